// src/messages/virtual-terminal.ts

import { MAX_PAYLOAD_LENGTH } from '../constants/constants.js';
import { InvalidPayloadError, ProtocolViolationError } from '../errors.js';
import type { PayloadInput } from '../types/fieldbus-types.js';
import { isByteArray } from '../utils/utils.js';

const HEADER_SIZE = 3;
export const MAX_VT_DATA_LENGTH = MAX_PAYLOAD_LENGTH - HEADER_SIZE;

export interface VirtualTerminalPayload {
  commandId: number;
  screenId: number;
  data: Uint8Array;
}

/**
 * Operator interface frame: [commandId, screenId u16 LE, data (0-5 bytes)]
 */
export function buildVirtualTerminalMessage(
  commandId: number,
  screenId: number,
  data: PayloadInput = []
): Uint8Array {
  if (!Number.isInteger(commandId) || commandId < 0 || commandId > 0xff) {
    throw new RangeError(`Command id must be 0-255, got ${commandId}`);
  }
  if (!Number.isInteger(screenId) || screenId < 0 || screenId > 0xffff) {
    throw new RangeError(`Screen id must be 0-65535, got ${screenId}`);
  }
  if (data.length > MAX_VT_DATA_LENGTH) {
    throw new InvalidPayloadError(
      `operator interface data is ${data.length} bytes, at most ${MAX_VT_DATA_LENGTH} allowed`
    );
  }

  if (!isByteArray(data)) {
    throw new InvalidPayloadError('operator interface data must be byte values');
  }

  const payload = new Uint8Array(HEADER_SIZE + data.length);
  const view = new DataView(payload.buffer);
  view.setUint8(0, commandId);
  view.setUint16(1, screenId, true);
  payload.set(data, HEADER_SIZE);
  return payload;
}

/**
 * @throws ProtocolViolationError when the header is incomplete
 */
export function parseVirtualTerminalMessage(payload: Uint8Array): VirtualTerminalPayload {
  if (payload.length < HEADER_SIZE) {
    throw new ProtocolViolationError(`Operator interface payload too short: ${payload.length} bytes`);
  }
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return {
    commandId: view.getUint8(0),
    screenId: view.getUint16(1, true),
    data: payload.slice(HEADER_SIZE),
  };
}
