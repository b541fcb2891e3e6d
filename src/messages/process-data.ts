// src/messages/process-data.ts

import { PROCESS_DATA_OPCODES } from '../constants/constants.js';
import { InvalidPayloadError, ProtocolViolationError } from '../errors.js';
import { validateTaskId } from './task-control.js';

const PAYLOAD_SIZE = 8;
const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

export const DEFAULT_VALUE_SCALE = 100;

export type ProcessDataValueOpcode = 'set' | 'set-ack' | 'request' | 'response' | 'initial';

export type ProcessDataMessage =
  | { opcode: ProcessDataValueOpcode; taskId: number; ddi: number; rawValue: number }
  | { opcode: 'nack'; taskId: number; ddi: number; reason: number };

const OPCODES: Record<ProcessDataValueOpcode | 'nack', number> = {
  set: PROCESS_DATA_OPCODES.SET_VALUE,
  'set-ack': PROCESS_DATA_OPCODES.SET_ACK,
  request: PROCESS_DATA_OPCODES.REQUEST_VALUE,
  response: PROCESS_DATA_OPCODES.RESPONSE_VALUE,
  initial: PROCESS_DATA_OPCODES.INITIAL_VALUE,
  nack: PROCESS_DATA_OPCODES.SET_NACK,
};

const OPCODE_NAMES = new Map<number, ProcessDataValueOpcode>([
  [PROCESS_DATA_OPCODES.SET_VALUE, 'set'],
  [PROCESS_DATA_OPCODES.SET_ACK, 'set-ack'],
  [PROCESS_DATA_OPCODES.REQUEST_VALUE, 'request'],
  [PROCESS_DATA_OPCODES.RESPONSE_VALUE, 'response'],
  [PROCESS_DATA_OPCODES.INITIAL_VALUE, 'initial'],
]);

/**
 * Engineering value -> int32 wire value
 * @throws InvalidPayloadError when the scaled value does not fit in int32
 */
export function toWireValue(value: number, scale: number = DEFAULT_VALUE_SCALE): number {
  const raw = Math.round(value * scale);
  if (!Number.isFinite(raw) || raw < INT32_MIN || raw > INT32_MAX) {
    throw new InvalidPayloadError(`value ${value} does not fit a 32-bit process data field`);
  }
  return raw;
}

export function fromWireValue(raw: number, scale: number = DEFAULT_VALUE_SCALE): number {
  return raw / scale;
}

function validateDdi(ddi: number): void {
  if (!Number.isInteger(ddi) || ddi < 0 || ddi > 0xffff) {
    throw new RangeError(`DDI must be 0-65535, got ${ddi}`);
  }
}

/**
 * Process data frame: [opcode, taskId, ddi u16 LE, value int32 LE]
 */
export function buildProcessData(
  opcode: ProcessDataValueOpcode,
  taskId: number,
  ddi: number,
  rawValue: number = 0
): Uint8Array {
  validateTaskId(taskId);
  validateDdi(ddi);

  const buffer = new ArrayBuffer(PAYLOAD_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, OPCODES[opcode]);
  view.setUint8(1, taskId);
  view.setUint16(2, ddi, true);
  view.setInt32(4, rawValue, true);

  return new Uint8Array(buffer);
}

/**
 * Negative acknowledgement: [opcode, taskId, ddi u16 LE, reason, 0, 0, 0]
 */
export function buildProcessDataNack(taskId: number, ddi: number, reason: number): Uint8Array {
  validateTaskId(taskId);
  validateDdi(ddi);

  const buffer = new ArrayBuffer(PAYLOAD_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, OPCODES.nack);
  view.setUint8(1, taskId);
  view.setUint16(2, ddi, true);
  view.setUint8(4, reason & 0xff);

  return new Uint8Array(buffer);
}

/**
 * Parses a process data payload.
 * @throws ProtocolViolationError on wrong length or unknown opcode
 */
export function parseProcessData(payload: Uint8Array): ProcessDataMessage {
  if (payload.length !== PAYLOAD_SIZE) {
    throw new ProtocolViolationError(
      `Invalid process data length: expected ${PAYLOAD_SIZE}, got ${payload.length}`
    );
  }

  const view = new DataView(payload.buffer, payload.byteOffset, PAYLOAD_SIZE);
  const opcode = view.getUint8(0);
  const taskId = view.getUint8(1);
  const ddi = view.getUint16(2, true);

  if (opcode === PROCESS_DATA_OPCODES.SET_NACK) {
    return { opcode: 'nack', taskId, ddi, reason: view.getUint8(4) };
  }

  const name = OPCODE_NAMES.get(opcode);
  if (name === undefined) {
    throw new ProtocolViolationError(`Unknown process data opcode: 0x${opcode.toString(16)}`);
  }
  return { opcode: name, taskId, ddi, rawValue: view.getInt32(4, true) };
}
