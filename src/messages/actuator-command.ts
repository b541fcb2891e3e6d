// src/messages/actuator-command.ts

import { MAX_PAYLOAD_LENGTH } from '../constants/constants.js';
import { InvalidPayloadError, ProtocolViolationError } from '../errors.js';
import type { PayloadInput } from '../types/fieldbus-types.js';
import { isByteArray } from '../utils/utils.js';

export const MAX_COMMAND_PARAMETERS = MAX_PAYLOAD_LENGTH - 1;

export interface ActuatorCommand {
  command: number;
  parameters: Uint8Array;
}

/**
 * Actuator frame identifier for a node address
 */
export function actuatorIdentifier(baseIdentifier: number, address: number): number {
  return baseIdentifier + address;
}

/**
 * Actuator payload: [command, ...parameters]
 */
export function buildActuatorCommand(command: number, parameters: PayloadInput = []): Uint8Array {
  if (!Number.isInteger(command) || command < 0 || command > 0xff) {
    throw new RangeError(`Command code must be 0-255, got ${command}`);
  }
  if (parameters.length > MAX_COMMAND_PARAMETERS) {
    throw new InvalidPayloadError(
      `${parameters.length} command parameters, at most ${MAX_COMMAND_PARAMETERS} allowed`
    );
  }
  if (!isByteArray(parameters)) {
    throw new InvalidPayloadError('command parameters must be byte values');
  }
  const payload = new Uint8Array(1 + parameters.length);
  payload[0] = command;
  payload.set(parameters, 1);
  return payload;
}

export function parseActuatorCommand(payload: Uint8Array): ActuatorCommand {
  const command = payload[0];
  if (command === undefined) {
    throw new ProtocolViolationError('Empty actuator command');
  }
  return { command, parameters: payload.slice(1) };
}
