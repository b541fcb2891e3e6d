// src/errors.ts

import type { FrameFormat, RangeCategory, TaskState } from './types/fieldbus-types.js';

function hex(value: number): string {
  return `0x${value.toString(16).toUpperCase()}`;
}

/**
 * Normalizes a caught value to an Error instance
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Base class for all field bus errors
 */
export class FieldBusError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FieldBusError';
  }
}

// --- Frame model ---

/**
 * Payload longer than 8 bytes or containing non-byte values
 */
export class InvalidPayloadError extends FieldBusError {
  constructor(public readonly reason: string) {
    super(`Invalid payload: ${reason}`);
    this.name = 'InvalidPayloadError';
  }
}

/**
 * Identifier outside the bit-width of its frame format
 */
export class InvalidIdentifierError extends FieldBusError {
  constructor(
    public readonly identifier: number,
    public readonly format: FrameFormat
  ) {
    super(
      `Invalid ${format} identifier: ${Number.isInteger(identifier) ? hex(identifier) : identifier}`
    );
    this.name = 'InvalidIdentifierError';
  }
}

/**
 * Integrity tag mismatch or malformed wire bytes
 */
export class CorruptFrameError extends FieldBusError {
  constructor(message: string = 'Frame integrity check failed') {
    super(message);
    this.name = 'CorruptFrameError';
  }
}

// --- Bus transport ---

export class BusNotActiveError extends FieldBusError {
  constructor(message: string = 'Bus is not active') {
    super(message);
    this.name = 'BusNotActiveError';
  }
}

export class QueueFullError extends FieldBusError {
  constructor(
    public readonly address: number,
    public readonly capacity: number
  ) {
    super(`Transmit queue of node ${hex(address)} is full (capacity ${capacity})`);
    this.name = 'QueueFullError';
  }
}

export class BusConfigError extends FieldBusError {
  constructor(message: string) {
    super(message);
    this.name = 'BusConfigError';
  }
}

export class NodeNotRegisteredError extends FieldBusError {
  constructor(public readonly nodeId: number) {
    super(`Node #${nodeId} is not registered on this bus`);
    this.name = 'NodeNotRegisteredError';
  }
}

export class NodeInactiveError extends FieldBusError {
  constructor(public readonly address: number) {
    super(`Node ${hex(address)} is inactive`);
    this.name = 'NodeInactiveError';
  }
}

export class DuplicateNodeAddressError extends FieldBusError {
  constructor(public readonly address: number) {
    super(`Address ${hex(address)} is already used by another node`);
    this.name = 'DuplicateNodeAddressError';
  }
}

// --- Addressing ---

export class RangeConflictError extends FieldBusError {
  constructor(
    public readonly category: RangeCategory,
    public readonly low: number,
    public readonly high: number,
    public readonly existingCategory: RangeCategory
  ) {
    super(
      `Range ${hex(low)}-${hex(high)} (${category}) overlaps a registered ${existingCategory} range`
    );
    this.name = 'RangeConflictError';
  }
}

export class InvalidRangeError extends FieldBusError {
  constructor(low: number, high: number, format: FrameFormat) {
    super(`Invalid ${format} identifier range: ${low}-${high}`);
    this.name = 'InvalidRangeError';
  }
}

export class UnknownAddressError extends FieldBusError {
  constructor(public readonly address: number) {
    super(`Unknown address: ${hex(address)}`);
    this.name = 'UnknownAddressError';
  }
}

export class RegistryFrozenError extends FieldBusError {
  constructor() {
    super('Identifier registry is frozen; registrations are only accepted before startup');
    this.name = 'RegistryFrozenError';
  }
}

export class UnclassifiedIdentifierError extends FieldBusError {
  constructor(
    public readonly identifier: number,
    public readonly format: FrameFormat
  ) {
    super(`Identifier ${hex(identifier)} (${format}) does not belong to any registered range`);
    this.name = 'UnclassifiedIdentifierError';
  }
}

// --- Application protocol ---

export class TaskNotActiveError extends FieldBusError {
  constructor(
    public readonly taskId: number,
    public readonly state: TaskState
  ) {
    super(`Task ${taskId} is not active (state: ${state})`);
    this.name = 'TaskNotActiveError';
  }
}

export class OutOfRangeError extends FieldBusError {
  constructor(
    public readonly value: number,
    public readonly low: number,
    public readonly high: number
  ) {
    super(`Value ${value} is outside the valid range [${low}, ${high}]`);
    this.name = 'OutOfRangeError';
  }
}

export class ProtocolTimeoutError extends FieldBusError {
  constructor(message: string = 'No response within the allowed time') {
    super(message);
    this.name = 'ProtocolTimeoutError';
  }
}

export class NoHandlerError extends FieldBusError {
  constructor(
    public readonly screenId: number,
    public readonly commandId: number
  ) {
    super(`No handler registered for screen ${screenId}, command ${hex(commandId)}`);
    this.name = 'NoHandlerError';
  }
}

export class UnknownTaskError extends FieldBusError {
  constructor(public readonly taskId: number) {
    super(`Unknown task: ${taskId}`);
    this.name = 'UnknownTaskError';
  }
}

export class UnknownParameterError extends FieldBusError {
  constructor(
    public readonly taskId: number,
    public readonly key: number | string
  ) {
    super(`Task ${taskId} has no parameter ${typeof key === 'number' ? hex(key) : `"${key}"`}`);
    this.name = 'UnknownParameterError';
  }
}

export class InvalidTransitionError extends FieldBusError {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Invalid transition: ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class RequestCancelledError extends FieldBusError {
  constructor(message: string = 'Request cancelled') {
    super(message);
    this.name = 'RequestCancelledError';
  }
}

/**
 * Inbound frame that does not fit the current exchange (unsolicited ack, wrong sender, bad opcode)
 */
export class ProtocolViolationError extends FieldBusError {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolViolationError';
  }
}
