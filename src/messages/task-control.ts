// src/messages/task-control.ts

import { TASK_OPCODES, TASK_STATUS_CODES } from '../constants/constants.js';
import { ProtocolViolationError } from '../errors.js';

export type TaskStatusCode = 'working' | 'idle' | 'finished' | 'failed';

export type TaskCommand = 'pause' | 'resume' | 'end';

export type TaskControlMessage =
  | { opcode: 'start'; taskId: number }
  | { opcode: 'ack'; taskId: number; accepted: boolean; code: number }
  | { opcode: 'status'; taskId: number; status: TaskStatusCode; progress: number }
  | { opcode: TaskCommand; taskId: number }
  | { opcode: 'abort'; taskId: number; reason: number };

const STATUS_BY_CODE = new Map<number, TaskStatusCode>([
  [TASK_STATUS_CODES.WORKING, 'working'],
  [TASK_STATUS_CODES.IDLE, 'idle'],
  [TASK_STATUS_CODES.FINISHED, 'finished'],
  [TASK_STATUS_CODES.FAILED, 'failed'],
]);

const STATUS_CODES: Record<TaskStatusCode, number> = {
  working: TASK_STATUS_CODES.WORKING,
  idle: TASK_STATUS_CODES.IDLE,
  finished: TASK_STATUS_CODES.FINISHED,
  failed: TASK_STATUS_CODES.FAILED,
};

const COMMAND_OPCODES: Record<TaskCommand, number> = {
  pause: TASK_OPCODES.PAUSE,
  resume: TASK_OPCODES.RESUME,
  end: TASK_OPCODES.END,
};

/**
 * Validates a task identifier on the wire: 1-254 name a task, 0xFF
 * (`BROADCAST_TASK_ID`) marks broadcast process data.
 */
export function validateTaskId(taskId: number): void {
  if (!Number.isInteger(taskId) || taskId < 1 || taskId > 0xff) {
    throw new RangeError(`Task id must be 1-255, got ${taskId}`);
  }
}

export function buildTaskStart(taskId: number): Uint8Array {
  validateTaskId(taskId);
  return Uint8Array.of(TASK_OPCODES.START, taskId);
}

/**
 * Ack: [opcode, taskId, result]; result 0 accepts, anything else rejects
 */
export function buildTaskAck(taskId: number, accepted: boolean = true, code: number = 1): Uint8Array {
  validateTaskId(taskId);
  return Uint8Array.of(TASK_OPCODES.ACK, taskId, accepted ? 0 : (code & 0xff) || 1);
}

export function buildTaskStatus(taskId: number, status: TaskStatusCode, progress: number = 0): Uint8Array {
  validateTaskId(taskId);
  const clamped = Math.max(0, Math.min(100, Math.round(progress)));
  return Uint8Array.of(TASK_OPCODES.STATUS, taskId, STATUS_CODES[status], clamped);
}

export function buildTaskCommand(command: TaskCommand, taskId: number): Uint8Array {
  validateTaskId(taskId);
  return Uint8Array.of(COMMAND_OPCODES[command], taskId);
}

export function buildTaskAbort(taskId: number, reason: number = 0): Uint8Array {
  validateTaskId(taskId);
  return Uint8Array.of(TASK_OPCODES.ABORT, taskId, reason & 0xff);
}

/**
 * Parses a task control payload.
 * @throws ProtocolViolationError
 */
export function parseTaskControlMessage(payload: Uint8Array): TaskControlMessage {
  const opcode = payload[0];
  const taskId = payload[1];
  if (opcode === undefined || taskId === undefined) {
    throw new ProtocolViolationError(`Task control payload too short: ${payload.length} bytes`);
  }

  switch (opcode) {
    case TASK_OPCODES.START:
      return { opcode: 'start', taskId };
    case TASK_OPCODES.ACK: {
      const code = payload[2] ?? 0;
      return { opcode: 'ack', taskId, accepted: code === 0, code };
    }
    case TASK_OPCODES.STATUS: {
      const status = STATUS_BY_CODE.get(payload[2] ?? -1);
      if (status === undefined) {
        throw new ProtocolViolationError(`Unknown task status code: ${String(payload[2])}`);
      }
      return { opcode: 'status', taskId, status, progress: payload[3] ?? 0 };
    }
    case TASK_OPCODES.PAUSE:
      return { opcode: 'pause', taskId };
    case TASK_OPCODES.RESUME:
      return { opcode: 'resume', taskId };
    case TASK_OPCODES.END:
      return { opcode: 'end', taskId };
    case TASK_OPCODES.ABORT:
      return { opcode: 'abort', taskId, reason: payload[2] ?? 0 };
    default:
      throw new ProtocolViolationError(`Unknown task control opcode: 0x${opcode.toString(16)}`);
  }
}
