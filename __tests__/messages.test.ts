import { describe, it, expect } from 'vitest';
import {
  buildAnnounce,
  buildConnectAck,
  buildDisconnect,
  buildHeartbeat,
  decodeCapabilities,
  encodeCapabilities,
  parseNetworkMessage,
} from '../src/messages/network-management.js';
import {
  buildTaskAbort,
  buildTaskAck,
  buildTaskCommand,
  buildTaskStart,
  buildTaskStatus,
  parseTaskControlMessage,
} from '../src/messages/task-control.js';
import {
  buildProcessData,
  buildProcessDataNack,
  fromWireValue,
  parseProcessData,
  toWireValue,
} from '../src/messages/process-data.js';
import { buildVirtualTerminalMessage, parseVirtualTerminalMessage } from '../src/messages/virtual-terminal.js';
import { buildActuatorCommand, parseActuatorCommand } from '../src/messages/actuator-command.js';
import {
  decodeCommandValue,
  decodeSensorValue,
  encodeCommandValue,
  encodeSensorValue,
  sensorIdentifier,
} from '../src/messages/sensor-reading.js';
import { InvalidPayloadError, ProtocolViolationError } from '../src/errors.js';

describe('network management', () => {
  it('encodes an announcement with role code and capability mask', () => {
    const payload = buildAnnounce('implement', ['RATE_CONTROL', 'PROCESS_DATA']);
    expect(Array.from(payload)).toEqual([0x01, 0x03, 0x12, 0x00]);
    expect(parseNetworkMessage(payload)).toEqual({
      opcode: 'announce',
      role: 'implement',
      capabilities: ['RATE_CONTROL', 'PROCESS_DATA'],
    });
  });

  it('maps capability names to bits and back', () => {
    expect(encodeCapabilities(['SECTION_CONTROL', 'FERTILIZER'])).toBe(0x41);
    expect(decodeCapabilities(0x41)).toEqual(['SECTION_CONTROL', 'FERTILIZER']);
  });

  it('encodes connect-ack, disconnect and heartbeat', () => {
    expect(Array.from(buildConnectAck(0x10))).toEqual([0x02, 0x10]);
    expect(Array.from(buildDisconnect(4))).toEqual([0x03, 0x04]);
    expect(Array.from(buildHeartbeat(0x101))).toEqual([0x04, 0x01]);
    expect(parseNetworkMessage(Uint8Array.of(0x03))).toEqual({ opcode: 'disconnect', reason: 0 });
  });

  it('rejects unknown opcodes, role codes and short payloads', () => {
    expect(() => parseNetworkMessage(Uint8Array.of(0x09))).toThrow(ProtocolViolationError);
    expect(() => parseNetworkMessage(Uint8Array.of(0x01, 0x09, 0, 0))).toThrow(ProtocolViolationError);
    expect(() => parseNetworkMessage(Uint8Array.of(0x01, 0x03))).toThrow(ProtocolViolationError);
    expect(() => parseNetworkMessage(Uint8Array.of(0x02))).toThrow(ProtocolViolationError);
    expect(() => parseNetworkMessage(new Uint8Array(0))).toThrow(ProtocolViolationError);
  });
});

describe('task control', () => {
  it('encodes start, status, commands and abort', () => {
    expect(Array.from(buildTaskStart(7))).toEqual([0x01, 7]);
    expect(Array.from(buildTaskStatus(7, 'working', 42.4))).toEqual([0x03, 7, 0x00, 42]);
    expect(Array.from(buildTaskStatus(7, 'finished', 150))).toEqual([0x03, 7, 0x02, 100]);
    expect(Array.from(buildTaskCommand('pause', 7))).toEqual([0x04, 7]);
    expect(Array.from(buildTaskCommand('resume', 7))).toEqual([0x05, 7]);
    expect(Array.from(buildTaskCommand('end', 7))).toEqual([0x06, 7]);
    expect(Array.from(buildTaskAbort(7, 2))).toEqual([0x07, 7, 2]);
  });

  it('encodes acceptance as result 0 and rejection as a non-zero code', () => {
    expect(Array.from(buildTaskAck(3))).toEqual([0x02, 3, 0]);
    expect(Array.from(buildTaskAck(3, false))).toEqual([0x02, 3, 1]);
    expect(Array.from(buildTaskAck(3, false, 0))).toEqual([0x02, 3, 1]);
    expect(parseTaskControlMessage(Uint8Array.of(0x02, 3, 5))).toEqual({
      opcode: 'ack',
      taskId: 3,
      accepted: false,
      code: 5,
    });
  });

  it('parses status frames', () => {
    expect(parseTaskControlMessage(buildTaskStatus(9, 'failed', 10))).toEqual({
      opcode: 'status',
      taskId: 9,
      status: 'failed',
      progress: 10,
    });
    expect(() => parseTaskControlMessage(Uint8Array.of(0x03, 9, 0x08, 0))).toThrow(ProtocolViolationError);
  });

  it('validates task ids and opcodes', () => {
    expect(() => buildTaskStart(0)).toThrow(RangeError);
    expect(() => buildTaskStart(256)).toThrow(RangeError);
    expect(() => buildTaskAbort(256)).toThrow('Task id must be 1-255, got 256');
    expect(Array.from(buildTaskAbort(0xff))).toEqual([0x07, 0xff, 0x00]);
    expect(() => parseTaskControlMessage(Uint8Array.of(0x01))).toThrow(ProtocolViolationError);
    expect(() => parseTaskControlMessage(Uint8Array.of(0x0f, 1))).toThrow(ProtocolViolationError);
  });
});

describe('process data', () => {
  it('scales engineering values to int32', () => {
    expect(toWireValue(95)).toBe(9500);
    expect(toWireValue(1.005, 1000)).toBe(1005);
    expect(fromWireValue(-250)).toBe(-2.5);
    expect(() => toWireValue(3e7)).toThrow(InvalidPayloadError);
  });

  it('encodes [opcode, task, ddi LE, value LE]', () => {
    const payload = buildProcessData('set', 1, 0x0001, 9500);
    expect(Array.from(payload)).toEqual([0x01, 0x01, 0x01, 0x00, 0x1c, 0x25, 0x00, 0x00]);
    expect(parseProcessData(payload)).toEqual({ opcode: 'set', taskId: 1, ddi: 1, rawValue: 9500 });
  });

  it('keeps negative values', () => {
    const payload = buildProcessData('response', 2, 0x0102, -1);
    expect(Array.from(payload)).toEqual([0x04, 0x02, 0x02, 0x01, 0xff, 0xff, 0xff, 0xff]);
    expect(parseProcessData(payload)).toEqual({ opcode: 'response', taskId: 2, ddi: 0x0102, rawValue: -1 });
  });

  it('encodes negative acknowledgements with a reason', () => {
    const payload = buildProcessDataNack(1, 5, 2);
    expect(Array.from(payload)).toEqual([0x06, 0x01, 0x05, 0x00, 0x02, 0x00, 0x00, 0x00]);
    expect(parseProcessData(payload)).toEqual({ opcode: 'nack', taskId: 1, ddi: 5, reason: 2 });
  });

  it('rejects wrong lengths and unknown opcodes', () => {
    expect(() => parseProcessData(new Uint8Array(7))).toThrow(ProtocolViolationError);
    expect(() => parseProcessData(Uint8Array.of(0x09, 1, 0, 0, 0, 0, 0, 0))).toThrow(ProtocolViolationError);
    expect(() => buildProcessData('set', 1, 0x10000)).toThrow(RangeError);
  });
});

describe('operator interface', () => {
  it('encodes command, screen and data', () => {
    const payload = buildVirtualTerminalMessage(0x10, 0x1234, [1, 2]);
    expect(Array.from(payload)).toEqual([0x10, 0x34, 0x12, 1, 2]);
    expect(parseVirtualTerminalMessage(payload)).toEqual({
      commandId: 0x10,
      screenId: 0x1234,
      data: Uint8Array.of(1, 2),
    });
  });

  it('limits data to five bytes', () => {
    expect(() => buildVirtualTerminalMessage(1, 1, [1, 2, 3, 4, 5, 6])).toThrow(InvalidPayloadError);
    expect(() => buildVirtualTerminalMessage(1, 0x10000)).toThrow(RangeError);
    expect(() => parseVirtualTerminalMessage(Uint8Array.of(1, 2))).toThrow(ProtocolViolationError);
  });
});

describe('domain payloads', () => {
  it('maps sensor types to identifiers', () => {
    expect(sensorIdentifier('humidity')).toBe(0x101);
    expect(sensorIdentifier('npk')).toBe(0x104);
  });

  it('encodes sensor values as int32 LE hundredths padded to 8 bytes', () => {
    const payload = encodeSensorValue(21.5);
    expect(Array.from(payload)).toEqual([0x66, 0x08, 0, 0, 0, 0, 0, 0]);
    expect(decodeSensorValue(payload)).toBe(21.5);
    expect(decodeSensorValue(encodeSensorValue(-3.25))).toBe(-3.25);
    expect(() => decodeSensorValue(Uint8Array.of(0x19))).toThrow(InvalidPayloadError);
  });

  it('encodes command values as u16 BE', () => {
    expect(Array.from(encodeCommandValue(0x1234))).toEqual([0x12, 0x34]);
    expect(decodeCommandValue(Uint8Array.of(0, 0x01, 0xf4), 1)).toBe(500);
    expect(() => encodeCommandValue(70000)).toThrow(RangeError);
  });

  it('builds actuator commands with up to seven parameters', () => {
    const payload = buildActuatorCommand(0x03, encodeCommandValue(500));
    expect(Array.from(payload)).toEqual([0x03, 0x01, 0xf4]);
    expect(parseActuatorCommand(payload)).toEqual({ command: 0x03, parameters: Uint8Array.of(0x01, 0xf4) });
    expect(() => buildActuatorCommand(1, [1, 2, 3, 4, 5, 6, 7, 8])).toThrow(InvalidPayloadError);
    expect(() => parseActuatorCommand(new Uint8Array(0))).toThrow(ProtocolViolationError);
  });
});
