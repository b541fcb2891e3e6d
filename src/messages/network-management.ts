// src/messages/network-management.ts

import {
  DEVICE_CAPABILITIES,
  NETWORK_OPCODES,
  ROLE_CODES,
} from '../constants/constants.js';
import type { DeviceCapability } from '../constants/constants.js';
import { ProtocolViolationError } from '../errors.js';
import type { DeviceRole } from '../types/fieldbus-types.js';

const ANNOUNCE_SIZE = 4;

export type NetworkMessage =
  | { opcode: 'announce'; role: DeviceRole; capabilities: DeviceCapability[] }
  | { opcode: 'connect-ack'; address: number }
  | { opcode: 'disconnect'; reason: number }
  | { opcode: 'heartbeat'; counter: number };

const CAPABILITY_NAMES = Object.keys(DEVICE_CAPABILITIES).filter(
  (name): name is DeviceCapability => name in DEVICE_CAPABILITIES
);

const ROLE_BY_CODE = new Map<number, DeviceRole>([
  [ROLE_CODES.controller, 'controller'],
  [ROLE_CODES['task-controller'], 'task-controller'],
  [ROLE_CODES['virtual-terminal'], 'virtual-terminal'],
  [ROLE_CODES.implement, 'implement'],
]);

export function encodeCapabilities(capabilities: readonly DeviceCapability[]): number {
  return capabilities.reduce<number>((mask, name) => mask | DEVICE_CAPABILITIES[name], 0);
}

export function decodeCapabilities(mask: number): DeviceCapability[] {
  return CAPABILITY_NAMES.filter(name => (mask & DEVICE_CAPABILITIES[name]) !== 0);
}

/**
 * Announcement: [opcode, role code, capabilities u16 LE]
 */
export function buildAnnounce(role: DeviceRole, capabilities: readonly DeviceCapability[] = []): Uint8Array {
  const buffer = new ArrayBuffer(ANNOUNCE_SIZE);
  const view = new DataView(buffer);

  view.setUint8(0, NETWORK_OPCODES.ANNOUNCE);
  view.setUint8(1, ROLE_CODES[role]);
  view.setUint16(2, encodeCapabilities(capabilities), true);

  return new Uint8Array(buffer);
}

export function buildConnectAck(address: number): Uint8Array {
  return Uint8Array.of(NETWORK_OPCODES.CONNECT_ACK, address & 0xff);
}

export function buildDisconnect(reason: number = 0): Uint8Array {
  return Uint8Array.of(NETWORK_OPCODES.DISCONNECT, reason & 0xff);
}

export function buildHeartbeat(counter: number): Uint8Array {
  return Uint8Array.of(NETWORK_OPCODES.HEARTBEAT, counter & 0xff);
}

/**
 * Parses a network management payload.
 * @throws ProtocolViolationError on unknown opcodes, role codes or short payloads
 */
export function parseNetworkMessage(payload: Uint8Array): NetworkMessage {
  const opcode = payload[0];
  switch (opcode) {
    case NETWORK_OPCODES.ANNOUNCE: {
      if (payload.length < ANNOUNCE_SIZE) {
        throw new ProtocolViolationError(`Announcement too short: ${payload.length} bytes`);
      }
      const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
      const role = ROLE_BY_CODE.get(view.getUint8(1));
      if (role === undefined) {
        throw new ProtocolViolationError(`Unknown role code 0x${view.getUint8(1).toString(16)}`);
      }
      return { opcode: 'announce', role, capabilities: decodeCapabilities(view.getUint16(2, true)) };
    }
    case NETWORK_OPCODES.CONNECT_ACK:
      return { opcode: 'connect-ack', address: requireByte(payload, 1, 'connect-ack') };
    case NETWORK_OPCODES.DISCONNECT:
      return { opcode: 'disconnect', reason: payload[1] ?? 0 };
    case NETWORK_OPCODES.HEARTBEAT:
      return { opcode: 'heartbeat', counter: payload[1] ?? 0 };
    default:
      throw new ProtocolViolationError(
        `Unknown network management opcode: ${opcode === undefined ? 'none' : `0x${opcode.toString(16)}`}`
      );
  }
}

function requireByte(payload: Uint8Array, index: number, message: string): number {
  const value = payload[index];
  if (value === undefined) {
    throw new ProtocolViolationError(`${message} payload too short: ${payload.length} bytes`);
  }
  return value;
}
