// src/messages/sensor-reading.ts

import { MAX_PAYLOAD_LENGTH, SENSOR_IDENTIFIERS } from '../constants/constants.js';
import type { SensorType } from '../constants/constants.js';
import { InvalidPayloadError } from '../errors.js';
import { bytesToInt32LE, bytesToUint16BE, int32ToBytesLE, uint16ToBytesBE } from '../utils/utils.js';

const SENSOR_VALUE_SCALE = 100;

export function sensorIdentifier(sensor: SensorType): number {
  return SENSOR_IDENTIFIERS[sensor];
}

/**
 * Sensor value on the wire: int32 LE of value x 100, padded with zeros to 8 bytes.
 */
export function encodeSensorValue(value: number): Uint8Array {
  const raw = Math.round(value * SENSOR_VALUE_SCALE);
  if (!Number.isFinite(raw) || raw < -0x80000000 || raw > 0x7fffffff) {
    throw new InvalidPayloadError(`sensor value ${value} does not fit a 32-bit field`);
  }
  const payload = new Uint8Array(MAX_PAYLOAD_LENGTH);
  payload.set(int32ToBytesLE(raw), 0);
  return payload;
}

export function decodeSensorValue(payload: Uint8Array): number {
  if (payload.length < 4) {
    throw new InvalidPayloadError(`sensor value needs 4 bytes, got ${payload.length}`);
  }
  return bytesToInt32LE(payload, 0) / SENSOR_VALUE_SCALE;
}

/**
 * Actuator command parameter: u16 BE
 */
export function encodeCommandValue(value: number): Uint8Array {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new RangeError(`Command value must be 0-65535, got ${value}`);
  }
  return uint16ToBytesBE(value);
}

export function decodeCommandValue(parameters: Uint8Array, offset: number = 0): number {
  if (parameters.length < offset + 2) {
    throw new InvalidPayloadError(`command value needs 2 bytes at offset ${offset}`);
  }
  return bytesToUint16BE(parameters, offset);
}
