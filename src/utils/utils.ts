// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Converts a 16-bit unsigned integer to a Uint8Array in Big Endian format.
 */
export function uint16ToBytesBE(value: number): Uint8Array {
  const buf: Uint8Array = new Uint8Array(2);
  buf[0] = (value >> 8) & 0xff;
  buf[1] = value & 0xff;
  return buf;
}

/**
 * Reads a 16-bit unsigned Big Endian integer.
 */
export function bytesToUint16BE(buf: Uint8Array, offset: number = 0): number {
  return ((buf[offset] ?? 0) << 8) | (buf[offset + 1] ?? 0);
}

/**
 * Returns a view on a slice of the input array (shared buffer).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

/**
 * Converts a Uint8Array to a hex string.
 * @param uint8arr - The Uint8Array to convert.
 * @param separator - Placed between bytes.
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const parts: string[] = [];
  for (const b of uint8arr) {
    parts.push((HEX_TABLE[(b >> 4) & 0xf] ?? '0') + (HEX_TABLE[b & 0xf] ?? '0'));
  }
  return parts.join(separator);
}

/**
 * Writes a signed 32-bit integer in Little Endian order.
 */
export function int32ToBytesLE(value: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setInt32(0, value, true);
  return buf;
}

/**
 * Reads a signed 32-bit Little Endian integer.
 */
export function bytesToInt32LE(buf: Uint8Array, offset: number = 0): number {
  return new DataView(buf.buffer, buf.byteOffset, buf.byteLength).getInt32(offset, true);
}

/**
 * Compares two Uint8Arrays byte by byte.
 */
export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i: number = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * True when every element is an integer 0-255.
 */
export function isByteArray(values: ArrayLike<number>): boolean {
  for (let i: number = 0; i < values.length; i++) {
    const b = values[i];
    if (b === undefined || !Number.isInteger(b) || b < 0 || b > 0xff) return false;
  }
  return true;
}
