// src/utils/crc.ts

const CRC15_CAN_POLYNOMIAL = 0x4599;

const CRC15_TABLE: Uint16Array = new Uint16Array(256);
(function initCrc15Table(): void {
  for (let i: number = 0; i < 256; i++) {
    let crc: number = i << 7;
    for (let j: number = 0; j < 8; j++) {
      crc = crc & 0x4000 ? ((crc << 1) ^ CRC15_CAN_POLYNOMIAL) & 0x7fff : (crc << 1) & 0x7fff;
    }
    CRC15_TABLE[i] = crc;
  }
})();

/**
 * Calculates CRC-15/CAN (polynomial 0x4599, init 0x0000, no reflection) for the given bytes.
 * @param buffer - input data
 * @returns 2-byte array with the 15-bit CRC in big-endian format
 */
function crc15Can(buffer: Uint8Array): Uint8Array {
  let crc: number = 0;
  for (const byte of buffer) {
    const index: number = ((crc >> 7) ^ byte) & 0xff;
    crc = ((crc << 8) ^ (CRC15_TABLE[index] ?? 0)) & 0x7fff;
  }
  return new Uint8Array([(crc >> 8) & 0xff, crc & 0xff]);
}

export { crc15Can };
