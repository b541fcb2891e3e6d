import { describe, it, expect } from 'vitest';
import { CanFramer, decodeFrame, encodeFrame, isValidIdentifier } from '../src/framers/can-framer.js';
import { crc15Can } from '../src/utils/crc.js';
import { CorruptFrameError, InvalidIdentifierError, InvalidPayloadError } from '../src/errors.js';

describe('crc15Can', () => {
  it('matches the CRC-15/CAN check value', () => {
    const bytes = new TextEncoder().encode('123456789');
    expect(Array.from(crc15Can(bytes))).toEqual([0x05, 0x9e]);
  });

  it('returns zero for empty input', () => {
    expect(Array.from(crc15Can(new Uint8Array(0)))).toEqual([0, 0]);
  });
});

describe('CanFramer', () => {
  it('encodes a standard frame as flags, identifier, payload and tag', () => {
    const frame = encodeFrame(0x101, [0x19]);

    expect(frame.identifier).toBe(0x101);
    expect(frame.format).toBe('standard');
    expect(frame.dlc).toBe(1);
    expect(Array.from(frame.payload)).toEqual([0x19]);
    expect(frame.tag).toBe(0x3617);
    expect(Array.from(frame.raw)).toEqual([0x01, 0x00, 0x00, 0x01, 0x01, 0x19, 0x36, 0x17]);
  });

  it('sets the extended flag for 29-bit identifiers', () => {
    const frame = encodeFrame(0x0ceef710, [0x01, 0x02], 'extended');

    expect(Array.from(frame.raw)).toEqual([0x82, 0x0c, 0xee, 0xf7, 0x10, 0x01, 0x02, 0x63, 0xc6]);
    expect(decodeFrame(frame.raw)).toEqual({
      identifier: 0x0ceef710,
      format: 'extended',
      payload: Uint8Array.of(0x01, 0x02),
    });
  });

  it('accepts an empty payload', () => {
    const frame = encodeFrame(0x7ff, []);
    expect(frame.dlc).toBe(0);
    expect(frame.raw.length).toBe(7);
    expect(decodeFrame(frame.raw).payload.length).toBe(0);
  });

  it('rejects identifiers wider than the format', () => {
    expect(() => encodeFrame(0x800, [])).toThrow(InvalidIdentifierError);
    expect(() => encodeFrame(0x20000000, [], 'extended')).toThrow(InvalidIdentifierError);
    expect(() => encodeFrame(-1, [])).toThrow(InvalidIdentifierError);
    expect(isValidIdentifier(0x1fffffff, 'extended')).toBe(true);
  });

  it('rejects payloads longer than 8 bytes or with non-byte values', () => {
    expect(() => encodeFrame(0x100, new Uint8Array(9))).toThrow(InvalidPayloadError);
    expect(() => encodeFrame(0x100, [1, 2, 3, 4, 5, 6, 7, 8, 9])).toThrow(InvalidPayloadError);
    expect(() => encodeFrame(0x100, [256])).toThrow(InvalidPayloadError);
    expect(() => encodeFrame(0x100, [1.5])).toThrow(InvalidPayloadError);
  });

  it('detects a flipped payload bit', () => {
    const raw = Uint8Array.from(encodeFrame(0x101, [0x19]).raw);
    raw[5] = 0x18;
    expect(() => decodeFrame(raw)).toThrow(CorruptFrameError);
  });

  it('rejects frames whose length disagrees with the DLC', () => {
    const raw = encodeFrame(0x101, [0x19, 0x20]).raw;
    expect(() => decodeFrame(raw.slice(0, raw.length - 1))).toThrow(CorruptFrameError);
    expect(() => decodeFrame(new Uint8Array(3))).toThrow(CorruptFrameError);
  });

  it('checks that carried fields agree with the wire bytes', () => {
    const framer = new CanFramer();
    const frame = framer.encode(0x101, [0x19]);
    expect(framer.decodeFrame(frame).identifier).toBe(0x101);
    expect(() => framer.decodeFrame({ ...frame, identifier: 0x102 })).toThrow(CorruptFrameError);
  });

  it('uses a custom tag function', () => {
    const framer = new CanFramer(() => Uint8Array.of(0xaa));
    const frame = framer.encode(0x100, [1]);
    expect(Array.from(frame.raw)).toEqual([0x01, 0x00, 0x00, 0x01, 0x00, 0x01, 0xaa]);
    expect(frame.tag).toBe(0xaa);
    expect(framer.decode(frame.raw).payload).toEqual(Uint8Array.of(1));
  });
});
