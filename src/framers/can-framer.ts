// src/framers/can-framer.ts

import { crc15Can } from '../utils/crc.js';
import { arraysEqual, concatUint8Arrays, sliceUint8Array, toHex } from '../utils/utils.js';
import { CorruptFrameError, InvalidIdentifierError, InvalidPayloadError } from '../errors.js';
import {
  MAX_EXTENDED_IDENTIFIER,
  MAX_PAYLOAD_LENGTH,
  MAX_STANDARD_IDENTIFIER,
} from '../constants/constants.js';
import type {
  CanFrame,
  DecodedFrame,
  FrameFormat,
  PayloadInput,
  TagFunction,
} from '../types/fieldbus-types.js';

const HEADER_SIZE = 5;
const EXTENDED_FLAG = 0x80;
const DLC_MASK = 0x0f;

/**
 * Highest identifier allowed for a frame format
 */
export function maxIdentifier(format: FrameFormat): number {
  return format === 'extended' ? MAX_EXTENDED_IDENTIFIER : MAX_STANDARD_IDENTIFIER;
}

export function isValidIdentifier(identifier: number, format: FrameFormat): boolean {
  return Number.isInteger(identifier) && identifier >= 0 && identifier <= maxIdentifier(format);
}

function toPayload(payload: PayloadInput): Uint8Array {
  if (payload instanceof Uint8Array) {
    if (payload.length > MAX_PAYLOAD_LENGTH) {
      throw new InvalidPayloadError(`length ${payload.length} exceeds ${MAX_PAYLOAD_LENGTH} bytes`);
    }
    return Uint8Array.from(payload);
  }
  if (!Array.isArray(payload)) {
    throw new InvalidPayloadError('payload must be a Uint8Array or an array of bytes');
  }
  if (payload.length > MAX_PAYLOAD_LENGTH) {
    throw new InvalidPayloadError(`length ${payload.length} exceeds ${MAX_PAYLOAD_LENGTH} bytes`);
  }
  const bad = payload.find(b => !Number.isInteger(b) || b < 0 || b > 0xff);
  if (bad !== undefined) {
    throw new InvalidPayloadError(`${String(bad)} is not a byte value`);
  }
  return Uint8Array.from(payload);
}

/**
 * Builds and parses frames on the wire: [flags][identifier u32 BE][payload][tag].
 * Flags carry the extended bit (0x80) and the DLC (low nibble).
 */
export class CanFramer {
  private readonly tagLength: number;

  constructor(private readonly tagFn: TagFunction = crc15Can) {
    this.tagLength = tagFn(new Uint8Array(0)).length;
  }

  public encode(identifier: number, payload: PayloadInput, format: FrameFormat = 'standard'): CanFrame {
    if (!isValidIdentifier(identifier, format)) {
      throw new InvalidIdentifierError(identifier, format);
    }
    const data = toPayload(payload);

    const header = new Uint8Array(HEADER_SIZE);
    const view = new DataView(header.buffer);
    view.setUint8(0, (format === 'extended' ? EXTENDED_FLAG : 0) | data.length);
    view.setUint32(1, identifier, false);

    const body = concatUint8Arrays([header, data]);
    const tagBytes = this.tagFn(body);

    return {
      identifier,
      format,
      payload: data,
      dlc: data.length,
      tag: tagValue(tagBytes),
      raw: concatUint8Arrays([body, tagBytes]),
    };
  }

  public decode(raw: Uint8Array): DecodedFrame {
    if (raw.length < HEADER_SIZE + this.tagLength) {
      throw new CorruptFrameError(`Frame too short: ${raw.length} bytes`);
    }

    const flags = raw[0] ?? 0;
    const dlc = flags & DLC_MASK;
    const format: FrameFormat = flags & EXTENDED_FLAG ? 'extended' : 'standard';

    if (dlc > MAX_PAYLOAD_LENGTH || raw.length !== HEADER_SIZE + dlc + this.tagLength) {
      throw new CorruptFrameError(`Length ${raw.length} does not match DLC ${dlc}`);
    }

    const body = sliceUint8Array(raw, 0, HEADER_SIZE + dlc);
    const receivedTag = sliceUint8Array(raw, HEADER_SIZE + dlc);
    const calculatedTag = this.tagFn(body);
    if (!arraysEqual(receivedTag, calculatedTag)) {
      throw new CorruptFrameError(
        `Tag mismatch: received ${toHex(receivedTag)}, calculated ${toHex(calculatedTag)}`
      );
    }

    const identifier = new DataView(raw.buffer, raw.byteOffset, raw.byteLength).getUint32(1, false);
    if (!isValidIdentifier(identifier, format)) {
      throw new CorruptFrameError(`Identifier 0x${identifier.toString(16)} exceeds the ${format} width`);
    }

    return {
      identifier,
      format,
      payload: Uint8Array.from(sliceUint8Array(raw, HEADER_SIZE, HEADER_SIZE + dlc)),
    };
  }

  /**
   * Decodes an encoded frame and checks that its carried fields agree with the wire bytes.
   */
  public decodeFrame(frame: CanFrame): DecodedFrame {
    const decoded = this.decode(frame.raw);
    if (
      decoded.identifier !== frame.identifier ||
      decoded.format !== frame.format ||
      !arraysEqual(decoded.payload, frame.payload) ||
      tagValue(sliceUint8Array(frame.raw, -this.tagLength)) !== frame.tag
    ) {
      throw new CorruptFrameError('Frame fields disagree with its wire bytes');
    }
    return decoded;
  }
}

function tagValue(bytes: Uint8Array): number {
  let value = 0;
  for (const b of bytes) value = (value << 8) | b;
  return value >>> 0;
}

const defaultFramer = new CanFramer();

/**
 * Encodes a frame with the default CRC-15 tag.
 */
export function encodeFrame(
  identifier: number,
  payload: PayloadInput,
  format: FrameFormat = 'standard'
): CanFrame {
  return defaultFramer.encode(identifier, payload, format);
}

/**
 * Decodes raw wire bytes produced by {@link encodeFrame}.
 */
export function decodeFrame(raw: Uint8Array): DecodedFrame {
  return defaultFramer.decode(raw);
}
