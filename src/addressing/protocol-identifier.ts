// src/addressing/protocol-identifier.ts

import { FieldBusError } from '../errors.js';
import { MAX_NODE_ADDRESS } from '../constants/constants.js';
import type { ProtocolIdentifier } from '../types/fieldbus-types.js';

const PRIORITY_SHIFT = 26;
const PDU_FORMAT_SHIFT = 16;
const DESTINATION_SHIFT = 8;

/**
 * Packs application fields into a 29-bit identifier:
 * priority (3) | PDU format (8) | destination (8) | source (8).
 */
export function composeIdentifier({ priority, pduFormat, destination, source }: ProtocolIdentifier): number {
  const fieldsValid =
    Number.isInteger(priority) && priority >= 0 && priority <= 7 &&
    [pduFormat, destination, source].every(
      field => Number.isInteger(field) && field >= 0 && field <= MAX_NODE_ADDRESS
    );
  if (!fieldsValid) {
    throw new FieldBusError(
      `Invalid identifier fields: priority=${priority} pf=${pduFormat} da=${destination} sa=${source}`
    );
  }
  return (
    ((priority << PRIORITY_SHIFT) |
      (pduFormat << PDU_FORMAT_SHIFT) |
      (destination << DESTINATION_SHIFT) |
      source) >>>
    0
  );
}

export function parseIdentifier(identifier: number): ProtocolIdentifier {
  return {
    priority: (identifier >>> PRIORITY_SHIFT) & 0x07,
    pduFormat: (identifier >>> PDU_FORMAT_SHIFT) & 0xff,
    destination: (identifier >>> DESTINATION_SHIFT) & 0xff,
    source: identifier & 0xff,
  };
}
