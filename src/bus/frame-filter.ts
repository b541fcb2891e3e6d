// src/bus/frame-filter.ts

import { BusConfigError } from '../errors.js';
import { isValidIdentifier, maxIdentifier } from '../framers/can-framer.js';
import type { CanFrame, FrameFilter, FrameFormat } from '../types/fieldbus-types.js';

export const ACCEPT_ALL: FrameFilter = { kind: 'accept-all' };

/**
 * Checks a single filter against a frame.
 */
export function filterMatches(filter: FrameFilter, frame: Pick<CanFrame, 'identifier' | 'format'>): boolean {
  if (filter.kind === 'accept-all') return true;
  if (filter.format !== undefined && filter.format !== frame.format) return false;

  switch (filter.kind) {
    case 'exact':
      return frame.identifier === filter.identifier;
    case 'range':
      return frame.identifier >= filter.low && frame.identifier <= filter.high;
    case 'mask':
      return ((frame.identifier & filter.mask) >>> 0) === ((filter.match & filter.mask) >>> 0);
  }
}

/**
 * A node with no filters receives nothing.
 */
export function acceptsFrame(
  filters: readonly FrameFilter[],
  frame: Pick<CanFrame, 'identifier' | 'format'>
): boolean {
  return filters.some(filter => filterMatches(filter, frame));
}

/**
 * Validates filter bounds against the identifier widths.
 * @throws BusConfigError
 */
export function validateFilter(filter: FrameFilter): void {
  const format: FrameFormat = 'format' in filter && filter.format ? filter.format : 'extended';
  switch (filter.kind) {
    case 'accept-all':
      return;
    case 'exact':
      if (!isValidIdentifier(filter.identifier, format)) {
        throw new BusConfigError(`Exact filter identifier ${filter.identifier} is out of bounds`);
      }
      return;
    case 'range':
      if (
        !isValidIdentifier(filter.low, format) ||
        !isValidIdentifier(filter.high, format) ||
        filter.low > filter.high
      ) {
        throw new BusConfigError(`Range filter ${filter.low}-${filter.high} is invalid`);
      }
      return;
    case 'mask':
      if (
        !Number.isInteger(filter.mask) ||
        !Number.isInteger(filter.match) ||
        filter.mask < 0 ||
        filter.mask > maxIdentifier(format)
      ) {
        throw new BusConfigError(`Mask filter ${filter.mask}/${filter.match} is invalid`);
      }
      return;
  }
}

/**
 * Human-readable filter description for status output.
 */
export function describeFilter(filter: FrameFilter): string {
  const suffix = 'format' in filter && filter.format ? ` (${filter.format})` : '';
  switch (filter.kind) {
    case 'accept-all':
      return 'accept-all';
    case 'exact':
      return `0x${filter.identifier.toString(16).toUpperCase()}${suffix}`;
    case 'range':
      return `0x${filter.low.toString(16).toUpperCase()}-0x${filter.high.toString(16).toUpperCase()}${suffix}`;
    case 'mask':
      return `mask 0x${filter.mask.toString(16).toUpperCase()} / 0x${filter.match.toString(16).toUpperCase()}${suffix}`;
  }
}
