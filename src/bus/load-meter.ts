// src/bus/load-meter.ts

import {
  EXTENDED_FRAME_OVERHEAD_BITS,
  STANDARD_FRAME_OVERHEAD_BITS,
} from '../constants/constants.js';
import type { CanFrame } from '../types/fieldbus-types.js';

/**
 * Bits a frame occupies on the medium (bit stuffing ignored).
 */
export function frameBits(frame: Pick<CanFrame, 'format' | 'dlc'>): number {
  const overhead =
    frame.format === 'extended' ? EXTENDED_FRAME_OVERHEAD_BITS : STANDARD_FRAME_OVERHEAD_BITS;
  return overhead + frame.dlc * 8;
}

/**
 * Sliding-window utilization: bits carried in the last `windowMs` against the bitrate capacity.
 */
export class LoadMeter {
  private samples: Array<{ at: number; bits: number }> = [];
  private windowBits: number = 0;

  constructor(
    private bitrate: number,
    private readonly windowMs: number
  ) {}

  public setBitrate(bitrate: number): void {
    this.bitrate = bitrate;
  }

  public record(bits: number, now: number = Date.now()): void {
    this.samples.push({ at: now, bits });
    this.windowBits += bits;
    this.prune(now);
  }

  /** Frames carried within the window */
  public framesInWindow(now: number = Date.now()): number {
    this.prune(now);
    return this.samples.length;
  }

  /** Load fraction 0.0–1.0 */
  public load(now: number = Date.now()): number {
    this.prune(now);
    const capacity = (this.bitrate * this.windowMs) / 1000;
    if (capacity <= 0) return 0;
    return Math.min(1, this.windowBits / capacity);
  }

  public reset(): void {
    this.samples = [];
    this.windowBits = 0;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.samples.length && (this.samples[drop]?.at ?? now) <= cutoff) {
      this.windowBits -= this.samples[drop]?.bits ?? 0;
      drop++;
    }
    if (drop > 0) this.samples.splice(0, drop);
  }
}
