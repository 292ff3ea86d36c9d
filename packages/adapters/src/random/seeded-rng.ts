import type { RandomSource } from '@walkloop/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Gives the meander variant reproducible output when a seed is configured.
 */
export class SeededRng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

/** Unseeded source backed by Math.random. */
export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/** Wall-clock implementation used by services that need "now". */
export function wallClockNow(): Date {
  return new Date();
}
