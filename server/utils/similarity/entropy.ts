/**
 * Injectable entropy sources for hash-family generation.
 *
 * Production runs draw from the crypto module; tests and reproducible runs
 * pass a seeded source so the same seed always yields the same coefficients.
 */

import { randomInt } from 'crypto';
import { ConfigurationError } from '../../types/errors';

const UINT32_RANGE = 0x1_0000_0000;
export const MAX_UINT32 = 0xffff_ffff;

export interface EntropySource {
  /** Uniform integer in [0, 2^32 - 1] */
  nextUint32(): number;
}

/**
 * Seeded source using the mulberry32 generator (full 32-bit output range)
 */
export function createSeededEntropy(seed: number): EntropySource {
  let state = seed >>> 0;
  return {
    nextUint32() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return (t ^ (t >>> 14)) >>> 0;
    },
  };
}

// randomInt's upper bound is exclusive and must stay below 2^48
export const cryptoEntropy: EntropySource = {
  nextUint32() {
    return randomInt(0, UINT32_RANGE);
  },
};

/**
 * Draw a uniform integer in [0, bound] without modulo bias
 */
export function drawInRange(source: EntropySource, bound: number): number {
  if (!Number.isInteger(bound) || bound < 0 || bound > MAX_UINT32) {
    throw new ConfigurationError('bound must be an integer in [0, 2^32 - 1]', { bound });
  }
  if (bound === MAX_UINT32) {
    return source.nextUint32();
  }

  const span = bound + 1;
  const limit = UINT32_RANGE - (UINT32_RANGE % span);
  let value = source.nextUint32();
  while (value >= limit) {
    value = source.nextUint32();
  }
  return value % span;
}
