/**
 * Universal Hash Function Family
 *
 * MinHash needs numHashes independent hash functions. We use the classic
 * universal family h(x) = (a*x + b) mod p, where p is a prime just above the
 * largest shingle value and a, b are drawn at random per function slot.
 */

import { ConfigurationError } from '../../types/errors';
import { cryptoEntropy, drawInRange, MAX_UINT32, type EntropySource } from './entropy';

/** Largest value a CRC-32 shingle hash can take */
export const MAX_SHINGLE_VALUE = MAX_UINT32;

/** First prime above 2^32 - 1 */
export const NEXT_PRIME = 4294967311;

/** Stored in a signature slot that no shingle lowered (empty shingle sets) */
export const SIGNATURE_SENTINEL = NEXT_PRIME + 1;

// Keeps every intermediate product in mulAddMod below 2^53
const MAX_SUPPORTED_PRIME = 2 ** 36;
const HALF_WORD = 0x1_0000;

export interface HashFunctionFamily {
  readonly a: readonly number[];
  readonly b: readonly number[];
  readonly prime: number;
  readonly maxShingleValue: number;
  readonly size: number;
}

export interface HashFamilyOptions {
  entropy?: EntropySource;
  maxShingleValue?: number;
  prime?: number;
}

/**
 * Pick `count` distinct random integers in [0, bound] by rejection sampling.
 *
 * Draws repeat until the set holds exactly `count` values, however many
 * duplicates come up along the way.
 */
export function pickRandomCoefficients(
  count: number,
  bound: number,
  entropy: EntropySource = cryptoEntropy
): number[] {
  if (!Number.isInteger(count) || count <= 0) {
    throw new ConfigurationError('numHashes must be a positive integer', { numHashes: count });
  }
  if (count > bound + 1) {
    throw new ConfigurationError('Cannot draw more distinct coefficients than the range holds', {
      count,
      bound,
    });
  }

  const picked = new Set<number>();
  while (picked.size < count) {
    picked.add(drawInRange(entropy, bound));
  }
  return Array.from(picked);
}

/**
 * Generate a family of `numHashes` hash functions. The `a` pool is drawn in
 * full before the `b` pool, so a seeded source reproduces both exactly.
 */
export function createHashFamily(
  numHashes: number,
  options: HashFamilyOptions = {}
): HashFunctionFamily {
  const {
    entropy = cryptoEntropy,
    maxShingleValue = MAX_SHINGLE_VALUE,
    prime = NEXT_PRIME,
  } = options;

  if (!Number.isInteger(prime) || prime <= maxShingleValue || prime > MAX_SUPPORTED_PRIME) {
    throw new ConfigurationError('prime must be an integer above the maximum shingle value', {
      prime,
      maxShingleValue,
    });
  }

  const a = Object.freeze(pickRandomCoefficients(numHashes, maxShingleValue, entropy));
  const b = Object.freeze(pickRandomCoefficients(numHashes, maxShingleValue, entropy));

  return Object.freeze({
    a,
    b,
    prime,
    maxShingleValue,
    size: numHashes,
  });
}

/**
 * Compute (a*x + b) mod p exactly with doubles.
 *
 * a*x can reach 2^64, so `a` is split into 16-bit halves and each partial
 * product is reduced before it is combined.
 */
export function mulAddMod(a: number, x: number, b: number, p: number): number {
  const aHi = Math.floor(a / HALF_WORD);
  const aLo = a % HALF_WORD;

  let result = (aHi * x) % p;
  result = (result * HALF_WORD) % p;
  result = (result + aLo * x) % p;
  return (result + b) % p;
}

/**
 * Evaluate hash function `index` of the family on shingle value `x`
 */
export function applyHash(family: HashFunctionFamily, index: number, x: number): number {
  return mulAddMod(family.a[index], x, family.b[index], family.prime);
}
