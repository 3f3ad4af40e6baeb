/**
 * Word Shingle Extraction
 *
 * Turns normalized text into the set of k-word windows ("shingles") that
 * MinHash signatures are built from. Each window is hashed with CRC-32 so a
 * shingle is a plain unsigned 32-bit integer, stable across processes.
 *
 * Example with shingleSize=3:
 * "the cat sat on" -> {crc("the cat sat"), crc("cat sat on")}
 */

import CRC32 from 'crc-32';
import { ConfigurationError } from '../../types/errors';

export type ShingleSet = Set<number>;

/**
 * Hash a single shingle string to an unsigned 32-bit integer
 */
export function hashShingle(shingle: string): number {
  return CRC32.buf(Buffer.from(shingle, 'utf8')) >>> 0;
}

/**
 * Split normalized text into words, dropping empty tokens
 */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter(word => word.length > 0);
}

export function countWords(text: string): number {
  return splitWords(text).length;
}

/**
 * Generate the shingle set for already-normalized text.
 *
 * Text with fewer than `shingleSize` words yields an empty set; downstream
 * stages treat that like any other set (its signature is all sentinels).
 *
 * @param text - Normalized text (whitespace collapsed, punctuation removed, lowercased)
 * @param shingleSize - Number of consecutive words per shingle
 */
export function extractShingles(text: string, shingleSize: number): ShingleSet {
  if (!Number.isInteger(shingleSize) || shingleSize <= 0) {
    throw new ConfigurationError('shingleSize must be a positive integer', { shingleSize });
  }

  const words = splitWords(text);
  const shingles: ShingleSet = new Set();

  for (let i = 0; i <= words.length - shingleSize; i++) {
    const shingle = words.slice(i, i + shingleSize).join(' ');
    shingles.add(hashShingle(shingle));
  }

  return shingles;
}
