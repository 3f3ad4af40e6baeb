/**
 * Pairwise Similarity Estimation
 *
 * The fraction of positions where two MinHash signatures agree is an unbiased
 * estimate of the Jaccard similarity of the underlying shingle sets; the
 * variance shrinks as numHashes grows.
 *
 * Comparing every pair costs O(numDocs^2 * numHashes). This stage is the
 * limiting factor for corpus size: 10k documents already mean ~50M pairs.
 * Use iterateSimilarities (or a minSimilarity cutoff) to avoid holding every
 * pair in memory.
 */

import {
  throwIfCancelled,
  yieldToEventLoop,
  type CancellableOptions,
} from './cancellation';
import type { Signature, SignatureMatrix } from './minHash';

export interface SimilarityResult {
  /** Position of the first document in the signature matrix */
  indexA: number;
  /** Position of the second document; always greater than indexA */
  indexB: number;
  /** Estimated Jaccard similarity in [0, 1] */
  similarity: number;
}

export interface SimilarityOptions extends CancellableOptions {
  /** Pairs below this value are dropped while generating (default: keep all) */
  minSimilarity?: number;
}

export interface RowRange {
  startRow: number;
  endRow: number;
}

/**
 * Estimate similarity between two signatures
 *
 * @returns Fraction of matching positions, between 0 and 1
 */
export function estimateSimilarity(sig1: Signature, sig2: Signature): number {
  if (sig1.length !== sig2.length) {
    throw new Error(`Signature length mismatch: ${sig1.length} vs ${sig2.length}`);
  }
  if (sig1.length === 0) {
    throw new Error('Signatures must not be empty');
  }

  let matches = 0;
  for (let k = 0; k < sig1.length; k++) {
    if (sig1[k] === sig2[k]) {
      matches++;
    }
  }

  return matches / sig1.length;
}

/**
 * Yield every pair (i, j), i < j, in row-major order, one at a time
 */
export function* iterateSimilarities(
  matrix: SignatureMatrix,
  options: SimilarityOptions = {}
): Generator<SimilarityResult> {
  yield* iterateRows(matrix, { startRow: 0, endRow: matrix.numDocs }, options);
}

/**
 * Compare every pair of signatures and return the full result list
 */
export function calculateSimilarities(
  matrix: SignatureMatrix,
  options: SimilarityOptions = {}
): SimilarityResult[] {
  return Array.from(iterateSimilarities(matrix, options));
}

/**
 * Split rows into contiguous ranges holding roughly equal numbers of pairs.
 * Row i owns the pairs (i, j) for every j > i, so ranges never overlap.
 */
export function partitionRows(numDocs: number, partitions: number): RowRange[] {
  if (numDocs <= 0) return [];

  const count = Math.max(1, Math.min(Math.floor(partitions), numDocs));
  const totalPairs = (numDocs * (numDocs - 1)) / 2;
  const target = totalPairs / count;
  const ranges: RowRange[] = [];

  let start = 0;
  let accumulated = 0;
  for (let row = 0; row < numDocs; row++) {
    accumulated += numDocs - 1 - row;
    const canCut = ranges.length < count - 1 && row + 1 < numDocs;
    if (canCut && accumulated >= target * (ranges.length + 1)) {
      ranges.push({ startRow: start, endRow: row + 1 });
      start = row + 1;
    }
  }
  ranges.push({ startRow: start, endRow: numDocs });

  return ranges;
}

/**
 * Same results as calculateSimilarities, computed one row range at a time
 * with a yield to the event loop in between so a server stays responsive
 * and an abort from a closed connection is noticed.
 */
export async function calculateSimilaritiesAsync(
  matrix: SignatureMatrix,
  options: SimilarityOptions & { partitions?: number } = {}
): Promise<SimilarityResult[]> {
  const ranges = partitionRows(matrix.numDocs, options.partitions ?? 8);
  const results: SimilarityResult[] = [];

  for (const range of ranges) {
    for (const result of iterateRows(matrix, range, options)) {
      results.push(result);
    }
    await yieldToEventLoop();
  }

  throwIfCancelled(options.signal, 'pairwise similarity');
  return results;
}

/**
 * Number of unordered pairs for a corpus of the given size
 */
export function pairCount(numDocs: number): number {
  return numDocs > 1 ? (numDocs * (numDocs - 1)) / 2 : 0;
}

function* iterateRows(
  matrix: SignatureMatrix,
  range: RowRange,
  options: SimilarityOptions
): Generator<SimilarityResult> {
  const minSimilarity = options.minSimilarity ?? 0;

  for (let i = range.startRow; i < range.endRow; i++) {
    throwIfCancelled(options.signal, 'pairwise similarity', { row: i });
    const sig1 = matrix.row(i);

    for (let j = i + 1; j < matrix.numDocs; j++) {
      const similarity = estimateSimilarity(sig1, matrix.row(j));
      if (similarity >= minSimilarity) {
        yield { indexA: i, indexB: j, similarity };
      }
    }
  }
}
