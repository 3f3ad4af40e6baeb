/**
 * Exact Jaccard Similarity
 *
 * Computes |A ∩ B| / |A ∪ B| directly on shingle sets. Used to check MinHash
 * estimates on small corpora; it is O(|A| + |B|) per pair, so it does not
 * scale the way signatures do.
 */

import type { DocumentShingles } from './minHash';
import type { SimilarityResult } from './estimator';

/**
 * @returns Similarity between 0 and 1; two empty sets count as identical
 */
export function jaccardSimilarity(setA: ReadonlySet<number>, setB: ReadonlySet<number>): number {
  if (setA.size === 0 && setB.size === 0) return 1;

  // Iterate the smaller set
  const [small, large] = setA.size <= setB.size ? [setA, setB] : [setB, setA];
  let intersection = 0;
  for (const value of small) {
    if (large.has(value)) intersection++;
  }

  const union = setA.size + setB.size - intersection;
  return intersection / union;
}

/**
 * Exact similarity for every pair, laid out like the estimator's results
 */
export function exactSimilarities(documents: readonly DocumentShingles[]): SimilarityResult[] {
  const results: SimilarityResult[] = [];
  for (let i = 0; i < documents.length; i++) {
    for (let j = i + 1; j < documents.length; j++) {
      results.push({
        indexA: i,
        indexB: j,
        similarity: jaccardSimilarity(documents[i].shingles, documents[j].shingles),
      });
    }
  }
  return results;
}

/**
 * Mean absolute difference between estimated and exact results that share
 * the same pair layout
 */
export function meanAbsoluteError(
  estimated: readonly SimilarityResult[],
  exact: readonly SimilarityResult[]
): number {
  if (estimated.length !== exact.length) {
    throw new Error(`Result count mismatch: ${estimated.length} vs ${exact.length}`);
  }
  if (estimated.length === 0) return 0;

  let total = 0;
  estimated.forEach((result, index) => {
    total += Math.abs(result.similarity - exact[index].similarity);
  });
  return total / estimated.length;
}
