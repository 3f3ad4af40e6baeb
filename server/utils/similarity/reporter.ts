/**
 * Similarity Report Rendering
 *
 * Threshold filtering and human-readable lines for pipeline results.
 * Lives outside the estimator: which pairs matter is a caller decision.
 */

import type { SimilarityResult } from './estimator';

export interface ReportOptions {
  threshold: number;
  /** Document ids by signature position; positions are printed when omitted */
  documentIds?: readonly number[];
  digits?: number;
}

/**
 * Keep results with similarity >= threshold, preserving order
 */
export function filterByThreshold(
  results: readonly SimilarityResult[],
  threshold: number
): SimilarityResult[] {
  return results.filter(result => result.similarity >= threshold);
}

export function formatSimilarityLine(
  result: SimilarityResult,
  documentIds?: readonly number[],
  digits: number = 8
): string {
  const labelA = documentIds?.[result.indexA] ?? result.indexA;
  const labelB = documentIds?.[result.indexB] ?? result.indexB;
  return `Document ${labelA} is similar to Document ${labelB} with similarity ${result.similarity.toFixed(digits)}`;
}

export function renderReport(
  results: readonly SimilarityResult[],
  options: ReportOptions
): string[] {
  return filterByThreshold(results, options.threshold).map(result =>
    formatSimilarityLine(result, options.documentIds, options.digits)
  );
}
