/**
 * Similarity Pipeline Unit Tests
 * End-to-end runs over small corpora with seeded hash families
 */

import { describe, it, expect } from 'vitest';
import { SimilarityPipeline } from '../../utils/similarity/pipeline';
import { DEFAULT_PIPELINE_OPTIONS, parsePipelineOptions } from '../../utils/similarity/options';
import { createSeededEntropy } from '../../utils/similarity/entropy';
import { createHashFamily, SIGNATURE_SENTINEL } from '../../utils/similarity/hashFamily';
import { MinHashSignatureGenerator } from '../../utils/similarity/minHash';
import { estimateSimilarity } from '../../utils/similarity/estimator';
import { ConfigurationError, EmptyCorpusError, OperationCancelledError } from '../../types/errors';
import testUtils from '../helpers/testUtils';

const corpus = testUtils.createDocuments([
  'the cat sat on the mat',
  'the cat sat on the rug',
  'completely unrelated text about space travel',
]);

function similarityOf(
  results: { indexA: number; indexB: number; similarity: number }[],
  indexA: number,
  indexB: number
): number | undefined {
  return results.find(r => r.indexA === indexA && r.indexB === indexB)?.similarity;
}

describe('Pipeline - Options', () => {
  it('should apply defaults', () => {
    expect(parsePipelineOptions()).toEqual(DEFAULT_PIPELINE_OPTIONS);
    expect(new SimilarityPipeline({}, { entropy: createSeededEntropy(1) }).options).toEqual({
      shingleSize: 3,
      numHashes: 100,
      similarityThreshold: 0.5,
    });
  });

  it.each([
    { shingleSize: 0 },
    { shingleSize: 2.5 },
    { numHashes: 0 },
    { numHashes: -4 },
    { similarityThreshold: 1.5 },
    { similarityThreshold: -0.1 },
  ])('should reject %o', options => {
    expect(() => new SimilarityPipeline(options)).toThrow(ConfigurationError);
  });

  it('should report which option failed', () => {
    try {
      parsePipelineOptions({ numHashes: 0 });
      expect.fail('Expected ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe('Invalid similarity pipeline options');
        expect(error.context).toMatchObject({ issues: [{ path: 'numHashes' }] });
      }
    }
  });

  it('should reject a supplied family of the wrong size', () => {
    const family = createHashFamily(10, { entropy: createSeededEntropy(1) });
    expect(() => new SimilarityPipeline({ numHashes: 20 }, { family })).toThrow(ConfigurationError);
  });

  it('should reuse a supplied family', () => {
    const family = createHashFamily(20, { entropy: createSeededEntropy(1) });
    expect(new SimilarityPipeline({ numHashes: 20 }, { family }).family).toBe(family);
  });
});

describe('Pipeline - End to End', () => {
  it('should find the near-duplicate pair', () => {
    const pipeline = new SimilarityPipeline(
      { shingleSize: 3, numHashes: 100 },
      { entropy: createSeededEntropy(42) }
    );
    const { results, stats } = pipeline.run(corpus);

    expect(results).toHaveLength(3);
    expect(similarityOf(results, 0, 1)).toBeGreaterThan(0.3);
    expect(similarityOf(results, 0, 2)).toBeLessThan(0.1);
    expect(similarityOf(results, 1, 2)).toBeLessThan(0.1);
    expect(stats).toMatchObject({
      documentCount: 3,
      emptyDocuments: 0,
      pairCount: 3,
      resultCount: 3,
    });
  });

  it('should be reproducible for the same seed', () => {
    const first = new SimilarityPipeline({}, { entropy: createSeededEntropy(7) }).run(corpus);
    const second = new SimilarityPipeline({}, { entropy: createSeededEntropy(7) }).run(corpus);

    expect(second.results).toEqual(first.results);
  });

  it('should keep shingle sets in input order', () => {
    const pipeline = new SimilarityPipeline({}, { entropy: createSeededEntropy(1) });
    const { documents, signatures } = pipeline.run(corpus);

    expect(documents.map(doc => doc.id)).toEqual([1, 2, 3]);
    expect(documents.map(doc => doc.shingles.size)).toEqual([4, 4, 4]);
    expect(signatures.documentIds).toEqual([1, 2, 3]);
  });

  it('should score identical documents as 1', () => {
    const docs = testUtils.createDocuments(['one two three four', 'one two three four']);
    const { results } = new SimilarityPipeline(
      { shingleSize: 2 },
      { entropy: createSeededEntropy(3) }
    ).run(docs);

    expect(results).toEqual([{ indexA: 0, indexB: 1, similarity: 1 }]);
  });

  it('should return no pairs for a single document', () => {
    const { results, stats } = new SimilarityPipeline({}, { entropy: createSeededEntropy(3) }).run(
      testUtils.createDocuments(['only one document here'])
    );

    expect(results).toEqual([]);
    expect(stats.pairCount).toBe(0);
  });

  it('should filter with minSimilarity', () => {
    const pipeline = new SimilarityPipeline({}, { entropy: createSeededEntropy(42) });
    const { results, stats } = pipeline.run(corpus, { minSimilarity: 0.3 });

    expect(results.map(r => [r.indexA, r.indexB])).toEqual([[0, 1]]);
    expect(stats.pairCount).toBe(3);
    expect(stats.resultCount).toBe(1);
  });
});

describe('Pipeline - Degenerate Documents', () => {
  it('should give documents shorter than the shingle size sentinel signatures', () => {
    const docs = testUtils.createDocuments(['too short', 'also tiny', 'a longer document with words']);
    const { signatures, stats, results } = new SimilarityPipeline(
      { shingleSize: 3, numHashes: 16 },
      { entropy: createSeededEntropy(5) }
    ).run(docs);

    expect(stats.emptyDocuments).toBe(2);
    expect(signatures.row(0).every(value => value === SIGNATURE_SENTINEL)).toBe(true);
    // Two empty documents agree on every slot
    expect(similarityOf(results, 0, 1)).toBe(1);
    expect(similarityOf(results, 0, 2)).toBe(0);
  });

  it('should treat an empty string as an empty document', () => {
    const docs = testUtils.createDocuments(['', 'one two three']);
    const { stats } = new SimilarityPipeline({}, { entropy: createSeededEntropy(5) }).run(docs);

    expect(stats.emptyDocuments).toBe(1);
  });
});

describe('Pipeline - Errors and Cancellation', () => {
  it('should reject an empty corpus', async () => {
    const pipeline = new SimilarityPipeline({}, { entropy: createSeededEntropy(1) });

    expect(() => pipeline.run([])).toThrow(EmptyCorpusError);
    await expect(pipeline.runAsync([])).rejects.toBeInstanceOf(EmptyCorpusError);
  });

  it('should stop before shingling when already aborted', () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = new SimilarityPipeline({}, { entropy: createSeededEntropy(1) });

    expect(() => pipeline.run(corpus, { signal: controller.signal })).toThrow(
      'Operation cancelled: shingling'
    );
  });

  it('should reject runAsync when aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const pipeline = new SimilarityPipeline({}, { entropy: createSeededEntropy(1) });

    await expect(pipeline.runAsync(corpus, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError
    );
  });
});

describe('Pipeline - Async', () => {
  it('should match the synchronous run', async () => {
    const docs = testUtils.createDocuments(
      Array.from({ length: 12 }, (_, i) => testUtils.createLongDocument(20 + i))
    );
    const family = createHashFamily(64, { entropy: createSeededEntropy(9) });
    const pipeline = new SimilarityPipeline({ numHashes: 64 }, { family });

    const sync = pipeline.run(docs);
    const asyncRun = await pipeline.runAsync(docs, { partitions: 4 });

    expect(asyncRun.results).toEqual(sync.results);
    expect(asyncRun.stats.pairCount).toBe(66);
  });
});

describe('Pipeline - Estimation Accuracy', () => {
  // |A ∩ B| / |A ∪ B| = 2 / 6
  const setA = new Set([1, 2, 3, 4]);
  const setB = new Set([3, 4, 5, 6]);

  function estimateWithSeed(seed: number): number {
    const family = createHashFamily(200, { entropy: createSeededEntropy(seed) });
    const generator = new MinHashSignatureGenerator(family);
    return estimateSimilarity(generator.signature(setA), generator.signature(setB));
  }

  it.each([1, 2, 3, 4, 5])('should stay near the true similarity for seed %i', seed => {
    const estimate = estimateWithSeed(seed);

    expect(estimate).toBeGreaterThanOrEqual(0.2);
    expect(estimate).toBeLessThanOrEqual(0.45);
  });

  it('should average close to the true similarity across seeds', () => {
    let total = 0;
    for (let seed = 1; seed <= 20; seed++) {
      total += estimateWithSeed(seed);
    }
    const mean = total / 20;

    // Consecutive small shingle values bias the linear family slightly low
    expect(mean).toBeGreaterThan(0.2);
    expect(mean).toBeLessThan(0.4);
  });
});
