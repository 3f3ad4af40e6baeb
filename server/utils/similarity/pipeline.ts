/**
 * Similarity Pipeline
 *
 * Runs the three batch stages in order over an explicit, ordered document
 * list: shingle every document, sign every shingle set, then score every
 * pair. Result indices are positions in that list, not document ids.
 */

import { performance } from 'perf_hooks';
import { withSource } from '../../logger';
import { metrics } from '../../metrics';
import { ConfigurationError, EmptyCorpusError } from '../../types/errors';
import { throwIfCancelled, type CancellableOptions } from './cancellation';
import { cryptoEntropy, type EntropySource } from './entropy';
import {
  calculateSimilarities,
  calculateSimilaritiesAsync,
  pairCount,
  type SimilarityResult,
} from './estimator';
import { createHashFamily, type HashFunctionFamily } from './hashFamily';
import {
  MinHashSignatureGenerator,
  type DocumentShingles,
  type SignatureMatrix,
} from './minHash';
import { parsePipelineOptions, type PipelineOptions, type PipelineOptionsInput } from './options';
import { extractShingles } from './shingles';

const log = withSource('similarity-pipeline');

export interface CorpusDocument {
  /** Assigned by discovery order; not derived from content */
  id: number;
  /** Normalized text (see utils/corpus/normalizer) */
  text: string;
  /** Origin of the document, e.g. a file name */
  name?: string;
}

export interface PipelineDependencies {
  entropy?: EntropySource;
  /** Reuse an existing family instead of drawing a new one */
  family?: HashFunctionFamily;
}

export interface PipelineRunOptions extends CancellableOptions {
  minSimilarity?: number;
  /** Row partitions for runAsync's pairwise stage */
  partitions?: number;
}

export interface PipelineStats {
  documentCount: number;
  emptyDocuments: number;
  pairCount: number;
  resultCount: number;
  durations: {
    shingleMs: number;
    signatureMs: number;
    pairwiseMs: number;
  };
}

export interface PipelineResult {
  documents: DocumentShingles[];
  /** row() views are read-only; rows() returns copies */
  signatures: SignatureMatrix;
  results: SimilarityResult[];
  stats: PipelineStats;
}

interface PreparedRun {
  shingled: DocumentShingles[];
  signatures: SignatureMatrix;
  shingleMs: number;
  signatureMs: number;
  emptyDocuments: number;
}

export class SimilarityPipeline {
  readonly options: PipelineOptions;
  readonly family: HashFunctionFamily;
  private readonly generator: MinHashSignatureGenerator;

  constructor(options: PipelineOptionsInput = {}, deps: PipelineDependencies = {}) {
    this.options = parsePipelineOptions(options);

    if (deps.family && deps.family.size !== this.options.numHashes) {
      throw new ConfigurationError('Hash family size does not match numHashes', {
        familySize: deps.family.size,
        numHashes: this.options.numHashes,
      });
    }

    this.family = deps.family ?? createHashFamily(this.options.numHashes, {
      entropy: deps.entropy ?? cryptoEntropy,
    });
    this.generator = new MinHashSignatureGenerator(this.family);

    log.debug(
      { shingleSize: this.options.shingleSize, numHashes: this.options.numHashes },
      'Initialized similarity pipeline'
    );
  }

  /**
   * Shingle every document, keeping the input order
   */
  shingle(
    documents: readonly CorpusDocument[],
    options: CancellableOptions = {}
  ): DocumentShingles[] {
    return documents.map(doc => {
      throwIfCancelled(options.signal, 'shingling', { documentId: doc.id });
      return { id: doc.id, shingles: extractShingles(doc.text, this.options.shingleSize) };
    });
  }

  /**
   * Run all three stages synchronously
   */
  run(documents: readonly CorpusDocument[], options: PipelineRunOptions = {}): PipelineResult {
    const prepared = this.prepare(documents, options);

    const start = performance.now();
    const results = calculateSimilarities(prepared.signatures, options);
    const pairwiseMs = performance.now() - start;

    return this.finish(prepared, results, pairwiseMs);
  }

  /**
   * Same as run, but the pairwise stage yields to the event loop between
   * row partitions so it can be cancelled from an incoming abort
   */
  async runAsync(
    documents: readonly CorpusDocument[],
    options: PipelineRunOptions = {}
  ): Promise<PipelineResult> {
    const prepared = this.prepare(documents, options);

    const start = performance.now();
    const results = await calculateSimilaritiesAsync(prepared.signatures, options);
    const pairwiseMs = performance.now() - start;

    return this.finish(prepared, results, pairwiseMs);
  }

  private prepare(documents: readonly CorpusDocument[], options: CancellableOptions): PreparedRun {
    if (documents.length === 0) {
      throw new EmptyCorpusError();
    }

    let start = performance.now();
    const shingled = this.shingle(documents, options);
    const shingleMs = performance.now() - start;

    start = performance.now();
    const signatures = this.generator.signatures(shingled, options);
    const signatureMs = performance.now() - start;

    const emptyDocuments = shingled.filter(doc => doc.shingles.size === 0).length;
    if (emptyDocuments > 0) {
      log.debug(
        { emptyDocuments, shingleSize: this.options.shingleSize },
        'Documents shorter than shingle size produced empty signatures'
      );
    }

    return { shingled, signatures, shingleMs, signatureMs, emptyDocuments };
  }

  private finish(
    prepared: PreparedRun,
    results: SimilarityResult[],
    pairwiseMs: number
  ): PipelineResult {
    const { shingled, signatures, shingleMs, signatureMs, emptyDocuments } = prepared;
    const pairs = pairCount(shingled.length);

    metrics.observeStage('shingle', shingleMs);
    metrics.observeStage('signature', signatureMs);
    metrics.observeStage('pairwise', pairwiseMs);
    metrics.recordDocuments(shingled.length);
    metrics.recordPairs(pairs);

    const stats: PipelineStats = {
      documentCount: shingled.length,
      emptyDocuments,
      pairCount: pairs,
      resultCount: results.length,
      durations: { shingleMs, signatureMs, pairwiseMs },
    };

    log.info(stats, 'Similarity pipeline completed');

    return { documents: shingled, signatures, results, stats };
  }
}
