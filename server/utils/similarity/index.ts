/**
 * Similarity Module
 *
 * Shingling, MinHash signatures and pairwise similarity estimation
 */

export {
  extractShingles,
  hashShingle,
  splitWords,
  countWords,
  type ShingleSet,
} from './shingles';

export {
  createSeededEntropy,
  cryptoEntropy,
  drawInRange,
  type EntropySource,
} from './entropy';

export {
  createHashFamily,
  pickRandomCoefficients,
  applyHash,
  mulAddMod,
  MAX_SHINGLE_VALUE,
  NEXT_PRIME,
  SIGNATURE_SENTINEL,
  type HashFunctionFamily,
  type HashFamilyOptions,
} from './hashFamily';

export {
  MinHashSignatureGenerator,
  SignatureMatrix,
  isEmptySignature,
  sentinelFor,
  type Signature,
  type DocumentShingles,
} from './minHash';

export {
  estimateSimilarity,
  calculateSimilarities,
  calculateSimilaritiesAsync,
  iterateSimilarities,
  partitionRows,
  pairCount,
  type SimilarityResult,
  type SimilarityOptions,
  type RowRange,
} from './estimator';

export { jaccardSimilarity, exactSimilarities, meanAbsoluteError } from './jaccard';

export {
  parsePipelineOptions,
  PipelineOptionsSchema,
  DEFAULT_PIPELINE_OPTIONS,
  type PipelineOptions,
  type PipelineOptionsInput,
} from './options';

export {
  SimilarityPipeline,
  type CorpusDocument,
  type PipelineDependencies,
  type PipelineRunOptions,
  type PipelineResult,
  type PipelineStats,
} from './pipeline';

export {
  filterByThreshold,
  formatSimilarityLine,
  renderReport,
  type ReportOptions,
} from './reporter';
