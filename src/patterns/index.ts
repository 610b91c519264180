/**
 * Pattern analysis: public API.
 */

export {
  extractPatternRecord,
  extractPatternRecords,
  flattenFeatures,
  featureKey,
  outcomeKey,
  gapRecoveryKey,
  GAP_KEY,
  DAYS_TO_HALF_GAP_KEY,
  DAYS_TO_FULL_GAP_KEY,
  present,
  missing,
  valueOf,
  validateWindowSpec,
} from './features.js';
export { correlatePatterns, findCorrelation, DEFAULT_MIN_PAIRS } from './correlation.js';
export {
  cosineSimilarity,
  normalizeFeatures,
  scaleRecord,
  scorePatternSimilarity,
  findSimilarPatterns,
  DEFAULT_TOP_K,
  DEFAULT_SIMILARITY_FLOOR,
  DEFAULT_MIN_SHARED_DIMENSIONS,
} from './similarity.js';
export {
  clusterPatterns,
  predictCluster,
  DEFAULT_K_RANGE,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_RANK_OUTCOME,
  MIN_CLUSTER_RECORDS,
} from './clustering.js';

export { FEATURE_NAMES } from './types.js';
export type {
  MissingReason,
  Measurement,
  FeatureWindow,
  WindowSpec,
  FeatureName,
  FeatureVector,
  PatternRecord,
  PatternBatch,
  CorrelateOptions,
  CorrelationValue,
  CorrelationEntry,
  SimilarityOptions,
  SimilarityValue,
  PairSimilarity,
  SimilarityMatch,
  FeatureScale,
  NormalizedFeatures,
  ClusterOptions,
  ClusterOutcome,
  PatternCluster,
  FeatureImportance,
  ClusteringResult,
  ClusterAssignment,
} from './types.js';
