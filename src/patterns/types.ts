/**
 * Pattern analysis: shared types.
 *
 * Every feature and outcome is a Measurement: either a present value or an
 * explicit missing marker with its reason. Downstream code never infers
 * absence from a missing key.
 */

import type { EventFailure } from '../recovery/types.js';

// ---------------------------------------------------------------------------
// Measurements
// ---------------------------------------------------------------------------

export type MissingReason =
  | 'out-of-bounds'    // window or baseline does not fit inside the series
  | 'too-few-bars'     // not enough bars for the statistic
  | 'zero-baseline'    // baseline volume averages zero
  | 'zero-price'       // division by a zero close
  | 'zero-volume'      // volume trend against a zero first-bar volume
  | 'zero-gap'         // gap recovery against an ex-date open equal to the reference
  | 'not-reached'      // gap recovery level not reached within the scanned bars
  | 'beyond-series';   // forward horizon past the last bar

export type Measurement =
  | { status: 'present'; value: number }
  | { status: 'missing'; reason: MissingReason };

// ---------------------------------------------------------------------------
// Windows & records
// ---------------------------------------------------------------------------

/**
 * Pre-event window in trading days relative to the ex-date, both ends
 * inclusive. −1 is the reference bar (last bar before the ex-date).
 */
export interface FeatureWindow {
  label: string;
  startOffset: number;
  endOffset: number;
}

export interface WindowSpec {
  windows: readonly FeatureWindow[];
  /** Trading days after the ex-date; outcome key is `D+${h}`. */
  forwardHorizons: readonly number[];
  /** Bars preceding the earliest window used as the volume baseline. */
  baselineDays: number;
}

export const FEATURE_NAMES = [
  'trend',
  'volatility',
  'volumeRatio',
  'maxDrawdown',
  'upDays',
  'downDays',
  'volumeTrend',
] as const;
export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = Record<FeatureName, Measurement>;

export interface PatternRecord {
  instrumentId: string;
  /** Ex-date as declared on the event. */
  exDate: string;
  /** Close of the last bar before the ex-date. */
  referencePrice: number;
  /** Keyed by window label. */
  features: Record<string, FeatureVector>;
  /**
   * Keyed by `D+${horizon}`, then the gap outcomes: `gap`,
   * `gapRecovery.D+${horizon}`, `daysToHalfGap`, `daysToFullGap`.
   */
  outcomes: Record<string, Measurement>;
}

export interface PatternBatch {
  records: PatternRecord[];
  failures: EventFailure[];
}

// ---------------------------------------------------------------------------
// Correlation
// ---------------------------------------------------------------------------

export interface CorrelateOptions {
  /** Paired observations needed per cell. Default 3. */
  minPairs?: number;
  /** Drop defined cells with |r| below this. Default 0. */
  minAbsCorrelation?: number;
}

export type CorrelationValue =
  | { status: 'defined'; r: number }
  | { status: 'undefined'; reason: 'too-few-pairs' | 'zero-variance' };

export interface CorrelationEntry {
  /** `${windowLabel}.${featureName}` */
  featureKey: string;
  /** `D+${horizon}` */
  outcomeKey: string;
  pairs: number;
  correlation: CorrelationValue;
}

// ---------------------------------------------------------------------------
// Similarity
// ---------------------------------------------------------------------------

export interface SimilarityOptions {
  /** Default 5. */
  topK?: number;
  /** Default 0.8. */
  similarityFloor?: number;
  /** Shared non-missing dimensions needed for a score. Default 2. */
  minSharedDimensions?: number;
}

export type SimilarityValue =
  | { status: 'defined'; similarity: number; sharedDimensions: number }
  | { status: 'undefined'; reason: 'too-few-shared-dimensions' | 'zero-norm'; sharedDimensions: number };

export interface FeatureScale {
  key: string;
  mean: number;
  /** Population standard deviation; never 0. */
  stdDev: number;
}

export interface NormalizedFeatures {
  scales: FeatureScale[];
  rows: Array<Array<number | null>>;
}

export interface PairSimilarity {
  index: number;
  value: SimilarityValue;
}

export interface SimilarityMatch {
  index: number;
  instrumentId: string;
  exDate: string;
  similarity: number;
  sharedDimensions: number;
}

// ---------------------------------------------------------------------------
// Clustering
// ---------------------------------------------------------------------------

export interface ClusterOptions {
  /** Fixed cluster count. Chosen by silhouette over `kRange` when omitted. */
  k?: number;
  /** Candidate cluster counts, both ends inclusive. Default [2, 8]. */
  kRange?: readonly [number, number];
  /** Default 100. */
  maxIterations?: number;
  /** Outcome key ranking clusters best to worst. Default `D+10`. */
  rankOutcome?: string;
}

export interface ClusterOutcome {
  outcomeKey: string;
  /** Members with the outcome present. */
  observations: number;
  mean: number | null;
  /** Share of present values above zero. */
  positiveRate: number | null;
}

export interface PatternCluster {
  id: number;
  /** Population indices. */
  members: number[];
  /** Centroid in z-score space, one value per `featureKeys` entry. */
  centroid: number[];
  /** Mean Euclidean distance of members to the centroid. */
  cohesion: number;
  outcomes: ClusterOutcome[];
}

export interface FeatureImportance {
  featureKey: string;
  /** Between-cluster share of variance, scaled so the top feature is 1. */
  importance: number;
}

export interface ClusteringResult {
  k: number;
  /** Mean silhouette; null with fewer than two non-empty clusters. */
  silhouette: number | null;
  /** Silhouette per tried k when k was chosen automatically. */
  candidates: Array<{ k: number; silhouette: number | null }>;
  featureKeys: string[];
  scales: FeatureScale[];
  /** Cluster id per record, in population order. */
  labels: number[];
  clusters: PatternCluster[];
  featureImportance: FeatureImportance[];
  rankOutcome: string;
  bestClusterId: number | null;
  worstClusterId: number | null;
}

export interface ClusterAssignment {
  clusterId: number;
  distance: number;
  cluster: PatternCluster;
}
