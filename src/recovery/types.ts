/**
 * Recovery detection & aggregation: shared types.
 */

import type { DistributionEvent } from '../series/types.js';
import type { AnalyticsErrorCode } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Detector
// ---------------------------------------------------------------------------

export interface DetectOptions {
  /** Trading days after the ex-date to search, inclusive. Default 30. */
  maxHorizonDays?: number;
  /** Multiplier applied to the reference price. Default 1.0 (full recovery). */
  recoveryThreshold?: number;
}

/**
 * Why the walk stopped.
 *   recovered         : a close reached the target
 *   horizon-exhausted : every bar through maxHorizonDays was examined
 *   data-exhausted    : the series ended before maxHorizonDays
 */
export type RecoveryOutcome = 'recovered' | 'horizon-exhausted' | 'data-exhausted';

export interface RecoveryResult {
  event: DistributionEvent;
  /** Trading day the ex-date was matched to. */
  exDate: string;
  referenceDate: string;
  referencePrice: number;
  exDateOpen: number;
  exDateClose: number;
  /** referencePrice × recoveryThreshold */
  targetPrice: number;
  /** amount ÷ referencePrice */
  theoreticalDrop: number;
  declaredDrop: number | null;
  /** (referencePrice − exDateClose) ÷ referencePrice */
  observedDrop: number;
  /** (referencePrice − exDateOpen) ÷ referencePrice */
  openingGap: number;
  recovered: boolean;
  /** Trading days after the ex-date, 0 = same day. */
  recoveryOffset: number | null;
  recoveryDate: string | null;
  recoveryClose: number | null;
  /** Lowest walked close ÷ referencePrice − 1. */
  maxAdverseExcursion: number;
  barsExamined: number;
  outcome: RecoveryOutcome;
}

// ---------------------------------------------------------------------------
// Batch
// ---------------------------------------------------------------------------

export interface EventFailure {
  event: DistributionEvent;
  code: AnalyticsErrorCode;
  message: string;
}

export interface RecoveryBatch {
  results: RecoveryResult[];
  failures: EventFailure[];
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export interface SummarizeOptions {
  /** Refuse to report below this many results. Default 20. */
  minSampleSize?: number;
  /** Offset percentiles (0–100). Default [25, 50, 75, 90]. */
  percentiles?: number[];
}

export interface PercentilePoint {
  percentile: number;
  offset: number;
}

export interface SpeedBuckets {
  /** Recovered within 3 trading days. */
  fast: number;
  /** Recovered in 4–7 trading days. */
  normal: number;
  /** Recovered after more than 7 trading days. */
  slow: number;
}

export interface RecoveryStatistics {
  eventCount: number;
  recoveredCount: number;
  /** recoveredCount ÷ eventCount */
  winRate: number;
  /** Unrecovered results whose series ended before the horizon. */
  truncatedCount: number;
  /** recoveredCount ÷ (eventCount − truncatedCount) */
  resolvedWinRate: number;
  meanRecoveryOffset: number | null;
  medianRecoveryOffset: number | null;
  maxRecoveryOffset: number | null;
  offsetPercentiles: PercentilePoint[];
  speedBuckets: SpeedBuckets;
  meanObservedDrop: number;
  meanTheoreticalDrop: number;
  meanMaxAdverseExcursion: number;
}

export type GroupSummary =
  | { status: 'ok'; statistics: RecoveryStatistics }
  | { status: 'insufficient-sample'; count: number; required: number };
