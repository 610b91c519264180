/**
 * Recovery detection & aggregation: public API.
 */

export {
  detectRecovery,
  resolveEventAnchor,
  DEFAULT_MAX_HORIZON_DAYS,
  DEFAULT_RECOVERY_THRESHOLD,
} from './detector.js';
export { detectRecoveries, toEventFailure } from './batch.js';
export {
  summarizeRecoveries,
  trySummarizeRecoveries,
  summarizeRecoveryGroups,
  DEFAULT_MIN_SAMPLE_SIZE,
  DEFAULT_PERCENTILES,
} from './aggregator.js';

export type {
  DetectOptions,
  RecoveryOutcome,
  RecoveryResult,
  EventFailure,
  RecoveryBatch,
  SummarizeOptions,
  PercentilePoint,
  SpeedBuckets,
  RecoveryStatistics,
  GroupSummary,
} from './types.js';
