/**
 * Recovery Aggregator
 *
 * Turns a population of RecoveryResults into win-rate and risk statistics.
 *
 *   winRate          = recovered / all results
 *   resolvedWinRate  = recovered / (all − truncated), where truncated means
 *                      unrecovered because the series ended early
 *   offset stats     = recovered results only
 *   drop / MAE means = all results
 *
 * Below minSampleSize the aggregator refuses to report: "not enough events
 * to judge" must stay distinguishable from "no events recovered".
 */

import { assertInRange, assertPositiveInt } from '../config/index.js';
import { InsufficientSampleError } from '../lib/errors.js';
import { mean, median, percentile, safeDivide } from '../lib/stats.js';
import type {
  GroupSummary,
  RecoveryResult,
  RecoveryStatistics,
  SpeedBuckets,
  SummarizeOptions,
} from './types.js';

export const DEFAULT_MIN_SAMPLE_SIZE = 20;
export const DEFAULT_PERCENTILES = [25, 50, 75, 90];

const FAST_MAX_OFFSET = 3;
const NORMAL_MAX_OFFSET = 7;

export function summarizeRecoveries(
  results: readonly RecoveryResult[],
  options: SummarizeOptions = {},
): RecoveryStatistics {
  const minSampleSize = options.minSampleSize ?? DEFAULT_MIN_SAMPLE_SIZE;
  const percentiles = options.percentiles ?? DEFAULT_PERCENTILES;
  assertPositiveInt('minSampleSize', minSampleSize);
  for (const p of percentiles) assertInRange('percentiles', p, 0, 100);

  const eventCount = results.length;
  if (eventCount < minSampleSize) {
    throw new InsufficientSampleError(eventCount, minSampleSize);
  }

  const offsets: number[] = [];
  let maxOffset: number | null = null;
  let truncatedCount = 0;
  for (const r of results) {
    if (r.recovered && r.recoveryOffset !== null) {
      offsets.push(r.recoveryOffset);
      if (maxOffset === null || r.recoveryOffset > maxOffset) maxOffset = r.recoveryOffset;
    } else if (r.outcome === 'data-exhausted') {
      truncatedCount++;
    }
  }
  const recoveredCount = offsets.length;

  const speedBuckets: SpeedBuckets = { fast: 0, normal: 0, slow: 0 };
  for (const o of offsets) {
    if (o <= FAST_MAX_OFFSET) speedBuckets.fast++;
    else if (o <= NORMAL_MAX_OFFSET) speedBuckets.normal++;
    else speedBuckets.slow++;
  }

  const offsetPercentiles = offsets.length === 0
    ? []
    : percentiles.map((p) => ({ percentile: p, offset: percentile(offsets, p) ?? 0 }));

  return {
    eventCount,
    recoveredCount,
    winRate: recoveredCount / eventCount,
    truncatedCount,
    resolvedWinRate: safeDivide(recoveredCount, eventCount - truncatedCount),
    meanRecoveryOffset: mean(offsets),
    medianRecoveryOffset: median(offsets),
    maxRecoveryOffset: maxOffset,
    offsetPercentiles,
    speedBuckets,
    meanObservedDrop: mean(results.map((r) => r.observedDrop)) ?? 0,
    meanTheoreticalDrop: mean(results.map((r) => r.theoreticalDrop)) ?? 0,
    meanMaxAdverseExcursion: mean(results.map((r) => r.maxAdverseExcursion)) ?? 0,
  };
}

/** Like summarizeRecoveries, but reports a short sample as a value. */
export function trySummarizeRecoveries(
  results: readonly RecoveryResult[],
  options: SummarizeOptions = {},
): GroupSummary {
  try {
    return { status: 'ok', statistics: summarizeRecoveries(results, options) };
  } catch (err) {
    if (!(err instanceof InsufficientSampleError)) throw err;
    return { status: 'insufficient-sample', count: err.count, required: err.required };
  }
}

/**
 * Summarize any caller-defined grouping (per instrument, per year, per
 * yield bucket…). Groups below the minimum sample are reported as such
 * instead of failing the whole call. Keys keep first-seen order.
 */
export function summarizeRecoveryGroups<K>(
  results: readonly RecoveryResult[],
  keyOf: (result: RecoveryResult) => K,
  options: SummarizeOptions = {},
): Map<K, GroupSummary> {
  const groups = new Map<K, RecoveryResult[]>();
  for (const r of results) {
    const key = keyOf(r);
    const bucket = groups.get(key);
    if (bucket) bucket.push(r);
    else groups.set(key, [r]);
  }

  const out = new Map<K, GroupSummary>();
  for (const [key, members] of groups) {
    out.set(key, trySummarizeRecoveries(members, options));
  }
  return out;
}
