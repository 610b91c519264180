/**
 * Correlation Analyzer
 *
 * Pearson r between every pre-event feature (window.feature) and every
 * forward outcome (D+H) across a population of PatternRecords.
 *
 * Pairwise-complete: each cell uses only the records where both values are
 * present, so a missing window on one event does not drop that event from
 * unrelated cells.
 *
 * Ordering: defined cells by |r| descending, ties by feature key then outcome
 * key; undefined cells follow in key order.
 */

import { assertInRange, assertPositiveInt } from '../config/index.js';
import { logger as rootLogger } from '../lib/logger.js';
import { pearson } from '../lib/stats.js';
import { flattenFeatures, valueOf } from './features.js';
import type { CorrelateOptions, CorrelationEntry, PatternRecord } from './types.js';

const log = rootLogger.child({ component: 'pattern-correlation' });

export const DEFAULT_MIN_PAIRS = 3;

function compareKeys(a: CorrelationEntry, b: CorrelationEntry): number {
  if (a.featureKey !== b.featureKey) return a.featureKey < b.featureKey ? -1 : 1;
  if (a.outcomeKey !== b.outcomeKey) return a.outcomeKey < b.outcomeKey ? -1 : 1;
  return 0;
}

function compareEntries(a: CorrelationEntry, b: CorrelationEntry): number {
  const ca = a.correlation;
  const cb = b.correlation;
  if (ca.status === 'defined' && cb.status === 'defined') {
    const diff = Math.abs(cb.r) - Math.abs(ca.r);
    if (diff !== 0) return diff;
    return compareKeys(a, b);
  }
  if (ca.status === 'defined') return -1;
  if (cb.status === 'defined') return 1;
  return compareKeys(a, b);
}

export function correlatePatterns(
  patterns: readonly PatternRecord[],
  options: CorrelateOptions = {},
): CorrelationEntry[] {
  const minPairs = options.minPairs ?? DEFAULT_MIN_PAIRS;
  const minAbsCorrelation = options.minAbsCorrelation ?? 0;
  assertPositiveInt('minCorrelationPairs', minPairs, 2);
  assertInRange('minAbsCorrelation', minAbsCorrelation, 0, 1);

  // Per record lookups; key union keeps first-seen order
  const featureRows = patterns.map((p) => new Map(
    flattenFeatures(p).map(({ key, measurement }) => [key, valueOf(measurement)]),
  ));
  const featureKeys = [...new Set(featureRows.flatMap((row) => [...row.keys()]))];
  const outcomeKeys = [...new Set(patterns.flatMap((p) => Object.keys(p.outcomes)))];

  const entries: CorrelationEntry[] = [];
  for (const featureKey of featureKeys) {
    for (const outcomeKey of outcomeKeys) {
      const xs: number[] = [];
      const ys: number[] = [];
      for (let i = 0; i < patterns.length; i++) {
        const x = featureRows[i].get(featureKey) ?? null;
        const outcome = patterns[i].outcomes[outcomeKey];
        const y = outcome ? valueOf(outcome) : null;
        if (x !== null && y !== null) {
          xs.push(x);
          ys.push(y);
        }
      }

      if (xs.length < minPairs) {
        entries.push({ featureKey, outcomeKey, pairs: xs.length, correlation: { status: 'undefined', reason: 'too-few-pairs' } });
        continue;
      }
      const r = pearson(xs, ys);
      if (r === null) {
        entries.push({ featureKey, outcomeKey, pairs: xs.length, correlation: { status: 'undefined', reason: 'zero-variance' } });
        continue;
      }
      if (Math.abs(r) < minAbsCorrelation) continue;
      entries.push({ featureKey, outcomeKey, pairs: xs.length, correlation: { status: 'defined', r } });
    }
  }

  entries.sort(compareEntries);

  log.debug({
    records: patterns.length,
    cells: entries.length,
    defined: entries.filter((e) => e.correlation.status === 'defined').length,
  }, 'Correlation table built');

  return entries;
}

/** Look up one cell of a correlation table. */
export function findCorrelation(
  entries: readonly CorrelationEntry[],
  featureKey: string,
  outcomeKey: string,
): CorrelationEntry | undefined {
  return entries.find((e) => e.featureKey === featureKey && e.outcomeKey === outcomeKey);
}
