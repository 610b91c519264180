/**
 * Batch recovery detection for one instrument.
 *
 * Per-event failures (no reference bar, no bars after the ex-date) are
 * collected, never thrown: one bad event must not abort the batch, and an
 * event without data must not be scored as a non-recovery.
 */

import { assertPositiveInt, assertRecoveryThreshold } from '../config/index.js';
import { EventNotFoundError, InsufficientDataError } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import type { DistributionEvent, PriceSeries } from '../series/types.js';
import { DEFAULT_MAX_HORIZON_DAYS, DEFAULT_RECOVERY_THRESHOLD, detectRecovery } from './detector.js';
import type { DetectOptions, EventFailure, RecoveryBatch } from './types.js';

const log = rootLogger.child({ component: 'recovery-batch' });

/** Narrow an error to the per-event kinds a batch isolates. */
export function toEventFailure(event: DistributionEvent, err: unknown): EventFailure | null {
  if (err instanceof EventNotFoundError || err instanceof InsufficientDataError) {
    return { event, code: err.code, message: err.message };
  }
  return null;
}

export function detectRecoveries(
  series: PriceSeries,
  events: readonly DistributionEvent[],
  options: DetectOptions = {},
): RecoveryBatch {
  // Validate once so a bad option fails the call instead of every event
  assertPositiveInt('maxHorizonDays', options.maxHorizonDays ?? DEFAULT_MAX_HORIZON_DAYS);
  assertRecoveryThreshold(options.recoveryThreshold ?? DEFAULT_RECOVERY_THRESHOLD);

  const batch: RecoveryBatch = { results: [], failures: [] };

  for (const event of events) {
    try {
      batch.results.push(detectRecovery(series, event, options));
    } catch (err) {
      const failure = toEventFailure(event, err);
      if (!failure) throw err;
      log.warn({ instrumentId: event.instrumentId, exDate: event.exDate, code: failure.code }, 'Event skipped');
      batch.failures.push(failure);
    }
  }

  log.debug({
    events: events.length,
    analyzed: batch.results.length,
    failed: batch.failures.length,
  }, 'Recovery batch complete');

  return batch;
}
