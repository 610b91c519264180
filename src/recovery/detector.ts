/**
 * Recovery Detector
 *
 * For one distribution event, finds the first trading day on/after the
 * ex-date whose close reclaims the reference price (the last close before
 * the ex-date) scaled by the recovery threshold.
 *
 *   offset 0            = the ex-date bar itself (same-day recovery)
 *   offset maxHorizon   = last bar examined
 *
 * Pure: no logging, no I/O, identical inputs give identical results.
 */

import { assertPositiveInt, assertRecoveryThreshold } from '../config/index.js';
import { EventNotFoundError, InsufficientDataError } from '../lib/errors.js';
import { locateExDate } from '../series/locate.js';
import type { DistributionEvent, PriceSeries } from '../series/types.js';
import type { DetectOptions, RecoveryOutcome, RecoveryResult } from './types.js';

export const DEFAULT_MAX_HORIZON_DAYS = 30;
export const DEFAULT_RECOVERY_THRESHOLD = 1.0;

/**
 * Resolve the reference bar and the matched ex-date bar for an event.
 *
 * Throws EventNotFoundError when no bar precedes the ex-date and
 * InsufficientDataError when no bar falls on or after it.
 */
export function resolveEventAnchor(
  series: PriceSeries,
  event: DistributionEvent,
): { referenceIndex: number; exIndex: number } {
  if (series.length === 0) {
    throw new EventNotFoundError(event.instrumentId, event.exDate, 'price series is empty');
  }

  const exIndex = locateExDate(series, event.exDate);
  if (exIndex === 0) {
    throw new EventNotFoundError(
      event.instrumentId,
      event.exDate,
      `no bar before ex-date (series starts ${series[0].date})`,
    );
  }
  if (exIndex >= series.length) {
    throw new InsufficientDataError(
      event.instrumentId,
      event.exDate,
      `no bars on or after ex-date (series ends ${series[series.length - 1].date})`,
    );
  }

  return { referenceIndex: exIndex - 1, exIndex };
}

export function detectRecovery(
  series: PriceSeries,
  event: DistributionEvent,
  options: DetectOptions = {},
): RecoveryResult {
  const maxHorizonDays = options.maxHorizonDays ?? DEFAULT_MAX_HORIZON_DAYS;
  const recoveryThreshold = options.recoveryThreshold ?? DEFAULT_RECOVERY_THRESHOLD;
  assertPositiveInt('maxHorizonDays', maxHorizonDays);
  assertRecoveryThreshold(recoveryThreshold);

  const { referenceIndex, exIndex } = resolveEventAnchor(series, event);
  const reference = series[referenceIndex];
  const exBar = series[exIndex];
  const referencePrice = reference.close;
  const targetPrice = referencePrice * recoveryThreshold;

  const lastIndex = Math.min(exIndex + maxHorizonDays, series.length - 1);

  let minClose = Number.POSITIVE_INFINITY;
  let recoveryIndex = -1;
  for (let i = exIndex; i <= lastIndex; i++) {
    const close = series[i].close;
    if (close < minClose) minClose = close;
    if (close >= targetPrice) {
      recoveryIndex = i;
      break;
    }
  }

  const recovered = recoveryIndex >= 0;
  const barsExamined = (recovered ? recoveryIndex : lastIndex) - exIndex + 1;

  let outcome: RecoveryOutcome;
  if (recovered) outcome = 'recovered';
  else if (exIndex + maxHorizonDays > series.length - 1) outcome = 'data-exhausted';
  else outcome = 'horizon-exhausted';

  return {
    event,
    exDate: exBar.date,
    referenceDate: reference.date,
    referencePrice,
    exDateOpen: exBar.open,
    exDateClose: exBar.close,
    targetPrice,
    theoreticalDrop: event.amount / referencePrice,
    declaredDrop: event.declaredDrop ?? null,
    observedDrop: (referencePrice - exBar.close) / referencePrice,
    openingGap: (referencePrice - exBar.open) / referencePrice,
    recovered,
    recoveryOffset: recovered ? recoveryIndex - exIndex : null,
    recoveryDate: recovered ? series[recoveryIndex].date : null,
    recoveryClose: recovered ? series[recoveryIndex].close : null,
    maxAdverseExcursion: minClose / referencePrice - 1,
    barsExamined,
    outcome,
  };
}
