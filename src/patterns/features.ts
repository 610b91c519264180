/**
 * Window Feature Extractor
 *
 * Describes pre-event price/volume behaviour over labelled windows and
 * measures post-event outcomes at forward horizons.
 *
 * Offsets are trading-day indices relative to the matched ex-date bar:
 *
 *   ... [baseline: baselineDays bars] [earliest window ...] ... [-1 = reference] [0 = ex-date] ... [+H]
 *
 * Features per window:
 *   trend        close(end) / close(start) − 1
 *   volatility   sample std of bar-to-bar simple returns inside the window
 *   volumeRatio  mean window volume / mean baseline volume
 *   maxDrawdown  deepest peak-to-trough close decline inside the window
 *   upDays       bars closing above the previous close
 *   downDays     bars closing below the previous close
 *   volumeTrend  volume(end) / volume(start) − 1
 *
 * Outcome at H: close(ex-date + H) / reference − 1.
 *
 * Gap outcomes, measured from the ex-date open:
 *   gap              open(ex-date) / reference − 1 (negative for a drop)
 *   gapRecovery.D+H  (close(ex-date + H) / open(ex-date) − 1) / |gap|, capped at 1
 *   daysToHalfGap    first offset in [0, max H] whose uncapped gap recovery is ≥ 0.5
 *   daysToFullGap    same, for ≥ 1
 *
 * An ex-date after the last bar (an upcoming distribution) still produces a
 * record: features are measured up to the last bar and every outcome is
 * missing, which makes it a valid similarity target.
 */

import { assertFeatureWindows, assertForwardHorizons, assertPositiveInt } from '../config/index.js';
import { EventNotFoundError } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import { mean, sampleStdDev } from '../lib/stats.js';
import { locateExDate } from '../series/locate.js';
import type { DistributionEvent, PriceSeries } from '../series/types.js';
import { toEventFailure } from '../recovery/batch.js';
import {
  FEATURE_NAMES,
  type FeatureVector,
  type FeatureWindow,
  type Measurement,
  type MissingReason,
  type PatternBatch,
  type PatternRecord,
  type WindowSpec,
} from './types.js';

const log = rootLogger.child({ component: 'pattern-features' });

// ---------------------------------------------------------------------------
// Measurement helpers
// ---------------------------------------------------------------------------

export function present(value: number): Measurement {
  return { status: 'present', value };
}

export function missing(reason: MissingReason): Measurement {
  return { status: 'missing', reason };
}

export function valueOf(m: Measurement): number | null {
  return m.status === 'present' ? m.value : null;
}

export function featureKey(windowLabel: string, feature: string): string {
  return `${windowLabel}.${feature}`;
}

export function outcomeKey(horizon: number): string {
  return `D+${horizon}`;
}

export const GAP_KEY = 'gap';
export const DAYS_TO_HALF_GAP_KEY = 'daysToHalfGap';
export const DAYS_TO_FULL_GAP_KEY = 'daysToFullGap';

export function gapRecoveryKey(horizon: number): string {
  return `gapRecovery.${outcomeKey(horizon)}`;
}

/** Flatten a record's features in window order, then feature order. */
export function flattenFeatures(record: PatternRecord): Array<{ key: string; measurement: Measurement }> {
  const out: Array<{ key: string; measurement: Measurement }> = [];
  for (const [label, vector] of Object.entries(record.features)) {
    for (const name of FEATURE_NAMES) {
      out.push({ key: featureKey(label, name), measurement: vector[name] });
    }
  }
  return out;
}

function allMissing(reason: MissingReason): FeatureVector {
  return {
    trend: missing(reason),
    volatility: missing(reason),
    volumeRatio: missing(reason),
    maxDrawdown: missing(reason),
    upDays: missing(reason),
    downDays: missing(reason),
    volumeTrend: missing(reason),
  };
}

export function validateWindowSpec(spec: WindowSpec): void {
  assertFeatureWindows(spec.windows);
  assertForwardHorizons(spec.forwardHorizons);
  assertPositiveInt('baselineDays', spec.baselineDays);
}

// ---------------------------------------------------------------------------
// Feature computation
// ---------------------------------------------------------------------------

function computeBaselineVolume(
  series: PriceSeries,
  exIndex: number,
  windows: readonly FeatureWindow[],
  baselineDays: number,
): Measurement {
  const earliestStart = Math.min(...windows.map((w) => w.startOffset));
  const end = exIndex + earliestStart - 1;
  const start = end - baselineDays + 1;
  if (start < 0) return missing('out-of-bounds');

  const volumes: number[] = [];
  for (let i = start; i <= end; i++) volumes.push(series[i].volume);
  const avg = mean(volumes) ?? 0;
  return avg > 0 ? present(avg) : missing('zero-baseline');
}

function computeWindow(
  series: PriceSeries,
  start: number,
  end: number,
  baselineVolume: Measurement,
): FeatureVector {
  const bars = series.slice(start, end + 1);
  const first = bars[0].close;
  const last = bars[bars.length - 1].close;

  const trend = first === 0 ? missing('zero-price') : present(last / first - 1);

  let volatility: Measurement;
  if (bars.some((b, i) => i < bars.length - 1 && b.close === 0)) {
    volatility = missing('zero-price');
  } else {
    const returns: number[] = [];
    for (let i = 1; i < bars.length; i++) returns.push(bars[i].close / bars[i - 1].close - 1);
    const std = sampleStdDev(returns);
    volatility = std === null ? missing('too-few-bars') : present(std);
  }

  let volumeRatio: Measurement;
  if (baselineVolume.status === 'missing') {
    volumeRatio = baselineVolume;
  } else {
    const windowVolume = mean(bars.map((b) => b.volume)) ?? 0;
    volumeRatio = present(windowVolume / baselineVolume.value);
  }

  let peak = 0;
  let deepest = 0;
  for (const b of bars) {
    if (b.close > peak) peak = b.close;
    if (peak > 0) deepest = Math.min(deepest, b.close / peak - 1);
  }
  const maxDrawdown = peak > 0 ? present(deepest) : missing('zero-price');

  let up = 0;
  let down = 0;
  for (let i = 1; i < bars.length; i++) {
    if (bars[i].close > bars[i - 1].close) up++;
    else if (bars[i].close < bars[i - 1].close) down++;
  }
  const upDays = bars.length < 2 ? missing('too-few-bars') : present(up);
  const downDays = bars.length < 2 ? missing('too-few-bars') : present(down);

  const firstVolume = bars[0].volume;
  const volumeTrend = firstVolume === 0
    ? missing('zero-volume')
    : present(bars[bars.length - 1].volume / firstVolume - 1);

  return { trend, volatility, volumeRatio, maxDrawdown, upDays, downDays, volumeTrend };
}

function computeGapOutcomes(
  series: PriceSeries,
  exIndex: number,
  referencePrice: number,
  horizons: readonly number[],
): Record<string, Measurement> {
  const out: Record<string, Measurement> = {};
  const fill = (reason: MissingReason): Record<string, Measurement> => {
    out[GAP_KEY] = missing(reason);
    for (const h of horizons) out[gapRecoveryKey(h)] = missing(reason);
    out[DAYS_TO_HALF_GAP_KEY] = missing(reason);
    out[DAYS_TO_FULL_GAP_KEY] = missing(reason);
    return out;
  };

  if (exIndex >= series.length) return fill('beyond-series');
  const open = series[exIndex].open;
  if (referencePrice === 0 || open === 0) return fill('zero-price');

  const gap = open / referencePrice - 1;
  if (gap === 0) {
    fill('zero-gap');
    out[GAP_KEY] = present(0);
    return out;
  }
  out[GAP_KEY] = present(gap);

  const gapRecovered = (idx: number): number => (series[idx].close / open - 1) / Math.abs(gap);

  for (const h of horizons) {
    const idx = exIndex + h;
    out[gapRecoveryKey(h)] = idx >= series.length
      ? missing('beyond-series')
      : present(Math.min(gapRecovered(idx), 1));
  }

  const scanEnd = exIndex + Math.max(...horizons);
  let half: number | null = null;
  let full: number | null = null;
  for (let idx = exIndex; idx <= scanEnd && idx < series.length; idx++) {
    const g = gapRecovered(idx);
    if (half === null && g >= 0.5) half = idx - exIndex;
    if (full === null && g >= 1) full = idx - exIndex;
    if (full !== null) break;
  }
  const unreached: MissingReason = scanEnd >= series.length ? 'beyond-series' : 'not-reached';
  out[DAYS_TO_HALF_GAP_KEY] = half === null ? missing(unreached) : present(half);
  out[DAYS_TO_FULL_GAP_KEY] = full === null ? missing(unreached) : present(full);
  return out;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function extractPatternRecord(
  series: PriceSeries,
  event: DistributionEvent,
  spec: WindowSpec,
): PatternRecord {
  validateWindowSpec(spec);

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

  const referencePrice = series[exIndex - 1].close;
  const baselineVolume = computeBaselineVolume(series, exIndex, spec.windows, spec.baselineDays);

  const features: Record<string, FeatureVector> = {};
  for (const w of spec.windows) {
    const start = exIndex + w.startOffset;
    const end = exIndex + w.endOffset;
    features[w.label] = start < 0
      ? allMissing('out-of-bounds')
      : computeWindow(series, start, end, baselineVolume);
  }

  const outcomes: Record<string, Measurement> = {};
  for (const h of spec.forwardHorizons) {
    const idx = exIndex + h;
    if (idx >= series.length) outcomes[outcomeKey(h)] = missing('beyond-series');
    else if (referencePrice === 0) outcomes[outcomeKey(h)] = missing('zero-price');
    else outcomes[outcomeKey(h)] = present(series[idx].close / referencePrice - 1);
  }

  return {
    instrumentId: event.instrumentId,
    exDate: event.exDate,
    referencePrice,
    features,
    outcomes: { ...outcomes, ...computeGapOutcomes(series, exIndex, referencePrice, spec.forwardHorizons) },
  };
}

/** Extract one record per event, isolating per-event failures. */
export function extractPatternRecords(
  series: PriceSeries,
  events: readonly DistributionEvent[],
  spec: WindowSpec,
): PatternBatch {
  validateWindowSpec(spec);

  const batch: PatternBatch = { records: [], failures: [] };
  for (const event of events) {
    try {
      batch.records.push(extractPatternRecord(series, event, spec));
    } catch (err) {
      const failure = toEventFailure(event, err);
      if (!failure) throw err;
      log.warn({ instrumentId: event.instrumentId, exDate: event.exDate, code: failure.code }, 'Event skipped');
      batch.failures.push(failure);
    }
  }

  log.debug({ events: events.length, extracted: batch.records.length }, 'Pattern batch complete');
  return batch;
}
