import type { FeatureName, Measurement, PatternRecord } from '../patterns/types.js';
import { InMemoryPriceSeriesSource, type InMemoryInstrument } from '../series/memory.js';
import type { DistributionEvent, PriceBar } from '../series/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** ISO date `offset` calendar days after `start`. */
export function isoDay(offset: number, start = '2024-01-01'): string {
  return new Date(Date.parse(`${start}T00:00:00Z`) + offset * DAY_MS).toISOString().slice(0, 10);
}

/**
 * One bar per consecutive calendar day from `start`. Open equals close
 * unless `opens` is given; volume defaults to 1000 per bar.
 */
export function makeSeries(
  closes: readonly number[],
  options: { start?: string; volumes?: readonly number[]; opens?: readonly number[] } = {},
): PriceBar[] {
  return closes.map((close, i) => ({
    date: isoDay(i, options.start),
    open: options.opens?.[i] ?? close,
    high: close,
    low: close,
    close,
    volume: options.volumes?.[i] ?? 1000,
  }));
}

export function makeEvent(exDate: string, overrides: Partial<DistributionEvent> = {}): DistributionEvent {
  return { instrumentId: 'TEST', exDate, amount: 2, ...overrides };
}

/**
 * Single-window record ('W'). Features not listed are missing; a null
 * value is missing too.
 */
export function makePatternRecord(
  exDate: string,
  features: Partial<Record<FeatureName, number | null>>,
  outcomes: Record<string, number | null> = {},
  instrumentId = 'TEST',
): PatternRecord {
  const measure = (v: number | null | undefined): Measurement =>
    v === null || v === undefined ? { status: 'missing', reason: 'out-of-bounds' } : { status: 'present', value: v };

  const vector: Record<FeatureName, Measurement> = {
    trend: measure(features.trend),
    volatility: measure(features.volatility),
    volumeRatio: measure(features.volumeRatio),
    maxDrawdown: measure(features.maxDrawdown),
    upDays: measure(features.upDays),
    downDays: measure(features.downDays),
    volumeTrend: measure(features.volumeTrend),
  };

  const out: Record<string, Measurement> = {};
  for (const [key, value] of Object.entries(outcomes)) {
    out[key] = value === null ? { status: 'missing', reason: 'beyond-series' } : { status: 'present', value };
  }

  return { instrumentId, exDate, referencePrice: 100, features: { W: vector }, outcomes: out };
}

/**
 * 60 flat bars at 100 with a distribution every 10 days. Each ex-date
 * closes at 98, then 99, and is back at 100 two days later.
 */
export function makeRecoveringInstrument(instrumentId: string): InMemoryInstrument {
  const closes = Array.from({ length: 60 }, (_, i) => {
    if (i > 0 && i % 10 === 0) return 98;
    if (i > 1 && i % 10 === 1) return 99;
    return 100;
  });
  const events = [10, 20, 30, 40, 50].map((day) => makeEvent(isoDay(day), { instrumentId }));
  events.push(makeEvent(isoDay(70), { instrumentId, status: 'predicted' }));
  return { info: { name: `${instrumentId} Corp`, market: 'XPAR', currency: 'EUR' }, series: makeSeries(closes), events };
}

/** AAA recovers every time; BBB has events but no bars. */
export function makeStudySource(): InMemoryPriceSeriesSource {
  return new InMemoryPriceSeriesSource({
    AAA: makeRecoveringInstrument('AAA'),
    BBB: { series: [], events: [makeEvent(isoDay(10), { instrumentId: 'BBB' })] },
  });
}
