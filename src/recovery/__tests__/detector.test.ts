import { describe, it, expect } from 'vitest';
import { detectRecovery, resolveEventAnchor } from '../detector.js';
import { ConfigError, EventNotFoundError, InsufficientDataError } from '../../lib/errors.js';
import { isoDay, makeEvent, makeSeries } from '../../__tests__/fixtures.js';

const CLOSES = [100, 98, 96, 97, 99, 101, 100, 102, 103, 104];

describe('detectRecovery', () => {
  it('finds the first close at or above the reference', () => {
    const series = makeSeries(CLOSES);
    const result = detectRecovery(series, makeEvent(isoDay(1)), { maxHorizonDays: 8, recoveryThreshold: 1.0 });

    expect(result.referencePrice).toBe(100);
    expect(result.referenceDate).toBe(isoDay(0));
    expect(result.exDate).toBe(isoDay(1));
    expect(result.recovered).toBe(true);
    expect(result.recoveryOffset).toBe(4);
    expect(result.recoveryDate).toBe(isoDay(5));
    expect(result.recoveryClose).toBe(101);
    expect(result.barsExamined).toBe(5);
    expect(result.outcome).toBe('recovered');
    expect(result.maxAdverseExcursion).toBeCloseTo(-0.04, 12);
    expect(result.observedDrop).toBeCloseTo(0.02, 12);
    expect(result.theoreticalDrop).toBeCloseTo(0.02, 12);
    expect(result.declaredDrop).toBeNull();
  });

  it('reports a same-day recovery as offset 0', () => {
    const series = makeSeries([100, 100.5, 99]);
    const result = detectRecovery(series, makeEvent(isoDay(1)));

    expect(result.recoveryOffset).toBe(0);
    expect(result.barsExamined).toBe(1);
    expect(result.maxAdverseExcursion).toBeCloseTo(0.005, 12);
  });

  it('never recovers later under a stricter threshold', () => {
    const series = makeSeries(CLOSES);
    const event = makeEvent(isoDay(1));
    const lenient = detectRecovery(series, event, { maxHorizonDays: 8, recoveryThreshold: 0.95 });
    const full = detectRecovery(series, event, { maxHorizonDays: 8, recoveryThreshold: 1.0 });
    const strict = detectRecovery(series, event, { maxHorizonDays: 8, recoveryThreshold: 1.03 });

    expect(lenient.recoveryOffset).toBe(0);
    expect(full.recoveryOffset).toBe(4);
    expect(strict.recoveryOffset).toBe(7);
  });

  it('never loses a recovery when the horizon grows', () => {
    const series = makeSeries(CLOSES);
    const event = makeEvent(isoDay(1));
    const horizons = [1, 2, 3, 4, 5, 8];
    const results = horizons.map((h) => detectRecovery(series, event, { maxHorizonDays: h }));

    expect(results.map((r) => r.recovered)).toEqual([false, false, false, true, true, true]);
    expect(results.map((r) => r.recoveryOffset)).toEqual([null, null, null, 4, 4, 4]);
    expect(results.slice(0, 3).map((r) => r.outcome)).toEqual([
      'horizon-exhausted', 'horizon-exhausted', 'horizon-exhausted',
    ]);
  });

  it('is deterministic', () => {
    const series = makeSeries(CLOSES);
    const event = makeEvent(isoDay(1), { declaredDrop: 0.018 });
    expect(detectRecovery(series, event)).toEqual(detectRecovery(series, event));
  });

  it('matches an ex-date on a non-trading day to the next bar', () => {
    const series = makeSeries(CLOSES).filter((b) => b.date !== isoDay(2));
    const result = detectRecovery(series, makeEvent(isoDay(2)));

    expect(result.exDate).toBe(isoDay(3));
    expect(result.referenceDate).toBe(isoDay(1));
    expect(result.referencePrice).toBe(98);
  });

  it('distinguishes a truncated series from an exhausted horizon', () => {
    const truncated = detectRecovery(makeSeries([100, 90, 91, 92]), makeEvent(isoDay(1)), { maxHorizonDays: 30 });
    expect(truncated.recovered).toBe(false);
    expect(truncated.recoveryOffset).toBeNull();
    expect(truncated.outcome).toBe('data-exhausted');
    expect(truncated.barsExamined).toBe(3);

    const exhausted = detectRecovery(
      makeSeries([100, 90, 91, 92, 93, 94]),
      makeEvent(isoDay(1)),
      { maxHorizonDays: 2 },
    );
    expect(exhausted.outcome).toBe('horizon-exhausted');
    expect(exhausted.barsExamined).toBe(3);
    expect(exhausted.maxAdverseExcursion).toBeCloseTo(-0.1, 12);
  });

  it('throws InsufficientDataError when no bar falls on or after the ex-date', () => {
    const series = makeSeries(CLOSES);
    expect(() => detectRecovery(series, makeEvent(isoDay(20)))).toThrow(InsufficientDataError);
  });

  it('throws EventNotFoundError when no bar precedes the ex-date', () => {
    const series = makeSeries(CLOSES);
    expect(() => detectRecovery(series, makeEvent(isoDay(0)))).toThrow(EventNotFoundError);
    expect(() => detectRecovery([], makeEvent(isoDay(0)))).toThrow('price series is empty');
  });

  it('rejects invalid options', () => {
    const series = makeSeries(CLOSES);
    expect(() => detectRecovery(series, makeEvent(isoDay(1)), { maxHorizonDays: 0 })).toThrow(ConfigError);
    expect(() => detectRecovery(series, makeEvent(isoDay(1)), { recoveryThreshold: -1 })).toThrow(ConfigError);
  });
});

describe('resolveEventAnchor', () => {
  it('returns the reference and ex-date indices', () => {
    expect(resolveEventAnchor(makeSeries(CLOSES), makeEvent(isoDay(4)))).toEqual({ referenceIndex: 3, exIndex: 4 });
  });
});
