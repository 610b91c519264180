/**
 * Error taxonomy for the analytics engine.
 *
 * Per-event errors (EventNotFound, InsufficientData) are collected by the
 * batch runners and never abort a batch. InsufficientSample is terminal for
 * the aggregate call that raised it. Undefined correlations and similarities
 * are tagged values, not errors.
 */

export type AnalyticsErrorCode =
  | 'EVENT_NOT_FOUND'
  | 'INSUFFICIENT_DATA'
  | 'INSUFFICIENT_SAMPLE'
  | 'INSUFFICIENT_FEATURES'
  | 'INVALID_CONFIG';

export abstract class AnalyticsError extends Error {
  abstract readonly code: AnalyticsErrorCode;
}

/** The event has no reference bar: its ex-date is at or before the first bar. */
export class EventNotFoundError extends AnalyticsError {
  readonly code = 'EVENT_NOT_FOUND';

  constructor(
    public readonly instrumentId: string,
    public readonly exDate: string,
    detail: string,
  ) {
    super(`[${instrumentId}] Event ${exDate} not found: ${detail}`);
    this.name = 'EventNotFoundError';
  }
}

/** The event has zero bars on or after its ex-date. */
export class InsufficientDataError extends AnalyticsError {
  readonly code = 'INSUFFICIENT_DATA';

  constructor(
    public readonly instrumentId: string,
    public readonly exDate: string,
    detail: string,
  ) {
    super(`[${instrumentId}] Insufficient data for event ${exDate}: ${detail}`);
    this.name = 'InsufficientDataError';
  }
}

export class InsufficientSampleError extends AnalyticsError {
  readonly code = 'INSUFFICIENT_SAMPLE';

  constructor(
    public readonly count: number,
    public readonly required: number,
  ) {
    super(`Insufficient sample: ${count} events, at least ${required} required`);
    this.name = 'InsufficientSampleError';
  }
}

/** No feature varies across the population, so there is nothing to cluster on. */
export class InsufficientFeaturesError extends AnalyticsError {
  readonly code = 'INSUFFICIENT_FEATURES';

  constructor(public readonly records: number) {
    super(`No informative feature across ${records} records`);
    this.name = 'InsufficientFeaturesError';
  }
}

export class ConfigError extends AnalyticsError {
  readonly code = 'INVALID_CONFIG';

  constructor(
    public readonly option: string,
    public readonly rawValue: unknown,
    detail: string,
  ) {
    super(`Invalid ${option}: ${detail}`);
    this.name = 'ConfigError';
  }
}

export function isAnalyticsError(err: unknown): err is AnalyticsError {
  return err instanceof AnalyticsError;
}
