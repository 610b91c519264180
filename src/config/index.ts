/**
 * Analysis configuration.
 *
 * The engine never reads this module's environment loader: every operation
 * takes its thresholds as explicit arguments. Entry points (report CLI, API
 * server) build one AnalysisConfig from the environment and thread it down.
 */

import { ConfigError } from '../lib/errors.js';
import type { FeatureWindow } from '../patterns/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AnalysisConfig {
  /** Trading days after the ex-date to search for recovery. Default 30. */
  maxHorizonDays: number;
  /** Multiplier on the reference price the close must reclaim. Default 1.0. */
  recoveryThreshold: number;
  /** Minimum events before statistics are reported. Default 20. */
  minSampleSize: number;
  /** Recovery-offset percentiles to report (0–100). */
  percentiles: number[];
  /** Pre-event feature windows (negative trading-day offsets). */
  windows: FeatureWindow[];
  /** Forward outcome horizons in trading days. */
  forwardHorizons: number[];
  /** Trailing bars used as the volume-ratio baseline. Default 60. */
  baselineDays: number;
  /** Paired observations needed for a correlation cell. Default 3. */
  minCorrelationPairs: number;
  /** Defined correlations weaker than this are dropped. Default 0 (keep all). */
  minAbsCorrelation: number;
  /** Neighbours below this cosine similarity are excluded. Default 0.8. */
  similarityFloor: number;
  /** Maximum neighbours returned. Default 5. */
  topK: number;
  /** Shared feature dimensions needed for a similarity score. Default 2. */
  minSharedDimensions: number;
}

export const DEFAULT_FEATURE_WINDOWS: FeatureWindow[] = [
  { label: 'D-40_D-30', startOffset: -40, endOffset: -30 },
  { label: 'D-30_D-20', startOffset: -30, endOffset: -20 },
  { label: 'D-20_D-15', startOffset: -20, endOffset: -15 },
  { label: 'D-15_D-5', startOffset: -15, endOffset: -5 },
  { label: 'D-5_D-3', startOffset: -5, endOffset: -3 },
  { label: 'D-3_D-1', startOffset: -3, endOffset: -1 },
];

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  maxHorizonDays: 30,
  recoveryThreshold: 1.0,
  minSampleSize: 20,
  percentiles: [25, 50, 75, 90],
  windows: DEFAULT_FEATURE_WINDOWS,
  forwardHorizons: [5, 10, 15, 30],
  baselineDays: 60,
  minCorrelationPairs: 3,
  minAbsCorrelation: 0,
  similarityFloor: 0.8,
  topK: 5,
  minSharedDimensions: 2,
};

// ---------------------------------------------------------------------------
// Validators (shared with the engine entry points)
// ---------------------------------------------------------------------------

export function assertPositiveInt(option: string, value: number, min = 1): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(option, value, `expected an integer >= ${min}, got ${value}`);
  }
}

export function assertInRange(option: string, value: number, lo: number, hi: number): void {
  if (!Number.isFinite(value) || value < lo || value > hi) {
    throw new ConfigError(option, value, `expected a number in [${lo}, ${hi}], got ${value}`);
  }
}

export function assertRecoveryThreshold(value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError('recoveryThreshold', value, `expected a number > 0, got ${value}`);
  }
}

// Labels become record keys; these would reach the prototype instead
const RESERVED_LABELS = new Set(['__proto__']);

export function assertFeatureWindows(windows: readonly FeatureWindow[]): void {
  if (windows.length === 0) {
    throw new ConfigError('windows', windows, 'at least one window is required');
  }
  const seen = new Set<string>();
  for (const w of windows) {
    if (!w.label) throw new ConfigError('windows', w, 'window label is empty');
    if (RESERVED_LABELS.has(w.label)) throw new ConfigError('windows', w, `window label ${w.label} is reserved`);
    if (seen.has(w.label)) throw new ConfigError('windows', w, `duplicate window label ${w.label}`);
    seen.add(w.label);
    if (!Number.isInteger(w.startOffset) || !Number.isInteger(w.endOffset)) {
      throw new ConfigError('windows', w, `window ${w.label} offsets must be integers`);
    }
    if (w.endOffset >= 0 || w.startOffset > w.endOffset) {
      throw new ConfigError('windows', w, `window ${w.label} must satisfy start <= end < 0`);
    }
  }
}

export function assertForwardHorizons(horizons: readonly number[]): void {
  if (horizons.length === 0) {
    throw new ConfigError('forwardHorizons', horizons, 'at least one horizon is required');
  }
  for (const h of horizons) assertPositiveInt('forwardHorizons', h);
  if (new Set(horizons).size !== horizons.length) {
    throw new ConfigError('forwardHorizons', horizons, 'horizons must be unique');
  }
}

export function validateAnalysisConfig(config: AnalysisConfig): void {
  assertPositiveInt('maxHorizonDays', config.maxHorizonDays);
  assertRecoveryThreshold(config.recoveryThreshold);
  assertPositiveInt('minSampleSize', config.minSampleSize);
  for (const p of config.percentiles) assertInRange('percentiles', p, 0, 100);
  assertFeatureWindows(config.windows);
  assertForwardHorizons(config.forwardHorizons);
  assertPositiveInt('baselineDays', config.baselineDays);
  assertPositiveInt('minCorrelationPairs', config.minCorrelationPairs, 2);
  assertInRange('minAbsCorrelation', config.minAbsCorrelation, 0, 1);
  assertInRange('similarityFloor', config.similarityFloor, -1, 1);
  assertPositiveInt('topK', config.topK);
  assertPositiveInt('minSharedDimensions', config.minSharedDimensions);
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveAnalysisConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const d = DEFAULT_ANALYSIS_CONFIG;
  const config: AnalysisConfig = {
    maxHorizonDays: overrides.maxHorizonDays ?? d.maxHorizonDays,
    recoveryThreshold: overrides.recoveryThreshold ?? d.recoveryThreshold,
    minSampleSize: overrides.minSampleSize ?? d.minSampleSize,
    percentiles: overrides.percentiles ?? d.percentiles,
    windows: overrides.windows ?? d.windows,
    forwardHorizons: overrides.forwardHorizons ?? d.forwardHorizons,
    baselineDays: overrides.baselineDays ?? d.baselineDays,
    minCorrelationPairs: overrides.minCorrelationPairs ?? d.minCorrelationPairs,
    minAbsCorrelation: overrides.minAbsCorrelation ?? d.minAbsCorrelation,
    similarityFloor: overrides.similarityFloor ?? d.similarityFloor,
    topK: overrides.topK ?? d.topK,
    minSharedDimensions: overrides.minSharedDimensions ?? d.minSharedDimensions,
  };
  validateAnalysisConfig(config);
  return config;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

type NumericOption = {
  [K in keyof AnalysisConfig]: AnalysisConfig[K] extends number ? K : never;
}[keyof AnalysisConfig];

const NUMERIC_ENV: Array<[string, NumericOption]> = [
  ['MAX_HORIZON_DAYS', 'maxHorizonDays'],
  ['RECOVERY_THRESHOLD', 'recoveryThreshold'],
  ['MIN_SAMPLE_SIZE', 'minSampleSize'],
  ['BASELINE_DAYS', 'baselineDays'],
  ['MIN_CORRELATION_PAIRS', 'minCorrelationPairs'],
  ['MIN_ABS_CORRELATION', 'minAbsCorrelation'],
  ['SIMILARITY_FLOOR', 'similarityFloor'],
  ['TOP_K', 'topK'],
];

export function parseNumber(option: string, raw: string): number {
  const n = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(n)) {
    throw new ConfigError(option, raw, `expected a number, got "${raw}"`);
  }
  return n;
}

export function parseNumberList(option: string, raw: string): number[] {
  return raw.split(',').map((part) => parseNumber(option, part));
}

/** Build an AnalysisConfig from environment variables over the defaults. */
export function loadAnalysisConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const overrides: Partial<AnalysisConfig> = {};

  for (const [name, key] of NUMERIC_ENV) {
    const raw = env[name];
    if (raw !== undefined && raw !== '') overrides[key] = parseNumber(name, raw);
  }
  if (env.FORWARD_HORIZONS) {
    overrides.forwardHorizons = parseNumberList('FORWARD_HORIZONS', env.FORWARD_HORIZONS);
  }
  if (env.PERCENTILES) {
    overrides.percentiles = parseNumberList('PERCENTILES', env.PERCENTILES);
  }

  return resolveAnalysisConfig(overrides);
}

export interface ServerConfig {
  port: number;
  databaseUrl: string | null;
  sqlitePath: string | null;
}

export function loadServerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = env.PORT ? parseNumber('PORT', env.PORT) : 3000;
  assertPositiveInt('PORT', port);
  return {
    port,
    databaseUrl: env.DATABASE_URL || null,
    sqlitePath: env.SQLITE_PATH || null,
  };
}
