/**
 * Similarity Matcher
 *
 * Finds historical events whose pre-event feature vector resembles a target
 * event's. Each feature key is z-scored across the population first so that
 * volume ratios (≈1) do not drown out returns (≈0.01). Keys with zero spread
 * carry no information and are dropped.
 *
 * Pairs are compared on the dimensions both records have present; the
 * target itself is never a candidate.
 */

import { assertInRange, assertPositiveInt } from '../config/index.js';
import { logger as rootLogger } from '../lib/logger.js';
import { mean, populationStdDev } from '../lib/stats.js';
import { flattenFeatures, valueOf } from './features.js';
import type {
  FeatureScale,
  NormalizedFeatures,
  PairSimilarity,
  PatternRecord,
  SimilarityMatch,
  SimilarityOptions,
  SimilarityValue,
} from './types.js';

const log = rootLogger.child({ component: 'pattern-similarity' });

export const DEFAULT_TOP_K = 5;
export const DEFAULT_SIMILARITY_FLOOR = 0.8;
export const DEFAULT_MIN_SHARED_DIMENSIONS = 2;

/** Cosine of two equal-length vectors. Null when either has zero norm. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number | null {
  const n = Math.min(a.length, b.length);
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return null;
  const cos = dot / Math.sqrt(na * nb);
  return Math.max(-1, Math.min(1, cos));
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Z-score every informative feature key across the population. Rows follow
 * population order, columns follow `scales`; null where missing.
 */
export function normalizeFeatures(patterns: readonly PatternRecord[]): NormalizedFeatures {
  const rows = patterns.map((p) => new Map(
    flattenFeatures(p).map(({ key, measurement }) => [key, valueOf(measurement)]),
  ));
  const keys = [...new Set(rows.flatMap((row) => [...row.keys()]))];

  const scales: FeatureScale[] = [];
  const columns: Array<Array<number | null>> = [];
  for (const key of keys) {
    const raw = rows.map((row) => row.get(key) ?? null);
    const values = raw.filter((v): v is number => v !== null);
    const mu = mean(values);
    const sigma = populationStdDev(values);
    if (mu === null || sigma === null || sigma === 0) continue;
    scales.push({ key, mean: mu, stdDev: sigma });
    columns.push(raw.map((v) => (v === null ? null : (v - mu) / sigma)));
  }

  return { scales, rows: patterns.map((_, i) => columns.map((col) => col[i])) };
}

/** Apply fitted scales to a record outside the fitted population. */
export function scaleRecord(record: PatternRecord, scales: readonly FeatureScale[]): Array<number | null> {
  const values = new Map(flattenFeatures(record).map(({ key, measurement }) => [key, valueOf(measurement)]));
  return scales.map(({ key, mean: mu, stdDev }) => {
    const v = values.get(key) ?? null;
    return v === null ? null : (v - mu) / stdDev;
  });
}

function compareRows(
  target: readonly (number | null)[],
  candidate: readonly (number | null)[],
  minSharedDimensions: number,
): SimilarityValue {
  const a: number[] = [];
  const b: number[] = [];
  for (let d = 0; d < target.length; d++) {
    const x = target[d];
    const y = candidate[d];
    if (x !== null && y !== null) {
      a.push(x);
      b.push(y);
    }
  }

  const sharedDimensions = a.length;
  if (sharedDimensions < minSharedDimensions) {
    return { status: 'undefined', reason: 'too-few-shared-dimensions', sharedDimensions };
  }
  const similarity = cosineSimilarity(a, b);
  if (similarity === null) {
    return { status: 'undefined', reason: 'zero-norm', sharedDimensions };
  }
  return { status: 'defined', similarity, sharedDimensions };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Score every record except the target against it, in population order.
 * Undefined scores are returned, never coerced to 0.
 */
export function scorePatternSimilarity(
  patterns: readonly PatternRecord[],
  targetIndex: number,
  options: SimilarityOptions = {},
): PairSimilarity[] {
  const minSharedDimensions = options.minSharedDimensions ?? DEFAULT_MIN_SHARED_DIMENSIONS;
  assertPositiveInt('minSharedDimensions', minSharedDimensions);
  if (!Number.isInteger(targetIndex) || targetIndex < 0 || targetIndex >= patterns.length) {
    throw new RangeError(`targetIndex ${targetIndex} outside population of ${patterns.length}`);
  }

  const { rows } = normalizeFeatures(patterns);
  const target = rows[targetIndex];

  const scores: PairSimilarity[] = [];
  for (let i = 0; i < rows.length; i++) {
    if (i === targetIndex) continue;
    scores.push({ index: i, value: compareRows(target, rows[i], minSharedDimensions) });
  }
  return scores;
}

/**
 * Top-K neighbours at or above the similarity floor, most similar first.
 * Ties break on earlier ex-date, then population index.
 */
export function findSimilarPatterns(
  patterns: readonly PatternRecord[],
  targetIndex: number,
  options: SimilarityOptions = {},
): SimilarityMatch[] {
  const topK = options.topK ?? DEFAULT_TOP_K;
  const floor = options.similarityFloor ?? DEFAULT_SIMILARITY_FLOOR;
  assertPositiveInt('topK', topK);
  assertInRange('similarityFloor', floor, -1, 1);

  const scores = scorePatternSimilarity(patterns, targetIndex, options);

  const matches: SimilarityMatch[] = [];
  for (const { index, value } of scores) {
    if (value.status !== 'defined' || value.similarity < floor) continue;
    matches.push({
      index,
      instrumentId: patterns[index].instrumentId,
      exDate: patterns[index].exDate,
      similarity: value.similarity,
      sharedDimensions: value.sharedDimensions,
    });
  }

  matches.sort((a, b) => {
    if (b.similarity !== a.similarity) return b.similarity - a.similarity;
    if (a.exDate !== b.exDate) return a.exDate < b.exDate ? -1 : 1;
    return a.index - b.index;
  });

  const top = matches.slice(0, topK);
  log.debug({
    target: `${patterns[targetIndex].instrumentId}@${patterns[targetIndex].exDate}`,
    candidates: scores.length,
    aboveFloor: matches.length,
    returned: top.length,
  }, 'Similarity search complete');

  return top;
}
