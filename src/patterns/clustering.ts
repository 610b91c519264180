/**
 * Pattern Clustering
 *
 * Groups events by their pre-event feature profile and reports how each
 * group fared afterwards:
 *
 *   1. z-score features as the similarity matcher does; a missing value sits
 *      at the population mean (0 after scaling)
 *   2. k-means (Lloyd) from a farthest-first seeding, so runs are
 *      deterministic; without a fixed k, the k with the best mean silhouette
 *   3. outcome statistics per cluster, best and worst cluster by one outcome
 *   4. feature importance: each feature's between-cluster share of variance
 *
 * Cluster ids follow first appearance in population order.
 */

import { assertPositiveInt } from '../config/index.js';
import { ConfigError, InsufficientFeaturesError, InsufficientSampleError } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import { mean } from '../lib/stats.js';
import { outcomeKey, valueOf } from './features.js';
import { normalizeFeatures, scaleRecord } from './similarity.js';
import type {
  ClusterAssignment,
  ClusterOptions,
  ClusterOutcome,
  ClusteringResult,
  FeatureImportance,
  PatternCluster,
  PatternRecord,
} from './types.js';

const log = rootLogger.child({ component: 'pattern-clustering' });

export const DEFAULT_K_RANGE: readonly [number, number] = [2, 8];
export const DEFAULT_MAX_ITERATIONS = 100;
export const DEFAULT_RANK_OUTCOME = outcomeKey(10);
export const MIN_CLUSTER_RECORDS = 5;

type Point = readonly number[];

interface Partition {
  labels: number[];
  groups: Array<{ members: number[]; centroid: number[] }>;
}

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

function distance(a: Point, b: Point): number {
  let sum = 0;
  for (let d = 0; d < a.length; d++) {
    const diff = a[d] - b[d];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

function centroidOf(points: readonly Point[], dims: number): number[] {
  const c = new Array<number>(dims).fill(0);
  for (const p of points) {
    for (let d = 0; d < dims; d++) c[d] += p[d];
  }
  return c.map((v) => v / points.length);
}

/** Index of the closest centroid; ties go to the lower index. */
function nearest(point: Point, centroids: readonly Point[]): number {
  let best = 0;
  let bestDist = distance(point, centroids[0]);
  for (let c = 1; c < centroids.length; c++) {
    const d = distance(point, centroids[c]);
    if (d < bestDist) {
      best = c;
      bestDist = d;
    }
  }
  return best;
}

// ---------------------------------------------------------------------------
// k-means
// ---------------------------------------------------------------------------

/** Start at the point closest to the mean, then repeatedly take the farthest point. */
function seedCentroids(points: readonly Point[], k: number): number[][] {
  const origin = new Array<number>(points[0].length).fill(0);
  let first = 0;
  for (let i = 1; i < points.length; i++) {
    if (distance(points[i], origin) < distance(points[first], origin)) first = i;
  }

  const seeds = [first];
  const gap = points.map((p) => distance(p, points[first]));
  while (seeds.length < k) {
    let next = 0;
    for (let i = 1; i < points.length; i++) {
      if (gap[i] > gap[next]) next = i;
    }
    seeds.push(next);
    for (let i = 0; i < points.length; i++) {
      gap[i] = Math.min(gap[i], distance(points[i], points[next]));
    }
  }
  return seeds.map((i) => [...points[i]]);
}

function kMeans(points: readonly Point[], k: number, maxIterations: number): Partition {
  const dims = points[0].length;
  const centroids = seedCentroids(points, k);
  let assignments = points.map((p) => nearest(p, centroids));

  for (let iter = 0; iter < maxIterations; iter++) {
    for (let c = 0; c < k; c++) {
      const members = points.filter((_, i) => assignments[i] === c);
      // An empty cluster keeps its previous centroid
      if (members.length > 0) centroids[c] = centroidOf(members, dims);
    }
    const next = points.map((p) => nearest(p, centroids));
    const changed = next.some((a, i) => a !== assignments[i]);
    assignments = next;
    if (!changed) break;
  }

  // Relabel by first appearance; empty clusters drop out
  const ids = new Map<number, number>();
  const labels = assignments.map((a) => {
    let id = ids.get(a);
    if (id === undefined) {
      id = ids.size;
      ids.set(a, id);
    }
    return id;
  });
  const groups = [...ids.values()].map((id) => {
    const members = labels.flatMap((l, i) => (l === id ? [i] : []));
    return { members, centroid: centroidOf(members.map((i) => points[i]), dims) };
  });
  return { labels, groups };
}

/** Mean silhouette over all points; singletons score 0. */
function silhouette(points: readonly Point[], partition: Partition): number | null {
  const clusterCount = partition.groups.length;
  if (clusterCount < 2) return null;
  const { labels } = partition;
  const sizes = partition.groups.map((g) => g.members.length);

  let total = 0;
  for (let i = 0; i < points.length; i++) {
    const own = labels[i];
    if (sizes[own] === 1) continue;

    const sums = new Array<number>(clusterCount).fill(0);
    for (let j = 0; j < points.length; j++) {
      if (j !== i) sums[labels[j]] += distance(points[i], points[j]);
    }
    const a = sums[own] / (sizes[own] - 1);
    let b = Infinity;
    for (let c = 0; c < clusterCount; c++) {
      if (c !== own) b = Math.min(b, sums[c] / sizes[c]);
    }
    const scale = Math.max(a, b);
    total += scale === 0 ? 0 : (b - a) / scale;
  }
  return total / points.length;
}

// ---------------------------------------------------------------------------
// Cluster description
// ---------------------------------------------------------------------------

function describeOutcomes(
  patterns: readonly PatternRecord[],
  members: readonly number[],
  keys: readonly string[],
): ClusterOutcome[] {
  return keys.map((key) => {
    const values: number[] = [];
    for (const i of members) {
      const m = patterns[i].outcomes[key];
      const v = m ? valueOf(m) : null;
      if (v !== null) values.push(v);
    }
    return {
      outcomeKey: key,
      observations: values.length,
      mean: mean(values),
      positiveRate: values.length === 0 ? null : values.filter((v) => v > 0).length / values.length,
    };
  });
}

function featureImportance(
  points: readonly Point[],
  partition: Partition,
  featureKeys: readonly string[],
): FeatureImportance[] {
  const shares = featureKeys.map((featureKey, d) => {
    const grand = mean(points.map((p) => p[d])) ?? 0;
    let total = 0;
    for (const p of points) total += (p[d] - grand) ** 2;

    let between = 0;
    for (const g of partition.groups) {
      between += g.members.length * (g.centroid[d] - grand) ** 2;
    }
    return { featureKey, share: total === 0 ? 0 : between / total };
  });

  const top = shares.reduce((m, s) => (s.share > m ? s.share : m), 0);
  return shares
    .map(({ featureKey, share }) => ({ featureKey, importance: top > 0 ? share / top : 0 }))
    .sort((a, b) => b.importance - a.importance);
}

function rankClusters(
  clusters: readonly PatternCluster[],
  rankOutcome: string,
): { best: number | null; worst: number | null } {
  let best: { id: number; mean: number } | null = null;
  let worst: { id: number; mean: number } | null = null;
  for (const c of clusters) {
    const m = c.outcomes.find((o) => o.outcomeKey === rankOutcome)?.mean ?? null;
    if (m === null) continue;
    if (best === null || m > best.mean) best = { id: c.id, mean: m };
    if (worst === null || m < worst.mean) worst = { id: c.id, mean: m };
  }
  return { best: best?.id ?? null, worst: worst?.id ?? null };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export function clusterPatterns(
  patterns: readonly PatternRecord[],
  options: ClusterOptions = {},
): ClusteringResult {
  const [kLo, kHi] = options.kRange ?? DEFAULT_K_RANGE;
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const rankOutcome = options.rankOutcome ?? DEFAULT_RANK_OUTCOME;
  assertPositiveInt('kRange', kLo, 2);
  assertPositiveInt('kRange', kHi, kLo);
  assertPositiveInt('maxIterations', maxIterations);

  const n = patterns.length;
  if (n < MIN_CLUSTER_RECORDS) throw new InsufficientSampleError(n, MIN_CLUSTER_RECORDS);
  if (options.k !== undefined) {
    assertPositiveInt('k', options.k, 2);
    if (options.k > n) throw new ConfigError('k', options.k, `expected at most ${n} clusters for ${n} records`);
  }

  const { scales, rows } = normalizeFeatures(patterns);
  if (scales.length === 0) throw new InsufficientFeaturesError(n);
  const points: Point[] = rows.map((row) => row.map((v) => v ?? 0));

  let partition: Partition;
  let score: number | null;
  const candidates: ClusteringResult['candidates'] = [];

  if (options.k !== undefined) {
    partition = kMeans(points, options.k, maxIterations);
    score = silhouette(points, partition);
  } else {
    let best: { partition: Partition; score: number } | null = null;
    for (let k = kLo; k <= Math.min(kHi, n - 1); k++) {
      const run = kMeans(points, k, maxIterations);
      const s = silhouette(points, run);
      candidates.push({ k, silhouette: s });
      log.debug({ k, silhouette: s }, 'Cluster count scored');
      if (s !== null && (best === null || s > best.score)) best = { partition: run, score: s };
    }
    if (best === null) {
      partition = kMeans(points, 2, maxIterations);
      score = silhouette(points, partition);
    } else {
      partition = best.partition;
      score = best.score;
    }
  }

  const outcomeKeys = [...new Set(patterns.flatMap((p) => Object.keys(p.outcomes)))];
  const clusters: PatternCluster[] = partition.groups.map((g, id) => ({
    id,
    members: g.members,
    centroid: g.centroid,
    cohesion: mean(g.members.map((i) => distance(points[i], g.centroid))) ?? 0,
    outcomes: describeOutcomes(patterns, g.members, outcomeKeys),
  }));
  const { best, worst } = rankClusters(clusters, rankOutcome);

  log.debug({
    records: n,
    features: scales.length,
    clusters: clusters.length,
    silhouette: score,
  }, 'Clustering complete');

  return {
    k: clusters.length,
    silhouette: score,
    candidates,
    featureKeys: scales.map((s) => s.key),
    scales,
    labels: partition.labels,
    clusters,
    featureImportance: featureImportance(points, partition, scales.map((s) => s.key)),
    rankOutcome,
    bestClusterId: best,
    worstClusterId: worst,
  };
}

/**
 * Nearest cluster for a record outside the clustered population, such as
 * an upcoming distribution. Scaled with the population's fitted scales.
 */
export function predictCluster(result: ClusteringResult, record: PatternRecord): ClusterAssignment {
  const point = scaleRecord(record, result.scales).map((v) => v ?? 0);
  const index = nearest(point, result.clusters.map((c) => c.centroid));
  const cluster = result.clusters[index];
  return { clusterId: cluster.id, distance: distance(point, cluster.centroid), cluster };
}
