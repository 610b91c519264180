import { Router, type Request, type Response, type NextFunction } from 'express';
import { resolveAnalysisConfig } from '../../config/index.js';
import { ConfigError, EventNotFoundError } from '../../lib/errors.js';
import { clusterPatterns, predictCluster } from '../../patterns/clustering.js';
import { correlatePatterns } from '../../patterns/correlation.js';
import { extractPatternRecords } from '../../patterns/features.js';
import { findSimilarPatterns } from '../../patterns/similarity.js';
import { queryNumber, queryString, requireInstrument, type ApiContext } from '../context.js';

export function createPatternRoutes(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/v1/instruments/:id/patterns/correlations
  // Query: minPairs, minAbs
  router.get('/:id/patterns/correlations', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instrumentId = req.params.id;
      const config = resolveAnalysisConfig({
        ...ctx.config,
        minCorrelationPairs: queryNumber(req, 'minPairs') ?? ctx.config.minCorrelationPairs,
        minAbsCorrelation: queryNumber(req, 'minAbs') ?? ctx.config.minAbsCorrelation,
      });

      await requireInstrument(ctx, instrumentId);
      const [series, events] = await Promise.all([
        ctx.source.loadSeries(instrumentId),
        ctx.source.loadEvents(instrumentId),
      ]);

      const batch = extractPatternRecords(series, events, config);
      const correlations = correlatePatterns(batch.records, {
        minPairs: config.minCorrelationPairs,
        minAbsCorrelation: config.minAbsCorrelation,
      });

      res.json({
        success: true,
        data: {
          instrumentId,
          records: batch.records.length,
          failures: batch.failures,
          correlations,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/instruments/:id/patterns/similar?exDate=YYYY-MM-DD
  // Query: topK, floor. The target may be an upcoming (predicted) event.
  router.get('/:id/patterns/similar', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instrumentId = req.params.id;
      const exDate = queryString(req, 'exDate');
      if (!exDate) throw new ConfigError('exDate', req.query.exDate, 'exDate query parameter is required');
      const config = resolveAnalysisConfig({
        ...ctx.config,
        topK: queryNumber(req, 'topK') ?? ctx.config.topK,
        similarityFloor: queryNumber(req, 'floor') ?? ctx.config.similarityFloor,
      });

      await requireInstrument(ctx, instrumentId);
      const [series, events] = await Promise.all([
        ctx.source.loadSeries(instrumentId),
        ctx.source.loadEvents(instrumentId, { includePredicted: true }),
      ]);

      const batch = extractPatternRecords(series, events, config);
      const targetIndex = batch.records.findIndex((r) => r.exDate === exDate);
      if (targetIndex < 0) {
        throw new EventNotFoundError(instrumentId, exDate, 'no pattern record for this ex-date');
      }

      const matches = findSimilarPatterns(batch.records, targetIndex, config);

      res.json({
        success: true,
        data: {
          instrumentId,
          exDate,
          candidates: batch.records.length - 1,
          matches,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /api/v1/instruments/:id/patterns/clusters
  // Query: k (chosen by silhouette when absent), rank (outcome key, default D+10).
  // Settled events are clustered; upcoming ones are assigned to the nearest cluster.
  router.get('/:id/patterns/clusters', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instrumentId = req.params.id;
      const k = queryNumber(req, 'k');
      const rankOutcome = queryString(req, 'rank');

      await requireInstrument(ctx, instrumentId);
      const [series, events] = await Promise.all([
        ctx.source.loadSeries(instrumentId),
        ctx.source.loadEvents(instrumentId, { includePredicted: true }),
      ]);

      const settled = extractPatternRecords(series, events.filter((e) => e.status !== 'predicted'), ctx.config);
      const upcoming = extractPatternRecords(series, events.filter((e) => e.status === 'predicted'), ctx.config);
      const result = clusterPatterns(settled.records, { k, rankOutcome });

      res.json({
        success: true,
        data: {
          instrumentId,
          records: settled.records.length,
          failures: settled.failures,
          k: result.k,
          silhouette: result.silhouette,
          candidates: result.candidates,
          assignments: settled.records.map((r, i) => ({ exDate: r.exDate, clusterId: result.labels[i] })),
          clusters: result.clusters,
          featureImportance: result.featureImportance,
          rankOutcome: result.rankOutcome,
          bestClusterId: result.bestClusterId,
          worstClusterId: result.worstClusterId,
          upcoming: upcoming.records.map((r) => {
            const { clusterId, distance } = predictCluster(result, r);
            return { exDate: r.exDate, clusterId, distance };
          }),
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
