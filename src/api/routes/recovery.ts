import { Router, type Request, type Response, type NextFunction } from 'express';
import { resolveAnalysisConfig } from '../../config/index.js';
import { logger as rootLogger } from '../../lib/logger.js';
import { trySummarizeRecoveries } from '../../recovery/aggregator.js';
import { detectRecoveries } from '../../recovery/batch.js';
import { queryNumber, requireInstrument, type ApiContext } from '../context.js';

const log = rootLogger.child({ component: 'recovery-routes' });

export function createRecoveryRoutes(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/v1/instruments/:id/recovery - Recovery statistics for one instrument
  // Query: horizon, threshold, minSample
  router.get('/:id/recovery', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instrumentId = req.params.id;
      const config = resolveAnalysisConfig({
        ...ctx.config,
        maxHorizonDays: queryNumber(req, 'horizon') ?? ctx.config.maxHorizonDays,
        recoveryThreshold: queryNumber(req, 'threshold') ?? ctx.config.recoveryThreshold,
        minSampleSize: queryNumber(req, 'minSample') ?? ctx.config.minSampleSize,
      });

      await requireInstrument(ctx, instrumentId);
      const [series, events] = await Promise.all([
        ctx.source.loadSeries(instrumentId),
        ctx.source.loadEvents(instrumentId),
      ]);

      const batch = detectRecoveries(series, events, config);
      const summary = trySummarizeRecoveries(batch.results, config);

      log.debug({ instrumentId, events: events.length, summary: summary.status }, 'Recovery computed');

      res.json({
        success: true,
        data: {
          instrumentId,
          maxHorizonDays: config.maxHorizonDays,
          recoveryThreshold: config.recoveryThreshold,
          insufficientSample: summary.status === 'insufficient-sample',
          summary,
          results: batch.results,
          failures: batch.failures,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
