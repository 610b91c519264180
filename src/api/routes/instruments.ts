import { Router, type Request, type Response, type NextFunction } from 'express';
import type { ApiContext } from '../context.js';

export function createInstrumentRoutes(ctx: ApiContext): Router {
  const router = Router();

  // GET /api/v1/instruments - List instruments in the store
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const instruments = await ctx.source.listInstruments();
      res.json({
        success: true,
        data: { instruments, count: instruments.length },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
