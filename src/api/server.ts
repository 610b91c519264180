import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import { loadAnalysisConfigFromEnv, loadServerConfigFromEnv } from '../config/index.js';
import { isAnalyticsError } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import { openSourceFromEnv } from '../series/open.js';
import { InstrumentNotFoundError, type ApiContext } from './context.js';
import { createInstrumentRoutes } from './routes/instruments.js';
import { createPatternRoutes } from './routes/patterns.js';
import { createRecoveryRoutes } from './routes/recovery.js';

const log = rootLogger.child({ component: 'api-server' });

const ALLOWED_ORIGINS = process.env.ALLOWED_ORIGINS?.split(',') ?? ['http://localhost:5173', 'http://localhost:3000'];

/** Map an error to its HTTP status and machine-readable code. */
export function toErrorResponse(error: unknown): { status: number; code: string; message: string } {
  if (error instanceof InstrumentNotFoundError) {
    return { status: 404, code: error.code, message: error.message };
  }
  if (isAnalyticsError(error)) {
    const status = error.code === 'INVALID_CONFIG' ? 400
      : error.code === 'EVENT_NOT_FOUND' ? 404
      : 422;
    return { status, code: error.code, message: error.message };
  }
  return { status: 500, code: 'INTERNAL_ERROR', message: 'Internal server error' };
}

export function createApp(ctx: ApiContext): Express {
  const app = express();

  app.disable('x-powered-by');

  // CORS - read-only API, GET only
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && ALLOWED_ORIGINS.includes(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
    }
    res.header('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept');

    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
      return;
    }
    next();
  });

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    log.debug({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      data: { status: 'ok', uptime: process.uptime() },
    });
  });

  app.use('/api/v1/instruments', createInstrumentRoutes(ctx));
  app.use('/api/v1/instruments', createRecoveryRoutes(ctx));
  app.use('/api/v1/instruments', createPatternRoutes(ctx));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  // Error handler - must keep four parameters for express to treat it as one
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, code, message } = toErrorResponse(error);
    if (status >= 500) {
      log.error({ err: error instanceof Error ? error.message : error, path: req.path }, 'Request failed');
    } else {
      log.debug({ code, path: req.path }, 'Request rejected');
    }
    res.status(status).json({ success: false, error: message, code });
  });

  return app;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export async function startServer(): Promise<void> {
  const server = loadServerConfigFromEnv();
  const config = loadAnalysisConfigFromEnv();
  const source = openSourceFromEnv();

  const app = createApp({ source, config });
  const httpServer = app.listen(server.port, () => {
    log.info({ port: server.port }, 'API server listening');
  });

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    httpServer.close(() => {
      source.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err: err instanceof Error ? err.message : err }, 'Failed to close price series source');
          process.exit(1);
        });
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

const isMain = /api[\\/]server\.[jt]s$/.test(process.argv[1] ?? '');
if (isMain) {
  startServer().catch((err) => {
    log.error({ err: err instanceof Error ? err.message : err }, 'Server failed to start');
    process.exit(1);
  });
}
