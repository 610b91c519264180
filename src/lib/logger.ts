/**
 * Structured JSON Logger
 *
 * Thin wrapper around pino. Every module takes a child of the root logger
 * bound to its component name:
 *
 *   const log = rootLogger.child({ component: 'recovery-batch' });
 *   log.warn({ exDate, code }, 'Event skipped');
 *
 * Level comes from LOG_LEVEL (debug | info | warn | error | fatal | silent).
 * No console.log anywhere in the codebase; all output goes through this logger.
 */

import pino from 'pino';

export type Logger = pino.Logger;

const LEVELS = new Set(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export function parseLogLevel(level: string | undefined): string {
  const normalized = (level ?? '').trim().toLowerCase();
  return LEVELS.has(normalized) ? normalized : 'info';
}

export function createLogger(bindings: Record<string, unknown> = {}): Logger {
  return pino({
    level: parseLogLevel(process.env.LOG_LEVEL),
    base: bindings,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

/** Root application logger */
export const logger: Logger = createLogger({ service: 'exdiv-recovery' });
