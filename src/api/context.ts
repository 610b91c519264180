/**
 * Shared request plumbing for the API routes: injected dependencies,
 * query-parameter parsing, and instrument lookup.
 */

import type { Request } from 'express';
import { parseNumber, type AnalysisConfig } from '../config/index.js';
import type { InstrumentInfo, PriceSeriesSource } from '../series/types.js';

export interface ApiContext {
  source: PriceSeriesSource;
  config: AnalysisConfig;
}

export class InstrumentNotFoundError extends Error {
  readonly code = 'INSTRUMENT_NOT_FOUND';

  constructor(public readonly instrumentId: string) {
    super(`Unknown instrument: ${instrumentId}`);
    this.name = 'InstrumentNotFoundError';
  }
}

/** A single string query value, or undefined when absent or repeated. */
export function queryString(req: Request, name: string): string | undefined {
  const raw = req.query[name];
  return typeof raw === 'string' && raw !== '' ? raw : undefined;
}

/** Numeric query value; malformed input raises ConfigError (→ 400). */
export function queryNumber(req: Request, name: string): number | undefined {
  const raw = queryString(req, name);
  return raw === undefined ? undefined : parseNumber(name, raw);
}

export async function requireInstrument(ctx: ApiContext, instrumentId: string): Promise<InstrumentInfo> {
  const instruments = await ctx.source.listInstruments();
  const found = instruments.find((i) => i.id === instrumentId);
  if (!found) throw new InstrumentNotFoundError(instrumentId);
  return found;
}
