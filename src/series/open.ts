import { loadServerConfigFromEnv } from '../config/index.js';
import { PgPriceSeriesSource } from './pg.js';
import { SqlitePriceSeriesSource } from './sqlite.js';
import type { PriceSeriesSource } from './types.js';

/** Pick a store from the environment: DATABASE_URL first, then SQLITE_PATH. */
export function openSourceFromEnv(env: NodeJS.ProcessEnv = process.env): PriceSeriesSource {
  const server = loadServerConfigFromEnv(env);
  if (server.databaseUrl) return new PgPriceSeriesSource(server.databaseUrl);
  if (server.sqlitePath) return new SqlitePriceSeriesSource(server.sqlitePath, { readonly: true });
  throw new Error('Set DATABASE_URL or SQLITE_PATH to choose a price series store');
}
