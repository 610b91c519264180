/**
 * Price series adapters: public API.
 */

export { locateExDate, toPriceBar, toDistributionEvent } from './locate.js';
export { InMemoryPriceSeriesSource, type InMemoryInstrument } from './memory.js';
export { SqlitePriceSeriesSource } from './sqlite.js';
export { PgPriceSeriesSource, type SqlClient } from './pg.js';
export { openSourceFromEnv } from './open.js';

export type {
  PriceBar,
  PriceSeries,
  DistributionEvent,
  DistributionStatus,
  InstrumentInfo,
  LoadEventsOptions,
  PriceSeriesSource,
} from './types.js';
