/**
 * SQLite price series store.
 *
 * Reads the local `stocks / price_data / dividends` layout the download
 * scripts populate. Also exposes idempotent upserts so a store can be seeded
 * from any provider dump (ON CONFLICT DO UPDATE).
 */

import Database from 'better-sqlite3';
import { logger as rootLogger } from '../lib/logger.js';
import { readSchemaFile } from './schema.js';
import { toDistributionEvent, toPriceBar } from './locate.js';
import type {
  DistributionEvent,
  DividendRow,
  InstrumentInfo,
  LoadEventsOptions,
  PriceBar,
  PriceDataRow,
  PriceSeriesSource,
  StockRow,
} from './types.js';

const log = rootLogger.child({ component: 'sqlite-source' });

export class SqlitePriceSeriesSource implements PriceSeriesSource {
  private readonly db: Database.Database;

  /** Accepts a file path (`:memory:` included) or an open handle. */
  constructor(pathOrDb: string | Database.Database, options: { readonly?: boolean } = {}) {
    this.db = typeof pathOrDb === 'string'
      ? new Database(pathOrDb, { readonly: options.readonly ?? false })
      : pathOrDb;
    this.db.pragma('foreign_keys = ON');
  }

  ensureSchema(): void {
    this.db.exec(readSchemaFile('sqlite-schema.sql'));
    log.info('SQLite schema ensured');
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  async listInstruments(): Promise<InstrumentInfo[]> {
    const rows = this.db
      .prepare<[], StockRow>('SELECT ticker, name, market, currency FROM stocks ORDER BY ticker ASC')
      .all();
    return rows.map((r) => ({ id: r.ticker, name: r.name, market: r.market, currency: r.currency }));
  }

  async loadSeries(instrumentId: string): Promise<PriceBar[]> {
    const rows = this.db
      .prepare<[string], PriceDataRow>(
        `SELECT p.date, p.open, p.high, p.low, p.close, p.volume
         FROM price_data p
         JOIN stocks s ON s.id = p.stock_id
         WHERE s.ticker = ?
         ORDER BY p.date ASC`,
      )
      .all(instrumentId);
    return rows.map(toPriceBar);
  }

  async loadEvents(instrumentId: string, options: LoadEventsOptions = {}): Promise<DistributionEvent[]> {
    const rows = this.db
      .prepare<[string, number], DividendRow>(
        `SELECT d.ex_date, d.amount, d.declared_drop, d.status
         FROM dividends d
         JOIN stocks s ON s.id = d.stock_id
         WHERE s.ticker = ? AND (? = 1 OR UPPER(d.status) <> 'PREDICTED')
         ORDER BY d.ex_date ASC`,
      )
      .all(instrumentId, options.includePredicted ? 1 : 0);
    return rows.map((r) => toDistributionEvent(instrumentId, r));
  }

  // -------------------------------------------------------------------------
  // Writes
  // -------------------------------------------------------------------------

  upsertInstrument(info: InstrumentInfo): number {
    this.db
      .prepare<[string, string | null, string | null, string | null]>(
        `INSERT INTO stocks (ticker, name, market, currency) VALUES (?, ?, ?, ?)
         ON CONFLICT (ticker) DO UPDATE SET
           name = excluded.name, market = excluded.market, currency = excluded.currency`,
      )
      .run(info.id, info.name, info.market, info.currency);
    return this.stockId(info.id);
  }

  insertBars(instrumentId: string, bars: readonly PriceBar[]): number {
    const stockId = this.stockId(instrumentId);
    const stmt = this.db.prepare<[number, string, number, number, number, number, number]>(
      `INSERT INTO price_data (stock_id, date, open, high, low, close, volume)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (stock_id, date) DO UPDATE SET
         open = excluded.open, high = excluded.high, low = excluded.low,
         close = excluded.close, volume = excluded.volume`,
    );
    const insertAll = this.db.transaction((rows: readonly PriceBar[]) => {
      for (const b of rows) stmt.run(stockId, b.date, b.open, b.high, b.low, b.close, b.volume);
      return rows.length;
    });
    const inserted = insertAll(bars);
    log.debug({ instrumentId, inserted }, 'Bars upserted');
    return inserted;
  }

  insertEvents(events: readonly DistributionEvent[]): number {
    const stmt = this.db.prepare<[number, string, number, number | null, string]>(
      `INSERT INTO dividends (stock_id, ex_date, amount, declared_drop, status)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (stock_id, ex_date) DO UPDATE SET
         amount = excluded.amount, declared_drop = excluded.declared_drop, status = excluded.status`,
    );
    const insertAll = this.db.transaction((rows: readonly DistributionEvent[]) => {
      for (const e of rows) {
        stmt.run(
          this.stockId(e.instrumentId),
          e.exDate,
          e.amount,
          e.declaredDrop ?? null,
          (e.status ?? 'confirmed').toUpperCase(),
        );
      }
      return rows.length;
    });
    return insertAll(events);
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private stockId(ticker: string): number {
    const row = this.db
      .prepare<[string], { id: number }>('SELECT id FROM stocks WHERE ticker = ?')
      .get(ticker);
    if (!row) throw new Error(`Unknown instrument: ${ticker}`);
    return row.id;
  }
}
