/**
 * Price series & distribution events: shared types.
 *
 * These are the only inputs the engine accepts. Adapters materialize them
 * from a store before any analytics run; the engine never holds a
 * connection.
 */

// ---------------------------------------------------------------------------
// Engine inputs
// ---------------------------------------------------------------------------

/** One daily bar. `date` is an ISO calendar day (YYYY-MM-DD). */
export interface PriceBar {
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}

/** Ordered by date, strictly increasing, no duplicates. */
export type PriceSeries = readonly PriceBar[];

export type DistributionStatus = 'confirmed' | 'predicted' | 'paid';

export interface DistributionEvent {
  readonly instrumentId: string;
  /** ISO calendar day; matched to the first trading day at or after it. */
  readonly exDate: string;
  /** Cash amount per share, in the instrument's currency. */
  readonly amount: number;
  /** Declared price drop as a fraction of the reference price, when the source publishes one. */
  readonly declaredDrop?: number;
  readonly status?: DistributionStatus;
}

// ---------------------------------------------------------------------------
// Adapter contract
// ---------------------------------------------------------------------------

export interface InstrumentInfo {
  id: string;
  name: string | null;
  market: string | null;
  currency: string | null;
}

export interface LoadEventsOptions {
  /** Include forecast distributions that have not gone ex yet. Default false. */
  includePredicted?: boolean;
}

export interface PriceSeriesSource {
  listInstruments(): Promise<InstrumentInfo[]>;
  loadSeries(instrumentId: string): Promise<PriceBar[]>;
  loadEvents(instrumentId: string, options?: LoadEventsOptions): Promise<DistributionEvent[]>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Database row types (shared by the pg and sqlite adapters)
// ---------------------------------------------------------------------------

export interface StockRow {
  ticker: string;
  name: string | null;
  market: string | null;
  currency: string | null;
}

export interface PriceDataRow {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number | null;
}

export interface DividendRow {
  ex_date: string;
  amount: number;
  declared_drop: number | null;
  status: string | null;
}
