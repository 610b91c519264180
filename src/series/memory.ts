import type {
  DistributionEvent,
  InstrumentInfo,
  LoadEventsOptions,
  PriceBar,
  PriceSeriesSource,
} from './types.js';

export interface InMemoryInstrument {
  info?: Partial<Omit<InstrumentInfo, 'id'>>;
  series: PriceBar[];
  events: DistributionEvent[];
}

/**
 * Source over collections the caller already holds. Bars and events are
 * returned sorted by date; unknown instruments yield empty collections.
 */
export class InMemoryPriceSeriesSource implements PriceSeriesSource {
  private readonly instruments: Map<string, InMemoryInstrument>;

  constructor(instruments: Record<string, InMemoryInstrument> | Map<string, InMemoryInstrument>) {
    this.instruments = instruments instanceof Map
      ? new Map(instruments)
      : new Map(Object.entries(instruments));
  }

  async listInstruments(): Promise<InstrumentInfo[]> {
    return [...this.instruments.entries()]
      .map(([id, entry]) => ({
        id,
        name: entry.info?.name ?? null,
        market: entry.info?.market ?? null,
        currency: entry.info?.currency ?? null,
      }))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  async loadSeries(instrumentId: string): Promise<PriceBar[]> {
    const entry = this.instruments.get(instrumentId);
    if (!entry) return [];
    return [...entry.series].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  async loadEvents(instrumentId: string, options: LoadEventsOptions = {}): Promise<DistributionEvent[]> {
    const entry = this.instruments.get(instrumentId);
    if (!entry) return [];
    return entry.events
      .filter((e) => options.includePredicted || e.status !== 'predicted')
      .sort((a, b) => (a.exDate < b.exDate ? -1 : a.exDate > b.exDate ? 1 : 0));
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
