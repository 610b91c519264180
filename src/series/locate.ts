import type { DistributionEvent, DistributionStatus, DividendRow, PriceBar, PriceSeries } from './types.js';

/**
 * Index of the first bar dated on or after `date`, or `series.length` when
 * every bar is earlier. ISO dates compare lexically.
 *
 * O(log N).
 */
export function locateExDate(series: PriceSeries, date: string): number {
  let lo = 0;
  let hi = series.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (series[mid].date < date) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

/** Map adapter rows into bars; a null volume becomes 0. */
export function toPriceBar(row: {
  date: string;
  open: number | string;
  high: number | string;
  low: number | string;
  close: number | string;
  volume: number | string | null;
}): PriceBar {
  return {
    date: row.date,
    open: Number(row.open),
    high: Number(row.high),
    low: Number(row.low),
    close: Number(row.close),
    volume: row.volume === null ? 0 : Number(row.volume),
  };
}

const STATUS_MAP: Record<string, DistributionStatus> = {
  CONFIRMED: 'confirmed',
  PREDICTED: 'predicted',
  PAID: 'paid',
};

/** Map a dividend row into an event. Unknown statuses are treated as confirmed. */
export function toDistributionEvent(instrumentId: string, row: DividendRow): DistributionEvent {
  const status = STATUS_MAP[(row.status ?? 'CONFIRMED').toUpperCase()] ?? 'confirmed';
  return {
    instrumentId,
    exDate: row.ex_date,
    amount: Number(row.amount),
    ...(row.declared_drop !== null ? { declaredDrop: Number(row.declared_drop) } : {}),
    status,
  };
}
