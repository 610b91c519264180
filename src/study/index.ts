/**
 * Recovery Study Runner
 *
 * Runs detection and feature extraction across many instruments from one
 * source, then pools the results:
 *
 *   per instrument  → RecoveryBatch + PatternBatch + GroupSummary
 *   across the pool → GroupSummary over every RecoveryResult
 *
 * Instruments load concurrently; each owns its own series, so no state is
 * shared between units. A failing instrument (store error, empty series) is
 * recorded and the study carries on. Each instrument can also be cancelled
 * on its own through `instrumentSignal`; it is then recorded as an aborted
 * failure. Configuration errors and an abort of the study-wide `signal`
 * fail the whole call.
 */

import { validateAnalysisConfig, type AnalysisConfig } from '../config/index.js';
import { logger as rootLogger } from '../lib/logger.js';
import { extractPatternRecords } from '../patterns/features.js';
import type { PatternBatch, PatternRecord } from '../patterns/types.js';
import { trySummarizeRecoveries } from '../recovery/aggregator.js';
import { detectRecoveries } from '../recovery/batch.js';
import type { GroupSummary, RecoveryBatch, RecoveryResult } from '../recovery/types.js';
import type { PriceSeriesSource } from '../series/types.js';

const log = rootLogger.child({ component: 'recovery-study' });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface StudyOptions {
  /** Cancels the whole study. */
  signal?: AbortSignal;
  /** Cancels one instrument; the rest of the study carries on. */
  instrumentSignal?: (instrumentId: string) => AbortSignal | undefined;
  /** Also extract pattern records for events that have not gone ex yet. */
  includePredicted?: boolean;
}

export interface InstrumentStudy {
  instrumentId: string;
  barCount: number;
  recovery: RecoveryBatch;
  patterns: PatternBatch;
  summary: GroupSummary;
}

export interface InstrumentFailure {
  instrumentId: string;
  message: string;
  /** True when the instrument's own signal cancelled it. */
  aborted: boolean;
}

export interface RecoveryStudy {
  instruments: InstrumentStudy[];
  failures: InstrumentFailure[];
  /** Every RecoveryResult across instruments, in instrument order. */
  results: RecoveryResult[];
  /** Every PatternRecord across instruments, in instrument order. */
  patterns: PatternRecord[];
  pooled: GroupSummary;
}

// ---------------------------------------------------------------------------
// Single instrument
// ---------------------------------------------------------------------------

export async function studyInstrument(
  source: PriceSeriesSource,
  instrumentId: string,
  config: AnalysisConfig,
  options: StudyOptions = {},
): Promise<InstrumentStudy> {
  const own = options.instrumentSignal?.(instrumentId);
  const checkAborted = (): void => {
    options.signal?.throwIfAborted();
    own?.throwIfAborted();
  };
  checkAborted();

  const [series, events] = await Promise.all([
    source.loadSeries(instrumentId),
    source.loadEvents(instrumentId, { includePredicted: options.includePredicted }),
  ]);
  checkAborted();

  // Predicted events have no outcome to score; they only feed the pattern side
  const settled = events.filter((e) => e.status !== 'predicted');
  const recovery = detectRecoveries(series, settled, config);
  const patterns = extractPatternRecords(series, events, config);
  const summary = trySummarizeRecoveries(recovery.results, config);

  log.info({
    instrumentId,
    bars: series.length,
    events: events.length,
    analyzed: recovery.results.length,
    skipped: recovery.failures.length,
    summary: summary.status,
  }, 'Instrument analyzed');

  return { instrumentId, barCount: series.length, recovery, patterns, summary };
}

// ---------------------------------------------------------------------------
// Many instruments
// ---------------------------------------------------------------------------

export async function runRecoveryStudy(
  source: PriceSeriesSource,
  instrumentIds: readonly string[],
  config: AnalysisConfig,
  options: StudyOptions = {},
): Promise<RecoveryStudy> {
  validateAnalysisConfig(config);
  options.signal?.throwIfAborted();

  log.info({ instruments: instrumentIds.length }, 'Starting recovery study');

  const settled = await Promise.all(instrumentIds.map(async (instrumentId) => {
    try {
      return { ok: true as const, study: await studyInstrument(source, instrumentId, config, options) };
    } catch (err) {
      if (options.signal?.aborted) throw err;
      const message = err instanceof Error ? err.message : String(err);
      const aborted = options.instrumentSignal?.(instrumentId)?.aborted ?? false;
      if (aborted) log.warn({ instrumentId, reason: message }, 'Instrument cancelled');
      else log.error({ instrumentId, err: message }, 'Instrument failed');
      return { ok: false as const, failure: { instrumentId, message, aborted } };
    }
  }));

  const instruments: InstrumentStudy[] = [];
  const failures: InstrumentFailure[] = [];
  for (const s of settled) {
    if (s.ok) instruments.push(s.study);
    else failures.push(s.failure);
  }

  const results = instruments.flatMap((s) => s.recovery.results);
  const patterns = instruments.flatMap((s) => s.patterns.records);
  const pooled = trySummarizeRecoveries(results, config);

  log.info({
    instruments: instruments.length,
    failed: failures.length,
    results: results.length,
    patterns: patterns.length,
    pooled: pooled.status,
  }, 'Recovery study complete');

  return { instruments, failures, results, patterns, pooled };
}
