/**
 * Recovery Report
 *
 * Builds a per-instrument report from a price series source: recovery
 * statistics, the strongest feature/outcome correlations, and the closest
 * historical matches for the most recent distribution (which may be an
 * upcoming one).
 *
 * Usage:
 *   npx tsx src/report/index.ts <TICKER>
 *
 * Source selection: DATABASE_URL → PostgreSQL, SQLITE_PATH → SQLite.
 */

import { writeFileSync } from 'node:fs';
import { loadAnalysisConfigFromEnv, type AnalysisConfig } from '../config/index.js';
import { logger as rootLogger } from '../lib/logger.js';
import { correlatePatterns } from '../patterns/correlation.js';
import { findSimilarPatterns } from '../patterns/similarity.js';
import type { CorrelationEntry, SimilarityMatch } from '../patterns/types.js';
import type { EventFailure, GroupSummary, RecoveryResult } from '../recovery/types.js';
import { openSourceFromEnv } from '../series/open.js';
import type { PriceSeriesSource } from '../series/types.js';
import { studyInstrument } from '../study/index.js';

const log = rootLogger.child({ component: 'recovery-report' });

const TOP_CORRELATIONS = 10;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RecoveryReport {
  instrumentId: string;
  generatedAt: string;
  period: { start: string | null; end: string | null; bars: number };
  config: Pick<AnalysisConfig, 'maxHorizonDays' | 'recoveryThreshold' | 'minSampleSize'>;
  summary: GroupSummary;
  results: RecoveryResult[];
  failures: EventFailure[];
  correlations: CorrelationEntry[];
  /** Most recent event and its nearest historical neighbours. */
  latest: { exDate: string; matches: SimilarityMatch[] } | null;
}

// ---------------------------------------------------------------------------
// Report Generator
// ---------------------------------------------------------------------------

export async function generateRecoveryReport(
  source: PriceSeriesSource,
  instrumentId: string,
  config: AnalysisConfig,
): Promise<RecoveryReport> {
  log.info({ instrumentId }, 'Generating recovery report');

  const study = await studyInstrument(source, instrumentId, config, { includePredicted: true });
  const records = study.patterns.records;

  const correlations = correlatePatterns(records, {
    minPairs: config.minCorrelationPairs,
    minAbsCorrelation: config.minAbsCorrelation,
  })
    .filter((e) => e.correlation.status === 'defined')
    .slice(0, TOP_CORRELATIONS);

  // Records follow event order, so the last one is the most recent ex-date
  let latest: RecoveryReport['latest'] = null;
  if (records.length > 1) {
    const targetIndex = records.length - 1;
    latest = {
      exDate: records[targetIndex].exDate,
      matches: findSimilarPatterns(records, targetIndex, config),
    };
  }

  const dates = study.recovery.results.map((r) => r.exDate);
  const report: RecoveryReport = {
    instrumentId,
    generatedAt: new Date().toISOString(),
    period: {
      start: dates[0] ?? null,
      end: dates[dates.length - 1] ?? null,
      bars: study.barCount,
    },
    config: {
      maxHorizonDays: config.maxHorizonDays,
      recoveryThreshold: config.recoveryThreshold,
      minSampleSize: config.minSampleSize,
    },
    summary: study.summary,
    results: study.recovery.results,
    failures: study.recovery.failures,
    correlations,
    latest,
  };

  log.info({
    instrumentId,
    events: report.results.length,
    skipped: report.failures.length,
    correlations: correlations.length,
    matches: latest?.matches.length ?? 0,
  }, 'Recovery report generated');

  return report;
}

// ---------------------------------------------------------------------------
// Pretty-print report
// ---------------------------------------------------------------------------

function pct(n: number, decimals = 1): string {
  return `${(n * 100).toFixed(decimals)}%`;
}

function days(n: number | null): string {
  return n === null ? 'N/A' : `${n.toFixed(1)} days`;
}

export function formatRecoveryReport(report: RecoveryReport): string {
  const divider = '='.repeat(68);
  const rule = '  ' + '-'.repeat(50);
  const lines: string[] = [];

  lines.push('');
  lines.push(divider);
  lines.push(`  Ex-Distribution Recovery Report: ${report.instrumentId}`);
  lines.push(divider);
  lines.push(`  Events : ${report.period.start ?? 'N/A'} to ${report.period.end ?? 'N/A'} (${report.period.bars} bars)`);
  lines.push(`  Horizon: ${report.config.maxHorizonDays} trading days, threshold ${report.config.recoveryThreshold}`);
  lines.push('');

  lines.push('  RECOVERY STATISTICS');
  lines.push(rule);
  const summary = report.summary;
  if (summary.status === 'insufficient-sample') {
    lines.push(`  Insufficient sample: ${summary.count} events, at least ${summary.required} required`);
  } else {
    const s = summary.statistics;
    lines.push(`  Events           : ${s.eventCount}`);
    lines.push(`  Recovered        : ${s.recoveredCount}`);
    lines.push(`  Win rate         : ${pct(s.winRate)}`);
    lines.push(`  Resolved rate    : ${pct(s.resolvedWinRate)} (${s.truncatedCount} truncated)`);
    lines.push(`  Mean recovery    : ${days(s.meanRecoveryOffset)}`);
    lines.push(`  Median recovery  : ${days(s.medianRecoveryOffset)}`);
    lines.push(`  Max recovery     : ${days(s.maxRecoveryOffset)}`);
    for (const p of s.offsetPercentiles) {
      lines.push(`  p${String(p.percentile).padEnd(15)}: ${days(p.offset)}`);
    }
    lines.push(`  Speed            : fast ${s.speedBuckets.fast} / normal ${s.speedBuckets.normal} / slow ${s.speedBuckets.slow}`);
    lines.push(`  Mean drop        : ${pct(s.meanObservedDrop, 2)} observed, ${pct(s.meanTheoreticalDrop, 2)} theoretical`);
    lines.push(`  Mean MAE         : ${pct(s.meanMaxAdverseExcursion, 2)}`);
  }
  if (report.failures.length > 0) {
    lines.push(`  Skipped events   : ${report.failures.length}`);
    for (const f of report.failures) {
      lines.push(`    ${f.event.exDate}  ${f.code}`);
    }
  }
  lines.push('');

  lines.push('  STRONGEST FEATURE CORRELATIONS');
  lines.push(rule);
  if (report.correlations.length === 0) {
    lines.push('  No data');
  } else {
    for (const e of report.correlations) {
      if (e.correlation.status !== 'defined') continue;
      const r = e.correlation.r;
      const sign = r >= 0 ? '+' : '';
      lines.push(`  ${e.featureKey.padEnd(28)} ${e.outcomeKey.padEnd(6)} r=${sign}${r.toFixed(3)}  (n=${e.pairs})`);
    }
  }
  lines.push('');

  lines.push('  SIMILAR HISTORICAL EVENTS');
  lines.push(rule);
  if (!report.latest) {
    lines.push('  No data');
  } else {
    lines.push(`  Target ex-date: ${report.latest.exDate}`);
    if (report.latest.matches.length === 0) {
      lines.push('  No events above the similarity floor');
    }
    for (const m of report.latest.matches) {
      lines.push(`    ${m.exDate}  similarity ${m.similarity.toFixed(3)}  (${m.sharedDimensions} dims)`);
    }
  }

  lines.push('');
  lines.push(divider);
  return lines.join('\n') + '\n';
}

export function printReport(report: RecoveryReport): void {
  process.stdout.write(formatRecoveryReport(report));
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const instrumentId = process.argv[2];
  if (!instrumentId) {
    throw new Error('Usage: tsx src/report/index.ts <TICKER>');
  }

  const config = loadAnalysisConfigFromEnv();
  const source = openSourceFromEnv();
  try {
    const report = await generateRecoveryReport(source, instrumentId, config);
    printReport(report);

    const jsonPath = `recovery-report-${instrumentId}.json`;
    writeFileSync(jsonPath, JSON.stringify(report, null, 2));
    log.info({ path: jsonPath }, 'JSON report written');
  } finally {
    await source.close();
  }
}

const isMain = /report[\\/]index\.[jt]s$/.test(process.argv[1] ?? '');
if (isMain) {
  main().catch((err) => {
    log.error({ err: err instanceof Error ? err.message : err }, 'Report failed');
    process.exit(1);
  });
}
