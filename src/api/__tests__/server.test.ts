import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { createApp } from '../server.js';
import { resolveAnalysisConfig } from '../../config/index.js';
import { InMemoryPriceSeriesSource } from '../../series/memory.js';
import type { InstrumentInfo } from '../../series/types.js';
import { isoDay, makeEvent, makeSeries, makeStudySource } from '../../__tests__/fixtures.js';

const config = resolveAnalysisConfig({
  minSampleSize: 3,
  windows: [{ label: 'D-5_D-1', startOffset: -5, endOffset: -1 }],
  forwardHorizons: [1, 2],
  baselineDays: 2,
});

const app = createApp({ source: makeStudySource(), config });

describe('API server', () => {
  it('GET /health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data.status).toBe('ok');
  });

  it('GET /api/v1/instruments lists the store', async () => {
    const res = await request(app).get('/api/v1/instruments');
    expect(res.status).toBe(200);
    expect(res.body.data.count).toBe(2);
    expect(res.body.data.instruments[0]).toEqual({ id: 'AAA', name: 'AAA Corp', market: 'XPAR', currency: 'EUR' });
  });

  describe('GET /api/v1/instruments/:id/recovery', () => {
    it('returns statistics for a sufficient sample', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/recovery');
      expect(res.status).toBe(200);
      expect(res.body.data.insufficientSample).toBe(false);
      expect(res.body.data.summary.statistics.recoveredCount).toBe(5);
      expect(res.body.data.results).toHaveLength(5);
    });

    it('flags an insufficient sample instead of reporting a win rate', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/recovery?minSample=10');
      expect(res.status).toBe(200);
      expect(res.body.data.insufficientSample).toBe(true);
      expect(res.body.data.summary).toEqual({ status: 'insufficient-sample', count: 5, required: 10 });
    });

    it('applies the horizon override', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/recovery?horizon=1');
      expect(res.status).toBe(200);
      expect(res.body.data.maxHorizonDays).toBe(1);
      expect(res.body.data.summary.statistics.recoveredCount).toBe(0);
    });

    it('rejects malformed query parameters with 400', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/recovery?horizon=abc');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        error: 'Invalid horizon: expected a number, got "abc"',
        code: 'INVALID_CONFIG',
      });

      const zero = await request(app).get('/api/v1/instruments/AAA/recovery?horizon=0');
      expect(zero.status).toBe(400);
    });

    it('returns 404 for an unknown instrument', async () => {
      const res = await request(app).get('/api/v1/instruments/NOPE/recovery');
      expect(res.status).toBe(404);
      expect(res.body.code).toBe('INSTRUMENT_NOT_FOUND');
    });
  });

  describe('pattern routes', () => {
    it('GET correlations returns every feature/outcome cell', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/patterns/correlations');
      expect(res.status).toBe(200);
      expect(res.body.data.records).toBe(5);
      expect(res.body.data.correlations).toHaveLength(49);
    });

    it('GET similar accepts an upcoming event as the target', async () => {
      const res = await request(app).get(`/api/v1/instruments/AAA/patterns/similar?exDate=${isoDay(70)}`);
      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ instrumentId: 'AAA', exDate: isoDay(70), candidates: 5, matches: [] });
    });

    it('GET similar requires exDate', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/patterns/similar');
      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_CONFIG');
    });

    it('GET clusters refuses a population whose features never vary', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/patterns/clusters');
      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        success: false,
        error: 'No informative feature across 5 records',
        code: 'INSUFFICIENT_FEATURES',
      });
    });

    it('GET clusters groups settled events and assigns upcoming ones', async () => {
      // Three events after a five-day climb from 100 to 104, three after a flat run at 100
      const closes = Array.from({ length: 90 }, () => 100);
      for (const day of [10, 20, 30]) {
        [100, 101, 102, 103, 104].forEach((close, i) => { closes[day - 5 + i] = close; });
        closes[day] = 102;
      }
      for (const day of [40, 50, 60]) closes[day] = 98;
      const events = [10, 20, 30, 40, 50, 60].map((day) => makeEvent(isoDay(day), { instrumentId: 'CCC' }));
      events.push(makeEvent(isoDay(80), { instrumentId: 'CCC', status: 'predicted' }));
      const clustered = createApp({
        source: new InMemoryPriceSeriesSource({ CCC: { series: makeSeries(closes), events } }),
        config,
      });

      const res = await request(clustered).get('/api/v1/instruments/CCC/patterns/clusters?rank=D%2B1');
      expect(res.status).toBe(200);
      expect(res.body.data.records).toBe(6);
      expect(res.body.data.k).toBe(2);
      expect(res.body.data.silhouette).toBe(1);
      expect(res.body.data.assignments.map((a: { clusterId: number }) => a.clusterId)).toEqual([0, 0, 0, 1, 1, 1]);
      expect(res.body.data.rankOutcome).toBe('D+1');
      expect(res.body.data.bestClusterId).toBe(1);
      expect(res.body.data.worstClusterId).toBe(0);
      expect(res.body.data.upcoming).toHaveLength(1);
      expect(res.body.data.upcoming[0].exDate).toBe(isoDay(80));
      expect(res.body.data.upcoming[0].clusterId).toBe(1);
      expect(res.body.data.upcoming[0].distance).toBeCloseTo(0, 12);
    });

    it('GET similar returns 404 for an unknown ex-date', async () => {
      const res = await request(app).get('/api/v1/instruments/AAA/patterns/similar?exDate=1999-01-01');
      expect(res.status).toBe(404);
      expect(res.body.code).toBe('EVENT_NOT_FOUND');
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(app).get('/api/v1/nothing');
    expect(res.status).toBe(404);
    expect(res.body.code).toBe('NOT_FOUND');
  });

  it('hides internal errors behind a 500', async () => {
    class BrokenSource extends InMemoryPriceSeriesSource {
      async listInstruments(): Promise<InstrumentInfo[]> {
        throw new Error('connection refused');
      }
    }
    const broken = createApp({ source: new BrokenSource({}), config });

    const res = await request(broken).get('/api/v1/instruments');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' });
  });
});
