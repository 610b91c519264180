import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ANALYSIS_CONFIG,
  loadAnalysisConfigFromEnv,
  loadServerConfigFromEnv,
  resolveAnalysisConfig,
} from '../index.js';
import { ConfigError } from '../../lib/errors.js';

describe('analysis config', () => {
  describe('resolveAnalysisConfig', () => {
    it('returns the defaults when nothing is overridden', () => {
      expect(resolveAnalysisConfig()).toEqual(DEFAULT_ANALYSIS_CONFIG);
    });

    it('applies overrides field by field', () => {
      const config = resolveAnalysisConfig({ maxHorizonDays: 10, topK: 3 });
      expect(config.maxHorizonDays).toBe(10);
      expect(config.topK).toBe(3);
      expect(config.recoveryThreshold).toBe(1.0);
    });

    it('rejects a non-positive or fractional horizon', () => {
      expect(() => resolveAnalysisConfig({ maxHorizonDays: 0 })).toThrow(ConfigError);
      expect(() => resolveAnalysisConfig({ maxHorizonDays: 1.5 })).toThrow(ConfigError);
    });

    it('rejects a non-positive recovery threshold', () => {
      expect(() => resolveAnalysisConfig({ recoveryThreshold: 0 })).toThrow(
        'Invalid recoveryThreshold: expected a number > 0, got 0',
      );
    });

    it('rejects duplicate window labels and windows that reach the ex-date', () => {
      expect(() => resolveAnalysisConfig({
        windows: [
          { label: 'A', startOffset: -5, endOffset: -3 },
          { label: 'A', startOffset: -3, endOffset: -1 },
        ],
      })).toThrow('duplicate window label A');
      expect(() => resolveAnalysisConfig({
        windows: [{ label: 'A', startOffset: -3, endOffset: 0 }],
      })).toThrow(ConfigError);
    });

    it('rejects a window label that would replace the record prototype', () => {
      expect(() => resolveAnalysisConfig({
        windows: [
          { label: '__proto__', startOffset: -3, endOffset: -1 },
          { label: 'W', startOffset: -2, endOffset: -1 },
        ],
      })).toThrow('Invalid windows: window label __proto__ is reserved');
    });

    it('requires at least two correlation pairs', () => {
      expect(() => resolveAnalysisConfig({ minCorrelationPairs: 1 })).toThrow(ConfigError);
    });
  });

  describe('loadAnalysisConfigFromEnv', () => {
    it('reads numeric options and lists', () => {
      const config = loadAnalysisConfigFromEnv({
        MAX_HORIZON_DAYS: '10',
        RECOVERY_THRESHOLD: '0.99',
        FORWARD_HORIZONS: '5, 10',
        PERCENTILES: '50,90',
      });
      expect(config.maxHorizonDays).toBe(10);
      expect(config.recoveryThreshold).toBe(0.99);
      expect(config.forwardHorizons).toEqual([5, 10]);
      expect(config.percentiles).toEqual([50, 90]);
      expect(config.minSampleSize).toBe(20);
    });

    it('names the variable in the error for a malformed value', () => {
      expect(() => loadAnalysisConfigFromEnv({ MAX_HORIZON_DAYS: 'abc' })).toThrow(
        'Invalid MAX_HORIZON_DAYS: expected a number, got "abc"',
      );
    });

    it('ignores empty variables', () => {
      expect(loadAnalysisConfigFromEnv({ TOP_K: '' }).topK).toBe(5);
    });
  });

  describe('loadServerConfigFromEnv', () => {
    it('defaults to port 3000 with no store configured', () => {
      expect(loadServerConfigFromEnv({})).toEqual({ port: 3000, databaseUrl: null, sqlitePath: null });
    });

    it('reads the port and store locations', () => {
      expect(loadServerConfigFromEnv({ PORT: '8080', SQLITE_PATH: 'data/prices.db' })).toEqual({
        port: 8080,
        databaseUrl: null,
        sqlitePath: 'data/prices.db',
      });
    });
  });
});
