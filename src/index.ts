/**
 * Ex-distribution recovery & pattern analytics: public API.
 */

export * from './series/index.js';
export * from './recovery/index.js';
export * from './patterns/index.js';

export {
  runRecoveryStudy,
  studyInstrument,
  type StudyOptions,
  type InstrumentStudy,
  type InstrumentFailure,
  type RecoveryStudy,
} from './study/index.js';
export {
  generateRecoveryReport,
  formatRecoveryReport,
  printReport,
  type RecoveryReport,
} from './report/index.js';
export { createApp, startServer, toErrorResponse } from './api/server.js';
export type { ApiContext } from './api/context.js';

export {
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_FEATURE_WINDOWS,
  resolveAnalysisConfig,
  validateAnalysisConfig,
  loadAnalysisConfigFromEnv,
  loadServerConfigFromEnv,
  type AnalysisConfig,
  type ServerConfig,
} from './config/index.js';
export {
  AnalyticsError,
  EventNotFoundError,
  InsufficientDataError,
  InsufficientSampleError,
  InsufficientFeaturesError,
  ConfigError,
  isAnalyticsError,
  type AnalyticsErrorCode,
} from './lib/errors.js';
export { logger, createLogger, type Logger } from './lib/logger.js';
