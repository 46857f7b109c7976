// @relgate/core - errors, logging and configuration shared by every package

export {
  RelgateError,
  RelgateErrorCode,
  ConfigError,
  AnalysisError,
  PipelineError,
  getErrorMessage,
} from './errors/index.js';
export type { ErrorSeverity, PipelineStage } from './errors/index.js';

export {
  consoleLogger,
  jsonLogger,
  silentLogger,
  withLevel,
  createLogger,
} from './logger.js';
export type { Logger, LogLevel, LogFormat } from './logger.js';

export { loadConfig, parseConfig, resolveConfigPath } from './config/loader.js';
export {
  relgateConfigSchema,
  DEFAULT_CONCURRENCY,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_COMPONENTS,
  DEFAULT_MAX_DEPENDENCIES,
  DEFAULT_FALLBACK_COMPONENT_LIMIT,
  DEFAULT_AI_MODEL,
  DEFAULT_AI_CALLS_PER_MINUTE,
} from './config/schema.js';
export type { RelgateConfig, AnalysisConfig, AIConfig } from './config/schema.js';
