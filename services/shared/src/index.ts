/**
 * Shared infrastructure for Basis Desk services
 */

// Logging
export {
  Logger,
  LogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogMetadata,
  type PerformanceTimer,
} from './logger/Logger.js';

// Errors
export {
  BrokerError,
  type BrokerErrorCode,
  ConfigValidationError,
  type ConfigIssue,
  errorMessage,
  HistoricalDataError,
  MarketDataUnavailableError,
  toError,
} from './errors.js';

// Configuration Schema and Loading
export {
  BasisDeskConfigSchema,
  type BasisDeskConfig,
  type BrokerKind,
  BrokerKindSchema,
  DEFAULT_EXECUTION_CONFIG,
  DEFAULT_MONITOR_CONFIG,
  DEFAULT_STRATEGY_CONFIG,
  ExecutionConfigSchema,
  type ExecutionConfig,
  MonitorConfigSchema,
  type MonitorConfig,
  OrderTypeSettingSchema,
  PairConfigSchema,
  type PairConfig,
  StrategyConfigSchema,
  type StrategyConfig,
} from './config/ConfigSchema.js';
export { applyEnvOverrides, defaultPair, loadConfig, parseConfig } from './config/ConfigLoader.js';

// Time
export { type Clock, ManualClock, SystemClock } from './utils/time/Clock.js';
