/**
 * Basis Engine
 *
 * Cash-and-carry basis trade analysis, position tracking and execution
 */

export * from './types/index.js';

export { buildPairStrategyConfig, futuresTargetAmount, spotTargetAmount } from './config/strategy.js';

export {
  BasisCalculator,
  basisPercent,
  daysToExpiry,
  etfDiscountPremium,
  normalizeBasis,
} from './engine/BasisCalculator.js';
export { type BasisAnalysis, criticalRisks, overallRisk, SignalEngine } from './engine/SignalEngine.js';
export {
  calculatePositionSizing,
  DELTA_NEUTRAL_TOLERANCE,
  PositionSizer,
  roundHalfEven,
} from './sizing/PositionSizer.js';

export {
  FilePositionRepository,
  InMemoryPositionRepository,
  type PositionRepository,
  positionFromRecord,
  positionStatePath,
  positionToRecord,
} from './position/PositionRepository.js';
export { PositionTracker } from './position/PositionTracker.js';

export {
  type ExecutionJournal,
  FileExecutionJournal,
  InMemoryExecutionJournal,
  JOURNAL_EVENTS,
  type JournalEventType,
  type JournalLine,
  type JournalRecord,
  readJournal,
} from './execution/ExecutionJournal.js';
export {
  type BrokerOrder,
  type BrokerOrderStatus,
  isTerminalBrokerStatus,
  type OrderBroker,
} from './execution/interfaces.js';
export { createBroker, OfflineBroker, PaperBroker } from './execution/brokers.js';
export { type EntryQuantities, type LegPrices, OrderExecutor } from './execution/OrderExecutor.js';
export { type ConfirmationPrompt, ReadlinePrompt, StaticPrompt } from './execution/ConfirmationPrompt.js';
export {
  determineAction,
  ExecutionManager,
  type ExecutionManagerDeps,
  type ExecutionOutcome,
  PARTIAL_EXIT_PCT,
} from './execution/ExecutionManager.js';

export {
  FallbackMarketDataSource,
  FileSnapshotSource,
  type MarketDataSource,
  StaticMarketDataSource,
} from './monitor/MarketDataSource.js';
export { type AlertRecord, type AlertSink, FileAlertSink, MemoryAlertSink } from './monitor/AlertSink.js';
export {
  BasisMonitor,
  type BasisMonitorOptions,
  type MonitorEvents,
  type PairContext,
  SUMMARY_EVERY_TICKS,
} from './monitor/BasisMonitor.js';

export { formatAnalysisReport, formatPct, formatUsd } from './report/AnalysisReport.js';
export { colorSignal, createProgram, parseDate, parseNumber } from './cli.js';
