/**
 * Basis Backtesting
 *
 * Replays the basis engine's signals over daily history
 */

export * from "./types/index.js";
export { HistoricalDataService, CSV_COLUMNS, gaussian, mulberry32 } from "./data/HistoricalDataService.js";
export { BacktestEngine, DEFAULT_MAX_HOLDING_DAYS } from "./engine/BacktestEngine.js";
export {
    equityReturns,
    maxDrawdown,
    mean,
    profitFactor,
    sampleStdev,
    sharpeRatio,
    winRate,
} from "./engine/statistics.js";
export { annualizedReturn, daysBetween, holdingDays, MS_PER_DAY, returnPct } from "./engine/trade.js";
export {
    calculateComprehensiveCosts,
    COST_RATES,
    type CostBreakdown,
    type CostInputs,
    grossPnl,
    type LegCosts,
} from "./costs/TradingCosts.js";
export {
    type BacktestJson,
    type BacktestTradeJson,
    formatBacktestReport,
    formatCostReport,
    toBacktestJson,
} from "./report/BacktestReport.js";
export { createBacktestProgram } from "./cli.js";
