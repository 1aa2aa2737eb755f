/**
 * basis-backtesting central types
 */

/**
 * One day of history for a spot/futures pair
 */
export interface HistoricalPoint {
    date: Date;
    spotPrice: number;
    futuresPrice: number;
    futuresExpiry: Date;
}

export type TradeStatus = "open" | "closed" | "stopped_out" | "forced_close";

/**
 * A simulated cash-and-carry trade: long spot, short futures
 */
export interface Trade {
    entryDate: Date;
    entrySpot: number;
    entryFutures: number;
    /** futures - spot at entry */
    entryBasis: number;
    exitDate?: Date;
    exitSpot?: number;
    exitFutures?: number;
    exitBasis?: number;
    /** Units of the underlying on each leg */
    positionSize: number;
    fundingCost: number;
    realizedPnl?: number;
    status: TradeStatus;
    exitReason?: string;
}

export interface BacktestOptions {
    /** Close a trade once it has been held this many days */
    maxHoldingDays?: number;
    /** Units per trade */
    positionSize?: number;
}

export interface BacktestResult {
    trades: Trade[];
    /** Starts at the initial capital, one point per closed trade */
    equityCurve: number[];
    /** Per-trade returns on equity */
    returns: number[];
    initialCapital: number;
    finalCapital: number;
    totalReturn: number;
    totalTrades: number;
    winningTrades: number;
    losingTrades: number;
    /** Mean return of winning trades */
    avgWin: number;
    /** Mean return of losing trades (negative) */
    avgLoss: number;
    winRate: number;
    profitFactor: number;
    maxDrawdown: number;
    sharpeRatio: number;
    startDate: Date | null;
    endDate: Date | null;
}

export interface SampleDataOptions {
    basePrice?: number;
    /** PRNG seed; the same seed always yields the same series */
    seed?: number;
}
