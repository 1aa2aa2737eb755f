/**
 * Market Types for the Basis Engine
 *
 * A normalized snapshot of one spot/futures pair, whatever venue it came
 * from, plus the basis metrics derived from it.
 */

/**
 * Normalized market snapshot consumed by the signal engine
 */
export interface MarketSnapshot {
  /** Spot price of the underlying */
  spotPrice: number;
  /** Futures price of the front contract */
  futuresPrice: number;
  /** Expiry of the futures contract */
  futuresExpiry: Date;
  /** Spot ETF price, when the spot leg is held through an ETF */
  etfPrice?: number;
  /** ETF net asset value per share */
  etfNav?: number;
  /** Sentiment index in [0, 1] (fear & greed) */
  sentimentIndex?: number;
  /** Futures open interest in contracts */
  openInterest?: number;
  /** Reference date for day counts; defaults to the clock's now */
  asOf?: Date;
  /** Pair this snapshot belongs to */
  pairId?: string;
  spotSymbol?: string;
  futuresSymbol?: string;
}

/**
 * Basis metrics derived from a snapshot
 */
export interface BasisMetrics {
  /** futures - spot */
  basisAbsolute: number;
  /** basisAbsolute / spot */
  basisPercent: number;
  /** Whole days from reference date to expiry (may be <= 0) */
  daysToExpiry: number;
  /** Basis normalized to a 30-day horizon; 0 when daysToExpiry <= 0 */
  monthlyBasis: number;
  /** Basis normalized to 365 days; 0 when daysToExpiry <= 0 */
  annualizedBasis: number;
  /** (etf - nav) / nav, when both are known */
  etfDiscountPremium?: number;
}

/**
 * Return metrics, all expressed as fractions
 */
export interface BasisReturns {
  basisAbsolute: number;
  basisPercent: number;
  monthlyBasis: number;
  grossAnnualized: number;
  netAnnualized: number;
  leveragedReturn: number;
}
