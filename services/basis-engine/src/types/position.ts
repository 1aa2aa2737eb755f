/**
 * Position Types for the Basis Engine
 */

/**
 * The currently open two-leg position (long spot ETF, short futures)
 */
export interface Position {
  /** ETF shares held (spot leg) */
  etfShares: number;
  etfSymbol: string;
  etfEntryPrice: number;
  /** Futures contracts short */
  futuresContracts: number;
  futuresSymbol: string;
  futuresEntryPrice: number;
  /** Contract month or expiry date string */
  futuresExpiry?: string;
  /** ISO timestamp of the entry fill */
  openedAt?: string;
}

/**
 * Position state as stored on disk
 */
export interface PositionRecord {
  etf_shares: number;
  etf_symbol: string;
  etf_entry_price: number;
  futures_contracts: number;
  futures_symbol: string;
  futures_entry_price: number;
  futures_expiry: string | null;
  opened_at: string | null;
}

/**
 * Entry fill recorded by the tracker
 */
export interface EntryFill {
  etfShares: number;
  etfPrice: number;
  futuresContracts: number;
  futuresPrice: number;
  etfSymbol: string;
  futuresSymbol: string;
  futuresExpiry?: string;
}

/**
 * Delta-neutral sizing of both legs
 */
export interface PositionSizing {
  /** Unrounded contracts needed to reach the futures target */
  rawContracts: number;
  futuresContracts: number;
  /** Underlying units covered by the futures leg */
  futuresUnits: number;
  futuresValue: number;
  /** ETF shares, when an ETF price is known */
  etfShares?: number;
  /** Notional of the spot leg */
  spotValue: number;
  totalExposure: number;
  deltaNeutral: boolean;
  /** Futures notional exceeds target because of the one-contract floor */
  overAllocated: boolean;
}

export const DEFAULT_ETF_SYMBOL = 'IBIT';
export const DEFAULT_FUTURES_SYMBOL = 'MBT';

export function emptyPosition(
  etfSymbol: string = DEFAULT_ETF_SYMBOL,
  futuresSymbol: string = DEFAULT_FUTURES_SYMBOL,
): Position {
  return {
    etfShares: 0,
    etfSymbol,
    etfEntryPrice: 0,
    futuresContracts: 0,
    futuresSymbol,
    futuresEntryPrice: 0,
  };
}

export function isPositionOpen(position: Position): boolean {
  return position.etfShares > 0 || position.futuresContracts > 0;
}

export function isPositionBalanced(position: Position): boolean {
  return position.etfShares > 0 && position.futuresContracts > 0;
}
