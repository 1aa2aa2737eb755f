/**
 * Signal Types for the Basis Engine
 */

/**
 * Trading signals of the cash-and-carry strategy
 */
export const SIGNALS = [
  'STRONG_ENTRY',
  'ACCEPTABLE_ENTRY',
  'NO_ENTRY',
  'PARTIAL_EXIT',
  'FULL_EXIT',
  'STOP_LOSS',
  'HOLD',
] as const;

export type Signal = (typeof SIGNALS)[number];

/**
 * A signal together with its human-readable reason
 */
export interface SignalDecision {
  signal: Signal;
  reason: string;
}

/**
 * Fixed strategy thresholds, expressed as monthly basis fractions
 */
export const SIGNAL_THRESHOLDS = {
  /** Below this the basis is treated as compressed */
  compressedMonthly: 0.002,
  /** Above this: take full profit */
  peakMonthly: 0.035,
  /** Above this: reduce the position */
  elevatedMonthly: 0.025,
  /** Above this: strong entry */
  strongEntryMonthly: 0.01,
  /** ETF discount to NAV that signals liquidity stress */
  etfDiscountStress: -0.01,
  /** Sentiment above which a strong entry is called optimal */
  highSentiment: 0.8,
} as const;

export type RiskLevel = 'low' | 'moderate' | 'high' | 'critical';

export type RiskFactor = 'funding' | 'basis' | 'liquidity' | 'crowding' | 'operational';

export interface RiskRating {
  level: RiskLevel;
  note: string;
}

export type RiskAssessment = Record<RiskFactor, RiskRating>;

export type OverallRisk = 'LOW' | 'MODERATE' | 'HIGH';

/**
 * Risk classification thresholds
 */
export const RISK_THRESHOLDS = {
  highFundingAnnual: 0.06,
  tightEtfTracking: 0.002,
  crowdedOpenInterest: 40_000,
  risingOpenInterest: 30_000,
  nearExpiryDays: 7,
} as const;

export function isEntrySignal(signal: Signal): boolean {
  return signal === 'STRONG_ENTRY' || signal === 'ACCEPTABLE_ENTRY';
}

export function isExitSignal(signal: Signal): boolean {
  return signal === 'FULL_EXIT' || signal === 'STOP_LOSS';
}
