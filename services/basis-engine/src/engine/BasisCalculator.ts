import { type Clock, type StrategyConfig, SystemClock } from '@basis-desk/shared';
import type { BasisMetrics, BasisReturns, MarketSnapshot } from '../types/market.js';

const MS_PER_DAY = 86_400_000;

/**
 * Whole days from `asOf` to `expiry`, rounded down (negative once expired)
 */
export function daysToExpiry(expiry: Date, asOf: Date): number {
  return Math.floor((expiry.getTime() - asOf.getTime()) / MS_PER_DAY);
}

/**
 * Basis as a fraction of spot: (futures - spot) / spot
 */
export function basisPercent(spotPrice: number, futuresPrice: number): number {
  if (spotPrice <= 0) return 0;
  return (futuresPrice - spotPrice) / spotPrice;
}

/**
 * Scale a basis fraction to `horizonDays`; degenerate expiries yield 0
 */
export function normalizeBasis(basisPct: number, days: number, horizonDays: number): number {
  if (days <= 0) return 0;
  return basisPct * (horizonDays / days);
}

/**
 * ETF discount (negative) or premium (positive) to NAV
 */
export function etfDiscountPremium(etfPrice?: number, etfNav?: number): number | undefined {
  if (!etfPrice || !etfNav) return undefined;
  return (etfPrice - etfNav) / etfNav;
}

/**
 * Basis calculator for spot/futures cash-and-carry analysis
 */
export class BasisCalculator {
  constructor(private readonly clock: Clock = new SystemClock()) {}

  /**
   * Reference date of a snapshot: its own as-of date, else now
   */
  referenceDate(snapshot: MarketSnapshot): Date {
    return snapshot.asOf ?? this.clock.date();
  }

  calculateMetrics(snapshot: MarketSnapshot): BasisMetrics {
    const days = daysToExpiry(snapshot.futuresExpiry, this.referenceDate(snapshot));
    const pct = basisPercent(snapshot.spotPrice, snapshot.futuresPrice);
    return {
      basisAbsolute: snapshot.futuresPrice - snapshot.spotPrice,
      basisPercent: pct,
      daysToExpiry: days,
      monthlyBasis: normalizeBasis(pct, days, 30),
      annualizedBasis: normalizeBasis(pct, days, 365),
      etfDiscountPremium: etfDiscountPremium(snapshot.etfPrice, snapshot.etfNav),
    };
  }

  /**
   * Gross, net-of-funding and leveraged annualized returns.
   * All zero when the contract has no days left.
   */
  calculateReturns(snapshot: MarketSnapshot, config: StrategyConfig): BasisReturns {
    const metrics = this.calculateMetrics(snapshot);
    if (metrics.daysToExpiry <= 0) {
      return {
        basisAbsolute: 0,
        basisPercent: 0,
        monthlyBasis: 0,
        grossAnnualized: 0,
        netAnnualized: 0,
        leveragedReturn: 0,
      };
    }

    const grossAnnualized = metrics.basisPercent * (365 / metrics.daysToExpiry);
    const netAnnualized = grossAnnualized - config.fundingCostAnnual;
    return {
      basisAbsolute: metrics.basisAbsolute,
      basisPercent: metrics.basisPercent,
      monthlyBasis: metrics.monthlyBasis,
      grossAnnualized,
      netAnnualized,
      leveragedReturn: netAnnualized * config.leverage,
    };
  }
}
