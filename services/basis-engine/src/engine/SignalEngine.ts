import { type Clock, type StrategyConfig, SystemClock } from '@basis-desk/shared';
import { PositionSizer } from '../sizing/PositionSizer.js';
import type { BasisMetrics, BasisReturns, MarketSnapshot } from '../types/market.js';
import type { PositionSizing } from '../types/position.js';
import {
  type OverallRisk,
  type RiskAssessment,
  type RiskFactor,
  RISK_THRESHOLDS,
  SIGNAL_THRESHOLDS,
  type SignalDecision,
} from '../types/signals.js';
import { BasisCalculator } from './BasisCalculator.js';

/**
 * Everything the engine derives from one snapshot
 */
export interface BasisAnalysis {
  snapshot: MarketSnapshot;
  metrics: BasisMetrics;
  returns: BasisReturns;
  decision: SignalDecision;
  risks: RiskAssessment;
  sizing: PositionSizing;
}

const pct = (value: number, digits: number) => (value * 100).toFixed(digits);

/**
 * Signal engine for the cash-and-carry strategy.
 *
 * `generateSignal` is a pure function of (snapshot, config): the live
 * monitor and the backtest call the same code. Thresholds other than
 * `minMonthlyBasis` are fixed constants.
 */
export class SignalEngine {
  readonly calculator: BasisCalculator;
  private readonly sizer: PositionSizer;

  constructor(
    readonly config: StrategyConfig,
    clock: Clock = new SystemClock(),
  ) {
    this.calculator = new BasisCalculator(clock);
    this.sizer = new PositionSizer(config);
  }

  calculateMetrics(snapshot: MarketSnapshot): BasisMetrics {
    return this.calculator.calculateMetrics(snapshot);
  }

  calculateReturns(snapshot: MarketSnapshot): BasisReturns {
    return this.calculator.calculateReturns(snapshot, this.config);
  }

  /**
   * Map a snapshot to a signal; first matching rule wins
   */
  generateSignal(snapshot: MarketSnapshot): SignalDecision {
    const metrics = this.calculateMetrics(snapshot);
    const monthly = metrics.monthlyBasis;

    if (monthly < 0) {
      return { signal: 'STOP_LOSS', reason: 'Backwardation detected - basis negative' };
    }

    if (monthly < SIGNAL_THRESHOLDS.compressedMonthly) {
      return { signal: 'STOP_LOSS', reason: 'Basis compressed below 0.2% monthly' };
    }

    const monthlyFunding = this.config.fundingCostAnnual / 12;
    if (monthly < monthlyFunding) {
      return {
        signal: 'STOP_LOSS',
        reason: `Basis below funding cost (${pct(monthlyFunding, 2)}% monthly)`,
      };
    }

    const discount = metrics.etfDiscountPremium;
    if (discount !== undefined && discount < SIGNAL_THRESHOLDS.etfDiscountStress) {
      return { signal: 'STOP_LOSS', reason: 'ETF discount > 1% - liquidity stress' };
    }

    if (monthly > SIGNAL_THRESHOLDS.peakMonthly) {
      return { signal: 'FULL_EXIT', reason: 'Basis at peak levels (>3.5% monthly) - take profit' };
    }

    if (monthly > SIGNAL_THRESHOLDS.elevatedMonthly) {
      return { signal: 'PARTIAL_EXIT', reason: 'Elevated basis (>2.5% monthly) - partial exit' };
    }

    if (monthly > SIGNAL_THRESHOLDS.strongEntryMonthly) {
      if (snapshot.sentimentIndex !== undefined && snapshot.sentimentIndex > SIGNAL_THRESHOLDS.highSentiment) {
        return { signal: 'STRONG_ENTRY', reason: 'Strong basis + high Fear & Greed - optimal entry' };
      }
      return { signal: 'STRONG_ENTRY', reason: 'Strong basis >1.0% monthly' };
    }

    const min = this.config.minMonthlyBasis;
    if (monthly > min) {
      return { signal: 'ACCEPTABLE_ENTRY', reason: `Acceptable basis ${pct(min, 1)}-1.0% monthly` };
    }

    return {
      signal: 'NO_ENTRY',
      reason: `Basis too low (${pct(monthly, 2)}% monthly, min ${pct(min, 1)}%)`,
    };
  }

  /**
   * Classify funding, basis, liquidity, crowding and operational risk
   */
  assessRisk(snapshot: MarketSnapshot): RiskAssessment {
    const metrics = this.calculateMetrics(snapshot);
    const discount = metrics.etfDiscountPremium;
    const openInterest = snapshot.openInterest ?? 0;

    return {
      funding:
        this.config.fundingCostAnnual > RISK_THRESHOLDS.highFundingAnnual
          ? { level: 'high', note: 'Funding cost elevated (>6%)' }
          : { level: 'moderate', note: 'Normal funding environment' },
      basis:
        metrics.monthlyBasis < 0
          ? { level: 'critical', note: 'Backwardation (negative carry)' }
          : metrics.monthlyBasis < this.config.minMonthlyBasis
            ? { level: 'high', note: 'Basis near zero' }
            : { level: 'low', note: 'Positive contango' },
      liquidity:
        discount !== undefined && discount < SIGNAL_THRESHOLDS.etfDiscountStress
          ? { level: 'high', note: 'ETF trading at discount >1%' }
          : discount !== undefined && discount !== 0 && Math.abs(discount) < RISK_THRESHOLDS.tightEtfTracking
            ? { level: 'low', note: 'ETF tracking NAV closely' }
            : { level: 'moderate', note: 'Normal ETF tracking' },
      crowding:
        openInterest > RISK_THRESHOLDS.crowdedOpenInterest
          ? { level: 'high', note: 'Open interest >40k contracts (crowded)' }
          : openInterest > RISK_THRESHOLDS.risingOpenInterest
            ? { level: 'moderate', note: 'Open interest rising' }
            : { level: 'low', note: 'Healthy open interest' },
      operational:
        metrics.daysToExpiry < RISK_THRESHOLDS.nearExpiryDays
          ? { level: 'high', note: 'Near expiry (rollover soon)' }
          : { level: 'low', note: 'Sufficient time to expiry' },
    };
  }

  calculatePositionSizing(snapshot: MarketSnapshot): PositionSizing {
    return this.sizer.size(snapshot);
  }

  analyze(snapshot: MarketSnapshot): BasisAnalysis {
    return {
      snapshot,
      metrics: this.calculateMetrics(snapshot),
      returns: this.calculateReturns(snapshot),
      decision: this.generateSignal(snapshot),
      risks: this.assessRisk(snapshot),
      sizing: this.calculatePositionSizing(snapshot),
    };
  }
}

/**
 * Aggregate risk: HIGH with three or more high/critical factors
 */
export function overallRisk(risks: RiskAssessment): OverallRisk {
  const elevated = Object.values(risks).filter((r) => r.level === 'high' || r.level === 'critical').length;
  if (elevated >= 3) return 'HIGH';
  if (elevated >= 1) return 'MODERATE';
  return 'LOW';
}

export function criticalRisks(risks: RiskAssessment): RiskFactor[] {
  const factors: RiskFactor[] = ['funding', 'basis', 'liquidity', 'crowding', 'operational'];
  return factors.filter((factor) => risks[factor].level === 'critical');
}
