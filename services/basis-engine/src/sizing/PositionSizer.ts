import type { StrategyConfig } from '@basis-desk/shared';
import { futuresTargetAmount } from '../config/strategy.js';
import type { MarketSnapshot } from '../types/market.js';
import type { PositionSizing } from '../types/position.js';

/** Spot and futures notionals closer than this count as delta-neutral */
export const DELTA_NEUTRAL_TOLERANCE = 1000;

/**
 * Round to the nearest integer, exact halves to the even neighbour
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Delta-neutral sizing of both legs.
 *
 * Futures contracts are indivisible, so the futures leg is sized first and
 * its notional becomes the anchor; the spot leg is matched to it in whole
 * ETF shares. The contract count never drops below one, which can size
 * above target for small accounts (`overAllocated`).
 */
export function calculatePositionSizing(
  snapshot: Pick<MarketSnapshot, 'spotPrice' | 'etfPrice'>,
  config: StrategyConfig,
): PositionSizing {
  const target = futuresTargetAmount(config);
  const rawContracts = snapshot.spotPrice > 0 ? target / snapshot.spotPrice / config.contractSize : 0;
  const futuresContracts = Math.max(1, roundHalfEven(rawContracts));
  const futuresUnits = futuresContracts * config.contractSize;
  const futuresValue = futuresUnits * snapshot.spotPrice;

  let etfShares: number | undefined;
  let spotValue = futuresValue;
  if (snapshot.etfPrice) {
    etfShares = Math.floor(futuresValue / snapshot.etfPrice);
    spotValue = etfShares * snapshot.etfPrice;
  }

  return {
    rawContracts,
    futuresContracts,
    futuresUnits,
    futuresValue,
    etfShares,
    spotValue,
    totalExposure: spotValue + futuresValue,
    deltaNeutral: Math.abs(spotValue - futuresValue) < DELTA_NEUTRAL_TOLERANCE,
    overAllocated: futuresValue > target,
  };
}

/**
 * Sizer bound to one strategy configuration
 */
export class PositionSizer {
  constructor(private readonly config: StrategyConfig) {}

  size(snapshot: Pick<MarketSnapshot, 'spotPrice' | 'etfPrice'>): PositionSizing {
    return calculatePositionSizing(snapshot, this.config);
  }
}
