/**
 * Strategy configuration helpers
 */

import type { PairConfig, StrategyConfig } from '@basis-desk/shared';

/** Notional targeted by the futures leg */
export function futuresTargetAmount(config: StrategyConfig): number {
  return config.accountSize * config.futuresTargetPct;
}

/** Notional targeted by the spot leg */
export function spotTargetAmount(config: StrategyConfig): number {
  return config.accountSize * config.spotTargetPct;
}

/**
 * Per-pair strategy config: the global config with the pair's allocation on
 * both legs and the pair's contract size.
 */
export function buildPairStrategyConfig(
  global: StrategyConfig,
  pair: Pick<PairConfig, 'allocationPct' | 'contractSize'>,
): StrategyConfig {
  return Object.freeze({
    ...global,
    spotTargetPct: pair.allocationPct,
    futuresTargetPct: pair.allocationPct,
    contractSize: pair.contractSize,
  });
}
