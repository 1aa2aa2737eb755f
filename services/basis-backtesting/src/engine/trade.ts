import type { Trade } from "../types/index.js";

export const MS_PER_DAY = 86_400_000;

/** Whole days between two dates, rounded down */
export function daysBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

export function holdingDays(trade: Trade): number {
    return trade.exitDate ? daysBetween(trade.entryDate, trade.exitDate) : 0;
}

/**
 * Realized P&L over the notional of the spot leg at entry
 */
export function returnPct(trade: Trade): number | undefined {
    if (trade.realizedPnl === undefined) return undefined;
    return trade.realizedPnl / (trade.entrySpot * trade.positionSize);
}

export function annualizedReturn(trade: Trade): number | undefined {
    const pct = returnPct(trade);
    const days = holdingDays(trade);
    if (pct === undefined || days <= 0) return undefined;
    return pct * (365 / days);
}
