/**
 * Performance statistics over an equity curve
 */

/** Below this an average loss counts as zero */
const LOSS_EPSILON = 0.0001;

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator)
 */
export function sampleStdev(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const avg = mean(values);
    const variance = values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
    return Math.sqrt(variance);
}

/**
 * Period-over-period returns of an equity curve
 */
export function equityReturns(equity: readonly number[]): number[] {
    const returns: number[] = [];
    for (let i = 1; i < equity.length; i++) {
        returns.push((equity[i] - equity[i - 1]) / equity[i - 1]);
    }
    return returns;
}

/**
 * Largest drop from a running peak, as a fraction of that peak
 */
export function maxDrawdown(equity: readonly number[]): number {
    if (equity.length === 0) return 0;
    let peak = equity[0];
    let worst = 0;
    for (const value of equity) {
        if (value > peak) peak = value;
        const drawdown = peak > 0 ? (peak - value) / peak : 0;
        if (drawdown > worst) worst = drawdown;
    }
    return worst;
}

/**
 * Annualized Sharpe ratio; 0 with fewer than two returns or no dispersion
 */
export function sharpeRatio(returns: readonly number[], periodsPerYear: number = 365): number {
    if (returns.length < 2) return 0;
    const stdev = sampleStdev(returns);
    if (stdev === 0) return 0;
    return (mean(returns) / stdev) * Math.sqrt(periodsPerYear);
}

export function winRate(winningTrades: number, totalTrades: number): number {
    return totalTrades === 0 ? 0 : winningTrades / totalTrades;
}

/**
 * |avgWin / avgLoss|, Infinity when there is effectively no average loss
 */
export function profitFactor(avgWin: number, avgLoss: number): number {
    if (Math.abs(avgLoss) < LOSS_EPSILON) return Infinity;
    return Math.abs(avgWin / avgLoss);
}
