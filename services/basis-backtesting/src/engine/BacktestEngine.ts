import { type Logger, type StrategyConfig } from "@basis-desk/shared";
import { type MarketSnapshot, type Signal, SignalEngine } from "@basis-desk/basis-engine";
import type {
    BacktestOptions,
    BacktestResult,
    HistoricalPoint,
    Trade,
    TradeStatus,
} from "../types/index.js";
import {
    equityReturns,
    maxDrawdown,
    mean,
    profitFactor,
    sharpeRatio,
    winRate,
} from "./statistics.js";
import { daysBetween, returnPct } from "./trade.js";

export const DEFAULT_MAX_HOLDING_DAYS = 30;

function toSnapshot(point: HistoricalPoint): MarketSnapshot {
    return {
        spotPrice: point.spotPrice,
        futuresPrice: point.futuresPrice,
        futuresExpiry: point.futuresExpiry,
        asOf: point.date,
    };
}

function isEntry(signal: Signal): boolean {
    return signal === "STRONG_ENTRY" || signal === "ACCEPTABLE_ENTRY";
}

/**
 * Replays the live signal engine over a daily history.
 *
 * At most one trade is open at a time. An open trade closes on STOP_LOSS
 * (stopped_out), FULL_EXIT or the holding limit (closed); whatever is still
 * open after the last point is force-closed against it. A new trade may open
 * on the same day another one closed.
 */
export class BacktestEngine {
    private readonly signals: SignalEngine;
    private readonly config: StrategyConfig;
    private readonly logger: Logger;

    constructor(config: StrategyConfig, logger: Logger) {
        this.config = config;
        this.logger = logger;
        this.signals = new SignalEngine(config);
    }

    run(points: readonly HistoricalPoint[], options: BacktestOptions = {}): BacktestResult {
        const maxHoldingDays = options.maxHoldingDays ?? DEFAULT_MAX_HOLDING_DAYS;
        const positionSize = options.positionSize ?? 1;
        const initialCapital = this.config.accountSize;

        const trades: Trade[] = [];
        const equity = [initialCapital];
        let open: Trade | null = null;

        const settle = (trade: Trade) => {
            trades.push(trade);
            equity.push(equity[equity.length - 1] + (trade.realizedPnl ?? 0));
        };

        this.logger.info(`Running backtest over ${points.length} data points`, undefined, {
            maxHoldingDays,
            positionSize,
        });

        for (const point of points) {
            const { signal } = this.signals.generateSignal(toSnapshot(point));

            if (open) {
                const held = daysBetween(open.entryDate, point.date);
                if (signal === "STOP_LOSS" || signal === "FULL_EXIT") {
                    const status: TradeStatus = signal === "STOP_LOSS" ? "stopped_out" : "closed";
                    settle(this.close(open, point, status, `Signal: ${signal}`));
                    open = null;
                } else if (held >= maxHoldingDays) {
                    settle(this.close(open, point, "closed", `Max holding period (${maxHoldingDays} days)`));
                    open = null;
                }
            }

            if (!open && isEntry(signal)) {
                open = {
                    entryDate: point.date,
                    entrySpot: point.spotPrice,
                    entryFutures: point.futuresPrice,
                    entryBasis: point.futuresPrice - point.spotPrice,
                    positionSize,
                    fundingCost: 0,
                    status: "open",
                };
                this.logger.debug(`Opened trade on ${point.date.toISOString().slice(0, 10)} (${signal})`);
            }
        }

        const last = points[points.length - 1];
        if (open && last) {
            settle(this.close(open, last, "forced_close", "End of data"));
        }

        return this.summarize(trades, equity, points);
    }

    private close(trade: Trade, point: HistoricalPoint, status: TradeStatus, reason: string): Trade {
        const days = daysBetween(trade.entryDate, point.date);
        const spotPnl = (point.spotPrice - trade.entrySpot) * trade.positionSize;
        const futuresPnl = (trade.entryFutures - point.futuresPrice) * trade.positionSize;
        const fundingCost = (this.config.fundingCostAnnual / 365) * days * (trade.entrySpot * trade.positionSize);

        return {
            ...trade,
            exitDate: point.date,
            exitSpot: point.spotPrice,
            exitFutures: point.futuresPrice,
            exitBasis: point.futuresPrice - point.spotPrice,
            fundingCost,
            realizedPnl: spotPnl + futuresPnl - fundingCost,
            status,
            exitReason: reason,
        };
    }

    private summarize(trades: Trade[], equity: number[], points: readonly HistoricalPoint[]): BacktestResult {
        const pnl = (t: Trade) => t.realizedPnl ?? 0;
        const wins = trades.filter((t) => pnl(t) > 0);
        const losses = trades.filter((t) => pnl(t) < 0);
        const returnOf = (t: Trade) => returnPct(t) ?? 0;
        const avgWin = mean(wins.map(returnOf));
        const avgLoss = mean(losses.map(returnOf));

        const initialCapital = equity[0];
        const finalCapital = equity[equity.length - 1];
        const returns = equityReturns(equity);

        const result: BacktestResult = {
            trades,
            equityCurve: equity,
            returns,
            initialCapital,
            finalCapital,
            totalReturn: (finalCapital - initialCapital) / initialCapital,
            totalTrades: trades.length,
            winningTrades: wins.length,
            losingTrades: losses.length,
            avgWin,
            avgLoss,
            winRate: winRate(wins.length, trades.length),
            profitFactor: profitFactor(avgWin, avgLoss),
            maxDrawdown: maxDrawdown(equity),
            sharpeRatio: sharpeRatio(returns),
            startDate: points[0]?.date ?? null,
            endDate: points[points.length - 1]?.date ?? null,
        };

        this.logger.info(`Backtest complete: ${trades.length} trades`, undefined, {
            totalReturn: result.totalReturn,
            maxDrawdown: result.maxDrawdown,
        });
        return result;
    }
}
