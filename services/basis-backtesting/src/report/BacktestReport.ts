import { formatPct, formatUsd } from "@basis-desk/basis-engine";
import { type CostBreakdown, type CostInputs, grossPnl } from "../costs/TradingCosts.js";
import { annualizedReturn, holdingDays, returnPct } from "../engine/trade.js";
import type { BacktestResult, Trade } from "../types/index.js";

const RULE = "=".repeat(70);
const SUB_RULE = "-".repeat(70);

const row = (label: string, value: string) => `${label.padEnd(22)}${value}`;
const day = (date: Date) => date.toISOString().slice(0, 10);
const signedPct = (value: number) => `${value >= 0 ? "+" : ""}${formatPct(value)}`;
const signedUsd = (value: number) => `${value >= 0 ? "+" : ""}${formatUsd(value)}`;
const percentOrNull = (value: number | undefined) => (value === undefined ? null : value * 100);

export interface BacktestTradeJson {
    entry_date: string;
    exit_date: string | null;
    entry_basis: number;
    exit_basis: number | null;
    holding_days: number;
    realized_pnl: number | null;
    funding_cost: number;
    return_pct: number | null;
    annualized_return: number | null;
    status: Trade["status"];
}

export interface BacktestJson {
    summary: {
        initial_capital: number;
        final_capital: number;
        total_return: number;
        total_trades: number;
        winning_trades: number;
        losing_trades: number;
        win_rate: number;
        avg_win: number;
        avg_loss: number;
        /** null when there were no losses to divide by */
        profit_factor: number | null;
        max_drawdown: number;
        sharpe_ratio: number;
        start_date: string | null;
        end_date: string | null;
    };
    trades: BacktestTradeJson[];
}

/**
 * JSON document for a result; percentages are scaled to 0-100
 */
export function toBacktestJson(result: BacktestResult): BacktestJson {
    return {
        summary: {
            initial_capital: result.initialCapital,
            final_capital: result.finalCapital,
            total_return: result.totalReturn * 100,
            total_trades: result.totalTrades,
            winning_trades: result.winningTrades,
            losing_trades: result.losingTrades,
            win_rate: result.winRate * 100,
            avg_win: result.avgWin * 100,
            avg_loss: result.avgLoss * 100,
            profit_factor: Number.isFinite(result.profitFactor) ? result.profitFactor : null,
            max_drawdown: result.maxDrawdown * 100,
            sharpe_ratio: result.sharpeRatio,
            start_date: result.startDate?.toISOString() ?? null,
            end_date: result.endDate?.toISOString() ?? null,
        },
        trades: result.trades.map((t) => ({
            entry_date: t.entryDate.toISOString(),
            exit_date: t.exitDate?.toISOString() ?? null,
            entry_basis: t.entryBasis,
            exit_basis: t.exitBasis ?? null,
            holding_days: holdingDays(t),
            realized_pnl: t.realizedPnl ?? null,
            funding_cost: t.fundingCost,
            return_pct: percentOrNull(returnPct(t)),
            annualized_return: percentOrNull(annualizedReturn(t)),
            status: t.status,
        })),
    };
}

function tradeLine(trade: Trade, index: number): string {
    const marker = (trade.realizedPnl ?? 0) > 0 ? "[+]" : "[-]";
    let line = `${index}. ${marker} ${day(trade.entryDate)}`;
    if (trade.exitDate) {
        line += ` -> ${day(trade.exitDate)} (${holdingDays(trade)}d)`;
    }
    line += ` | Basis: ${formatPct(trade.entryBasis / trade.entrySpot)}`;
    const pct = returnPct(trade);
    if (pct !== undefined) {
        line += ` | Return: ${signedPct(pct)}`;
    }
    return `${line} | ${trade.status}`;
}

export function formatBacktestReport(result: BacktestResult): string {
    const period =
        result.startDate && result.endDate ? `${day(result.startDate)} to ${day(result.endDate)}` : "N/A";
    const profitFactor = Number.isFinite(result.profitFactor) ? result.profitFactor.toFixed(2) : "inf";

    const lines = [
        RULE,
        "BASIS TRADE BACKTEST RESULTS",
        RULE,
        "",
        `[*] Period: ${period}`,
        "",
        "[*] PERFORMANCE SUMMARY",
        SUB_RULE,
        row("Initial Capital:", formatUsd(result.initialCapital)),
        row("Final Capital:", formatUsd(result.finalCapital)),
        row("Total Return:", formatPct(result.totalReturn)),
        row("Max Drawdown:", formatPct(result.maxDrawdown)),
        row("Sharpe Ratio:", result.sharpeRatio.toFixed(2)),
        "",
        "[*] TRADE STATISTICS",
        SUB_RULE,
        row("Total Trades:", String(result.totalTrades)),
        row("Winning Trades:", `${result.winningTrades} (${formatPct(result.winRate, 1)})`),
        row("Losing Trades:", String(result.losingTrades)),
        row("Average Win:", formatPct(result.avgWin)),
        row("Average Loss:", formatPct(result.avgLoss)),
        row("Profit Factor:", profitFactor),
        "",
        "[*] TRADE DETAILS",
        SUB_RULE,
        ...result.trades.map((trade, i) => tradeLine(trade, i + 1)),
        "",
        RULE,
    ];
    return lines.join("\n");
}

/**
 * Cost breakdown and net result for one hypothetical trade
 */
export function formatCostReport(inputs: CostInputs, costs: CostBreakdown): string {
    const useEtf = inputs.useEtf ?? true;
    const spotLabel = useEtf ? "ETF" : "Spot";
    const gross = grossPnl(inputs);
    const net = gross - costs.total;
    const netReturn = net / (inputs.entrySpot * inputs.positionSize);
    const annualized = inputs.holdingDays > 0 ? netReturn * (365 / inputs.holdingDays) : 0;

    const leg = (title: string, c: CostBreakdown["entry"]) => [
        `${title}:`,
        row(`  ${spotLabel} Commission:`, formatUsd(useEtf ? c.etfCommission : c.spotCommission)),
        row("  Futures Commission:", formatUsd(c.futuresCommission)),
        row(`  ${spotLabel} Slippage:`, formatUsd(c.spotSlippage)),
        row("  Futures Slippage:", formatUsd(c.futuresSlippage)),
        row(`  Total ${title.split(" ")[0]}:`, formatUsd(c.total)),
    ];

    return [
        RULE,
        `BASIS TRADE COST ANALYSIS (${useEtf ? "ETF" : "DIRECT SPOT"})`,
        RULE,
        "",
        ...leg("Entry Costs", costs.entry),
        "",
        ...leg("Exit Costs", costs.exit),
        "",
        "Holding Costs:",
        row("  Funding Cost:", formatUsd(costs.fundingCost)),
        row("  ETF Expense Ratio:", formatUsd(costs.etfExpense)),
        row("  Total Holding:", formatUsd(costs.totalHolding)),
        SUB_RULE,
        row("Total All Costs:", formatUsd(costs.total)),
        "",
        row("Gross P&L:", signedUsd(gross)),
        row("Net P&L:", signedUsd(net)),
        row("Net Return:", signedPct(netReturn)),
        row("Annualized Return:", signedPct(annualized)),
        RULE,
    ].join("\n");
}
