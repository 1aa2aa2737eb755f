/**
 * Trading cost model for a cash-and-carry trade
 *
 * Commission, slippage and holding costs for the spot leg (through an ETF
 * or direct spot) and the futures leg.
 */

export const COST_RATES = {
    /** ETF commission as a fraction of notional, minimum $1 per side */
    etfCommission: 0.0005,
    etfMinCommission: 1,
    /** Direct spot maker fee */
    spotCommission: 0.004,
    /** Units of the underlying per futures contract */
    futuresContractUnits: 5,
    futuresCommissionPerContract: 2,
    etfSlippage: 0.0001,
    spotSlippage: 0.0005,
    futuresSlippage: 0.0002,
    fundingAnnual: 0.05,
    etfExpenseAnnual: 0.0025,
} as const;

export interface CostInputs {
    entrySpot: number;
    exitSpot: number;
    entryFutures: number;
    exitFutures: number;
    /** Units of the underlying */
    positionSize: number;
    holdingDays: number;
    /** Hold the spot leg through an ETF (default) rather than directly */
    useEtf?: boolean;
}

export interface LegCosts {
    spotCommission: number;
    etfCommission: number;
    futuresCommission: number;
    /** Slippage on the spot leg, whether ETF or direct */
    spotSlippage: number;
    futuresSlippage: number;
    total: number;
}

export interface CostBreakdown {
    entry: LegCosts;
    exit: LegCosts;
    fundingCost: number;
    etfExpense: number;
    totalHolding: number;
    total: number;
}

function legCosts(spot: number, futures: number, size: number, useEtf: boolean): LegCosts {
    const notional = spot * size;
    const etfCommission = useEtf
        ? Math.max(COST_RATES.etfMinCommission, notional * COST_RATES.etfCommission)
        : 0;
    const spotCommission = useEtf ? 0 : notional * COST_RATES.spotCommission;
    const futuresCommission = (size / COST_RATES.futuresContractUnits) * COST_RATES.futuresCommissionPerContract;
    const spotSlippage = notional * (useEtf ? COST_RATES.etfSlippage : COST_RATES.spotSlippage);
    const futuresSlippage = futures * size * COST_RATES.futuresSlippage;

    return {
        spotCommission,
        etfCommission,
        futuresCommission,
        spotSlippage,
        futuresSlippage,
        total: spotCommission + etfCommission + futuresCommission + spotSlippage + futuresSlippage,
    };
}

export function calculateComprehensiveCosts(inputs: CostInputs): CostBreakdown {
    const useEtf = inputs.useEtf ?? true;
    const entry = legCosts(inputs.entrySpot, inputs.entryFutures, inputs.positionSize, useEtf);
    const exit = legCosts(inputs.exitSpot, inputs.exitFutures, inputs.positionSize, useEtf);

    const positionValue = inputs.entrySpot * inputs.positionSize;
    const fundingCost = (COST_RATES.fundingAnnual / 365) * inputs.holdingDays * positionValue;
    const etfExpense = useEtf ? (COST_RATES.etfExpenseAnnual / 365) * inputs.holdingDays * positionValue : 0;
    const totalHolding = fundingCost + etfExpense;

    return {
        entry,
        exit,
        fundingCost,
        etfExpense,
        totalHolding,
        total: entry.total + exit.total + totalHolding,
    };
}

/**
 * Gross P&L of the two legs before any cost
 */
export function grossPnl(inputs: Pick<CostInputs, "entrySpot" | "exitSpot" | "entryFutures" | "exitFutures" | "positionSize">): number {
    return (
        (inputs.exitSpot - inputs.entrySpot) * inputs.positionSize +
        (inputs.entryFutures - inputs.exitFutures) * inputs.positionSize
    );
}
