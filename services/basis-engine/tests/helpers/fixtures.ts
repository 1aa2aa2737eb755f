import {
    DEFAULT_EXECUTION_CONFIG,
    DEFAULT_STRATEGY_CONFIG,
    type ExecutionConfig,
    Logger,
    LogLevel,
    ManualClock,
    type PairConfig,
    type StrategyConfig,
} from "@basis-desk/shared";
import type { MarketSnapshot } from "../../src/types/market.js";

/** Monday 2025-01-06 14:00 UTC */
export const MONDAY = new Date("2025-01-06T14:00:00.000Z");
/** Saturday 2025-01-11 14:00 UTC */
export const SATURDAY = new Date("2025-01-11T14:00:00.000Z");

const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAfter(date: Date, days: number): Date {
    return new Date(date.getTime() + days * DAY_MS);
}

export function silentLogger(): Logger {
    return new Logger({
        level: LogLevel.FATAL,
        component: "test",
        enableConsole: false,
        enableFile: false,
        enablePerformanceLogging: false,
        sensitiveFields: [],
        maxStackTraceLines: 3,
    });
}

export function manualClock(start: Date = MONDAY): ManualClock {
    return new ManualClock(start);
}

export function strategyConfig(overrides: Partial<StrategyConfig> = {}): StrategyConfig {
    return { ...DEFAULT_STRATEGY_CONFIG, ...overrides };
}

export function executionConfig(overrides: Partial<ExecutionConfig> = {}): ExecutionConfig {
    return { ...DEFAULT_EXECUTION_CONFIG, ...overrides };
}

export const BTC_PAIR: PairConfig = {
    pairId: "BTC",
    spotSymbol: "IBIT",
    futuresSymbol: "MBT",
    allocationPct: 0.5,
    contractSize: 0.1,
    cryptoSymbol: "BTC",
    enabled: true,
};

/**
 * Snapshot `days` out with the futures at `spot * (1 + basisPct)`
 */
export function snapshot(
    basisPct: number,
    overrides: Partial<MarketSnapshot> = {},
    days = 30,
    asOf: Date = MONDAY,
): MarketSnapshot {
    const spotPrice = overrides.spotPrice ?? 100_000;
    return {
        spotPrice,
        futuresPrice: spotPrice * (1 + basisPct),
        futuresExpiry: daysAfter(asOf, days),
        asOf,
        ...overrides,
    };
}
