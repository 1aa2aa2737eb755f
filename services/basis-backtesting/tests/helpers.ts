import { Logger, LogLevel } from "@basis-desk/shared";
import { MS_PER_DAY } from "../src/engine/trade.js";
import type { HistoricalPoint } from "../src/types/index.js";

export const START = new Date("2024-01-01T00:00:00.000Z");

export function silentLogger(): Logger {
    return new Logger({
        level: LogLevel.FATAL,
        component: "backtest-test",
        enableConsole: false,
        enableFile: false,
        enablePerformanceLogging: false,
        sensitiveFields: [],
        maxStackTraceLines: 3,
    });
}

/**
 * Daily point `day` days after START with a contract expiring 30 days later
 */
export function point(day: number, spotPrice: number, futuresPrice: number, expiryDays = 30): HistoricalPoint {
    const date = new Date(START.getTime() + day * MS_PER_DAY);
    return {
        date,
        spotPrice,
        futuresPrice,
        futuresExpiry: new Date(date.getTime() + expiryDays * MS_PER_DAY),
    };
}

/**
 * `days` points with spot 100,000 and futures from `futuresFor(day)`
 */
export function series(days: number, futuresFor: (day: number) => number): HistoricalPoint[] {
    return Array.from({ length: days }, (_, day) => point(day, 100_000, futuresFor(day)));
}
