import * as fs from "fs";
import { z } from "zod";
import { errorMessage, HistoricalDataError, type Logger } from "@basis-desk/shared";
import { MS_PER_DAY } from "../engine/trade.js";
import type { HistoricalPoint, SampleDataOptions } from "../types/index.js";

export const CSV_COLUMNS = ["date", "spot_price", "futures_price", "futures_expiry"] as const;

const isoDate = z.string().transform((value, ctx) => {
    const date = new Date(value.trim());
    if (value.trim() === "" || Number.isNaN(date.getTime())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date '${value}'` });
        return z.NEVER;
    }
    return date;
});

const price = z.string().transform((value, ctx) => {
    const parsed = Number(value.trim());
    if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid price '${value}'` });
        return z.NEVER;
    }
    return parsed;
});

const CsvRowSchema = z.object({
    date: isoDate,
    spot_price: price,
    futures_price: price,
    futures_expiry: isoDate,
});

/**
 * Deterministic 32-bit PRNG
 */
export function mulberry32(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Standard normal draws (Box-Muller) from a uniform source
 */
export function gaussian(random: () => number): (mean: number, stdev: number) => number {
    return (mean, stdev) => {
        let u = 0;
        while (u === 0) u = random();
        const v = random();
        return mean + stdev * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
    };
}

export class HistoricalDataService {
    private logger: Logger;

    constructor(logger: Logger) {
        this.logger = logger;
    }

    /**
     * Read `date,spot_price,futures_price,futures_expiry` rows. Columns may
     * appear in any order; blank lines are skipped.
     */
    async loadCsv(filePath: string): Promise<HistoricalPoint[]> {
        let content: string;
        try {
            content = await fs.promises.readFile(filePath, "utf-8");
        } catch (error) {
            throw new HistoricalDataError(`Cannot read ${filePath}: ${errorMessage(error)}`);
        }

        const lines = content.split(/\r?\n/);
        const header = (lines[0] ?? "").split(",").map((h) => h.trim());
        const missing = CSV_COLUMNS.filter((column) => !header.includes(column));
        if (missing.length > 0) {
            throw new HistoricalDataError(`Missing CSV column(s): ${missing.join(", ")}`, 1);
        }

        const points: HistoricalPoint[] = [];
        for (let i = 1; i < lines.length; i++) {
            const line = lines[i];
            if (line.trim() === "") continue;

            const cells = line.split(",");
            if (cells.length !== header.length) {
                throw new HistoricalDataError(`Expected ${header.length} fields, got ${cells.length}`, i + 1);
            }

            const row: Record<string, string> = {};
            header.forEach((column, index) => {
                row[column] = cells[index];
            });

            const parsed = CsvRowSchema.safeParse(row);
            if (!parsed.success) {
                const issue = parsed.error.issues[0];
                throw new HistoricalDataError(
                    issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid row",
                    i + 1,
                );
            }

            points.push({
                date: parsed.data.date,
                spotPrice: parsed.data.spot_price,
                futuresPrice: parsed.data.futures_price,
                futuresExpiry: parsed.data.futures_expiry,
            });
        }

        this.logger.info(`Loaded ${points.length} data points from ${filePath}`);
        this.validateContinuity(points);
        return points;
    }

    /**
     * Synthetic daily series from `start` to `end` inclusive: a random walk
     * with 2% daily volatility floored at 10,000, basis drawn from
     * N(1.5%, 1%) floored at -1%, and a contract expiring 30 days out.
     */
    generateSampleData(start: Date, end: Date, options: SampleDataOptions = {}): HistoricalPoint[] {
        const seed = options.seed ?? Date.now();
        const normal = gaussian(mulberry32(seed));
        let spot = options.basePrice ?? 50_000;

        const points: HistoricalPoint[] = [];
        for (let t = start.getTime(); t <= end.getTime(); t += MS_PER_DAY) {
            spot = Math.max(10_000, spot + normal(0, 0.02) * spot);
            const basisPct = Math.max(-0.01, normal(0.015, 0.01));
            points.push({
                date: new Date(t),
                spotPrice: spot,
                futuresPrice: spot * (1 + basisPct),
                futuresExpiry: new Date(t + 30 * MS_PER_DAY),
            });
        }

        this.logger.info(`Generated ${points.length} sample data points`, undefined, { seed });
        return points;
    }

    /**
     * Keep points whose date falls within [start, end]
     */
    filterRange(points: readonly HistoricalPoint[], start?: Date, end?: Date): HistoricalPoint[] {
        return points.filter(
            (p) =>
                (!start || p.date.getTime() >= start.getTime()) && (!end || p.date.getTime() <= end.getTime()),
        );
    }

    private validateContinuity(points: readonly HistoricalPoint[]) {
        for (let i = 1; i < points.length; i++) {
            const diff = points[i].date.getTime() - points[i - 1].date.getTime();
            if (diff <= 0) {
                this.logger.warn(`Out-of-order date at point ${i + 1}`, undefined, {
                    previous: points[i - 1].date.toISOString(),
                    current: points[i].date.toISOString(),
                });
            } else if (diff > MS_PER_DAY * 1.5) {
                this.logger.warn("Data gap detected", undefined, {
                    start: points[i - 1].date.toISOString(),
                    end: points[i].date.toISOString(),
                    gapDays: Math.round(diff / MS_PER_DAY),
                });
            }
        }
    }
}
