import * as fs from "fs";
import * as path from "path";
import { Command } from "commander";
import chalk from "chalk";
import { loadConfig, Logger } from "@basis-desk/shared";
import { parseDate, parseNumber } from "@basis-desk/basis-engine";
import { calculateComprehensiveCosts, type CostInputs } from "./costs/TradingCosts.js";
import { HistoricalDataService } from "./data/HistoricalDataService.js";
import { BacktestEngine, DEFAULT_MAX_HOLDING_DAYS } from "./engine/BacktestEngine.js";
import { formatBacktestReport, formatCostReport, toBacktestJson } from "./report/BacktestReport.js";
import type { HistoricalPoint } from "./types/index.js";

const DEFAULT_START = "2024-01-01";
const DEFAULT_END = "2024-12-31";

interface RunOptions {
    data?: string;
    start?: Date;
    end?: Date;
    holdingDays: number;
    seed?: number;
    output?: string;
    config?: string;
}

interface CostOptions {
    entrySpot: number;
    exitSpot: number;
    entryFutures: number;
    exitFutures: number;
    size: number;
    days: number;
    spot: boolean;
}

export function createBacktestProgram(logger: Logger = Logger.getInstance("basis-backtest")): Command {
    const program = new Command();

    program.name("basis-backtest").description("Backtest the basis trade signals over daily history").version("1.0.0");

    program
        .command("run", { isDefault: true })
        .description("Replay signals over CSV history or a synthetic series")
        .option("--data <path>", "Historical CSV (date,spot_price,futures_price,futures_expiry)")
        .option("--start <date>", `Start date (default ${DEFAULT_START} for synthetic data)`, parseDate)
        .option("--end <date>", `End date (default ${DEFAULT_END} for synthetic data)`, parseDate)
        .option("--holding-days <days>", "Maximum holding period in days", parseNumber, DEFAULT_MAX_HOLDING_DAYS)
        .option("--seed <n>", "Seed for synthetic data", parseNumber)
        .option("--output <path>", "Write the JSON result here")
        .option("--config <path>", "Path to config JSON")
        .action(async (options: RunOptions) => {
            const config = loadConfig(options.config);
            const data = new HistoricalDataService(logger.child("data"));

            let points: HistoricalPoint[];
            if (options.data) {
                console.log(`Loading historical data from ${options.data}...`);
                points = data.filterRange(await data.loadCsv(options.data), options.start, options.end);
            } else {
                console.log("Generating sample data...");
                points = data.generateSampleData(
                    options.start ?? new Date(DEFAULT_START),
                    options.end ?? new Date(DEFAULT_END),
                    { seed: options.seed },
                );
            }

            console.log(`Running backtest on ${points.length} data points...`);
            const engine = new BacktestEngine(config.strategy, logger.child("engine"));
            const result = engine.run(points, { maxHoldingDays: options.holdingDays });
            console.log(formatBacktestReport(result));

            if (options.output) {
                fs.mkdirSync(path.dirname(path.resolve(options.output)), { recursive: true });
                fs.writeFileSync(options.output, JSON.stringify(toBacktestJson(result), null, 2), "utf-8");
                console.log(chalk.green(`Results saved to ${options.output}`));
            }
        });

    program
        .command("costs")
        .description("Break down the costs of one hypothetical trade")
        .requiredOption("--entry-spot <price>", "Spot price at entry", parseNumber)
        .requiredOption("--exit-spot <price>", "Spot price at exit", parseNumber)
        .requiredOption("--entry-futures <price>", "Futures price at entry", parseNumber)
        .requiredOption("--exit-futures <price>", "Futures price at exit", parseNumber)
        .option("--size <units>", "Position size in units of the underlying", parseNumber, 1)
        .option("--days <n>", "Holding period in days", parseNumber, 30)
        .option("--spot", "Hold the spot leg directly instead of through an ETF", false)
        .action((options: CostOptions) => {
            const inputs: CostInputs = {
                entrySpot: options.entrySpot,
                exitSpot: options.exitSpot,
                entryFutures: options.entryFutures,
                exitFutures: options.exitFutures,
                positionSize: options.size,
                holdingDays: options.days,
                useEtf: !options.spot,
            };
            console.log(formatCostReport(inputs, calculateComprehensiveCosts(inputs)));
        });

    return program;
}
