import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
    type BasisDeskConfig,
    DEFAULT_MONITOR_CONFIG,
    DEFAULT_STRATEGY_CONFIG,
    type ManualClock,
    type PairConfig,
} from "@basis-desk/shared";
import { InMemoryExecutionJournal } from "../../src/execution/ExecutionJournal.js";
import { ExecutionManager, type ExecutionOutcome } from "../../src/execution/ExecutionManager.js";
import { type AlertRecord, MemoryAlertSink } from "../../src/monitor/AlertSink.js";
import { BasisMonitor } from "../../src/monitor/BasisMonitor.js";
import { type MarketDataSource, StaticMarketDataSource } from "../../src/monitor/MarketDataSource.js";
import { BTC_PAIR, executionConfig, manualClock, silentLogger, snapshot } from "../helpers/fixtures.js";

const ETH_PAIR: PairConfig = {
    pairId: "ETH",
    spotSymbol: "FETH",
    futuresSymbol: "MET",
    allocationPct: 0.3,
    contractSize: 0.1,
    enabled: true,
};

describe("BasisMonitor", () => {
    let dir: string;
    let clock: ManualClock;
    let sink: MemoryAlertSink;
    let source: StaticMarketDataSource;

    const config = (overrides: Partial<BasisDeskConfig> = {}): BasisDeskConfig => ({
        strategy: DEFAULT_STRATEGY_CONFIG,
        execution: executionConfig(),
        pairs: [BTC_PAIR, ETH_PAIR],
        monitor: {
            ...DEFAULT_MONITOR_CONFIG,
            historyLimit: 3,
            historyPath: path.join(dir, "history.json"),
            stateDir: dir,
            journalPath: path.join(dir, "execution_log.jsonl"),
        },
        ...overrides,
    });

    const monitor = (cfg: BasisDeskConfig = config(), dataSource: MarketDataSource = source) =>
        new BasisMonitor({ config: cfg, source: dataSource, alertSink: sink, logger: silentLogger(), clock });

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "basis-monitor-"));
        clock = manualClock();
        sink = new MemoryAlertSink();
        source = new StaticMarketDataSource({ BTC: snapshot(0.02) });
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it("should only track enabled pairs", () => {
        const m = monitor(config({ pairs: [BTC_PAIR, { ...ETH_PAIR, enabled: false }] }));

        expect([...m.pairs.keys()]).toEqual(["BTC"]);
    });

    it("should apply the pair allocation to the strategy", () => {
        const m = monitor();

        expect(m.pairs.get("ETH")?.strategy.futuresTargetPct).toBe(0.3);
        expect(m.pairs.get("BTC")?.strategy.contractSize).toBe(0.1);
    });

    it("should alert on an entry signal only when it changes", async () => {
        const m = monitor();
        await m.runOnce();
        await m.runOnce();

        expect(sink.messages()).toEqual(["[BTC] [+] STRONG ENTRY SIGNAL: Strong basis >1.0% monthly"]);
        expect(m.pairs.get("BTC")?.history).toHaveLength(2);
    });

    it("should repeat exit alerts every tick", async () => {
        source.set("BTC", snapshot(0.03));
        const m = monitor();
        await m.runOnce();
        await m.runOnce();

        expect(sink.messages()).toEqual([
            "[BTC] [~] PARTIAL EXIT SIGNAL: Elevated basis (>2.5% monthly) - partial exit",
            "[BTC] [~] PARTIAL EXIT SIGNAL: Elevated basis (>2.5% monthly) - partial exit",
        ]);
    });

    it("should raise a stop loss and the critical risks together", async () => {
        source.set("BTC", snapshot(-0.01));
        const m = monitor();
        const alerts: string[] = [];
        m.on("alert", (message) => alerts.push(message));
        await m.runOnce();

        expect(alerts).toEqual([
            "[BTC] [!!] STOP LOSS ALERT: Backwardation detected - basis negative",
            "[BTC] [!] CRITICAL RISKS: basis",
        ]);
        expect(sink.alerts[0].record.signal).toBe("STOP_LOSS");
    });

    it("should record the evaluated sample", async () => {
        const m = monitor();
        const record = await m.checkPair(m.activePairs("btc")[0], snapshot(0.02));

        expect(record.timestamp).toBe("2025-01-06T14:00:00.000Z");
        expect(record.pair_id).toBe("BTC");
        expect(record.spot_price).toBe(100_000);
        expect(record.futures_price).toBe(102_000);
        expect(record.monthly_basis).toBe(0.02);
        expect(record.net_annualized_return).toBeCloseTo(0.193333, 6);
        expect(record.signal).toBe("STRONG_ENTRY");
    });

    it("should cap history at the configured limit", async () => {
        const m = monitor();
        for (let i = 0; i < 5; i++) {
            await m.runOnce();
        }

        expect(m.pairs.get("BTC")?.history).toHaveLength(3);
    });

    describe("runOnce", () => {
        it("should report false when no pair has data", async () => {
            source = new StaticMarketDataSource();

            await expect(monitor().runOnce()).resolves.toBe(false);
        });

        it("should select nothing for an unknown pair", async () => {
            const m = monitor();

            expect(m.activePairs("SOL")).toEqual([]);
            await expect(m.runOnce("SOL")).resolves.toBe(false);
        });

        it("should keep going when a source throws", async () => {
            const failing: MarketDataSource = {
                name: "failing",
                fetchSnapshot: async () => {
                    throw new Error("feed down");
                },
            };

            await expect(monitor(config(), failing).runOnce()).resolves.toBe(false);
        });

        it("should filter by pair id case-insensitively", async () => {
            const m = monitor();
            await m.runOnce("btc");

            expect(m.pairs.get("BTC")?.history).toHaveLength(1);
            expect(m.pairs.get("ETH")?.history).toHaveLength(0);
        });
    });

    describe("execution", () => {
        const withExecution = () =>
            new BasisMonitor({
                config: config({ execution: executionConfig({ enabled: true, autoTrade: true, dryRun: true }) }),
                source,
                alertSink: sink,
                logger: silentLogger(),
                clock,
                createManager: (pair, engine, logger) =>
                    ExecutionManager.forPair({
                        pair,
                        execution: executionConfig({ enabled: true, autoTrade: true, dryRun: true }),
                        monitor: { stateDir: dir, journalPath: path.join(dir, "execution_log.jsonl") },
                        engine,
                        logger,
                        clock,
                        journal: new InMemoryExecutionJournal(),
                    }),
            });

        it("should hand alerting signals to the pair's manager", async () => {
            source.set("BTC", snapshot(0.02, { etfPrice: 50 }));
            const m = withExecution();
            const outcomes: Array<[string, ExecutionOutcome]> = [];
            m.on("execution", (pairId, outcome) => outcomes.push([pairId, outcome]));
            await m.runOnce();

            expect(outcomes).toHaveLength(1);
            expect(outcomes[0][0]).toBe("BTC");
            expect(outcomes[0][1].kind).toBe("executed");
            expect(m.pairs.get("BTC")?.executionManager?.tracker.position.futuresContracts).toBe(10);
        });

        it("should not execute when no alert fired", async () => {
            source.set("BTC", snapshot(0.02, { etfPrice: 50 }));
            const m = withExecution();
            const outcomes: ExecutionOutcome[] = [];
            m.on("execution", (_pairId, outcome) => outcomes.push(outcome));
            await m.runOnce();
            await m.runOnce();

            expect(outcomes).toHaveLength(1);
        });

        it("should not build managers when execution is disabled", () => {
            const m = new BasisMonitor({
                config: config(),
                source,
                alertSink: sink,
                logger: silentLogger(),
                createManager: () => {
                    throw new Error("should not be called");
                },
            });

            expect(m.pairs.get("BTC")?.executionManager).toBeUndefined();
        });
    });

    it("should save every pair's history on stop", async () => {
        const m = monitor();
        m.start(60);
        expect(m.isRunning).toBe(true);
        await m.stop();

        expect(m.isRunning).toBe(false);
        const saved = JSON.parse(fs.readFileSync(path.join(dir, "history.json"), "utf-8"));
        expect(Object.keys(saved)).toEqual(["BTC", "ETH"]);
        expect(saved.BTC).toHaveLength(1);
        expect(saved.BTC[0].signal).toBe("STRONG_ENTRY");
        expect(saved.ETH).toEqual([]);
    });

    it("should log a failing summary listener and keep ticking", async () => {
        jest.useFakeTimers({ doNotFake: ["nextTick", "queueMicrotask", "setImmediate", "Date"] });
        const logger = silentLogger();
        const errors = jest.spyOn(logger, "error");
        const m = new BasisMonitor({ config: config(), source, alertSink: sink, logger, clock });
        const samples: AlertRecord[] = [];
        m.on("sample", (record) => samples.push(record));
        m.on("summary", () => {
            throw new Error("listener broke");
        });
        try {
            m.start(60);
            await jest.advanceTimersByTimeAsync(11 * 60_000);

            expect(errors).toHaveBeenCalledWith("Monitor pass failed: listener broke", expect.any(Error));

            await jest.advanceTimersByTimeAsync(60_000);
            expect(errors).toHaveBeenCalledTimes(1);
            expect(samples).toHaveLength(13);
        } finally {
            jest.useRealTimers();
            await m.stop();
        }
    });

    describe("generateSummaryReport", () => {
        it("should summarize each pair", async () => {
            const m = monitor();
            await m.runOnce();
            clock.advance(5 * 60 * 1000);
            source.set("BTC", snapshot(0.03));
            await m.runOnce();

            const lines = m.generateSummaryReport().split("\n");

            expect(lines[1]).toBe("BASIS MONITOR SUMMARY - 2025-01-06 14:05:00");
            expect(lines).toEqual(
                expect.arrayContaining([
                    "--- [BTC] IBIT/MBT ---",
                    "  Spot Price:         $100,000.00",
                    "  Monthly Basis:      3.00%",
                    "  Net Annual Return:  31.50%",
                    "  Signal:             PARTIAL_EXIT",
                    "  Trend:              [UP] Rising (+1.00% change)",
                    "  Recent (2 samples):",
                    "    1. 14:00:00 - Basis: 2.00% - STRONG_ENTRY",
                    "    2. 14:05:00 - Basis: 3.00% - PARTIAL_EXIT",
                    "    Funding              MODERATE - Normal funding environment",
                    "[ETH] No data collected yet.",
                ]),
            );
        });

        it("should call a single sample stable", async () => {
            const m = monitor();
            await m.runOnce();

            expect(m.generateSummaryReport()).toContain("  Trend:              [=]  Stable (+0.00% change)");
        });
    });
});
