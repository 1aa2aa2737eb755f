import { OrderExecutor } from "../../src/execution/OrderExecutor.js";
import { InMemoryPositionRepository } from "../../src/position/PositionRepository.js";
import { PositionTracker } from "../../src/position/PositionTracker.js";
import type { OrderRequest } from "../../src/types/orders.js";
import { FakeBroker } from "../helpers/FakeBroker.js";
import { executionConfig, manualClock, MONDAY, silentLogger } from "../helpers/fixtures.js";
import type { ExecutionConfig, ManualClock } from "@basis-desk/shared";

describe("OrderExecutor", () => {
    let clock: ManualClock;
    let broker: FakeBroker;
    let tracker: PositionTracker;

    const executor = (overrides: Partial<ExecutionConfig> = {}) =>
        new OrderExecutor(
            executionConfig({ orderTimeoutMs: 2000, pollIntervalMs: 500, cancelSettleMs: 1000, ...overrides }),
            broker,
            tracker,
            silentLogger(),
            clock,
        );

    const request = (overrides: Partial<OrderRequest> = {}): OrderRequest => ({
        side: "BUY",
        symbol: "IBIT",
        quantity: 100,
        orderType: "LIMIT",
        limitPrice: 40.04,
        timestamp: MONDAY,
        ...overrides,
    });

    beforeEach(() => {
        clock = manualClock();
        broker = new FakeBroker(true);
        tracker = new PositionTracker(new InMemoryPositionRepository(), silentLogger(), clock);
    });

    describe("executeOrder", () => {
        it("should return PENDING under dry run without touching the broker", async () => {
            const result = await executor({ dryRun: true }).executeOrder(request());

            expect(result.status).toBe("PENDING");
            expect(result.error).toBe("Dry run - order not submitted");
            expect(broker.placed).toHaveLength(0);
        });

        it("should fail when the broker is not connected", async () => {
            broker = new FakeBroker(false);
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("FAILED");
            expect(result.error).toBe("Not connected to broker");
            expect(broker.placed).toHaveLength(0);
        });

        it("should report a fill", async () => {
            broker.on("IBIT", { kind: "fill", price: 40.02, commission: 1.5 });
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("FILLED");
            expect(result.fillPrice).toBe(40.02);
            expect(result.filledQty).toBe(100);
            expect(result.commission).toBe(1.5);
            expect(clock.getSleptMs()).toBe(0);
        });

        it("should time each broker round-trip", async () => {
            const logger = silentLogger();
            const start = jest.spyOn(logger, "startTimer");
            const end = jest.spyOn(logger, "endTimer");
            const exec = new OrderExecutor(executionConfig({ dryRun: false }), broker, tracker, logger, clock);

            await exec.executeOrder(request({ side: "SELL" }));

            expect(start).toHaveBeenCalledWith("order SELL IBIT");
            expect(end).toHaveBeenCalledWith(start.mock.results[0]?.value);
            expect(logger.getActiveTimerCount()).toBe(0);
        });

        it("should stop the timer when the broker throws", async () => {
            const logger = silentLogger();
            broker.on("IBIT", { kind: "throw", message: "Gateway down" });
            const exec = new OrderExecutor(executionConfig({ dryRun: false }), broker, tracker, logger, clock);

            const result = await exec.executeOrder(request());

            expect(result.status).toBe("FAILED");
            expect(logger.getActiveTimerCount()).toBe(0);
        });

        it("should fail an order the broker ends without a fill", async () => {
            broker.on("IBIT", { kind: "reject" });
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("FAILED");
            expect(result.error).toBe("Order ended with status: REJECTED");
        });

        it("should cancel on timeout and report a partial fill", async () => {
            broker.on("IBIT", { kind: "hang", filledQty: 40, price: 40.01 });
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("PARTIALLY_FILLED");
            expect(result.filledQty).toBe(40);
            expect(result.error).toBe("Partial fill (40/100) before timeout");
            expect(broker.cancelled).toEqual(["fake-1"]);
            expect(clock.getSleptMs()).toBe(3000);
        });

        it("should report CANCELLED when nothing filled before the timeout", async () => {
            broker.on("IBIT", { kind: "hang" });
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("CANCELLED");
            expect(result.error).toBe("Order cancelled due to timeout");
        });

        it("should convert broker errors into FAILED results", async () => {
            broker.on("IBIT", { kind: "throw", message: "Insufficient buying power" });
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("FAILED");
            expect(result.error).toBe("Insufficient buying power");
        });

        it("should keep the fill of an order the broker ends part-filled", async () => {
            broker.on("IBIT", { kind: "reject", status: "CANCELLED", filledQty: 60, price: 40.01 });
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("PARTIALLY_FILLED");
            expect(result.filledQty).toBe(60);
            expect(result.fillPrice).toBe(40.01);
            expect(result.error).toBe("Partial fill (60/100) - order ended CANCELLED");
        });

        it("should keep a partial fill when the cancel fails", async () => {
            broker.on("IBIT", { kind: "hang", filledQty: 40 });
            broker.cancelError = "Cancel rejected";
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("PARTIALLY_FILLED");
            expect(result.filledQty).toBe(40);
            expect(result.error).toBe("Partial fill (40/100) before timeout");
            expect(clock.getSleptMs()).toBe(2000);
        });

        it("should fail when the cancel fails and nothing filled", async () => {
            broker.on("IBIT", { kind: "hang" });
            broker.cancelError = "Cancel rejected";
            const result = await executor({ dryRun: false }).executeOrder(request());

            expect(result.status).toBe("FAILED");
            expect(result.error).toBe("Cancel failed after timeout: Cancel rejected");
        });
    });

    describe("executeEntryPair", () => {
        const prices = { etfPrice: 40, futuresPrice: 102_000, futuresExpiry: "2025-02-05" };

        it("should price limit orders off the snapshot", async () => {
            const { etf, futures } = await executor({ dryRun: true }).executeEntryPair(
                { etfShares: 100, futuresContracts: 4 },
                prices,
            );

            expect(etf?.request.limitPrice).toBe(40.04);
            expect(etf?.request.reason).toBe("Basis trade entry - spot leg");
            expect(futures?.request.limitPrice).toBe(101_898);
            expect(futures?.request.side).toBe("SELL");
            expect(futures?.request.signal).toBe("ENTRY");
        });

        it("should omit limit prices for market orders", async () => {
            const { etf } = await executor({ dryRun: true, orderType: "market" }).executeEntryPair(
                { etfShares: 100, futuresContracts: 4 },
                prices,
            );

            expect(etf?.request.orderType).toBe("MARKET");
            expect(etf?.request.limitPrice).toBeUndefined();
        });

        it("should record the requested entry under dry run", async () => {
            await executor({ dryRun: true }).executeEntryPair({ etfShares: 100, futuresContracts: 4 }, prices);

            expect(tracker.position).toMatchObject({
                etfShares: 100,
                etfEntryPrice: 40,
                futuresContracts: 4,
                futuresEntryPrice: 102_000,
                futuresExpiry: "2025-02-05",
            });
        });

        it("should never send the futures leg when the spot leg fails", async () => {
            broker.on("IBIT", { kind: "reject" });
            const { etf, futures } = await executor({ dryRun: false }).executeEntryPair(
                { etfShares: 100, futuresContracts: 4 },
                prices,
            );

            expect(etf?.status).toBe("FAILED");
            expect(futures).toBeNull();
            expect(broker.placed).toHaveLength(1);
            expect(tracker.isOpen).toBe(false);
        });

        it("should record actual fills when both legs fill", async () => {
            broker.on("IBIT", { kind: "fill", price: 40.03 }).on("MBT", { kind: "fill", price: 101_950 });
            await executor({ dryRun: false }).executeEntryPair({ etfShares: 100, futuresContracts: 4 }, prices);

            expect(tracker.position).toMatchObject({
                etfShares: 100,
                etfEntryPrice: 40.03,
                futuresContracts: 4,
                futuresEntryPrice: 101_950,
            });
            expect(tracker.isBalanced).toBe(true);
        });

        it("should track an unhedged spot leg when the futures leg fails", async () => {
            broker.on("MBT", { kind: "reject" });
            const { futures } = await executor({ dryRun: false }).executeEntryPair(
                { etfShares: 100, futuresContracts: 4 },
                prices,
            );

            expect(futures?.status).toBe("FAILED");
            expect(tracker.position.etfShares).toBe(100);
            expect(tracker.position.futuresContracts).toBe(0);
            expect(tracker.isBalanced).toBe(false);
        });
    });

    describe("executeExitPair", () => {
        it("should fail without an open position", async () => {
            const { etf, futures } = await executor({ dryRun: false }).executeExitPair();

            expect(etf?.status).toBe("FAILED");
            expect(etf?.error).toBe("No open position");
            expect(etf?.request.symbol).toBe("NONE");
            expect(etf?.request.quantity).toBe(0);
            expect(futures).toBeNull();
            expect(broker.placed).toHaveLength(0);
        });

        it("should close the tracked quantities and clear the tracker", async () => {
            tracker.updateOnEntry({
                etfShares: 120,
                etfPrice: 40,
                futuresContracts: 3,
                futuresPrice: 102_000,
                etfSymbol: "IBIT",
                futuresSymbol: "MBT",
            });
            const { etf, futures } = await executor({ dryRun: false }).executeExitPair({
                etfPrice: 41,
                futuresPrice: 103_000,
            });

            expect(etf?.request).toMatchObject({ side: "SELL", symbol: "IBIT", quantity: 120 });
            expect(futures?.request).toMatchObject({ side: "BUY", symbol: "MBT", quantity: 3 });
            expect(etf?.request.limitPrice).toBeUndefined();
            expect(tracker.isOpen).toBe(false);
        });

        it("should keep the unfilled leg when one side fails", async () => {
            tracker.updateOnEntry({
                etfShares: 120,
                etfPrice: 40,
                futuresContracts: 3,
                futuresPrice: 102_000,
                etfSymbol: "IBIT",
                futuresSymbol: "MBT",
            });
            broker.on("MBT", { kind: "hang", filledQty: 1 });
            await executor({ dryRun: false }).executeExitPair({ etfPrice: 41, futuresPrice: 103_000 });

            expect(tracker.position.etfShares).toBe(0);
            expect(tracker.position.futuresContracts).toBe(2);
            expect(tracker.isOpen).toBe(true);
        });

        it("should reduce by the fill of a spot order the broker ends part-filled", async () => {
            tracker.updateOnEntry({
                etfShares: 100,
                etfPrice: 40,
                futuresContracts: 2,
                futuresPrice: 102_000,
                etfSymbol: "IBIT",
                futuresSymbol: "MBT",
            });
            broker.on("IBIT", { kind: "reject", status: "CANCELLED", filledQty: 60 });
            await executor({ dryRun: false }).executeExitPair({ etfPrice: 41, futuresPrice: 103_000 });

            expect(tracker.position.etfShares).toBe(40);
            expect(tracker.position.futuresContracts).toBe(0);
            expect(tracker.isOpen).toBe(true);
        });
    });

    describe("executePartialExit", () => {
        beforeEach(() => {
            tracker.updateOnEntry({
                etfShares: 101,
                etfPrice: 40,
                futuresContracts: 3,
                futuresPrice: 102_000,
                etfSymbol: "IBIT",
                futuresSymbol: "MBT",
            });
        });

        it("should halve both legs with a floor of one", async () => {
            const { etf, futures } = await executor({ dryRun: true }).executePartialExit();

            expect(etf?.request.quantity).toBe(50);
            expect(etf?.request.reason).toBe("Partial exit (50%) - spot leg");
            expect(futures?.request.quantity).toBe(1);
            expect(futures?.request.signal).toBe("PARTIAL_EXIT");
            expect(tracker.position.etfShares).toBe(51);
            expect(tracker.position.futuresContracts).toBe(2);
        });

        it("should reduce by what actually filled", async () => {
            broker.on("IBIT", { kind: "hang", filledQty: 20 });
            await executor({ dryRun: false }).executePartialExit(0.5, { etfPrice: 41, futuresPrice: 103_000 });

            expect(tracker.position.etfShares).toBe(81);
            expect(tracker.position.futuresContracts).toBe(2);
        });
    });

    describe("spot-only position", () => {
        beforeEach(async () => {
            broker.on("MBT", { kind: "reject" });
            await executor({ dryRun: false }).executeEntryPair(
                { etfShares: 100, futuresContracts: 4 },
                { etfPrice: 40, futuresPrice: 102_000 },
            );
        });

        it("should hold only the spot leg after the futures leg was rejected", () => {
            expect(tracker.position.etfShares).toBe(100);
            expect(tracker.position.futuresContracts).toBe(0);
        });

        it("should reduce only the spot leg", async () => {
            const { etf, futures } = await executor({ dryRun: false }).executePartialExit(0.5);

            expect(broker.placed.slice(2).map((r) => `${r.side} ${r.quantity} ${r.symbol}`)).toEqual([
                "SELL 50 IBIT",
            ]);
            expect(etf?.status).toBe("FILLED");
            expect(futures).toBeNull();
            expect(tracker.position.etfShares).toBe(50);
            expect(tracker.position.futuresContracts).toBe(0);
        });

        it("should close only the spot leg", async () => {
            const { etf, futures } = await executor({ dryRun: false }).executeExitPair();

            expect(broker.placed.slice(2).map((r) => `${r.side} ${r.quantity} ${r.symbol}`)).toEqual([
                "SELL 100 IBIT",
            ]);
            expect(etf?.status).toBe("FILLED");
            expect(futures).toBeNull();
            expect(tracker.isOpen).toBe(false);
        });

        it("should not send a futures order under dry run either", async () => {
            const { futures } = await executor({ dryRun: true }).executePartialExit(0.5);

            expect(futures).toBeNull();
            expect(tracker.position.etfShares).toBe(50);
            expect(tracker.position.futuresContracts).toBe(0);
        });
    });

    describe("connect", () => {
        it("should skip the broker under dry run", async () => {
            broker = new FakeBroker(false);
            await expect(executor({ dryRun: true }).connect()).resolves.toBe(true);
            expect(broker.isConnected()).toBe(false);
        });

        it("should report a refused connection", async () => {
            broker = new FakeBroker(false);
            broker.connectResult = false;
            await expect(executor({ dryRun: false }).connect()).resolves.toBe(false);
        });
    });
});
