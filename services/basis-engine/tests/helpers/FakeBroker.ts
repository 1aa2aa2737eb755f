import { BrokerError } from "@basis-desk/shared";
import type { BrokerOrder, OrderBroker } from "../../src/execution/interfaces.js";
import type { OrderRequest } from "../../src/types/orders.js";

/**
 * How the fake treats orders for a symbol
 */
export type FakeBehaviour =
    | { kind: "fill"; price?: number; commission?: number }
    | { kind: "reject"; status?: "REJECTED" | "CANCELLED"; filledQty?: number; price?: number }
    | { kind: "hang"; filledQty?: number; price?: number }
    | { kind: "throw"; message: string };

/**
 * Scriptable in-process broker. Symbols without a behaviour fill at the
 * request's limit or reference price.
 */
export class FakeBroker implements OrderBroker {
    readonly name = "fake";
    readonly placed: OrderRequest[] = [];
    readonly cancelled: string[] = [];
    connectResult = true;
    /** When set, cancelOrder throws with this message */
    cancelError: string | null = null;
    private connected = false;
    private nextId = 1;
    private readonly orders = new Map<string, BrokerOrder>();
    private readonly behaviours = new Map<string, FakeBehaviour>();

    constructor(connected = false) {
        this.connected = connected;
    }

    on(symbol: string, behaviour: FakeBehaviour): this {
        this.behaviours.set(symbol, behaviour);
        return this;
    }

    async connect(): Promise<boolean> {
        this.connected = this.connectResult;
        return this.connectResult;
    }

    async disconnect(): Promise<void> {
        this.connected = false;
    }

    isConnected(): boolean {
        return this.connected;
    }

    async placeOrder(request: OrderRequest): Promise<BrokerOrder> {
        this.placed.push(request);
        const behaviour = this.behaviours.get(request.symbol) ?? { kind: "fill" };
        const orderId = `fake-${this.nextId++}`;
        const price = request.limitPrice ?? request.referencePrice ?? 0;

        let order: BrokerOrder;
        switch (behaviour.kind) {
            case "throw":
                throw new BrokerError(behaviour.message, "ORDER_REJECTED");
            case "fill":
                order = {
                    orderId,
                    status: "FILLED",
                    done: true,
                    filledQty: request.quantity,
                    avgFillPrice: behaviour.price ?? price,
                    commission: behaviour.commission ?? 0,
                };
                break;
            case "reject":
                order = {
                    orderId,
                    status: behaviour.status ?? "REJECTED",
                    done: true,
                    filledQty: behaviour.filledQty ?? 0,
                    avgFillPrice: behaviour.price ?? price,
                    commission: 0,
                };
                break;
            case "hang":
                order = {
                    orderId,
                    status: behaviour.filledQty ? "PARTIALLY_FILLED" : "SUBMITTED",
                    done: false,
                    filledQty: behaviour.filledQty ?? 0,
                    avgFillPrice: behaviour.price ?? price,
                    commission: 0,
                };
                break;
        }
        this.orders.set(orderId, order);
        return { ...order };
    }

    async getOrderState(orderId: string): Promise<BrokerOrder> {
        const order = this.orders.get(orderId);
        if (!order) throw new BrokerError(`Unknown order ${orderId}`, "UNKNOWN_ORDER");
        return { ...order };
    }

    async cancelOrder(orderId: string): Promise<void> {
        this.cancelled.push(orderId);
        if (this.cancelError) throw new BrokerError(this.cancelError, "UNKNOWN_ORDER");
        const order = this.orders.get(orderId);
        if (order && !order.done) {
            this.orders.set(orderId, { ...order, status: "CANCELLED", done: true });
        }
    }
}
