/**
 * Broker implementations selected by `execution.broker`
 */

import { BrokerError, type BrokerKind, type ExecutionConfig, type Logger } from '@basis-desk/shared';
import type { OrderRequest } from '../types/orders.js';
import type { BrokerOrder, OrderBroker } from './interfaces.js';

/**
 * Broker used when no venue is configured; it never connects
 */
export class OfflineBroker implements OrderBroker {
  readonly name = 'offline';

  async connect(): Promise<boolean> {
    return false;
  }

  async disconnect(): Promise<void> {}

  isConnected(): boolean {
    return false;
  }

  async placeOrder(_request: OrderRequest): Promise<BrokerOrder> {
    throw new BrokerError('Offline broker cannot place orders', 'NOT_CONNECTED');
  }

  async getOrderState(orderId: string): Promise<BrokerOrder> {
    throw new BrokerError(`Unknown order ${orderId}`, 'UNKNOWN_ORDER');
  }

  async cancelOrder(orderId: string): Promise<void> {
    throw new BrokerError(`Unknown order ${orderId}`, 'UNKNOWN_ORDER');
  }
}

/**
 * In-process paper broker: fills immediately at the limit price, or at the
 * reference price for market orders.
 */
export class PaperBroker implements OrderBroker {
  readonly name = 'paper';
  private connected = false;
  private nextId = 1;
  private readonly orders = new Map<string, BrokerOrder>();

  constructor(private readonly commissionPerUnit: number = 0) {}

  async connect(): Promise<boolean> {
    this.connected = true;
    return true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  async placeOrder(request: OrderRequest): Promise<BrokerOrder> {
    if (!this.connected) {
      throw new BrokerError('Paper broker is not connected', 'NOT_CONNECTED');
    }

    const price = request.limitPrice ?? request.referencePrice;
    if (price === undefined || price <= 0) {
      throw new BrokerError(`No price to fill ${request.symbol}`, 'ORDER_REJECTED');
    }

    const order: BrokerOrder = {
      orderId: `paper-${this.nextId++}`,
      status: 'FILLED',
      done: true,
      filledQty: request.quantity,
      avgFillPrice: price,
      commission: this.commissionPerUnit * request.quantity,
    };
    this.orders.set(order.orderId, order);
    return { ...order };
  }

  async getOrderState(orderId: string): Promise<BrokerOrder> {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new BrokerError(`Unknown order ${orderId}`, 'UNKNOWN_ORDER');
    }
    return { ...order };
  }

  async cancelOrder(orderId: string): Promise<void> {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new BrokerError(`Unknown order ${orderId}`, 'UNKNOWN_ORDER');
    }
    if (!order.done) {
      this.orders.set(orderId, { ...order, status: 'CANCELLED', done: true });
    }
  }
}

export function createBroker(
  kind: BrokerKind,
  config: Pick<ExecutionConfig, 'paperCommissionPerUnit'>,
  logger: Logger,
): OrderBroker {
  switch (kind) {
    case 'paper':
      logger.info('Using paper broker', undefined, { commissionPerUnit: config.paperCommissionPerUnit });
      return new PaperBroker(config.paperCommissionPerUnit);
    case 'offline':
      return new OfflineBroker();
  }
}
