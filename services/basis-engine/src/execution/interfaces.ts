/**
 * Broker Interfaces for the Basis Engine
 *
 * The engine tracks position state itself; a broker only places, reports
 * and cancels orders.
 */

import type { OrderRequest } from '../types/orders.js';

/**
 * Broker-side order status
 */
export type BrokerOrderStatus =
  | 'SUBMITTED'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'CANCELLED'
  | 'REJECTED';

/**
 * Snapshot of an order as the broker reports it
 */
export interface BrokerOrder {
  orderId: string;
  status: BrokerOrderStatus;
  /** True once the broker will not change the order again */
  done: boolean;
  filledQty: number;
  /** Average fill price over filledQty */
  avgFillPrice: number;
  commission: number;
}

/**
 * Order broker
 */
export interface OrderBroker {
  /** Broker name for logging */
  readonly name: string;

  connect(): Promise<boolean>;

  disconnect(): Promise<void>;

  isConnected(): boolean;

  placeOrder(request: OrderRequest): Promise<BrokerOrder>;

  getOrderState(orderId: string): Promise<BrokerOrder>;

  cancelOrder(orderId: string): Promise<void>;
}

export function isTerminalBrokerStatus(status: BrokerOrderStatus): boolean {
  return status === 'FILLED' || status === 'CANCELLED' || status === 'REJECTED';
}
