/**
 * Order Types for the Basis Engine
 *
 * Defines order requests, execution results and the trade actions derived
 * from signals.
 */

/**
 * Order side
 */
export type OrderSide = 'BUY' | 'SELL';

/**
 * Order type
 */
export type OrderType = 'MARKET' | 'LIMIT';

/**
 * Order status
 */
export type OrderStatus =
  | 'PENDING'
  | 'SUBMITTED'
  | 'FILLED'
  | 'PARTIALLY_FILLED'
  | 'CANCELLED'
  | 'FAILED';

/**
 * High-level action derived from (signal, position state)
 */
export type TradeAction = 'OPEN' | 'CLOSE' | 'REDUCE' | 'NONE';

/**
 * Order request structure
 */
export interface OrderRequest {
  side: OrderSide;
  symbol: string;
  /** Shares for the spot leg, contracts for the futures leg */
  quantity: number;
  orderType: OrderType;
  /** Limit price (LIMIT orders) */
  limitPrice?: number;
  /** Market price observed when the order was built */
  referencePrice?: number;
  /** Signal tag, e.g. ENTRY / EXIT / PARTIAL_EXIT */
  signal?: string;
  reason?: string;
  timestamp: Date;
}

/**
 * Order execution result
 */
export interface OrderResult {
  status: OrderStatus;
  request: OrderRequest;
  /** Average fill price */
  fillPrice?: number;
  /** Filled quantity */
  filledQty?: number;
  /** Total commission paid */
  commission?: number;
  /** Failure or informational message */
  error?: string;
  timestamp: Date;
}

/**
 * Result of a two-leg sequence. A leg is null when it was never sent: the
 * futures leg after a failed spot entry, or a leg with nothing tracked on exit.
 */
export interface LegPairResult {
  etf: OrderResult | null;
  futures: OrderResult | null;
}

/**
 * Journal representation of an order result
 */
export interface OrderResultRecord {
  status: OrderStatus;
  side: OrderSide;
  symbol: string;
  requested_qty: number;
  order_type: OrderType;
  limit_price: number | null;
  fill_price: number | null;
  filled_qty: number | null;
  commission: number | null;
  error: string | null;
  signal: string | null;
  timestamp: string;
}

const quantityFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const decimalFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Human-readable order description, e.g. `SELL 2 MBT (LIMIT @ $97,402.50)`
 */
export function describeOrder(request: OrderRequest): string {
  const qty = Number.isInteger(request.quantity)
    ? quantityFormat.format(request.quantity)
    : decimalFormat.format(request.quantity);
  const price = request.limitPrice ? ` @ $${decimalFormat.format(request.limitPrice)}` : '';
  return `${request.side} ${qty} ${request.symbol} (${request.orderType}${price})`;
}

export function orderResultToRecord(result: OrderResult): OrderResultRecord {
  return {
    status: result.status,
    side: result.request.side,
    symbol: result.request.symbol,
    requested_qty: result.request.quantity,
    order_type: result.request.orderType,
    limit_price: result.request.limitPrice ?? null,
    fill_price: result.fillPrice ?? null,
    filled_qty: result.filledQty ?? null,
    commission: result.commission ?? null,
    error: result.error ?? null,
    signal: result.request.signal ?? null,
    timestamp: result.timestamp.toISOString(),
  };
}
