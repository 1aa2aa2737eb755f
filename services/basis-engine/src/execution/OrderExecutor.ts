import { type Clock, errorMessage, type ExecutionConfig, type Logger, SystemClock, toError } from '@basis-desk/shared';
import type { PositionTracker } from '../position/PositionTracker.js';
import {
  describeOrder,
  type LegPairResult,
  type OrderRequest,
  type OrderResult,
  type OrderSide,
  type OrderType,
} from '../types/orders.js';
import { isPositionOpen } from '../types/position.js';
import type { BrokerOrder, OrderBroker } from './interfaces.js';

/**
 * Prices observed when a two-leg sequence is built
 */
export interface LegPrices {
  etfPrice?: number;
  futuresPrice?: number;
  futuresExpiry?: string;
}

/**
 * Quantities for an entry
 */
export interface EntryQuantities {
  etfShares: number;
  futuresContracts: number;
}

const round2 = (value: number) => Math.round(value * 100) / 100;

function hasFilled(result: OrderResult | null): boolean {
  return result?.status === 'FILLED';
}

/** Quantity that actually traded on a leg */
function filledQuantity(result: OrderResult | null): number {
  if (!result) return 0;
  if (result.status === 'FILLED') return result.filledQty ?? result.request.quantity;
  if (result.status === 'PARTIALLY_FILLED') return result.filledQty ?? 0;
  return 0;
}

/**
 * Places the two legs of a basis trade through an {@link OrderBroker} and
 * keeps the {@link PositionTracker} in step with what filled.
 *
 * Under dry-run nothing reaches the broker: every order comes back PENDING
 * and the tracker is updated with the requested quantities.
 */
export class OrderExecutor {
  constructor(
    private readonly config: ExecutionConfig,
    private readonly broker: OrderBroker,
    private readonly tracker: PositionTracker,
    private readonly logger: Logger,
    private readonly clock: Clock = new SystemClock(),
  ) {}

  get dryRun(): boolean {
    return this.config.dryRun;
  }

  isConnected(): boolean {
    return this.broker.isConnected();
  }

  async connect(): Promise<boolean> {
    if (this.config.dryRun) {
      this.logger.info('[DRY RUN] Skipping broker connection');
      return true;
    }

    this.logger.info(`Executor connecting to ${this.broker.name} broker`);
    try {
      const connected = await this.broker.connect();
      if (connected) {
        this.logger.info(`[OK] Executor connected (${this.broker.name})`);
      } else {
        this.logger.warn(`[X] Executor could not connect to ${this.broker.name} broker`);
      }
      return connected;
    } catch (error) {
      this.logger.error('Broker connection failed', toError(error), undefined, {
        broker: this.broker.name,
        error: errorMessage(error),
      });
      return false;
    }
  }

  async disconnect(): Promise<void> {
    if (this.broker.isConnected()) {
      await this.broker.disconnect();
      this.logger.info(`[OK] Executor disconnected from ${this.broker.name}`);
    }
  }

  /**
   * Place one order and wait for it to finish, cancelling on timeout
   */
  async executeOrder(request: OrderRequest): Promise<OrderResult> {
    if (this.config.dryRun) {
      this.logger.info(`[DRY RUN] Would execute: ${describeOrder(request)}`);
      return this.result(request, 'PENDING', { error: 'Dry run - order not submitted' });
    }

    if (!this.broker.isConnected()) {
      return this.result(request, 'FAILED', { error: 'Not connected to broker' });
    }

    try {
      return await this.placeAndWait(request);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Order execution failed: ${message}`, toError(error));
      return this.result(request, 'FAILED', { error: message });
    }
  }

  /**
   * BUY spot, then SELL futures. The futures leg is never sent unless the
   * spot leg filled (or is PENDING under dry-run).
   */
  async executeEntryPair(quantities: EntryQuantities, prices: LegPrices = {}): Promise<LegPairResult> {
    const orderType = this.orderType();
    const offset = this.config.limitOffsetPct;

    let etfLimit: number | undefined;
    let futuresLimit: number | undefined;
    if (orderType === 'LIMIT') {
      if (prices.etfPrice) etfLimit = round2(prices.etfPrice * (1 + offset));
      if (prices.futuresPrice) futuresLimit = round2(prices.futuresPrice * (1 - offset));
    }

    const etfRequest = this.request('BUY', this.config.spotSymbol, quantities.etfShares, orderType, {
      limitPrice: etfLimit,
      referencePrice: prices.etfPrice,
      signal: 'ENTRY',
      reason: 'Basis trade entry - spot leg',
    });
    this.logger.info(`[1/2] ETF entry: ${describeOrder(etfRequest)}`);
    const etf = await this.executeOrder(etfRequest);

    if (etf.status !== 'FILLED' && etf.status !== 'PENDING') {
      this.logger.error(`ETF leg failed: ${etf.error ?? etf.status} - aborting futures leg`);
      return { etf, futures: null };
    }

    const futuresRequest = this.request('SELL', this.config.futuresSymbol, quantities.futuresContracts, orderType, {
      limitPrice: futuresLimit,
      referencePrice: prices.futuresPrice,
      signal: 'ENTRY',
      reason: 'Basis trade entry - futures leg',
    });
    this.logger.info(`[2/2] Futures entry: ${describeOrder(futuresRequest)}`);
    const futures = await this.executeOrder(futuresRequest);

    if (this.config.dryRun) {
      this.tracker.updateOnEntry({
        etfShares: quantities.etfShares,
        etfPrice: prices.etfPrice ?? 0,
        futuresContracts: quantities.futuresContracts,
        futuresPrice: prices.futuresPrice ?? 0,
        etfSymbol: this.config.spotSymbol,
        futuresSymbol: this.config.futuresSymbol,
        futuresExpiry: prices.futuresExpiry,
      });
    } else if (hasFilled(etf)) {
      if (!hasFilled(futures)) {
        this.logger.error('Futures leg did not fill - spot leg is unhedged', undefined, undefined, {
          futuresStatus: futures.status,
          futuresFilled: filledQuantity(futures),
        });
      }
      this.tracker.updateOnEntry({
        etfShares: filledQuantity(etf),
        etfPrice: etf.fillPrice ?? prices.etfPrice ?? 0,
        futuresContracts: filledQuantity(futures),
        futuresPrice: futures.fillPrice ?? prices.futuresPrice ?? 0,
        etfSymbol: this.config.spotSymbol,
        futuresSymbol: this.config.futuresSymbol,
        futuresExpiry: prices.futuresExpiry,
      });
    }

    return { etf, futures };
  }

  /**
   * SELL the tracked spot shares and BUY back the tracked futures. A leg
   * with nothing tracked is not sent.
   */
  async executeExitPair(prices: LegPrices = {}): Promise<LegPairResult> {
    const position = this.tracker.position;
    if (!isPositionOpen(position)) {
      this.logger.warn('No open position to exit');
      return this.noPosition();
    }

    const orderType = this.orderType();
    let etf: OrderResult | null = null;
    if (position.etfShares > 0) {
      const etfRequest = this.request('SELL', position.etfSymbol, position.etfShares, orderType, {
        referencePrice: prices.etfPrice,
        signal: 'EXIT',
        reason: 'Basis trade exit - spot leg',
      });
      this.logger.info(`[1/2] ETF exit: ${describeOrder(etfRequest)}`);
      etf = await this.executeOrder(etfRequest);
    }

    let futures: OrderResult | null = null;
    if (position.futuresContracts > 0) {
      const futuresRequest = this.request('BUY', position.futuresSymbol, position.futuresContracts, orderType, {
        referencePrice: prices.futuresPrice,
        signal: 'EXIT',
        reason: 'Basis trade exit - futures leg',
      });
      this.logger.info(`[2/2] Futures exit: ${describeOrder(futuresRequest)}`);
      futures = await this.executeOrder(futuresRequest);
    }

    if (this.config.dryRun) {
      this.tracker.clear();
    } else {
      this.reduceByFills(etf, futures);
    }

    return { etf, futures };
  }

  /**
   * Reduce each held leg by `exitPct`, at least one unit. A leg with nothing
   * tracked is not sent.
   */
  async executePartialExit(exitPct: number = 0.5, prices: LegPrices = {}): Promise<LegPairResult> {
    const position = this.tracker.position;
    if (!isPositionOpen(position)) {
      this.logger.warn('No open position to reduce');
      return this.noPosition();
    }

    const etfToSell = position.etfShares > 0 ? Math.max(1, Math.floor(position.etfShares * exitPct)) : 0;
    const contractsToClose =
      position.futuresContracts > 0 ? Math.max(1, Math.floor(position.futuresContracts * exitPct)) : 0;
    const label = `Partial exit (${(exitPct * 100).toFixed(0)}%)`;
    const orderType = this.orderType();

    let etf: OrderResult | null = null;
    if (etfToSell > 0) {
      const etfRequest = this.request('SELL', position.etfSymbol, etfToSell, orderType, {
        referencePrice: prices.etfPrice,
        signal: 'PARTIAL_EXIT',
        reason: `${label} - spot leg`,
      });
      this.logger.info(`[1/2] Partial ETF exit: ${describeOrder(etfRequest)}`);
      etf = await this.executeOrder(etfRequest);
    }

    let futures: OrderResult | null = null;
    if (contractsToClose > 0) {
      const futuresRequest = this.request('BUY', position.futuresSymbol, contractsToClose, orderType, {
        referencePrice: prices.futuresPrice,
        signal: 'PARTIAL_EXIT',
        reason: `${label} - futures leg`,
      });
      this.logger.info(`[2/2] Partial futures exit: ${describeOrder(futuresRequest)}`);
      futures = await this.executeOrder(futuresRequest);
    }

    if (this.config.dryRun) {
      this.tracker.updateOnPartialExit(etfToSell, contractsToClose);
    } else {
      this.reduceByFills(etf, futures);
    }

    return { etf, futures };
  }

  private reduceByFills(etf: OrderResult | null, futures: OrderResult | null): void {
    const etfSold = filledQuantity(etf);
    const contractsClosed = filledQuantity(futures);
    if (etfSold > 0 || contractsClosed > 0) {
      this.tracker.updateOnPartialExit(etfSold, contractsClosed);
    }
  }

  private async placeAndWait(request: OrderRequest): Promise<OrderResult> {
    const timerId = this.logger.startTimer(`order ${request.side} ${request.symbol}`);
    try {
      return await this.roundTrip(request);
    } finally {
      this.logger.endTimer(timerId);
    }
  }

  private async roundTrip(request: OrderRequest): Promise<OrderResult> {
    const placed = await this.broker.placeOrder(request);
    this.logger.info(`Order placed: ${describeOrder(request)}`, undefined, { orderId: placed.orderId });

    const started = this.clock.now();
    let state: BrokerOrder = placed;
    while (!state.done && this.clock.now() - started < this.config.orderTimeoutMs) {
      await this.clock.sleep(this.config.pollIntervalMs);
      state = await this.broker.getOrderState(placed.orderId);
    }

    if (state.done) {
      if (state.status === 'FILLED') {
        return this.result(request, 'FILLED', {
          fillPrice: state.avgFillPrice,
          filledQty: state.filledQty,
          commission: state.commission,
        });
      }
      if (state.filledQty > 0) {
        return this.partial(request, state, `- order ended ${state.status}`);
      }
      return this.result(request, 'FAILED', { error: `Order ended with status: ${state.status}` });
    }

    this.logger.warn(`Order timeout after ${this.config.orderTimeoutMs}ms - cancelling`, undefined, {
      orderId: placed.orderId,
    });
    let cancelError: string | undefined;
    try {
      await this.broker.cancelOrder(placed.orderId);
      await this.clock.sleep(this.config.cancelSettleMs);
      state = await this.broker.getOrderState(placed.orderId);
    } catch (error) {
      cancelError = errorMessage(error);
      this.logger.error(`Cancel failed for order ${placed.orderId}: ${cancelError}`, toError(error));
    }

    if (state.filledQty > 0) {
      return this.partial(request, state, 'before timeout');
    }
    if (cancelError !== undefined) {
      return this.result(request, 'FAILED', { error: `Cancel failed after timeout: ${cancelError}` });
    }
    return this.result(request, 'CANCELLED', { error: 'Order cancelled due to timeout' });
  }

  private partial(request: OrderRequest, state: BrokerOrder, context: string): OrderResult {
    return this.result(request, 'PARTIALLY_FILLED', {
      fillPrice: state.avgFillPrice,
      filledQty: state.filledQty,
      commission: state.commission,
      error: `Partial fill (${state.filledQty}/${request.quantity}) ${context}`,
    });
  }

  private noPosition(): LegPairResult {
    const request = this.request('SELL', 'NONE', 0, 'MARKET', {});
    return { etf: this.result(request, 'FAILED', { error: 'No open position' }), futures: null };
  }

  private orderType(): OrderType {
    return this.config.orderType === 'limit' ? 'LIMIT' : 'MARKET';
  }

  private request(
    side: OrderSide,
    symbol: string,
    quantity: number,
    orderType: OrderType,
    extra: Pick<OrderRequest, 'limitPrice' | 'referencePrice' | 'signal' | 'reason'>,
  ): OrderRequest {
    return { side, symbol, quantity, orderType, ...extra, timestamp: this.clock.date() };
  }

  private result(
    request: OrderRequest,
    status: OrderResult['status'],
    fields: Pick<OrderResult, 'fillPrice' | 'filledQty' | 'commission' | 'error'>,
  ): OrderResult {
    return { status, request, ...fields, timestamp: this.clock.date() };
  }
}
