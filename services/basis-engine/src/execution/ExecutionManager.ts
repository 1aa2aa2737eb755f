/**
 * Execution Manager
 *
 * Turns (signal, position state) into a trade action, runs the safety
 * checks, asks for confirmation unless auto-trading, and drives the
 * executor. Every decision is written to the execution journal.
 */

import * as path from 'path';
import {
  type Clock,
  type ExecutionConfig,
  type Logger,
  type MonitorConfig,
  type PairConfig,
  type StrategyConfig,
  SystemClock,
} from '@basis-desk/shared';
import type { SignalEngine } from '../engine/SignalEngine.js';
import { FilePositionRepository, positionStatePath } from '../position/PositionRepository.js';
import { PositionTracker } from '../position/PositionTracker.js';
import type { MarketSnapshot } from '../types/market.js';
import { type LegPairResult, orderResultToRecord, type TradeAction } from '../types/orders.js';
import { isPositionOpen, type PositionSizing } from '../types/position.js';
import type { Signal } from '../types/signals.js';
import { createBroker } from './brokers.js';
import type { ConfirmationPrompt } from './ConfirmationPrompt.js';
import { type ExecutionJournal, FileExecutionJournal, type JournalRecord } from './ExecutionJournal.js';
import type { OrderBroker } from './interfaces.js';
import { OrderExecutor } from './OrderExecutor.js';

/** Fraction of each leg closed by a REDUCE */
export const PARTIAL_EXIT_PCT = 0.5;

export type ExecutionOutcome =
  | { kind: 'skipped'; action: 'NONE' }
  | { kind: 'rejected'; action: TradeAction; reason: string }
  | { kind: 'user-rejected'; action: TradeAction }
  | { kind: 'connection-failed'; action: TradeAction }
  | { kind: 'executed'; action: TradeAction; result: LegPairResult };

/**
 * Map a signal to an action given whether a position is open
 */
export function determineAction(signal: Signal, isOpen: boolean): TradeAction {
  switch (signal) {
    case 'STRONG_ENTRY':
    case 'ACCEPTABLE_ENTRY':
      return isOpen ? 'NONE' : 'OPEN';
    case 'FULL_EXIT':
    case 'STOP_LOSS':
      return isOpen ? 'CLOSE' : 'NONE';
    case 'PARTIAL_EXIT':
      return isOpen ? 'REDUCE' : 'NONE';
    case 'NO_ENTRY':
    case 'HOLD':
      return 'NONE';
  }
}

export interface ExecutionManagerDeps {
  pair: PairConfig;
  /** Execution config with the pair's symbols applied */
  execution: ExecutionConfig;
  engine: SignalEngine;
  tracker: PositionTracker;
  executor: OrderExecutor;
  journal: ExecutionJournal;
  logger: Logger;
  clock?: Clock;
  prompt?: ConfirmationPrompt;
}

const usd = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export class ExecutionManager {
  readonly pair: PairConfig;
  readonly tracker: PositionTracker;
  private readonly config: ExecutionConfig;
  private readonly engine: SignalEngine;
  private readonly executor: OrderExecutor;
  private readonly journal: ExecutionJournal;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly prompt?: ConfirmationPrompt;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(deps: ExecutionManagerDeps) {
    this.pair = deps.pair;
    this.config = deps.execution;
    this.engine = deps.engine;
    this.tracker = deps.tracker;
    this.executor = deps.executor;
    this.journal = deps.journal;
    this.logger = deps.logger;
    this.clock = deps.clock ?? new SystemClock();
    this.prompt = deps.prompt;
  }

  /**
   * Wire a manager for one pair with file-backed state and journal
   */
  static forPair(options: {
    pair: PairConfig;
    execution: ExecutionConfig;
    monitor: Pick<MonitorConfig, 'stateDir' | 'journalPath'>;
    engine: SignalEngine;
    logger: Logger;
    clock?: Clock;
    prompt?: ConfirmationPrompt;
    broker?: OrderBroker;
    journal?: ExecutionJournal;
  }): ExecutionManager {
    const { pair, logger } = options;
    const clock = options.clock ?? new SystemClock();
    const execution: ExecutionConfig = {
      ...options.execution,
      spotSymbol: pair.spotSymbol,
      futuresSymbol: pair.futuresSymbol,
    };
    const repository = new FilePositionRepository(positionStatePath(options.monitor.stateDir, pair.pairId), logger);
    const tracker = new PositionTracker(repository, logger, clock, {
      etfSymbol: pair.spotSymbol,
      futuresSymbol: pair.futuresSymbol,
    });
    const broker = options.broker ?? createBroker(execution.broker, execution, logger);
    const executor = new OrderExecutor(execution, broker, tracker, logger, clock);
    const journal = options.journal ?? new FileExecutionJournal(path.resolve(options.monitor.journalPath));

    return new ExecutionManager({
      pair,
      execution,
      engine: options.engine,
      tracker,
      executor,
      journal,
      logger,
      clock,
      prompt: options.prompt,
    });
  }

  get strategy(): StrategyConfig {
    return this.engine.config;
  }

  connect(): Promise<boolean> {
    return this.executor.connect();
  }

  disconnect(): Promise<void> {
    return this.executor.disconnect();
  }

  determineAction(signal: Signal): TradeAction {
    return determineAction(signal, isPositionOpen(this.tracker.position));
  }

  /**
   * Act on a signal. Calls for the same pair run one at a time.
   */
  handleSignal(signal: Signal, reason: string, snapshot: MarketSnapshot): Promise<ExecutionOutcome> {
    const run = this.queue.then(() => this.process(signal, reason, snapshot));
    // the chain only orders calls; each caller sees its own rejection
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Returns the failed check, or null when the action may proceed
   */
  safetyCheck(action: TradeAction, sizing: PositionSizing, snapshot: MarketSnapshot): string | null {
    if (action === 'OPEN') {
      const etfShares = sizing.etfShares ?? 0;
      if (etfShares > this.config.maxEtfShares) {
        return `ETF shares (${etfShares}) exceeds limit (${this.config.maxEtfShares})`;
      }
      if (sizing.futuresContracts > this.config.maxFuturesContracts) {
        return `Futures contracts (${sizing.futuresContracts}) exceeds limit (${this.config.maxFuturesContracts})`;
      }
    }

    const day = this.clock.date().getUTCDay();
    if (day === 0 || day === 6) {
      return `Weekend detected (day=${day}) - markets closed`;
    }

    if (action === 'OPEN') {
      if (this.engine.calculateMetrics(snapshot).monthlyBasis < 0) {
        return 'Backwardation - refusing to open new position';
      }
      if (sizing.etfShares === undefined) {
        return 'ETF price unavailable - cannot size spot leg';
      }
    }

    return null;
  }

  /**
   * Confirmation text for an action
   */
  buildSummary(
    action: TradeAction,
    signal: Signal,
    reason: string,
    sizing: PositionSizing,
    snapshot: MarketSnapshot,
  ): string {
    const monthly = this.engine.calculateMetrics(snapshot).monthlyBasis;
    const lines = [
      `Pair:         ${this.pair.pairId}`,
      `Signal:       ${signal}`,
      `Reason:       ${reason}`,
      `Action:       ${action}`,
      `Dry Run:      ${this.config.dryRun ? 'YES' : 'NO - LIVE'}`,
      '',
      `Spot:         $${usd.format(snapshot.spotPrice)}`,
      `Futures:      $${usd.format(snapshot.futuresPrice)}`,
      `Monthly Basis:${(monthly * 100).toFixed(2).padStart(6)}%`,
      '',
    ];

    const position = this.tracker.position;
    switch (action) {
      case 'OPEN':
        lines.push(
          `ETF (${this.config.spotSymbol}):`,
          `  BUY ${sizing.etfShares ?? 'N/A'} shares (~$${usd.format(sizing.spotValue)})`,
          `Futures (${this.config.futuresSymbol}):`,
          `  SELL ${sizing.futuresContracts} contracts (~$${usd.format(sizing.futuresValue)})`,
        );
        break;
      case 'CLOSE':
        lines.push(
          'Closing position:',
          `  SELL ${position.etfShares} ${position.etfSymbol} shares`,
          `  BUY  ${position.futuresContracts} ${position.futuresSymbol} contracts`,
        );
        break;
      case 'REDUCE':
        lines.push(
          `Reducing position by ${(PARTIAL_EXIT_PCT * 100).toFixed(0)}%:`,
          `  SELL ${Math.max(1, Math.floor(position.etfShares * PARTIAL_EXIT_PCT))} ${position.etfSymbol} shares`,
          `  BUY  ${Math.max(1, Math.floor(position.futuresContracts * PARTIAL_EXIT_PCT))} ${position.futuresSymbol} contracts`,
        );
        break;
      case 'NONE':
        break;
    }

    return lines.join('\n');
  }

  private async process(signal: Signal, reason: string, snapshot: MarketSnapshot): Promise<ExecutionOutcome> {
    const action = this.determineAction(signal);
    if (action === 'NONE') {
      this.logger.debug(`Signal ${signal} -> no action`, undefined, {
        positionOpen: isPositionOpen(this.tracker.position),
      });
      return { kind: 'skipped', action };
    }

    this.logger.info(`Signal ${signal} -> action ${action}: ${reason}`);
    const sizing = this.engine.calculatePositionSizing(snapshot);

    const safetyError = this.safetyCheck(action, sizing, snapshot);
    if (safetyError) {
      this.logger.warn(`Safety check failed: ${safetyError}`);
      await this.record({ event: 'REJECTED', signal, action, reason: safetyError });
      return { kind: 'rejected', action, reason: safetyError };
    }

    if (!this.config.autoTrade) {
      if (!this.prompt) {
        this.logger.warn('No confirmation prompt configured - treating as rejected');
        await this.record({ event: 'USER_REJECTED', signal, action });
        return { kind: 'user-rejected', action };
      }
      const summary = this.buildSummary(action, signal, reason, sizing, snapshot);
      if (!(await this.prompt.confirm(summary))) {
        this.logger.info('Trade rejected by user');
        await this.record({ event: 'USER_REJECTED', signal, action });
        return { kind: 'user-rejected', action };
      }
    }

    if (!this.config.dryRun && !this.executor.isConnected()) {
      if (!(await this.connect())) {
        await this.record({ event: 'CONNECTION_FAILED', signal, action });
        return { kind: 'connection-failed', action };
      }
    }

    await this.record({ event: 'EXECUTING', signal, action, sizing, dry_run: this.config.dryRun });

    const prices = {
      etfPrice: snapshot.etfPrice,
      futuresPrice: snapshot.futuresPrice,
      futuresExpiry: snapshot.futuresExpiry.toISOString().slice(0, 10),
    };

    let result: LegPairResult;
    let event: JournalRecord['event'];
    switch (action) {
      case 'OPEN':
        result = await this.executor.executeEntryPair(
          { etfShares: sizing.etfShares ?? 0, futuresContracts: sizing.futuresContracts },
          prices,
        );
        event = 'ENTRY_RESULT';
        break;
      case 'CLOSE':
        result = await this.executor.executeExitPair(prices);
        event = 'EXIT_RESULT';
        break;
      case 'REDUCE':
        result = await this.executor.executePartialExit(PARTIAL_EXIT_PCT, prices);
        event = 'REDUCE_RESULT';
        break;
    }

    await this.record({
      event,
      etf: result.etf ? orderResultToRecord(result.etf) : null,
      futures: result.futures ? orderResultToRecord(result.futures) : null,
    });

    if (result.etf) {
      this.logger.info(`${action} ETF: ${result.etf.status}`);
    }
    if (result.futures) {
      this.logger.info(`${action} Futures: ${result.futures.status}`);
    }

    return { kind: 'executed', action, result };
  }

  private record(event: Omit<JournalRecord, 'pair_id' | 'logged_at'>): Promise<void> {
    return this.journal.append({
      ...event,
      pair_id: this.pair.pairId,
      logged_at: this.clock.date().toISOString(),
    });
  }
}
