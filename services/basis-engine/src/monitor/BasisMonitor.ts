/**
 * Basis Monitor
 *
 * Polls a market data source for every configured pair, evaluates the
 * signal, raises alerts, and hands actionable signals to the pair's
 * execution manager.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EventEmitter } from 'eventemitter3';
import {
  type BasisDeskConfig,
  type Clock,
  errorMessage,
  type Logger,
  type PairConfig,
  type StrategyConfig,
  SystemClock,
  toError,
} from '@basis-desk/shared';
import { buildPairStrategyConfig } from '../config/strategy.js';
import { criticalRisks, SignalEngine } from '../engine/SignalEngine.js';
import type { ExecutionManager, ExecutionOutcome } from '../execution/ExecutionManager.js';
import type { MarketSnapshot } from '../types/market.js';
import type { RiskFactor, Signal } from '../types/signals.js';
import type { AlertRecord, AlertSink } from './AlertSink.js';
import type { MarketDataSource } from './MarketDataSource.js';

/** Ticks between summary reports (one hour at the default interval) */
export const SUMMARY_EVERY_TICKS = 12;

/**
 * Per-pair runtime state
 */
export interface PairContext {
  pair: PairConfig;
  strategy: StrategyConfig;
  engine: SignalEngine;
  executionManager?: ExecutionManager;
  lastSignal?: Signal;
  history: AlertRecord[];
}

export interface MonitorEvents {
  alert: (message: string, record: AlertRecord) => void;
  sample: (record: AlertRecord) => void;
  execution: (pairId: string, outcome: ExecutionOutcome) => void;
  summary: (report: string) => void;
}

export interface BasisMonitorOptions {
  config: BasisDeskConfig;
  source: MarketDataSource;
  alertSink: AlertSink;
  logger: Logger;
  clock?: Clock;
  /** Builds the execution manager for a pair; called only when execution is enabled */
  createManager?: (pair: PairConfig, engine: SignalEngine, logger: Logger) => ExecutionManager;
}

const RISK_ORDER: readonly RiskFactor[] = ['funding', 'basis', 'liquidity', 'crowding', 'operational'];

const usd = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

const pct = (value: number) => `${(value * 100).toFixed(2)}%`;

export class BasisMonitor extends EventEmitter<MonitorEvents> {
  readonly pairs = new Map<string, PairContext>();
  private readonly config: BasisDeskConfig;
  private readonly source: MarketDataSource;
  private readonly alertSink: AlertSink;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<boolean> | null = null;
  private tickCount = 0;
  private pairFilter?: string;

  constructor(options: BasisMonitorOptions) {
    super();
    this.config = options.config;
    this.source = options.source;
    this.alertSink = options.alertSink;
    this.logger = options.logger;
    this.clock = options.clock ?? new SystemClock();

    for (const pair of this.config.pairs) {
      if (!pair.enabled) continue;
      const strategy = buildPairStrategyConfig(this.config.strategy, pair);
      const engine = new SignalEngine(strategy, this.clock);
      const ctx: PairContext = { pair, strategy, engine, history: [] };
      if (this.config.execution.enabled && options.createManager) {
        ctx.executionManager = options.createManager(pair, engine, this.logger.child(`execution:${pair.pairId}`));
      }
      this.pairs.set(pair.pairId, ctx);
    }
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Contexts to evaluate; an unknown filter selects nothing
   */
  activePairs(pairFilter?: string): PairContext[] {
    if (!pairFilter) {
      return [...this.pairs.values()];
    }
    const ctx = this.pairs.get(pairFilter.toUpperCase());
    if (!ctx) {
      this.logger.warn(`Pair '${pairFilter}' not found. Available: ${[...this.pairs.keys()].join(', ')}`);
      return [];
    }
    return [ctx];
  }

  /**
   * Evaluate one snapshot for a pair: alert, execute, record history
   */
  async checkPair(ctx: PairContext, snapshot: MarketSnapshot): Promise<AlertRecord> {
    const { signal, reason } = ctx.engine.generateSignal(snapshot);
    const returns = ctx.engine.calculateReturns(snapshot);
    const risks = ctx.engine.assessRisk(snapshot);

    const record: AlertRecord = {
      timestamp: this.clock.date().toISOString(),
      pair_id: ctx.pair.pairId,
      spot_price: snapshot.spotPrice,
      futures_price: snapshot.futuresPrice,
      monthly_basis: returns.monthlyBasis,
      net_annualized_return: returns.netAnnualized,
      signal,
      signal_reason: reason,
      risks,
    };

    const signalChanged = ctx.lastSignal !== signal;
    ctx.lastSignal = signal;

    const tag = `[${ctx.pair.pairId}]`;
    const messages: string[] = [];
    if (signal === 'STOP_LOSS') {
      messages.push(`${tag} [!!] STOP LOSS ALERT: ${reason}`);
    } else if (signal === 'FULL_EXIT') {
      messages.push(`${tag} [-] FULL EXIT SIGNAL: ${reason}`);
    } else if (signal === 'PARTIAL_EXIT') {
      messages.push(`${tag} [~] PARTIAL EXIT SIGNAL: ${reason}`);
    } else if (signal === 'STRONG_ENTRY' && signalChanged) {
      messages.push(`${tag} [+] STRONG ENTRY SIGNAL: ${reason}`);
    } else if (signal === 'ACCEPTABLE_ENTRY' && signalChanged) {
      messages.push(`${tag} [~] ACCEPTABLE ENTRY SIGNAL: ${reason}`);
    }

    const critical = criticalRisks(risks);
    if (critical.length > 0) {
      messages.push(`${tag} [!] CRITICAL RISKS: ${critical.join(', ')}`);
    }

    if (messages.length > 0) {
      for (const message of messages) {
        this.logger.warn(message);
        await this.alertSink.send(message, record);
        this.emit('alert', message, record);
      }

      if (ctx.executionManager) {
        try {
          const outcome = await ctx.executionManager.handleSignal(signal, reason, snapshot);
          this.emit('execution', ctx.pair.pairId, outcome);
        } catch (error) {
          this.logger.error(`${tag} Execution failed: ${errorMessage(error)}`, toError(error));
        }
      }
    }

    ctx.history.push(record);
    if (ctx.history.length > this.config.monitor.historyLimit) {
      ctx.history.splice(0, ctx.history.length - this.config.monitor.historyLimit);
    }
    this.emit('sample', record);

    return record;
  }

  /**
   * One pass over the active pairs. Resolves true when at least one pair
   * produced a snapshot.
   */
  async runOnce(pairFilter?: string): Promise<boolean> {
    const results = await Promise.all(
      this.activePairs(pairFilter).map(async (ctx) => {
        try {
          const snapshot = await this.source.fetchSnapshot(ctx.pair);
          if (!snapshot) {
            this.logger.warn(`[${ctx.pair.pairId}] No market data this tick`);
            return false;
          }
          await this.checkPair(ctx, snapshot);
          return true;
        } catch (error) {
          this.logger.error(`[${ctx.pair.pairId}] Monitor check failed: ${errorMessage(error)}`, toError(error));
          return false;
        }
      }),
    );
    return results.some(Boolean);
  }

  /**
   * Run a pass now and then every `intervalSeconds`
   */
  start(intervalSeconds: number = this.config.monitor.intervalSeconds, pairFilter?: string): void {
    if (this.timer) return;
    this.pairFilter = pairFilter;
    const names = this.activePairs(pairFilter).map((ctx) => ctx.pair.pairId);
    this.logger.info(`Starting continuous monitoring for [${names.join(', ')}] (interval: ${intervalSeconds}s)`);

    this.timer = setInterval(() => {
      void this.tick();
    }, intervalSeconds * 1000);
    void this.tick();
  }

  /**
   * Stop polling, let an in-flight pass finish, disconnect brokers and
   * save history
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }

    for (const ctx of this.pairs.values()) {
      if (ctx.executionManager) {
        await ctx.executionManager.disconnect();
      }
    }
    this.saveHistory();
    this.logger.info('Monitoring stopped');
  }

  /**
   * Write every pair's history as `{ [pairId]: records }`
   */
  saveHistory(filePath: string = this.config.monitor.historyPath): void {
    const combined: Record<string, AlertRecord[]> = {};
    for (const [pairId, ctx] of this.pairs) {
      combined[pairId] = ctx.history;
    }
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(combined, null, 2), 'utf-8');
    this.logger.info(`History saved to ${filePath}`);
  }

  generateSummaryReport(): string {
    const rule = '='.repeat(70);
    const stamp = this.clock.date().toISOString().slice(0, 19).replace('T', ' ');
    const lines = [rule, `BASIS MONITOR SUMMARY - ${stamp}`, rule];

    for (const [pairId, ctx] of this.pairs) {
      const current = ctx.history[ctx.history.length - 1];
      if (!current) {
        lines.push('', `[${pairId}] No data collected yet.`);
        continue;
      }

      const previous = ctx.history[ctx.history.length - 2];
      const change = previous ? current.monthly_basis - previous.monthly_basis : 0;
      const trend = !previous ? '[=]  Stable' : change > 0 ? '[UP] Rising' : '[DOWN] Falling';
      const changeText = `${change >= 0 ? '+' : ''}${(change * 100).toFixed(2)}%`;
      const recent = ctx.history.slice(-10);

      lines.push(
        '',
        `--- [${pairId}] ${ctx.pair.spotSymbol}/${ctx.pair.futuresSymbol} ---`,
        `  Spot Price:         $${usd.format(current.spot_price)}`,
        `  Monthly Basis:      ${pct(current.monthly_basis)}`,
        `  Net Annual Return:  ${pct(current.net_annualized_return)}`,
        `  Signal:             ${current.signal}`,
        `  Trend:              ${trend} (${changeText} change)`,
        `  Recent (${recent.length} samples):`,
      );
      recent.forEach((record, i) => {
        lines.push(`    ${i + 1}. ${record.timestamp.slice(11, 19)} - Basis: ${pct(record.monthly_basis)} - ${record.signal}`);
      });

      lines.push('  Risks:');
      for (const factor of RISK_ORDER) {
        const rating = current.risks[factor];
        const label = factor.charAt(0).toUpperCase() + factor.slice(1);
        lines.push(`    ${label.padEnd(20)} ${rating.level.toUpperCase()} - ${rating.note}`);
      }
    }

    lines.push('', rule);
    return lines.join('\n');
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.warn('Previous monitor pass still running, skipping tick');
      return;
    }
    this.inFlight = this.runOnce(this.pairFilter);
    try {
      await this.inFlight;
      this.tickCount += 1;
      if (this.tickCount % SUMMARY_EVERY_TICKS === 0) {
        this.emit('summary', this.generateSummaryReport());
      }
    } catch (error) {
      this.logger.error(`Monitor pass failed: ${errorMessage(error)}`, toError(error));
    } finally {
      this.inFlight = null;
    }
  }
}
