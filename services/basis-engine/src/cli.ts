import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  type BasisDeskConfig,
  defaultPair,
  loadConfig,
  Logger,
  type PairConfig,
  toError,
} from '@basis-desk/shared';
import { buildPairStrategyConfig } from './config/strategy.js';
import { SignalEngine } from './engine/SignalEngine.js';
import { ReadlinePrompt } from './execution/ConfirmationPrompt.js';
import { ExecutionManager } from './execution/ExecutionManager.js';
import { FileAlertSink } from './monitor/AlertSink.js';
import { BasisMonitor } from './monitor/BasisMonitor.js';
import { FileSnapshotSource } from './monitor/MarketDataSource.js';
import { FilePositionRepository, positionStatePath } from './position/PositionRepository.js';
import { formatAnalysisReport } from './report/AnalysisReport.js';
import type { MarketSnapshot } from './types/market.js';
import { isPositionBalanced, isPositionOpen } from './types/position.js';
import type { Signal } from './types/signals.js';

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not a number`);
  }
  return parsed;
}

export function parseDate(value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError(`'${value}' is not a date`);
  }
  return parsed;
}

export function colorSignal(signal: Signal): string {
  switch (signal) {
    case 'STRONG_ENTRY':
    case 'ACCEPTABLE_ENTRY':
      return chalk.green(signal);
    case 'PARTIAL_EXIT':
    case 'FULL_EXIT':
      return chalk.yellow(signal);
    case 'STOP_LOSS':
      return chalk.red(signal);
    case 'NO_ENTRY':
    case 'HOLD':
      return chalk.gray(signal);
  }
}

function findPair(config: BasisDeskConfig, pairId: string): PairConfig | undefined {
  return config.pairs.find((p) => p.pairId === pairId.toUpperCase());
}

interface AnalyzeOptions {
  spot: number;
  futures: number;
  expiry: Date;
  etf?: number;
  nav?: number;
  sentiment?: number;
  oi?: number;
  pair: string;
  config?: string;
}

interface MonitorOptions {
  config?: string;
  interval?: number;
  pair?: string;
  once?: boolean;
  execute?: boolean;
  live?: boolean;
  auto?: boolean;
}

interface PositionOptions {
  config?: string;
  pair: string;
}

export function createProgram(logger: Logger = Logger.getInstance('basis-desk')): Command {
  const program = new Command();

  program.name('basis-desk').description('Cash-and-carry basis trade analysis, monitoring and execution').version('1.0.0');

  program
    .command('analyze')
    .description('Analyze a single market snapshot')
    .requiredOption('--spot <price>', 'Spot price of the underlying', parseNumber)
    .requiredOption('--futures <price>', 'Futures price', parseNumber)
    .requiredOption('--expiry <date>', 'Futures expiry (ISO date)', parseDate)
    .option('--etf <price>', 'Spot ETF price', parseNumber)
    .option('--nav <price>', 'Spot ETF NAV', parseNumber)
    .option('--sentiment <index>', 'Sentiment index in [0, 1]', parseNumber)
    .option('--oi <contracts>', 'Futures open interest', parseNumber)
    .option('--pair <id>', 'Pair id', 'BTC')
    .option('--config <path>', 'Path to config JSON')
    .action((options: AnalyzeOptions) => {
      const config = loadConfig(options.config);
      const pair = findPair(config, options.pair) ?? defaultPair(config);
      const engine = new SignalEngine(buildPairStrategyConfig(config.strategy, pair));
      const snapshot: MarketSnapshot = {
        spotPrice: options.spot,
        futuresPrice: options.futures,
        futuresExpiry: options.expiry,
        etfPrice: options.etf,
        etfNav: options.nav,
        sentimentIndex: options.sentiment,
        openInterest: options.oi,
        pairId: pair.pairId,
        spotSymbol: pair.spotSymbol,
        futuresSymbol: pair.futuresSymbol,
      };
      const analysis = engine.analyze(snapshot);
      console.log(formatAnalysisReport(analysis));
      console.log(`\nSignal: ${colorSignal(analysis.decision.signal)}`);
    });

  program
    .command('monitor')
    .description('Poll snapshots for every pair and act on signals')
    .option('--config <path>', 'Path to config JSON')
    .option('--interval <seconds>', 'Seconds between checks', parseNumber)
    .option('--pair <id>', 'Only monitor this pair')
    .option('--once', 'Run a single check and exit', false)
    .option('--execute', 'Enable trade execution', false)
    .option('--live', 'Send orders to the broker (disables dry run)', false)
    .option('--auto', 'Skip confirmation prompts', false)
    .action(async (options: MonitorOptions) => {
      const loaded = loadConfig(options.config);
      const config: BasisDeskConfig = {
        ...loaded,
        execution: {
          ...loaded.execution,
          enabled: loaded.execution.enabled || Boolean(options.execute),
          dryRun: options.live ? false : loaded.execution.dryRun,
          autoTrade: loaded.execution.autoTrade || Boolean(options.auto),
        },
      };

      if (config.execution.enabled) {
        const mode = config.execution.dryRun ? chalk.yellow('DRY RUN') : chalk.red('LIVE');
        console.log(`Execution enabled (${mode}, broker: ${config.execution.broker})`);
      }

      const prompt = new ReadlinePrompt();
      const monitor = new BasisMonitor({
        config,
        source: new FileSnapshotSource(config.monitor.snapshotPath),
        alertSink: new FileAlertSink(config.monitor.alertLogPath),
        logger,
        createManager: (pair, engine, pairLogger) =>
          ExecutionManager.forPair({
            pair,
            execution: config.execution,
            monitor: config.monitor,
            engine,
            logger: pairLogger,
            prompt,
          }),
      });
      monitor.on('alert', (message) => console.log(chalk.yellow(message)));
      monitor.on('summary', (report) => console.log(report));

      if (options.once) {
        const ok = await monitor.runOnce(options.pair);
        for (const ctx of monitor.activePairs(options.pair)) {
          const latest = ctx.history[ctx.history.length - 1];
          if (latest) {
            console.log(`\n--- [${ctx.pair.pairId}] ---`);
            console.log(`${colorSignal(latest.signal)}: ${latest.signal_reason}`);
          }
        }
        await monitor.stop();
        process.exitCode = ok ? 0 : 1;
        return;
      }

      monitor.start(options.interval ?? config.monitor.intervalSeconds, options.pair);
      process.once('SIGINT', () => {
        console.log(chalk.blue('\nStopping monitor...'));
        monitor.stop().catch((error: unknown) => {
          logger.error('Monitor shutdown failed', toError(error));
          process.exitCode = 1;
        });
      });
    });

  program
    .command('position')
    .description('Show the tracked position for a pair')
    .option('--config <path>', 'Path to config JSON')
    .option('--pair <id>', 'Pair id', 'BTC')
    .action((options: PositionOptions) => {
      const config = loadConfig(options.config);
      const pairId = options.pair.toUpperCase();
      const repository = new FilePositionRepository(positionStatePath(config.monitor.stateDir, pairId), logger);
      const position = repository.load();

      if (!position || !isPositionOpen(position)) {
        console.log(chalk.gray(`[${pairId}] No open position`));
        return;
      }

      console.log(chalk.bold(`[${pairId}] Open position${isPositionBalanced(position) ? '' : chalk.red(' (UNBALANCED)')}`));
      console.log(`  ${position.etfSymbol}: ${position.etfShares} shares @ $${position.etfEntryPrice.toFixed(2)}`);
      console.log(
        `  ${position.futuresSymbol}: -${position.futuresContracts} contracts @ $${position.futuresEntryPrice.toFixed(2)}`,
      );
      if (position.futuresExpiry) console.log(`  Expiry: ${position.futuresExpiry}`);
      if (position.openedAt) console.log(`  Opened: ${position.openedAt}`);
    });

  return program;
}
