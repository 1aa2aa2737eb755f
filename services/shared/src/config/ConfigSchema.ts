/**
 * Configuration Schema Definitions for Basis Desk
 *
 * Strategy, execution, pair and monitor settings, validated with zod.
 * Every field has a default so an empty document is a valid configuration.
 */

import { z } from 'zod';

/**
 * Strategy configuration schema
 */
export const StrategyConfigSchema = z.object({
  /** Account size in quote currency */
  accountSize: z.number().positive().default(200_000),
  /** Fraction of the account targeted by the spot leg (informational) */
  spotTargetPct: z.number().min(0).max(1).default(0.5),
  /** Fraction of the account targeted by the futures leg; drives sizing */
  futuresTargetPct: z.number().min(0).max(1).default(0.5),
  /** Annualized cost of funding the spot leg */
  fundingCostAnnual: z.number().min(0).default(0.05),
  leverage: z.number().min(1).default(1),
  /** Underlying units per futures contract */
  contractSize: z.number().positive().default(5),
  /** Minimum monthly basis accepted for entry */
  minMonthlyBasis: z.number().min(0).default(0.005),
});
export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;

export const OrderTypeSettingSchema = z.enum(['limit', 'market']);
export const BrokerKindSchema = z.enum(['offline', 'paper']);
export type BrokerKind = z.infer<typeof BrokerKindSchema>;

/**
 * Execution configuration schema
 */
export const ExecutionConfigSchema = z.object({
  enabled: z.boolean().default(false),
  /** Skip the interactive confirmation prompt */
  autoTrade: z.boolean().default(false),
  spotSymbol: z.string().min(1).default('IBIT'),
  futuresSymbol: z.string().min(1).default('MBT'),
  orderType: OrderTypeSettingSchema.default('limit'),
  limitOffsetPct: z.number().min(0).max(0.1).default(0.001),
  maxEtfShares: z.number().int().nonnegative().default(10_000),
  maxFuturesContracts: z.number().int().nonnegative().default(50),
  dryRun: z.boolean().default(true),
  orderTimeoutMs: z.number().int().positive().default(30_000),
  pollIntervalMs: z.number().int().positive().default(500),
  cancelSettleMs: z.number().int().nonnegative().default(1_000),
  broker: BrokerKindSchema.default('offline'),
  /** Commission per unit charged by the paper broker */
  paperCommissionPerUnit: z.number().min(0).default(0),
});
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;

/**
 * Asset pair schema (spot ETF + futures contract)
 */
export const PairConfigSchema = z.object({
  /** Matched case-insensitively; stored upper-case */
  pairId: z
    .string()
    .min(1)
    .transform((s) => s.toUpperCase()),
  spotSymbol: z.string().min(1),
  futuresSymbol: z.string().min(1),
  /** Fraction of the account allocated to this pair */
  allocationPct: z.number().gt(0).max(1),
  contractSize: z.number().positive(),
  /** Symbol of the underlying on crypto venues, when there is one */
  cryptoSymbol: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
});
export type PairConfig = z.infer<typeof PairConfigSchema>;

/**
 * Monitor loop schema
 */
export const MonitorConfigSchema = z.object({
  intervalSeconds: z.number().int().positive().default(300),
  historyLimit: z.number().int().positive().default(1000),
  historyPath: z.string().default('output/monitor/history.json'),
  alertLogPath: z.string().default('output/logs/alerts.log'),
  stateDir: z.string().default('output/execution'),
  journalPath: z.string().default('output/execution/execution_log.jsonl'),
  /** JSON file of `{ [pairId]: snapshot }` read by the file source */
  snapshotPath: z.string().default('output/market/snapshots.json'),
});
export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

/**
 * Complete Basis Desk configuration
 */
export const BasisDeskConfigSchema = z
  .object({
    strategy: StrategyConfigSchema.default({}),
    execution: ExecutionConfigSchema.default({}),
    pairs: z.array(PairConfigSchema).default([]),
    monitor: MonitorConfigSchema.default({}),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.pairs.forEach((pair, index) => {
      if (seen.has(pair.pairId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate pair id '${pair.pairId}'`,
          path: ['pairs', index, 'pairId'],
        });
      }
      seen.add(pair.pairId);
    });
  });
export type BasisDeskConfig = z.infer<typeof BasisDeskConfigSchema>;

export const DEFAULT_STRATEGY_CONFIG: StrategyConfig = Object.freeze(
  StrategyConfigSchema.parse({}),
);

export const DEFAULT_EXECUTION_CONFIG: ExecutionConfig = Object.freeze(
  ExecutionConfigSchema.parse({}),
);

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = Object.freeze(
  MonitorConfigSchema.parse({}),
);
