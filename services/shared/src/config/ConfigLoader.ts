/**
 * Configuration Loader for Basis Desk
 * Reads the JSON config file, applies environment overrides and validates
 * the result against BasisDeskConfigSchema.
 */

import { existsSync, readFileSync } from 'fs';
import type { ZodIssue } from 'zod';
import { ConfigValidationError, errorMessage } from '../errors.js';
import { type BasisDeskConfig, BasisDeskConfigSchema, type PairConfig } from './ConfigSchema.js';

type Env = Record<string, string | undefined>;

/** Environment variable => [section, field, kind] */
const ENV_OVERRIDES: ReadonlyArray<[string, 'strategy' | 'execution', string, 'number' | 'boolean']> = [
  ['BASIS_ACCOUNT_SIZE', 'strategy', 'accountSize', 'number'],
  ['BASIS_FUNDING_COST_ANNUAL', 'strategy', 'fundingCostAnnual', 'number'],
  ['BASIS_MIN_MONTHLY_BASIS', 'strategy', 'minMonthlyBasis', 'number'],
  ['BASIS_EXECUTION_ENABLED', 'execution', 'enabled', 'boolean'],
  ['BASIS_DRY_RUN', 'execution', 'dryRun', 'boolean'],
  ['BASIS_AUTO_TRADE', 'execution', 'autoTrade', 'boolean'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEnvValue(name: string, raw: string, kind: 'number' | 'boolean'): number | boolean {
  if (kind === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
    throw new ConfigValidationError('Invalid environment override', [
      { path: name, message: `expected a boolean, got '${raw}'` },
    ]);
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigValidationError('Invalid environment override', [
      { path: name, message: `expected a number, got '${raw}'` },
    ]);
  }
  return value;
}

/**
 * Apply BASIS_* environment overrides on top of a raw config document
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const result: Record<string, unknown> = { ...raw };
  for (const [name, section, field, kind] of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined) continue;
    const current = result[section];
    result[section] = {
      ...(isRecord(current) ? current : {}),
      [field]: parseEnvValue(name, value, kind),
    };
  }
  return result;
}

function formatIssues(issues: ZodIssue[]) {
  return issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Single default pair used when the configuration lists none
 */
export function defaultPair(config: BasisDeskConfig): PairConfig {
  return {
    pairId: 'BTC',
    spotSymbol: config.execution.spotSymbol,
    futuresSymbol: config.execution.futuresSymbol,
    allocationPct: config.strategy.futuresTargetPct > 0 ? config.strategy.futuresTargetPct : 0.5,
    contractSize: config.strategy.contractSize,
    cryptoSymbol: 'BTC',
    enabled: true,
  };
}

/**
 * Validate an already-parsed config document
 */
export function parseConfig(raw: unknown, env: Env = {}): BasisDeskConfig {
  let base: Record<string, unknown> = {};
  if (raw !== undefined) {
    if (!isRecord(raw)) {
      throw new ConfigValidationError('Configuration must be a JSON object');
    }
    base = raw;
  }
  const withEnv = applyEnvOverrides(base, env);
  const parsed = BasisDeskConfigSchema.safeParse(withEnv);
  if (!parsed.success) {
    throw new ConfigValidationError('Invalid configuration', formatIssues(parsed.error.issues));
  }
  const config = parsed.data;
  if (config.pairs.length === 0) {
    return { ...config, pairs: [defaultPair(config)] };
  }
  return config;
}

/**
 * Load configuration from a JSON file. A missing file yields defaults.
 */
export function loadConfig(configPath?: string, env: Env = process.env): BasisDeskConfig {
  if (!configPath || !existsSync(configPath)) {
    return parseConfig(undefined, env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigValidationError(`Failed to read configuration file ${configPath}`, [
      { path: '', message: errorMessage(error) },
    ]);
  }
  return parseConfig(raw, env);
}
