/**
 * Durable storage for the tracked position
 *
 * The file layout is snake_case JSON:
 * etf_shares, etf_symbol, etf_entry_price, futures_contracts,
 * futures_symbol, futures_entry_price, futures_expiry, opened_at
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorMessage, type Logger } from '@basis-desk/shared';
import type { Position, PositionRecord } from '../types/position.js';

export interface PositionRepository {
  /** Stored position, or null when nothing usable is stored */
  load(): Position | null;
  save(position: Position): void;
}

const PositionRecordSchema = z.object({
  etf_shares: z.number().nonnegative(),
  etf_symbol: z.string(),
  etf_entry_price: z.number(),
  futures_contracts: z.number().nonnegative(),
  futures_symbol: z.string(),
  futures_entry_price: z.number(),
  futures_expiry: z.string().nullable().optional(),
  opened_at: z.string().nullable().optional(),
});

export function positionToRecord(position: Position): PositionRecord {
  return {
    etf_shares: position.etfShares,
    etf_symbol: position.etfSymbol,
    etf_entry_price: position.etfEntryPrice,
    futures_contracts: position.futuresContracts,
    futures_symbol: position.futuresSymbol,
    futures_entry_price: position.futuresEntryPrice,
    futures_expiry: position.futuresExpiry ?? null,
    opened_at: position.openedAt ?? null,
  };
}

export function positionFromRecord(record: z.infer<typeof PositionRecordSchema>): Position {
  return {
    etfShares: record.etf_shares,
    etfSymbol: record.etf_symbol,
    etfEntryPrice: record.etf_entry_price,
    futuresContracts: record.futures_contracts,
    futuresSymbol: record.futures_symbol,
    futuresEntryPrice: record.futures_entry_price,
    futuresExpiry: record.futures_expiry ?? undefined,
    openedAt: record.opened_at ?? undefined,
  };
}

/**
 * Position state file for one pair
 */
export function positionStatePath(stateDir: string, pairId: string): string {
  return path.join(stateDir, `position_state_${pairId}.json`);
}

/**
 * JSON file repository. Saves write to a temp file and rename over the
 * target, so a reader never sees a half-written record.
 */
export class FilePositionRepository implements PositionRepository {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger,
  ) {}

  get path(): string {
    return this.filePath;
  }

  load(): Position | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      this.logger.warn('Position state unreadable, starting flat', undefined, {
        path: this.filePath,
        error: errorMessage(error),
      });
      return null;
    }

    const parsed = PositionRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Position state malformed, starting flat', undefined, {
        path: this.filePath,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }

    return positionFromRecord(parsed.data);
  }

  save(position: Position): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(positionToRecord(position), null, 2), 'utf-8');
    fs.renameSync(tempPath, this.filePath);
  }
}

/**
 * Process-local repository for tests and dry runs
 */
export class InMemoryPositionRepository implements PositionRepository {
  private stored: Position | null;

  constructor(initial: Position | null = null) {
    this.stored = initial ? { ...initial } : null;
  }

  load(): Position | null {
    return this.stored ? { ...this.stored } : null;
  }

  save(position: Position): void {
    this.stored = { ...position };
  }
}
