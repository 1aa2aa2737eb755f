/**
 * Market data sources for the monitor loop
 */

import * as fs from 'fs';
import { z } from 'zod';
import { errorMessage, type Logger, MarketDataUnavailableError, type PairConfig } from '@basis-desk/shared';
import type { MarketSnapshot } from '../types/market.js';

/**
 * Produces the current snapshot for a pair. `null` means no data this tick.
 */
export interface MarketDataSource {
  readonly name: string;
  fetchSnapshot(pair: PairConfig): Promise<MarketSnapshot | null>;
}

/**
 * Tries each source in order and returns the first snapshot
 */
export class FallbackMarketDataSource implements MarketDataSource {
  readonly name: string;

  constructor(
    private readonly sources: readonly MarketDataSource[],
    private readonly logger: Logger,
  ) {
    this.name = `fallback(${sources.map((s) => s.name).join(', ')})`;
  }

  async fetchSnapshot(pair: PairConfig): Promise<MarketSnapshot | null> {
    for (const source of this.sources) {
      try {
        const snapshot = await source.fetchSnapshot(pair);
        if (snapshot) {
          return snapshot;
        }
        this.logger.debug(`[${pair.pairId}] ${source.name} returned no data`);
      } catch (error) {
        this.logger.warn(`[${pair.pairId}] ${source.name} fetch failed: ${errorMessage(error)}`);
      }
    }
    return null;
  }
}

const isoDate = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date '${value}'` });
    return z.NEVER;
  }
  return date;
});

const SnapshotEntrySchema = z.object({
  spotPrice: z.number().positive(),
  futuresPrice: z.number().positive(),
  futuresExpiry: isoDate,
  etfPrice: z.number().positive().optional(),
  etfNav: z.number().positive().optional(),
  sentimentIndex: z.number().min(0).max(1).optional(),
  openInterest: z.number().nonnegative().optional(),
  asOf: isoDate.optional(),
});

const SnapshotFileSchema = z.record(z.unknown());

/**
 * Reads `{ [pairId]: snapshot }` from a JSON file written by an external
 * collector. A pair missing from the file yields null; only the requested
 * pair's entry is validated.
 */
export class FileSnapshotSource implements MarketDataSource {
  readonly name = 'snapshot-file';

  constructor(private readonly filePath: string) {}

  async fetchSnapshot(pair: PairConfig): Promise<MarketSnapshot | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(this.filePath, 'utf-8'));
    } catch (error) {
      throw new MarketDataUnavailableError(pair.pairId, this.name, errorMessage(error));
    }

    const file = SnapshotFileSchema.safeParse(raw);
    if (!file.success) {
      throw new MarketDataUnavailableError(pair.pairId, this.name, 'snapshot file is not a JSON object');
    }

    const rawEntry = file.data[pair.pairId];
    if (rawEntry === undefined) {
      return null;
    }

    const parsed = SnapshotEntrySchema.safeParse(rawEntry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new MarketDataUnavailableError(
        pair.pairId,
        this.name,
        issue ? [pair.pairId, ...issue.path].join('.') + `: ${issue.message}` : 'invalid snapshot entry',
      );
    }

    const entry = parsed.data;
    return {
      ...entry,
      pairId: pair.pairId,
      spotSymbol: pair.spotSymbol,
      futuresSymbol: pair.futuresSymbol,
    };
  }
}

/**
 * Fixed snapshots keyed by pair id
 */
export class StaticMarketDataSource implements MarketDataSource {
  readonly name = 'static';
  private readonly snapshots = new Map<string, MarketSnapshot>();

  constructor(snapshots: Record<string, MarketSnapshot> = {}) {
    for (const [pairId, snapshot] of Object.entries(snapshots)) {
      this.snapshots.set(pairId, snapshot);
    }
  }

  set(pairId: string, snapshot: MarketSnapshot): void {
    this.snapshots.set(pairId, snapshot);
  }

  async fetchSnapshot(pair: PairConfig): Promise<MarketSnapshot | null> {
    return this.snapshots.get(pair.pairId) ?? null;
  }
}
