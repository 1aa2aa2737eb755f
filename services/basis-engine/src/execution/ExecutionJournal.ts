/**
 * Append-only execution journal (newline-delimited JSON)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { z } from 'zod';
import type { OrderResultRecord, TradeAction } from '../types/orders.js';
import type { PositionSizing } from '../types/position.js';
import type { Signal } from '../types/signals.js';

export const JOURNAL_EVENTS = [
  'REJECTED',
  'USER_REJECTED',
  'CONNECTION_FAILED',
  'EXECUTING',
  'ENTRY_RESULT',
  'EXIT_RESULT',
  'REDUCE_RESULT',
] as const;

export type JournalEventType = (typeof JOURNAL_EVENTS)[number];

export interface JournalRecord {
  event: JournalEventType;
  pair_id: string;
  /** ISO timestamp */
  logged_at: string;
  signal?: Signal;
  action?: TradeAction;
  reason?: string;
  sizing?: PositionSizing;
  dry_run?: boolean;
  etf?: OrderResultRecord | null;
  futures?: OrderResultRecord | null;
}

export interface ExecutionJournal {
  append(record: JournalRecord): Promise<void>;
}

/**
 * One `appendFile` call per record, so concurrent pairs never interleave
 * partial lines.
 */
export class FileExecutionJournal implements ExecutionJournal {
  private dirReady = false;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async append(record: JournalRecord): Promise<void> {
    if (!this.dirReady) {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }
    await fs.promises.appendFile(this.filePath, `${JSON.stringify(record)}\n`, 'utf-8');
  }
}

export class InMemoryExecutionJournal implements ExecutionJournal {
  readonly records: JournalRecord[] = [];

  async append(record: JournalRecord): Promise<void> {
    // eslint-disable-next-line functional/immutable-data
    this.records.push(record);
  }

  events(): JournalEventType[] {
    return this.records.map((r) => r.event);
  }
}

const JournalLineSchema = z
  .object({
    event: z.enum(JOURNAL_EVENTS),
    pair_id: z.string(),
    logged_at: z.string(),
  })
  .passthrough();

export type JournalLine = z.infer<typeof JournalLineSchema>;

/**
 * Stream a journal file, skipping blank and malformed lines
 */
export async function readJournal(
  filePath: string,
  filter?: (line: JournalLine) => boolean,
): Promise<JournalLine[]> {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const entries: JournalLine[] = [];
  const fileStream = fs.createReadStream(filePath);
  const rl = readline.createInterface({
    input: fileStream,
    crlfDelay: Infinity,
  });

  for await (const line of rl) {
    if (!line.trim()) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = JournalLineSchema.safeParse(raw);
    if (parsed.success && (!filter || filter(parsed.data))) {
      entries.push(parsed.data);
    }
  }

  return entries;
}
