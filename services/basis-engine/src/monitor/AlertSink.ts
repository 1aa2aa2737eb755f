import * as fs from 'fs';
import * as path from 'path';
import type { RiskAssessment, Signal } from '../types/signals.js';

/**
 * One evaluated sample, kept in history and attached to alerts
 */
export interface AlertRecord {
  timestamp: string;
  pair_id: string;
  spot_price: number;
  futures_price: number;
  monthly_basis: number;
  net_annualized_return: number;
  signal: Signal;
  signal_reason: string;
  risks: RiskAssessment;
}

export interface AlertSink {
  send(message: string, record: AlertRecord): Promise<void>;
}

/**
 * Appends `<timestamp> - <message>` plus the record as JSON to a log file
 */
export class FileAlertSink implements AlertSink {
  constructor(private readonly filePath: string) {}

  async send(message: string, record: AlertRecord): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.appendFile(
      this.filePath,
      `${record.timestamp} - ${message}\nData: ${JSON.stringify(record, null, 2)}\n\n`,
      'utf-8',
    );
  }
}

export class MemoryAlertSink implements AlertSink {
  readonly alerts: Array<{ message: string; record: AlertRecord }> = [];

  async send(message: string, record: AlertRecord): Promise<void> {
    // eslint-disable-next-line functional/immutable-data
    this.alerts.push({ message, record });
  }

  messages(): string[] {
    return this.alerts.map((a) => a.message);
  }
}
