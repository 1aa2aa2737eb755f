/**
 * Error types shared across Basis Desk services
 */

/**
 * A single validation problem, addressed by its dotted config path
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Configuration rejected by schema validation
 */
export class ConfigValidationError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(
      issues.length > 0
        ? `${message}: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`
        : message,
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

/**
 * A market data source could not produce a snapshot
 */
export class MarketDataUnavailableError extends Error {
  public readonly pairId: string;
  public readonly source: string;

  constructor(pairId: string, source: string, cause?: string) {
    super(`[${pairId}] market data unavailable from ${source}${cause ? `: ${cause}` : ''}`);
    this.name = 'MarketDataUnavailableError';
    this.pairId = pairId;
    this.source = source;
  }
}

export type BrokerErrorCode =
  | 'NOT_CONNECTED'
  | 'CONNECT_FAILED'
  | 'ORDER_REJECTED'
  | 'UNKNOWN_ORDER';

/**
 * Broker-level failure (connect, place, cancel)
 */
export class BrokerError extends Error {
  public readonly code: BrokerErrorCode;

  constructor(message: string, code: BrokerErrorCode) {
    super(message);
    this.name = 'BrokerError';
    this.code = code;
  }
}

/**
 * Malformed historical input
 */
export class HistoricalDataError extends Error {
  public readonly line?: number;

  constructor(message: string, line?: number) {
    super(line !== undefined ? `${message} (line ${line})` : message);
    this.name = 'HistoricalDataError';
    this.line = line;
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Coerce an unknown thrown value into an Error for logging
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
