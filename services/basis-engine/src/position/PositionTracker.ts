import { type Clock, type Logger, SystemClock } from '@basis-desk/shared';
import {
  emptyPosition,
  type EntryFill,
  isPositionBalanced,
  isPositionOpen,
  type Position,
} from '../types/position.js';
import type { PositionRepository } from './PositionRepository.js';

/**
 * Source of truth for the pair's open position.
 *
 * Every mutation is persisted through the repository before the method
 * returns.
 */
export class PositionTracker {
  private current: Position;

  constructor(
    private readonly repository: PositionRepository,
    private readonly logger: Logger,
    private readonly clock: Clock = new SystemClock(),
    private readonly defaults: Pick<Position, 'etfSymbol' | 'futuresSymbol'> = emptyPosition(),
  ) {
    this.current = this.loadOrEmpty();
  }

  get position(): Readonly<Position> {
    return this.current;
  }

  get isOpen(): boolean {
    return isPositionOpen(this.current);
  }

  get isBalanced(): boolean {
    return isPositionBalanced(this.current);
  }

  updateOnEntry(fill: EntryFill): void {
    this.commit({
      etfShares: fill.etfShares,
      etfSymbol: fill.etfSymbol,
      etfEntryPrice: fill.etfPrice,
      futuresContracts: fill.futuresContracts,
      futuresSymbol: fill.futuresSymbol,
      futuresEntryPrice: fill.futuresPrice,
      futuresExpiry: fill.futuresExpiry,
      openedAt: this.clock.date().toISOString(),
    });
    this.logger.info('Position opened', undefined, {
      etfShares: fill.etfShares,
      etfPrice: fill.etfPrice,
      futuresContracts: fill.futuresContracts,
      futuresPrice: fill.futuresPrice,
    });
  }

  /**
   * Reduce both legs; clears the position when both reach zero
   */
  updateOnPartialExit(etfSold: number, contractsClosed: number): void {
    const etfShares = Math.max(0, this.current.etfShares - etfSold);
    const futuresContracts = Math.max(0, this.current.futuresContracts - contractsClosed);

    if (etfShares === 0 && futuresContracts === 0) {
      this.clear();
      return;
    }

    this.commit({ ...this.current, etfShares, futuresContracts });
    this.logger.info('Position reduced', undefined, { etfShares, futuresContracts });
  }

  clear(): void {
    this.commit(emptyPosition(this.current.etfSymbol, this.current.futuresSymbol));
    this.logger.info('Position cleared');
  }

  /**
   * Re-read the repository, discarding in-memory state
   */
  reload(): Position {
    this.current = this.loadOrEmpty();
    return this.current;
  }

  private loadOrEmpty(): Position {
    return this.repository.load() ?? emptyPosition(this.defaults.etfSymbol, this.defaults.futuresSymbol);
  }

  private commit(next: Position): void {
    this.repository.save(next);
    this.current = next;
  }
}
