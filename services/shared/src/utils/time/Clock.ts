export interface Clock {
  now(): number;
  date(): Date;
  sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  date(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Clock whose time only moves when told to. `sleep` advances the clock
 * by the requested amount and resolves on the next microtask.
 */
export class ManualClock implements Clock {
  private currentTime: number;
  private sleptMs: number = 0;

  constructor(start: number | Date) {
    this.currentTime = typeof start === 'number' ? start : start.getTime();
  }

  now(): number {
    return this.currentTime;
  }

  date(): Date {
    return new Date(this.currentTime);
  }

  setTime(time: number | Date) {
    const next = typeof time === 'number' ? time : time.getTime();
    if (next < this.currentTime) {
      throw new Error('Cannot move time backwards');
    }
    // eslint-disable-next-line functional/immutable-data
    this.currentTime = next;
  }

  advance(ms: number) {
    this.setTime(this.currentTime + ms);
  }

  async sleep(ms: number): Promise<void> {
    // eslint-disable-next-line functional/immutable-data
    this.sleptMs += ms;
    this.advance(ms);
  }

  /** Total time spent in `sleep` */
  getSleptMs(): number {
    return this.sleptMs;
  }
}
