import { performance } from 'perf_hooks';

/**
 * Monotonic time source, in seconds.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => performance.now() / 1000
};

/**
 * Hand-driven clock for tests and scenario replay.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    if (seconds < this.current) {
      throw new Error(`Clock cannot move backwards (${seconds} < ${this.current})`);
    }
    this.current = seconds;
  }

  advance(seconds: number): number {
    this.set(this.current + seconds);
    return this.current;
  }
}
