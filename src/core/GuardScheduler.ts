import { AbusePreventionEngine } from './AbusePreventionEngine';
import { log, logError } from '../utils';

const TAG = 'scheduler';

type Cadence = 'micro' | 'macro' | 'sweep';

/**
 * Wall-clock driver for the engine's three cadences. The engine itself never
 * starts timers; tests and replays call tickMicro/tickMacro/sweep directly.
 */
export class GuardScheduler {
  private engine: AbusePreventionEngine;
  private timers: Map<Cadence, ReturnType<typeof setInterval>> = new Map();
  private failures = 0;

  constructor(engine: AbusePreventionEngine) {
    this.engine = engine;
  }

  start(): void {
    if (this.timers.size > 0) return;
    const c = this.engine.getConfig().cadence;
    this.every('micro', c.microSeconds, () => this.engine.tickMicro());
    this.every('macro', c.macroSeconds, () => this.engine.tickMacro());
    this.every('sweep', c.evictionSeconds, () => {
      const evicted = this.engine.sweep();
      if (evicted.length > 0) log(TAG, `Evicted ${evicted.length} idle subjects`);
    });
    log(TAG, `Started (micro ${c.microSeconds}s, macro ${c.macroSeconds}s, sweep ${c.evictionSeconds}s)`);
  }

  stop(): void {
    for (const timer of this.timers.values()) clearInterval(timer);
    this.timers.clear();
  }

  isRunning(): boolean {
    return this.timers.size > 0;
  }

  getFailureCount(): number {
    return this.failures;
  }

  private every(name: Cadence, seconds: number, fn: () => void): void {
    const timer = setInterval(() => {
      try {
        fn();
      } catch (err) {
        this.failures++;
        logError(TAG, `${name} tick failed:`, err instanceof Error ? err.message : String(err));
      }
    }, seconds * 1000);
    // Timers alone must not keep the process alive.
    timer.unref();
    this.timers.set(name, timer);
  }
}
