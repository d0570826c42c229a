import type { Clock } from '../utils/clock.js';

interface Sleeper {
  wakeAt: number;
  resolve: () => void;
}

/**
 * Manually driven Clock. `sleep` only resolves when `advance` moves time past
 * the sleeper's deadline, or when its signal aborts.
 *
 * @example
 * ```typescript
 * const clock = new FakeClock('2026-03-01T12:00:00Z');
 * clock.advance(5 * 60_000);
 * ```
 */
export class FakeClock implements Clock {
  private current: number;
  private sleepers: Sleeper[] = [];

  constructor(start: Date | string = '2026-01-01T00:00:00.000Z') {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(date: Date | string): void {
    this.current = new Date(date).getTime();
    this.wakeDue();
  }

  advance(ms: number): void {
    this.current += ms;
    this.wakeDue();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const sleeper: Sleeper = { wakeAt: this.current + ms, resolve };
      this.sleepers.push(sleeper);
      signal?.addEventListener(
        'abort',
        () => {
          this.sleepers = this.sleepers.filter((s) => s !== sleeper);
          resolve();
        },
        { once: true },
      );
    });
  }

  /** Number of sleep() calls still waiting */
  get pendingSleepers(): number {
    return this.sleepers.length;
  }

  private wakeDue(): void {
    const due = this.sleepers.filter((s) => s.wakeAt <= this.current);
    this.sleepers = this.sleepers.filter((s) => s.wakeAt > this.current);
    for (const sleeper of due) {
      sleeper.resolve();
    }
  }
}
