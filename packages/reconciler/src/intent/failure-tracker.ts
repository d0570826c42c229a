import { Limits, isTransient } from '@sundown/common';

export interface FailureRecord {
  /** Consecutive failures in the current streak */
  count: number;
  /** True exactly once per streak, when humans should hear about it */
  shouldReport: boolean;
}

interface Streak {
  count: number;
  reported: boolean;
}

/**
 * Consecutive-failure bookkeeping per intent. Transient failures are only
 * worth a message once they persist for `threshold` cycles; anything else is
 * reported straight away.
 */
export class FailureTracker {
  private readonly streaks = new Map<string, Streak>();

  constructor(private readonly threshold: number = Limits.FAILURE_NOTIFY_THRESHOLD) {}

  recordFailure(intentId: string, error: unknown): FailureRecord {
    const streak = this.streaks.get(intentId) ?? { count: 0, reported: false };
    streak.count += 1;

    const due = !isTransient(error) || streak.count >= this.threshold;
    const shouldReport = due && !streak.reported;
    if (shouldReport) {
      streak.reported = true;
    }

    this.streaks.set(intentId, streak);
    return { count: streak.count, shouldReport };
  }

  /** Success or purge ends the streak */
  reset(intentId: string): void {
    this.streaks.delete(intentId);
  }
}
