import { Limits, type IntentSnapshot, type IntentState } from '@sundown/common';

/** The moment the reminder becomes due. Derived, never stored. */
export function reminderAt(snapshot: IntentSnapshot, reminderWindowMs: number = Limits.REMINDER_WINDOW_MS): Date {
  return new Date(snapshot.executeAt.getTime() - reminderWindowMs);
}

/**
 * Non-terminal state of an intent at `now`. Terminal states (`executed`,
 * `cancelled`) are only known to the tracker.
 */
export function deriveState(
  now: Date,
  snapshot: IntentSnapshot,
  reminderWindowMs: number = Limits.REMINDER_WINDOW_MS,
): Exclude<IntentState, 'executed' | 'cancelled'> {
  if (now.getTime() >= snapshot.executeAt.getTime()) return 'execute_due';
  if (snapshot.reminderSent) return 'reminder_sent';
  if (now.getTime() >= reminderAt(snapshot, reminderWindowMs).getTime()) return 'reminder_due';
  return 'scheduled';
}
