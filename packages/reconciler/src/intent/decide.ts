import { Limits, type IntentSnapshot } from '@sundown/common';
import { deriveState } from './snapshot.js';

export type IntentObservation =
  | { kind: 'present'; snapshot: IntentSnapshot }
  | { kind: 'absent'; intentId: string; lastSeen: IntentSnapshot };

export type IntentAction =
  | { type: 'none' }
  | { type: 'send_reminder'; snapshot: IntentSnapshot }
  | { type: 'execute'; snapshot: IntentSnapshot }
  | { type: 'purge'; intentId: string; lastSeen: IntentSnapshot };

export type IntentActionType = IntentAction['type'];

/**
 * What an intent needs right now. Pure: same inputs, same action.
 *
 * An overdue intent is executed even if its reminder never went out, and an
 * intent that vanished from the store is purged from local bookkeeping.
 */
export function decide(
  now: Date,
  observation: IntentObservation,
  reminderWindowMs: number = Limits.REMINDER_WINDOW_MS,
): IntentAction {
  if (observation.kind === 'absent') {
    return { type: 'purge', intentId: observation.intentId, lastSeen: observation.lastSeen };
  }

  const { snapshot } = observation;
  switch (deriveState(now, snapshot, reminderWindowMs)) {
    case 'execute_due':
      return { type: 'execute', snapshot };
    case 'reminder_due':
      return { type: 'send_reminder', snapshot };
    default:
      return { type: 'none' };
  }
}
