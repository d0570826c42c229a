import { TimeParser, type IntentSnapshot } from '@sundown/common';

function describeResource(snapshot: IntentSnapshot): string {
  return snapshot.resourceName
    ? `container ${snapshot.resourceId} (${snapshot.resourceName})`
    : `container ${snapshot.resourceId}`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function reminderMessage(snapshot: IntentSnapshot, timezone = 'UTC'): string {
  const requestedBy = snapshot.requestor ? ` (requested by <@${snapshot.requestor}>)` : '';
  return (
    `:alarm_clock: Reminder: ${describeResource(snapshot)} will be deleted on ` +
    `${TimeParser.format(snapshot.executeAt, timezone)}${requestedBy}.`
  );
}

export function completionMessage(snapshot: IntentSnapshot, alreadyGone: boolean): string {
  const resource = capitalize(describeResource(snapshot));
  return alreadyGone
    ? `:wastebasket: ${resource} was already removed; its scheduled deletion has been cleared.`
    : `:wastebasket: ${resource} has been deleted as scheduled.`;
}

export function failureMessage(snapshot: IntentSnapshot, reason: string): string {
  return `:x: Failed to delete ${describeResource(snapshot)}: ${reason}. It will be retried at the next check.`;
}
