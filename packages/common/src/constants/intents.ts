/** Value of the `type` metadata key that marks a calendar event as a deletion intent */
export const INTENT_EVENT_TAG = 'deletion-intent';

/** Value of the `scheduled_by` metadata key on events this service creates */
export const INTENT_SCHEDULER_NAME = 'sundown';

export const IntentMetadataKey = {
  TYPE: 'type',
  RESOURCE_ID: 'resource_id',
  RESOURCE_NAME: 'resource_name',
  REQUESTOR: 'requestor',
  CREATED_AT: 'created_at',
  REMINDER_SENT: 'reminder_sent',
  SCHEDULED_BY: 'scheduled_by',
} as const;

export const ConfirmationActionKind = {
  STOP_RESOURCE: 'stop_resource',
  SCHEDULE_DELETION: 'schedule_deletion',
} as const;

export type ConfirmationActionKindType =
  (typeof ConfirmationActionKind)[keyof typeof ConfirmationActionKind];
