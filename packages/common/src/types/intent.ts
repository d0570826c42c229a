/**
 * A deletion intent as read from the event store on one poll.
 * Never mutated locally; the next poll produces a new snapshot.
 */
export interface IntentSnapshot {
  /** Event-store handle, stable for the intent's lifetime */
  readonly intentId: string;
  /** Numeric resource id in string form (a Proxmox vmid) */
  readonly resourceId: string;
  /** Display name cached when the intent was created */
  readonly resourceName: string | null;
  /** Slack user id of whoever scheduled the deletion */
  readonly requestor: string | null;
  readonly createdAt: Date;
  readonly executeAt: Date;
  /** Monotonic: once true it is never written back to false */
  readonly reminderSent: boolean;
}

/**
 * Lifecycle of an intent. Only `executed` and `cancelled` are terminal;
 * every other state is re-derived from a fresh snapshot each cycle.
 */
export type IntentState =
  | 'scheduled'
  | 'reminder_due'
  | 'reminder_sent'
  | 'execute_due'
  | 'executed'
  | 'cancelled';

export interface NewIntent {
  resourceId: string;
  resourceName: string | null;
  requestor: string | null;
  createdAt: Date;
  executeAt: Date;
}

/** Flat string map carried on the remote event */
export interface IntentMetadata {
  type: string;
  resource_id: string;
  resource_name: string;
  requestor: string;
  created_at: string;
  reminder_sent: 'true' | 'false';
  scheduled_by: string;
}
