import type { IntentMetadata, IntentSnapshot, NewIntent, ResourceStatus } from '@sundown/common';

/**
 * Capabilities the reconciler consumes. Every method takes an optional
 * AbortSignal last; the executor aborts it when a call outlives its timeout.
 */

/** Lifecycle control over the managed resources (Proxmox containers) */
export interface ResourceControl {
  exists(resourceId: string, signal?: AbortSignal): Promise<boolean>;
  status(resourceId: string, signal?: AbortSignal): Promise<ResourceStatus>;
  /** Throws NotFoundError when the resource is already gone */
  delete(resourceId: string, signal?: AbortSignal): Promise<void>;
}

/** Remote, durable home of deletion intents (calendar events) */
export interface EventStore {
  /** Every intent that has not been executed or cancelled */
  listOpen(signal?: AbortSignal): Promise<IntentSnapshot[]>;
  /** Returns the new intent id */
  create(input: NewIntent, signal?: AbortSignal): Promise<string>;
  /** Merge into the stored metadata. Throws NotFoundError for a missing intent. */
  updateMetadata(intentId: string, metadata: Partial<IntentMetadata>, signal?: AbortSignal): Promise<void>;
  /** Throws NotFoundError for a missing intent */
  delete(intentId: string, signal?: AbortSignal): Promise<void>;
}

export type Audience = { kind: 'broadcast' } | { kind: 'user'; userId: string };

export interface Notifier {
  notify(audience: Audience, text: string, signal?: AbortSignal): Promise<void>;
}
