import { NotFoundError, type IntentMetadata, type IntentSnapshot, type NewIntent } from '@sundown/common';
import type { EventStore } from '../ports.js';

type EventStoreMethod = 'listOpen' | 'create' | 'updateMetadata' | 'delete';

let snapshotCounter = 0;

/**
 * Build a snapshot with sensible defaults for tests.
 */
export function makeSnapshot(overrides: Partial<IntentSnapshot> = {}): IntentSnapshot {
  snapshotCounter++;
  return Object.freeze({
    intentId: `intent-${snapshotCounter}`,
    resourceId: '103',
    resourceName: 'web-01',
    requestor: 'U1',
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
    executeAt: new Date('2026-01-03T23:59:59.000Z'),
    reminderSent: false,
    ...overrides,
  });
}

/**
 * EventStore held in a Map. Failures are injected per method and persist
 * until cleared, like an outage would.
 */
export class InMemoryEventStore implements EventStore {
  readonly intents = new Map<string, IntentSnapshot>();
  /** Method calls in order, e.g. `delete:intent-1` */
  readonly calls: string[] = [];
  readonly failures: Partial<Record<EventStoreMethod, unknown>> = {};
  private nextId = 1;

  seed(...snapshots: IntentSnapshot[]): this {
    for (const snapshot of snapshots) {
      this.intents.set(snapshot.intentId, snapshot);
    }
    return this;
  }

  failOn(method: EventStoreMethod, error: unknown): void {
    this.failures[method] = error;
  }

  clearFailure(method: EventStoreMethod): void {
    delete this.failures[method];
  }

  async listOpen(): Promise<IntentSnapshot[]> {
    this.record('listOpen');
    return [...this.intents.values()];
  }

  async create(input: NewIntent): Promise<string> {
    this.record('create');
    const intentId = `stored-${this.nextId++}`;
    this.intents.set(intentId, Object.freeze({ ...input, intentId, reminderSent: false }));
    return intentId;
  }

  async updateMetadata(intentId: string, metadata: Partial<IntentMetadata>): Promise<void> {
    this.record('updateMetadata', intentId);
    const current = this.intents.get(intentId);
    if (!current) {
      throw new NotFoundError('Intent', intentId);
    }
    const reminderSent = current.reminderSent || metadata.reminder_sent === 'true';
    this.intents.set(intentId, Object.freeze({ ...current, reminderSent }));
  }

  async delete(intentId: string): Promise<void> {
    this.record('delete', intentId);
    if (!this.intents.delete(intentId)) {
      throw new NotFoundError('Intent', intentId);
    }
  }

  private record(method: EventStoreMethod, intentId?: string): void {
    this.calls.push(intentId ? `${method}:${intentId}` : method);
    if (method in this.failures) {
      throw this.failures[method];
    }
  }
}
