import { createLogger, type IntentSnapshot } from '@sundown/common';
import type { IntentObservation } from './decide.js';

const logger = createLogger('intent-tracker');

export interface DuplicateGroup {
  resourceId: string;
  /** Earliest executeAt; the only one acted on this cycle */
  primary: IntentSnapshot;
  /** Left alone for manual review */
  others: IntentSnapshot[];
}

export interface CyclePlan {
  observations: IntentObservation[];
  duplicates: DuplicateGroup[];
  /** Ids listed by the store that already reached a terminal state here */
  skipped: string[];
}

function byExecutionOrder(a: IntentSnapshot, b: IntentSnapshot): number {
  return (
    a.executeAt.getTime() - b.executeAt.getTime() ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.intentId.localeCompare(b.intentId)
  );
}

/**
 * The "previously seen" layer between the store listing and `decide`. It is
 * never authoritative: it only detects disappearance and remembers which
 * intents this process already executed.
 */
export class IntentTracker {
  private readonly seen = new Map<string, IntentSnapshot>();
  private readonly executed = new Set<string>();

  /**
   * Turn one listing into observations. Present snapshots replace what was
   * seen before; ids seen earlier but missing now come back as absent.
   */
  observe(snapshots: readonly IntentSnapshot[]): CyclePlan {
    const current = new Map<string, IntentSnapshot>();
    const skipped: string[] = [];

    for (const snapshot of snapshots) {
      if (this.executed.has(snapshot.intentId)) {
        skipped.push(snapshot.intentId);
        continue;
      }
      if (current.has(snapshot.intentId)) {
        logger.warn({ intentId: snapshot.intentId }, 'Store listed the same intent twice');
        continue;
      }
      current.set(snapshot.intentId, snapshot);
    }

    const byResource = new Map<string, IntentSnapshot[]>();
    for (const snapshot of current.values()) {
      const group = byResource.get(snapshot.resourceId) ?? [];
      group.push(snapshot);
      byResource.set(snapshot.resourceId, group);
    }

    const observations: IntentObservation[] = [];
    const duplicates: DuplicateGroup[] = [];
    for (const [resourceId, group] of byResource) {
      const [primary, ...others] = [...group].sort(byExecutionOrder);
      if (!primary) continue;
      observations.push({ kind: 'present', snapshot: primary });
      if (others.length > 0) {
        duplicates.push({ resourceId, primary, others });
      }
    }

    for (const [intentId, lastSeen] of this.seen) {
      if (!current.has(intentId)) {
        observations.push({ kind: 'absent', intentId, lastSeen });
      }
    }

    for (const [intentId, snapshot] of current) {
      this.seen.set(intentId, snapshot);
    }

    return { observations, duplicates, skipped };
  }

  /** Terminal: the intent will never be acted on again in this process */
  markExecuted(intentId: string): void {
    this.seen.delete(intentId);
    this.executed.add(intentId);
  }

  /** The intent disappeared from the store */
  forget(intentId: string): void {
    this.seen.delete(intentId);
  }

  get trackedCount(): number {
    return this.seen.size;
  }

  get executedCount(): number {
    return this.executed.size;
  }
}
