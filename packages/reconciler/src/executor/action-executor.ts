import {
  createLogger,
  errorMessage,
  isTransient,
  Limits,
  NotFoundError,
  withTimeout,
  type IntentSnapshot,
} from '@sundown/common';
import type { IntentAction, IntentActionType } from '../intent/decide.js';
import { FailureTracker } from '../intent/failure-tracker.js';
import type { IntentTracker } from '../intent/intent-tracker.js';
import type { Audience, EventStore, Notifier, ResourceControl } from '../ports.js';
import { completionMessage, failureMessage, reminderMessage } from './messages.js';

const logger = createLogger('action-executor');

export interface ActionExecutorDeps {
  resources: ResourceControl;
  eventStore: EventStore;
  notifier: Notifier;
  tracker: IntentTracker;
}

export interface ActionExecutorOptions {
  /** Deadline for each collaborator call */
  callTimeoutMs: number;
  /** Consecutive transient execute failures before humans are told */
  failureThreshold: number;
  /** Timezone for dates in messages */
  timezone: string;
}

export type ExecutionStatus = 'completed' | 'skipped' | 'failed';

export interface ExecutionOutcome {
  intentId: string | null;
  action: IntentActionType;
  status: ExecutionStatus;
  error?: unknown;
}

const DEFAULT_OPTIONS: ActionExecutorOptions = {
  callTimeoutMs: Limits.COLLABORATOR_TIMEOUT_MS,
  failureThreshold: Limits.FAILURE_NOTIFY_THRESHOLD,
  timezone: 'UTC',
};

/**
 * Performs the side effect an action calls for, then commits the resulting
 * state to the event store. The commit is always the last remote call of an
 * action, so a failure anywhere before it leaves the intent as it was and the
 * next cycle decides again from fresh state.
 */
export class ActionExecutor {
  private readonly options: ActionExecutorOptions;
  private readonly failures: FailureTracker;

  constructor(
    private readonly deps: ActionExecutorDeps,
    options: Partial<ActionExecutorOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.failures = new FailureTracker(this.options.failureThreshold);
  }

  async execute(action: IntentAction): Promise<ExecutionOutcome> {
    switch (action.type) {
      case 'none':
        return { intentId: null, action: 'none', status: 'skipped' };
      case 'send_reminder':
        return this.sendReminder(action.snapshot);
      case 'execute':
        return this.executeDeletion(action.snapshot);
      case 'purge':
        return this.purge(action.intentId);
    }
  }

  private async sendReminder(snapshot: IntentSnapshot): Promise<ExecutionOutcome> {
    const { intentId } = snapshot;

    try {
      await this.notifyAll(snapshot, reminderMessage(snapshot, this.options.timezone));
    } catch (error) {
      logger.warn({ intentId, error: errorMessage(error) }, 'Reminder not sent, will retry next cycle');
      return { intentId, action: 'send_reminder', status: 'failed', error };
    }

    try {
      await this.call('event-store', (signal) =>
        this.deps.eventStore.updateMetadata(intentId, { reminder_sent: 'true' }, signal),
      );
      logger.info({ intentId, resourceId: snapshot.resourceId }, 'Reminder sent');
    } catch (error) {
      if (error instanceof NotFoundError) {
        logger.info({ intentId }, 'Intent cancelled while its reminder was being sent');
      } else {
        logger.warn(
          { intentId, error: errorMessage(error) },
          'Reminder sent but not recorded; a duplicate reminder is possible next cycle',
        );
      }
    }

    return { intentId, action: 'send_reminder', status: 'completed' };
  }

  private async executeDeletion(snapshot: IntentSnapshot): Promise<ExecutionOutcome> {
    const { intentId, resourceId } = snapshot;
    let alreadyGone: boolean;

    try {
      const exists = await this.call('resources', (signal) => this.deps.resources.exists(resourceId, signal));
      alreadyGone = !exists;
      if (exists) {
        alreadyGone = await this.deleteResource(resourceId);
      }
    } catch (error) {
      await this.reportFailure(snapshot, error);
      return { intentId, action: 'execute', status: 'failed', error };
    }

    if (alreadyGone) {
      logger.info({ intentId, resourceId }, 'Resource already removed, clearing its intent');
    } else {
      logger.info({ intentId, resourceId }, 'Resource deleted');
    }

    try {
      await this.notifyAll(snapshot, completionMessage(snapshot, alreadyGone));
    } catch (error) {
      logger.warn({ intentId, error: errorMessage(error) }, 'Completion notice not sent, will retry next cycle');
      return { intentId, action: 'execute', status: 'failed', error };
    }

    try {
      await this.call('event-store', (signal) => this.deps.eventStore.delete(intentId, signal));
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        logger.warn({ intentId, error: errorMessage(error) }, 'Intent not cleared, will retry next cycle');
        return { intentId, action: 'execute', status: 'failed', error };
      }
      logger.debug({ intentId }, 'Intent already removed from the store');
    }

    this.deps.tracker.markExecuted(intentId);
    this.failures.reset(intentId);
    return { intentId, action: 'execute', status: 'completed' };
  }

  /** Returns true when the resource turned out to be gone already */
  private async deleteResource(resourceId: string): Promise<boolean> {
    try {
      await this.call('resources', (signal) => this.deps.resources.delete(resourceId, signal));
      return false;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return true;
      }
      throw error;
    }
  }

  private purge(intentId: string): ExecutionOutcome {
    this.deps.tracker.forget(intentId);
    this.failures.reset(intentId);
    logger.info({ intentId }, 'Intent disappeared from the store, dropped from tracking');
    return { intentId, action: 'purge', status: 'completed' };
  }

  private async reportFailure(snapshot: IntentSnapshot, error: unknown): Promise<void> {
    const { intentId } = snapshot;
    const { count, shouldReport } = this.failures.recordFailure(intentId, error);
    logger.error(
      { intentId, resourceId: snapshot.resourceId, error: errorMessage(error), transient: isTransient(error), count },
      'Scheduled deletion failed',
    );

    if (!shouldReport) return;
    try {
      await this.notifyAll(snapshot, failureMessage(snapshot, errorMessage(error)));
    } catch (notifyError) {
      logger.error({ intentId, error: errorMessage(notifyError) }, 'Failed to report deletion failure');
    }
  }

  private audiencesFor(snapshot: IntentSnapshot): Audience[] {
    const audiences: Audience[] = [{ kind: 'broadcast' }];
    if (snapshot.requestor) {
      audiences.push({ kind: 'user', userId: snapshot.requestor });
    }
    return audiences;
  }

  private async notifyAll(snapshot: IntentSnapshot, text: string): Promise<void> {
    for (const audience of this.audiencesFor(snapshot)) {
      await this.call('notifier', (signal) => this.deps.notifier.notify(audience, text, signal));
    }
  }

  private call<T>(collaborator: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withTimeout(fn, this.options.callTimeoutMs, collaborator);
  }
}
