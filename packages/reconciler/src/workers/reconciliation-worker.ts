import {
  createLogger,
  errorMessage,
  Limits,
  LogicError,
  systemClock,
  withTimeout,
  type Clock,
} from '@sundown/common';
import { decide } from '../intent/decide.js';
import type { IntentTracker } from '../intent/intent-tracker.js';
import type { ActionExecutor } from '../executor/action-executor.js';
import type { EventStore } from '../ports.js';

const logger = createLogger('reconciliation-worker');

export interface ReconciliationWorkerOptions {
  checkIntervalMs: number;
  /** Sleep after a cycle whose listing failed */
  retryDelayMs: number;
  reminderWindowMs: number;
  /** How long stop() lets an in-flight cycle run before aborting it */
  graceMs: number;
  /** Deadline for the listing call */
  callTimeoutMs: number;
}

export interface ReconciliationWorkerDeps {
  eventStore: EventStore;
  executor: ActionExecutor;
  tracker: IntentTracker;
}

export interface CycleReport {
  startedAt: Date;
  /** False when the store could not be listed */
  listed: boolean;
  observed: number;
  reminders: number;
  executions: number;
  purges: number;
  failures: number;
  duplicates: number;
  skipped: number;
  /** The batch was cut short by a hard stop */
  aborted: boolean;
  durationMs: number;
}

export interface ReconciliationWorkerStatus {
  isRunning: boolean;
  checkIntervalMs: number;
  retryDelayMs: number;
  lastCycle: CycleReport | null;
  consecutiveIterationFailures: number;
  trackedIntents: number;
  executedIntents: number;
}

const DEFAULT_OPTIONS: ReconciliationWorkerOptions = {
  checkIntervalMs: Limits.CHECK_INTERVAL_MS,
  retryDelayMs: Limits.ITERATION_RETRY_DELAY_MS,
  reminderWindowMs: Limits.REMINDER_WINDOW_MS,
  graceMs: Limits.SHUTDOWN_GRACE_MS,
  callTimeoutMs: Limits.COLLABORATOR_TIMEOUT_MS,
};

/**
 * Drives one full reconciliation pass per interval: list every open intent,
 * decide what each needs, and hand the actions to the executor one at a
 * time. The loop is its own retry mechanism; nothing here throws.
 */
export class ReconciliationWorker {
  private readonly options: ReconciliationWorkerOptions;
  private isRunning = false;
  private loopPromise: Promise<void> | null = null;
  private inflight: Promise<CycleReport> | null = null;
  private stopController = new AbortController();
  private batchController = new AbortController();
  private lastCycle: CycleReport | null = null;
  private consecutiveIterationFailures = 0;

  constructor(
    private readonly deps: ReconciliationWorkerDeps,
    private readonly clock: Clock = systemClock,
    options: Partial<ReconciliationWorkerOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Start the loop. The first cycle runs immediately.
   */
  start(): void {
    if (this.isRunning) {
      logger.warn('Reconciliation worker is already running');
      return;
    }
    if (this.inflight && this.batchController.signal.aborted) {
      logger.warn('An abandoned batch is still running, not starting');
      return;
    }

    this.isRunning = true;
    this.stopController = new AbortController();
    this.batchController = new AbortController();
    logger.info(
      { checkIntervalMs: this.options.checkIntervalMs, retryDelayMs: this.options.retryDelayMs },
      'Starting reconciliation worker',
    );

    this.loopPromise = this.loop();
  }

  /**
   * Stop the loop. An in-flight cycle gets `graceMs` to finish; after that its
   * batch is abandoned at the next intent boundary.
   */
  async stop(graceMs: number = this.options.graceMs): Promise<void> {
    if (!this.isRunning) {
      logger.warn('Reconciliation worker is not running');
      return;
    }

    logger.info({ graceMs }, 'Stopping reconciliation worker');
    this.isRunning = false;
    this.stopController.abort();

    const inflight = this.inflight;
    if (inflight) {
      const graceController = new AbortController();
      const finished = await Promise.race([
        inflight.then(() => true),
        this.clock.sleep(graceMs, graceController.signal).then(() => false),
      ]);
      graceController.abort();

      if (!finished) {
        this.batchController.abort();
        logger.warn({ graceMs }, 'Grace period expired, abandoning the in-flight batch');
        return;
      }
    }

    await this.loopPromise;
    this.loopPromise = null;
    logger.info('Reconciliation worker stopped');
  }

  /**
   * Run one cycle now. If a cycle is already running, wait for that one
   * instead of starting another.
   */
  runOnce(): Promise<CycleReport> {
    if (!this.inflight) {
      this.inflight = this.cycle().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  getStatus(): ReconciliationWorkerStatus {
    return {
      isRunning: this.isRunning,
      checkIntervalMs: this.options.checkIntervalMs,
      retryDelayMs: this.options.retryDelayMs,
      lastCycle: this.lastCycle,
      consecutiveIterationFailures: this.consecutiveIterationFailures,
      trackedIntents: this.deps.tracker.trackedCount,
      executedIntents: this.deps.tracker.executedCount,
    };
  }

  private async loop(): Promise<void> {
    const stopSignal = this.stopController.signal;
    while (!stopSignal.aborted) {
      const report = await this.runOnce();
      if (stopSignal.aborted) break;
      const delay = report.listed ? this.options.checkIntervalMs : this.options.retryDelayMs;
      logger.debug({ delayMs: delay }, 'Sleeping until next cycle');
      await this.clock.sleep(delay, stopSignal);
    }
  }

  private async cycle(): Promise<CycleReport> {
    // start() swaps the controller; an abandoned batch must keep seeing its own
    const batchSignal = this.batchController.signal;
    const startTime = Date.now();
    const report: CycleReport = {
      startedAt: this.clock.now(),
      listed: false,
      observed: 0,
      reminders: 0,
      executions: 0,
      purges: 0,
      failures: 0,
      duplicates: 0,
      skipped: 0,
      aborted: false,
      durationMs: 0,
    };

    try {
      const snapshots = await withTimeout(
        (signal) => this.deps.eventStore.listOpen(signal),
        this.options.callTimeoutMs,
        'event-store',
      );
      report.listed = true;
      report.observed = snapshots.length;
      this.consecutiveIterationFailures = 0;

      const plan = this.deps.tracker.observe(snapshots);
      report.skipped = plan.skipped.length;

      for (const group of plan.duplicates) {
        const error = new LogicError('Multiple open intents for one resource', {
          resourceId: group.resourceId,
          acting: group.primary.intentId,
          leftForReview: group.others.map((s) => s.intentId),
        });
        logger.error({ error: error.message, ...error.details }, 'Duplicate deletion intents');
        report.duplicates += group.others.length;
      }

      const handled = new Set<string>();
      for (const observation of plan.observations) {
        if (batchSignal.aborted) {
          report.aborted = true;
          break;
        }

        const action = decide(this.clock.now(), observation, this.options.reminderWindowMs);
        if (action.type === 'none') continue;

        const intentId = observation.kind === 'present' ? observation.snapshot.intentId : observation.intentId;
        if (handled.has(intentId)) continue;
        handled.add(intentId);

        try {
          const outcome = await this.deps.executor.execute(action);
          if (outcome.status === 'failed') {
            report.failures++;
          } else if (outcome.status === 'completed') {
            if (action.type === 'send_reminder') report.reminders++;
            if (action.type === 'execute') report.executions++;
            if (action.type === 'purge') report.purges++;
          }
        } catch (error) {
          report.failures++;
          logger.error({ intentId, action: action.type, error: errorMessage(error) }, 'Intent processing failed');
        }
      }
    } catch (error) {
      this.consecutiveIterationFailures++;
      logger.error(
        { error: errorMessage(error), consecutiveFailures: this.consecutiveIterationFailures },
        'Could not list intents, backing off',
      );
    }

    report.durationMs = Date.now() - startTime;
    this.lastCycle = report;

    const summary = { ...report, startedAt: report.startedAt.toISOString() };
    if (report.failures > 0 || report.aborted) {
      logger.warn(summary, 'Reconciliation cycle completed with failures');
    } else if (report.listed) {
      logger.info(summary, 'Reconciliation cycle completed');
    }
    return report;
  }
}
