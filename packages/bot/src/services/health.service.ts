import { createLogger, systemClock, type Clock } from '@sundown/common';
import type { ReconciliationWorker } from '@sundown/reconciler';
import type { FailedNotification } from '../utils/slack-retry.js';
import type { NotificationService } from './notification.service.js';

const logger = createLogger('health');

/** Undelivered Slack messages before the component counts as degraded / down */
const SLACK_DEGRADED_AFTER = 10;
const SLACK_DOWN_AFTER = 100;

type ComponentStatus = 'up' | 'degraded' | 'down';

export interface HealthStatus {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  uptimeMs: number;
  components: {
    reconciler: {
      status: ComponentStatus;
      lastCycleAt: Date | null;
      consecutiveIterationFailures: number;
      trackedIntents: number;
      executedIntents: number;
    };
    slack: { status: ComponentStatus; failedMessages: number; lastFailure: FailedNotification | null };
    confirmations: { pending: number };
  };
}

export interface HealthServiceDeps {
  worker: Pick<ReconciliationWorker, 'getStatus'>;
  notifier: Pick<NotificationService, 'getFailedCount' | 'getFailedNotifications'>;
  confirmations: { pendingCount(): number };
}

export class HealthService {
  private readonly startTime: number;

  constructor(
    private readonly deps: HealthServiceDeps,
    private readonly clock: Clock = systemClock,
  ) {
    this.startTime = clock.now().getTime();
  }

  getHealth(): HealthStatus {
    const now = this.clock.now();
    const reconciler = this.checkReconciler();
    const slack = this.checkSlack();

    let status: HealthStatus['status'] = 'healthy';
    if (reconciler.status === 'down' || slack.status === 'down') {
      status = 'unhealthy';
    } else if (reconciler.status === 'degraded' || slack.status === 'degraded') {
      status = 'degraded';
    }

    const health: HealthStatus = {
      status,
      timestamp: now.toISOString(),
      uptimeMs: now.getTime() - this.startTime,
      components: {
        reconciler,
        slack,
        confirmations: { pending: this.deps.confirmations.pendingCount() },
      },
    };

    if (status !== 'healthy') {
      logger.warn({ status, reconciler: reconciler.status, slack: slack.status }, 'System health is degraded or unhealthy');
    }
    return health;
  }

  private checkReconciler(): HealthStatus['components']['reconciler'] {
    const worker = this.deps.worker.getStatus();
    const lastCycle = worker.lastCycle;

    let status: ComponentStatus = 'up';
    if (!worker.isRunning) {
      status = 'down';
    } else if (worker.consecutiveIterationFailures > 0 || (lastCycle !== null && lastCycle.failures > 0)) {
      status = 'degraded';
    }

    return {
      status,
      lastCycleAt: lastCycle?.startedAt ?? null,
      consecutiveIterationFailures: worker.consecutiveIterationFailures,
      trackedIntents: worker.trackedIntents,
      executedIntents: worker.executedIntents,
    };
  }

  private checkSlack(): HealthStatus['components']['slack'] {
    const failedMessages = this.deps.notifier.getFailedCount();
    const lastFailure = this.deps.notifier.getFailedNotifications().at(-1) ?? null;

    let status: ComponentStatus = 'up';
    if (failedMessages > SLACK_DOWN_AFTER) {
      status = 'down';
    } else if (failedMessages > SLACK_DEGRADED_AFTER) {
      status = 'degraded';
    }
    return { status, failedMessages, lastFailure };
  }
}
