import { createLogger, errorMessage, Limits } from '@sundown/common';
import type { ConfirmationRegistry } from '../confirmation/confirmation-registry.js';

const logger = createLogger('confirmation-cleanup-worker');

/**
 * Periodically evicts stale confirmation tokens, on a cadence independent of
 * the reconciliation loop.
 */
export class ConfirmationCleanupWorker<P> {
  private interval: NodeJS.Timeout | null = null;

  constructor(
    private readonly registry: ConfirmationRegistry<P>,
    private readonly intervalMs: number = Limits.CONFIRMATION_CLEANUP_INTERVAL_MS,
  ) {}

  start(): void {
    if (this.interval) {
      logger.warn('Confirmation cleanup worker is already running');
      return;
    }

    this.interval = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    // Never keeps the process alive on its own
    this.interval.unref();
    logger.info({ intervalMs: this.intervalMs }, 'Confirmation cleanup worker started');
  }

  stop(): void {
    if (!this.interval) return;
    clearInterval(this.interval);
    this.interval = null;
    logger.info('Confirmation cleanup worker stopped');
  }

  tick(): number {
    try {
      return this.registry.cleanup();
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Confirmation cleanup failed');
      return 0;
    }
  }

  get isRunning(): boolean {
    return this.interval !== null;
  }
}
