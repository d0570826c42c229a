import { createLogger } from '@sundown/common';

const logger = createLogger('shutdown');

/** Extra time past the worker grace before the process is killed outright */
const FORCE_EXIT_MARGIN_MS = 5_000;

export interface ShutdownDependencies {
  cleanupWorker: { stop(): void };
  reconciliationWorker: { stop(graceMs?: number): Promise<void> };
  slackApp: { stop(): Promise<unknown> };
  /** How long an in-flight reconciliation cycle may keep running */
  graceMs: number;
  exit?: (code: number) => void;
}

/**
 * Creates a graceful shutdown handler. Repeated signals are ignored while the
 * first shutdown runs.
 */
export function createShutdownHandler(deps: ShutdownDependencies) {
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let isShuttingDown = false;

  return async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress, ignoring signal');
      return;
    }
    isShuttingDown = true;

    logger.info({ signal }, 'Graceful shutdown initiated');

    const forceExitTimeout = setTimeout(() => {
      logger.error({ graceMs: deps.graceMs }, 'Graceful shutdown timeout exceeded, forcing exit');
      exit(1);
    }, deps.graceMs + FORCE_EXIT_MARGIN_MS);

    try {
      // 1. No more token eviction
      deps.cleanupWorker.stop();

      // 2. Let the current reconciliation cycle finish, or abort it after the grace
      logger.info({ graceMs: deps.graceMs }, 'Stopping reconciliation worker...');
      await deps.reconciliationWorker.stop(deps.graceMs);

      // 3. Disconnect from Slack
      logger.info('Stopping Slack app...');
      await deps.slackApp.stop();

      clearTimeout(forceExitTimeout);
      logger.info('Graceful shutdown complete');
      exit(0);
    } catch (error) {
      logger.fatal({ error }, 'Error during graceful shutdown');
      clearTimeout(forceExitTimeout);
      exit(1);
    }
  };
}
