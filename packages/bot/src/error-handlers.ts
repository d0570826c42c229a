import { createLogger } from '@sundown/common';

const logger = createLogger('error-handler');

/**
 * Setup global error handlers for unhandled rejections and uncaught exceptions
 */
export function setupGlobalErrorHandlers(nodeEnv: string): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.fatal({ reason }, 'Unhandled promise rejection');
    // Under a process manager, exit and let it restart us once the logs flush
    if (nodeEnv === 'production') {
      setTimeout(() => process.exit(1), 1000);
    }
  });

  // Uncaught exceptions leave the process in an undefined state
  process.on('uncaughtException', (error: Error) => {
    logger.fatal({ error, stack: error.stack }, 'Uncaught exception - exiting immediately');
    process.exit(1);
  });

  process.on('warning', (warning: Error) => {
    logger.warn({ warning: warning.message, stack: warning.stack }, 'Process warning');
  });

  logger.info('Global error handlers configured');
}
