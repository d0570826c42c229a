import 'dotenv/config';
import { App } from '@slack/bolt';
import { ConfigurationError, createLogger, errorMessage, withRetry } from '@sundown/common';
import { ProxmoxAuthError, ProxmoxClient } from '@sundown/proxmox';
import {
  CalendarEventStore,
  GoogleAuthError,
  GoogleCalendarClient,
  GoogleTokenProvider,
} from '@sundown/calendar';
import {
  ActionExecutor,
  ConfirmationCleanupWorker,
  ConfirmationRegistry,
  IntentTracker,
  ReconciliationWorker,
} from '@sundown/reconciler';
import { loadConfig } from './config.js';
import { setupGlobalErrorHandlers } from './error-handlers.js';
import { createShutdownHandler } from './shutdown.js';
import { registerAllListeners } from './slack/listeners/index.js';
import { CommandService, type PendingAction } from './services/command.service.js';
import { NotificationService } from './services/notification.service.js';
import { HealthService } from './services/health.service.js';
import type { AppContext } from './context.js';

const logger = createLogger('sundown');

/**
 * Check both collaborators, retrying transient failures briefly. Rejected
 * credentials stop startup; anything else is left for the reconciliation loop.
 */
async function checkCollaborators(proxmox: ProxmoxClient, store: CalendarEventStore): Promise<void> {
  const checks: Array<[string, () => Promise<unknown>]> = [
    ['proxmox', () => proxmox.listContainers()],
    ['calendar', () => store.listOpen()],
  ];

  for (const [name, check] of checks) {
    try {
      await withRetry(check, { maxAttempts: 3, baseDelayMs: 2_000 }, logger);
      logger.info({ collaborator: name }, 'Collaborator reachable');
    } catch (error) {
      if (error instanceof ProxmoxAuthError || error instanceof GoogleAuthError) {
        throw new ConfigurationError(`${name} rejected the configured credentials: ${error.message}`);
      }
      logger.warn({ collaborator: name, error: errorMessage(error) }, 'Collaborator not reachable at startup');
    }
  }
}

async function main() {
  const config = loadConfig();
  setupGlobalErrorHandlers(config.server.nodeEnv);
  logger.info(
    { nodeEnv: config.server.nodeEnv, logLevel: config.server.logLevel, timezone: config.server.displayTimezone },
    'Starting sundown',
  );

  // Collaborators
  const proxmox = new ProxmoxClient(config.proxmox);
  const tokens = new GoogleTokenProvider(config.google);
  const calendarClient = new GoogleCalendarClient(tokens, undefined, config.calendar.timeoutMs);
  const store = new CalendarEventStore(calendarClient, config.calendar.calendarId);

  await checkCollaborators(proxmox, store);

  // Initialize Slack app with socket mode
  const app = new App({
    token: config.slack.botToken,
    signingSecret: config.slack.signingSecret,
    appToken: config.slack.appToken,
    socketMode: true,
  });
  const notifier = new NotificationService(app.client, config.slack.broadcastChannel);

  // Reconciler
  const tracker = new IntentTracker();
  const executor = new ActionExecutor(
    { resources: proxmox, eventStore: store, notifier, tracker },
    {
      callTimeoutMs: config.scheduler.callTimeoutMs,
      failureThreshold: config.scheduler.failureThreshold,
      timezone: config.server.displayTimezone,
    },
  );
  const reconciliationWorker = new ReconciliationWorker({ eventStore: store, executor, tracker }, undefined, {
    checkIntervalMs: config.scheduler.checkIntervalMs,
    retryDelayMs: config.scheduler.retryDelayMs,
    reminderWindowMs: config.scheduler.reminderWindowMs,
    graceMs: config.server.shutdownGraceMs,
    callTimeoutMs: config.scheduler.callTimeoutMs,
  });

  // Confirmations
  const confirmations = new ConfirmationRegistry<PendingAction>({ maxAgeMs: config.confirmations.maxAgeMs });
  const cleanupWorker = new ConfirmationCleanupWorker(confirmations, config.confirmations.cleanupIntervalMs);

  const health = new HealthService({ worker: reconciliationWorker, notifier, confirmations });
  const commandService = new CommandService(
    { resources: proxmox, eventStore: store, notifier, confirmations, health },
    { deletionDelayDays: config.scheduler.deletionDelayDays, timezone: config.server.displayTimezone },
  );

  const ctx: AppContext = { commandService, notifier };
  registerAllListeners(app, ctx);

  await app.start();
  logger.info('Slack app started in socket mode');

  reconciliationWorker.start();
  cleanupWorker.start();

  const shutdown = createShutdownHandler({
    cleanupWorker,
    reconciliationWorker,
    slackApp: app,
    graceMs: config.server.shutdownGraceMs,
  });
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal({ error: error.message }, 'Invalid configuration');
  } else {
    logger.fatal({ error }, 'Failed to start sundown');
  }
  process.exit(1);
});
