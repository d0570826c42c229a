import type { CommandService } from './services/command.service.js';
import type { NotificationService } from './services/notification.service.js';

/** Shared context injected into all Slack listeners */
export interface AppContext {
  commandService: Pick<CommandService, 'handle'>;
  notifier: Pick<NotificationService, 'postMessage' | 'addReaction'>;
}
