import type { App } from '@slack/bolt';
import type { AppContext } from '../../context.js';
import { registerMentionListener } from './mentions.js';
import { registerMessageListener } from './messages.js';
import { registerActionListeners } from './actions.js';

export function registerAllListeners(app: App, ctx: AppContext) {
  registerMentionListener(app, ctx);
  registerMessageListener(app, ctx);
  registerActionListeners(app, ctx);
}
