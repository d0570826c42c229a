import type { App } from '@slack/bolt';
import { createLogger } from '@sundown/common';
import type { AppContext } from '../../context.js';
import { handleIncomingText } from './handle-text.js';

const logger = createLogger('slack:messages');

/** Direct messages to the bot; channel traffic is only handled through mentions */
export function registerMessageListener(app: App, ctx: AppContext) {
  app.message(async ({ message }) => {
    // Edits, joins, bot posts and the like carry a subtype
    if (message.subtype !== undefined) return;
    if (message.channel_type !== 'im' || message.bot_id) return;

    logger.info({ user: message.user, channel: message.channel }, 'Direct message received');
    await handleIncomingText(ctx, {
      text: message.text ?? '',
      userId: message.user,
      channel: message.channel,
      threadTs: message.thread_ts ?? message.ts,
    });
  });
}
