import type { App } from '@slack/bolt';
import { createLogger } from '@sundown/common';
import type { AppContext } from '../../context.js';
import { handleIncomingText } from './handle-text.js';

const logger = createLogger('slack:mentions');

export function registerMentionListener(app: App, ctx: AppContext) {
  app.event('app_mention', async ({ event }) => {
    const { channel, ts } = event;
    const user = event.user;
    if (!user) return;

    logger.info({ user, channel, text: event.text.slice(0, 100) }, 'App mention received');
    await handleIncomingText(ctx, {
      text: event.text,
      userId: user,
      channel,
      threadTs: event.thread_ts ?? ts,
    });
  });
}
