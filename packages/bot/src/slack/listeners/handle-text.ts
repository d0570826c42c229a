import { createLogger, errorMessage } from '@sundown/common';
import type { AppContext } from '../../context.js';
import { confirmationBlocks } from '../blocks.js';
import { parseCommand } from '../command-parser.js';

const logger = createLogger('slack:text');

export interface IncomingText {
  text: string;
  userId: string;
  channel: string;
  /** Replies go into this thread */
  threadTs: string;
}

export const NOT_UNDERSTOOD_TEXT =
  "I couldn't understand that. Try `list containers`, `delete 103 in 3 days` or `help`.";

/**
 * Shared path for mentions and direct messages: parse, run, reply in thread.
 * Confirmation requests get Confirm / Cancel buttons.
 */
export async function handleIncomingText(ctx: AppContext, incoming: IncomingText): Promise<void> {
  const { text, userId, channel, threadTs } = incoming;

  const command = parseCommand(text);
  if (!command) {
    logger.info({ userId, channel, text: text.slice(0, 100) }, 'Unrecognised message');
    await ctx.notifier.postMessage(channel, NOT_UNDERSTOOD_TEXT, { threadTs });
    return;
  }

  try {
    const reply = await ctx.commandService.handle(command, { userId });
    await ctx.notifier.postMessage(channel, reply.text, {
      threadTs,
      ...(reply.confirmationId ? { blocks: confirmationBlocks(reply.text, reply.confirmationId) } : {}),
    });
  } catch (error) {
    logger.error({ error: errorMessage(error), command: command.type, userId, channel }, 'Error handling command');
    await ctx.notifier.addReaction(channel, threadTs, 'x');
    await ctx.notifier.postMessage(channel, `:x: ${errorMessage(error)}`, { threadTs });
  }
}
