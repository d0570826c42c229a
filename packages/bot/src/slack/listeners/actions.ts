import type { App, BlockAction, ButtonAction } from '@slack/bolt';
import { commandSchema, createLogger, errorMessage, type ConfirmationResponse } from '@sundown/common';
import type { AppContext } from '../../context.js';
import type { CommandReply } from '../../services/command.service.js';
import { CONFIRM_ACTION_ID, REJECT_ACTION_ID } from '../blocks.js';

const logger = createLogger('slack:actions');

/**
 * Turn a Confirm / Cancel click into a `respond_confirmation` command.
 * Returns null when the button carries no valid confirmation id.
 */
export async function handleConfirmationButton(
  ctx: AppContext,
  response: ConfirmationResponse,
  value: string | undefined,
  userId: string,
): Promise<CommandReply | null> {
  const parsed = commandSchema.safeParse({ type: 'respond_confirmation', confirmationId: value, response });
  if (!parsed.success) {
    logger.warn({ value, userId }, 'Button carried an invalid confirmation id');
    return null;
  }
  return ctx.commandService.handle(parsed.data, { userId });
}

export function registerActionListeners(app: App, ctx: AppContext) {
  const buttons: Array<[string, ConfirmationResponse]> = [
    [CONFIRM_ACTION_ID, 'confirm'],
    [REJECT_ACTION_ID, 'cancel'],
  ];

  for (const [actionId, response] of buttons) {
    app.action<BlockAction<ButtonAction>>(actionId, async ({ ack, action, body, respond }) => {
      await ack();
      logger.info({ actionId, userId: body.user.id, value: action.value }, 'Action received');

      try {
        const reply = await handleConfirmationButton(ctx, response, action.value, body.user.id);
        if (!reply) return;

        if (reply.ephemeral) {
          // Leave the buttons in place for the requester
          await respond({ response_type: 'ephemeral', replace_original: false, text: reply.text });
        } else {
          await respond({ replace_original: true, text: reply.text });
        }
      } catch (error) {
        logger.error({ error: errorMessage(error), actionId }, 'Error handling action');
        await respond({ response_type: 'ephemeral', replace_original: false, text: `:x: ${errorMessage(error)}` });
      }
    });
  }
}
