import type { types } from '@slack/bolt';

type ActionsBlock = types.ActionsBlock;
type KnownBlock = types.KnownBlock;
type SectionBlock = types.SectionBlock;

export const CONFIRM_ACTION_ID = 'confirm_action';
export const REJECT_ACTION_ID = 'reject_action';

export function section(text: string): SectionBlock {
  return { type: 'section', text: { type: 'mrkdwn', text } };
}

export function actions(
  ...buttons: Array<{ text: string; actionId: string; value: string; style?: 'primary' | 'danger' }>
): ActionsBlock {
  return {
    type: 'actions',
    elements: buttons.map((b) => ({
      type: 'button' as const,
      text: { type: 'plain_text' as const, text: b.text },
      action_id: b.actionId,
      value: b.value,
      ...(b.style ? { style: b.style } : {}),
    })),
  };
}

/**
 * The question plus Confirm / Cancel buttons. Both buttons carry the
 * confirmation id as their value.
 */
export function confirmationBlocks(text: string, confirmationId: string): KnownBlock[] {
  return [
    section(text),
    actions(
      { text: 'Confirm', actionId: CONFIRM_ACTION_ID, value: confirmationId, style: 'danger' },
      { text: 'Cancel', actionId: REJECT_ACTION_ID, value: confirmationId },
    ),
  ];
}
