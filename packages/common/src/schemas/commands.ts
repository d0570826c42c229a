import { z } from 'zod';

const resourceIdSchema = z.string().regex(/^\d+$/, 'Resource id must be a number');

/**
 * Closed set of commands the message layer can dispatch. Whatever classifies
 * free text (the keyword parser, or an external classifier) must produce one
 * of these; nothing past this boundary sees raw text.
 */
export const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('list_resources') }),
  z.object({ type: z.literal('start_resource'), resourceId: resourceIdSchema }),
  z.object({ type: z.literal('stop_resource'), resourceId: resourceIdSchema }),
  z.object({
    type: z.literal('schedule_deletion'),
    resourceId: resourceIdSchema,
    when: z.string().trim().min(1).optional(),
  }),
  z.object({ type: z.literal('list_scheduled') }),
  z.object({ type: z.literal('cancel_deletion'), resourceId: resourceIdSchema }),
  z.object({
    type: z.literal('respond_confirmation'),
    confirmationId: z.string().regex(/^[0-9a-f]{8}$/, 'Confirmation id must be 8 hex characters'),
    response: z.enum(['confirm', 'cancel']),
  }),
  z.object({ type: z.literal('status') }),
  z.object({ type: z.literal('help') }),
]);

export type Command = z.infer<typeof commandSchema>;
export type ConfirmationResponse = Extract<Command, { type: 'respond_confirmation' }>['response'];
