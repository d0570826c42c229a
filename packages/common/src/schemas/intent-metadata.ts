import { z } from 'zod';
import { INTENT_EVENT_TAG } from '../constants/intents.js';

/**
 * Private extended properties of a deletion-intent event. Anything written by
 * hand in the calendar UI goes through this before it reaches the core.
 */
export const intentMetadataSchema = z.object({
  type: z.literal(INTENT_EVENT_TAG),
  resource_id: z.string().regex(/^\d+$/),
  resource_name: z.string().optional(),
  requestor: z.string().optional(),
  created_at: z.string().datetime({ offset: true }).optional(),
  reminder_sent: z
    .string()
    .optional()
    .transform((value) => value?.trim().toLowerCase() === 'true'),
  scheduled_by: z.string().optional(),
});

export type IntentMetadataInput = z.input<typeof intentMetadataSchema>;
export type ParsedIntentMetadata = z.output<typeof intentMetadataSchema>;
