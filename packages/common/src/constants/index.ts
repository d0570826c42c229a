export { Limits } from './limits.js';
export {
  INTENT_EVENT_TAG,
  INTENT_SCHEDULER_NAME,
  IntentMetadataKey,
  ConfirmationActionKind,
} from './intents.js';
export type { ConfirmationActionKindType } from './intents.js';
