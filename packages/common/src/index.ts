// Constants
export {
  Limits,
  INTENT_EVENT_TAG,
  INTENT_SCHEDULER_NAME,
  IntentMetadataKey,
  ConfirmationActionKind,
} from './constants/index.js';
export type { ConfirmationActionKindType } from './constants/index.js';

// Types
export type {
  IntentSnapshot,
  IntentState,
  NewIntent,
  IntentMetadata,
  ResourceStatus,
  ResourceSummary,
} from './types/index.js';

// Schemas
export {
  commandSchema,
  intentMetadataSchema,
  type Command,
  type ConfirmationResponse,
  type IntentMetadataInput,
  type ParsedIntentMetadata,
} from './schemas/index.js';

// Utils
export {
  createLogger,
  SundownError,
  TransientCollaboratorError,
  CollaboratorTimeoutError,
  NotFoundError,
  ConfigurationError,
  LogicError,
  ValidationError,
  isTransient,
  errorMessage,
  withRetry,
  calculateBackoff,
  withTimeout,
  systemClock,
  generateConfirmationId,
  TimeParser,
} from './utils/index.js';
export type { Logger, RetryOptions, Clock } from './utils/index.js';
