export { createLogger } from './logger.js';
export type { Logger } from './logger.js';
export {
  SundownError,
  TransientCollaboratorError,
  CollaboratorTimeoutError,
  NotFoundError,
  ConfigurationError,
  LogicError,
  ValidationError,
  isTransient,
  errorMessage,
} from './errors.js';
export { withRetry, calculateBackoff } from './retry.js';
export type { RetryOptions } from './retry.js';
export { withTimeout } from './timeout.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { generateConfirmationId } from './ids.js';
export { TimeParser } from './time-parser.js';
