export class SundownError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
  ) {
    super(message);
    this.name = 'SundownError';
  }
}

/**
 * A collaborator (Proxmox, Google Calendar, Slack) failed in a way that is
 * expected to clear up on its own: network errors, timeouts, 5xx, rate limits.
 * The reconciliation loop retries these on its next natural poll.
 */
export class TransientCollaboratorError extends SundownError {
  constructor(
    public readonly collaborator: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${collaborator}: ${message}`, 'COLLABORATOR_UNAVAILABLE', true);
    this.name = 'TransientCollaboratorError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class CollaboratorTimeoutError extends TransientCollaboratorError {
  constructor(
    collaborator: string,
    public readonly timeoutMs: number,
  ) {
    super(collaborator, `call timed out after ${timeoutMs}ms`);
    this.name = 'CollaboratorTimeoutError';
  }
}

/** The remote thing is already gone. Callers treat this as "already resolved". */
export class NotFoundError extends SundownError {
  constructor(
    public readonly resource: string,
    public readonly id: string,
  ) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', false);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends SundownError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR', false);
    this.name = 'ConfigurationError';
  }
}

export class LogicError extends SundownError {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message, 'LOGIC_ERROR', false);
    this.name = 'LogicError';
  }
}

export class ValidationError extends SundownError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', false);
    this.name = 'ValidationError';
  }
}

/**
 * Errors that are not part of the taxonomy (fetch TypeErrors, aborts, bugs in
 * a client) are treated as transient so the next poll retries them.
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof SundownError) return error.recoverable;
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
