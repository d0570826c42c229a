import {
  NotFoundError,
  SundownError,
  TransientCollaboratorError,
} from '@sundown/common';

const COLLABORATOR = 'calendar';

/** Any non-retryable 4xx from the Calendar API */
export class GoogleApiError extends SundownError {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message, 'GOOGLE_API_ERROR', false);
    this.name = 'GoogleApiError';
  }
}

/** 429, 5xx, quota 403s, network failure or timeout */
export class GoogleTransientError extends TransientCollaboratorError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(COLLABORATOR, message, options);
    this.name = 'GoogleTransientError';
  }
}

/** 404, or 410 for an event that was already deleted */
export class GoogleNotFoundError extends NotFoundError {
  constructor(eventId: string) {
    super('Event', eventId);
    this.name = 'GoogleNotFoundError';
  }
}

/**
 * Credentials rejected. An expired access token (401 on a Calendar call) is
 * recoverable once the provider refreshes it; a rejected refresh token is not.
 */
export class GoogleAuthError extends SundownError {
  constructor(
    message: string,
    public readonly statusCode: number,
    recoverable = false,
  ) {
    super(message, 'GOOGLE_AUTH_FAILED', recoverable);
    this.name = 'GoogleAuthError';
  }
}

const QUOTA_REASONS = /rateLimitExceeded|userRateLimitExceeded|quotaExceeded/;

export function classifyGoogleFailure(
  status: number,
  message: string,
  eventId?: string,
): SundownError {
  if (eventId !== undefined && (status === 404 || status === 410)) {
    return new GoogleNotFoundError(eventId);
  }
  if (status === 401) {
    return new GoogleAuthError(`Access token rejected: ${message}`, status, true);
  }
  if (status === 429 || status >= 500 || (status === 403 && QUOTA_REASONS.test(message))) {
    return new GoogleTransientError(`HTTP ${status} ${message}`, status);
  }
  return new GoogleApiError(`Calendar request failed: ${status} ${message}`, status);
}
