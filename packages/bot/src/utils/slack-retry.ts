import { calculateBackoff, createLogger, errorMessage, Limits, systemClock } from '@sundown/common';

const logger = createLogger('slack-retry');

export interface SlackRetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitter?: boolean;
  shouldRetry?: (error: unknown) => boolean;
  /** Once aborted, no further attempt is made and the backoff sleep ends early */
  signal?: AbortSignal;
}

const TRANSIENT_SLACK_ERRORS = new Set([
  'rate_limited',
  'ratelimited',
  'internal_error',
  'service_unavailable',
  'request_timeout',
  'fatal_error',
]);

/** The `error` field of a Slack platform error, e.g. `channel_not_found` */
export function slackErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('data' in error)) return undefined;
  const data = error.data;
  if (typeof data !== 'object' || data === null || !('error' in data)) return undefined;
  return typeof data.error === 'string' ? data.error : undefined;
}

/** Seconds Slack asked us to wait, from a rate-limited error */
function retryAfterSeconds(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('retryAfter' in error)) return undefined;
  return typeof error.retryAfter === 'number' ? error.retryAfter : undefined;
}

const DEFAULT_OPTIONS: Required<Omit<SlackRetryOptions, 'signal'>> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitter: true,
  shouldRetry: (error: unknown) => {
    const errorCode = slackErrorCode(error);
    if (!errorCode) {
      return true; // Network failure or unknown error
    }
    return TRANSIENT_SLACK_ERRORS.has(errorCode);
  },
};

/**
 * Wraps a Slack API call with exponential backoff retry logic
 */
export async function withSlackRetry<T>(
  fn: () => Promise<T>,
  context: { operation: string; channel?: string },
  options: SlackRetryOptions = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const { signal } = options;
  let lastError: unknown;

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!opts.shouldRetry(error)) {
        logger.warn(
          { error: slackErrorCode(error) ?? errorMessage(error), operation: context.operation, channel: context.channel },
          'Slack API error is not retryable',
        );
        throw error;
      }

      if (attempt >= opts.maxRetries) {
        logger.error(
          {
            error: slackErrorCode(error) ?? errorMessage(error),
            operation: context.operation,
            channel: context.channel,
            attempts: attempt + 1,
          },
          'Slack API call failed after max retries',
        );
        throw error;
      }

      if (signal?.aborted) {
        logger.warn(
          { error: slackErrorCode(error) ?? errorMessage(error), operation: context.operation, channel: context.channel },
          'Slack API call abandoned by the caller',
        );
        throw error;
      }

      const retryAfter = retryAfterSeconds(error);
      const delay =
        retryAfter !== undefined
          ? retryAfter * 1000
          : calculateBackoff(attempt, opts.baseDelayMs, opts.maxDelayMs, opts.jitter);

      logger.warn(
        {
          error: slackErrorCode(error) ?? errorMessage(error),
          operation: context.operation,
          channel: context.channel,
          attempt: attempt + 1,
          maxRetries: opts.maxRetries,
          delayMs: delay,
        },
        'Slack API call failed, retrying...',
      );

      await systemClock.sleep(delay, signal);
      if (signal?.aborted) {
        throw error;
      }
    }
  }

  throw lastError;
}

export interface FailedNotification {
  timestamp: Date;
  operation: string;
  channel: string;
  text: string;
  error: string;
}

/**
 * Notifications that could not be delivered after retries, kept for
 * inspection. Oldest entries are dropped once the queue is full.
 */
export class FailedNotificationQueue {
  private readonly queue: FailedNotification[] = [];

  constructor(private readonly maxSize: number = Limits.FAILED_NOTIFICATION_QUEUE_SIZE) {}

  enqueue(operation: string, channel: string, text: string, error: unknown): void {
    if (this.queue.length >= this.maxSize) {
      this.queue.shift();
    }

    this.queue.push({
      timestamp: new Date(),
      operation,
      channel,
      text,
      error: errorMessage(error),
    });

    logger.warn({ operation, channel, queueSize: this.queue.length }, 'Slack notification could not be delivered');
  }

  getAll(): FailedNotification[] {
    return [...this.queue];
  }

  size(): number {
    return this.queue.length;
  }
}
