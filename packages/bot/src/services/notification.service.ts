import type { types } from '@slack/bolt';
import type {
  ChatPostMessageArguments,
  ChatPostMessageResponse,
  ReactionsAddArguments,
  ReactionsAddResponse,
} from '@slack/web-api';
import { createLogger, TransientCollaboratorError, errorMessage } from '@sundown/common';
import type { Audience, Notifier } from '@sundown/reconciler';
import {
  FailedNotificationQueue,
  slackErrorCode,
  withSlackRetry,
  type FailedNotification,
  type SlackRetryOptions,
} from '../utils/slack-retry.js';

type KnownBlock = types.KnownBlock;

const logger = createLogger('notification');

/** The part of the Slack WebClient this service calls */
export interface SlackClient {
  chat: {
    postMessage(args: ChatPostMessageArguments): Promise<ChatPostMessageResponse>;
  };
  reactions: {
    add(args: ReactionsAddArguments): Promise<ReactionsAddResponse>;
  };
}

export interface PostMessageOptions {
  threadTs?: string;
  blocks?: KnownBlock[];
  signal?: AbortSignal;
}

export class NotificationService implements Notifier {
  private readonly failedQueue = new FailedNotificationQueue();

  constructor(
    private readonly client: SlackClient,
    private readonly broadcastChannel: string,
    private readonly retryOptions: SlackRetryOptions = {},
  ) {}

  /**
   * Reply in a conversation. Never throws: a reply that cannot be delivered
   * is logged and kept in the failed queue.
   */
  async postMessage(channel: string, text: string, options: PostMessageOptions = {}): Promise<string | undefined> {
    try {
      const result = await withSlackRetry(
        () =>
          this.client.chat.postMessage({
            channel,
            text,
            ...(options.threadTs ? { thread_ts: options.threadTs } : {}),
            ...(options.blocks ? { blocks: options.blocks } : {}),
          }),
        { operation: 'postMessage', channel },
        { ...this.retryOptions, signal: options.signal },
      );
      return result.ts;
    } catch (error) {
      logger.error({ error: errorMessage(error), channel }, 'Failed to post Slack message after retries');
      this.failedQueue.enqueue('postMessage', channel, text, error);
      return undefined;
    }
  }

  /**
   * Deliver a reconciler notification. `broadcast` goes to the configured
   * channel, `user` to a direct message. Failures are rethrown as transient
   * so the caller does not commit the step the notification belongs to.
   * Retries stop once `signal` is aborted.
   */
  async notify(audience: Audience, text: string, signal?: AbortSignal): Promise<void> {
    const channel = audience.kind === 'broadcast' ? this.broadcastChannel : audience.userId;

    try {
      await withSlackRetry(
        () => this.client.chat.postMessage({ channel, text }),
        { operation: 'notify', channel },
        { ...this.retryOptions, signal },
      );
      logger.debug({ audience: audience.kind, channel }, 'Notification delivered');
    } catch (error) {
      this.failedQueue.enqueue('notify', channel, text, error);
      throw new TransientCollaboratorError('slack', slackErrorCode(error) ?? errorMessage(error), { cause: error });
    }
  }

  /** Add an emoji reaction to a message */
  async addReaction(channel: string, timestamp: string, emoji: string): Promise<void> {
    try {
      await withSlackRetry(
        () => this.client.reactions.add({ channel, timestamp, name: emoji }),
        { operation: 'addReaction', channel },
        {
          ...this.retryOptions,
          shouldRetry: (error: unknown) => slackErrorCode(error) !== 'already_reacted',
        },
      );
    } catch (error) {
      if (slackErrorCode(error) !== 'already_reacted') {
        logger.error({ error: errorMessage(error), channel, timestamp, emoji }, 'Failed to add reaction after retries');
      }
    }
  }

  /** Get failed notifications for review */
  getFailedNotifications(): FailedNotification[] {
    return this.failedQueue.getAll();
  }

  getFailedCount(): number {
    return this.failedQueue.size();
  }
}
