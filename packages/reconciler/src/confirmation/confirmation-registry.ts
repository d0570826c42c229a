import {
  createLogger,
  generateConfirmationId,
  Limits,
  LogicError,
  systemClock,
  type Clock,
  type ConfirmationActionKindType,
  type ConfirmationResponse,
} from '@sundown/common';

const logger = createLogger('confirmation-registry');

const MAX_ID_ATTEMPTS = 100;

export interface ConfirmationToken<P> {
  readonly confirmationId: string;
  readonly actionKind: ConfirmationActionKindType;
  /** Opaque to the registry */
  readonly params: P;
  readonly userId: string;
  readonly issuedAt: Date;
}

export type ResolveResult<P> =
  | { status: 'confirmed' | 'cancelled' | 'expired'; token: ConfirmationToken<P> }
  | { status: 'forbidden' }
  | { status: 'not_found' };

export interface ConfirmationRegistryOptions {
  maxAgeMs: number;
  /** Source of candidate ids; 8 lowercase hex chars by default */
  generateId: () => string;
}

/**
 * Single-use tokens gating destructive actions until their requester
 * confirms. Every operation is synchronous, so each one runs to completion on
 * the event loop before any other caller (Slack handlers, the cleanup
 * worker) can observe the map.
 */
export class ConfirmationRegistry<P> {
  private readonly pending = new Map<string, ConfirmationToken<P>>();
  /** Every id handed out by this process, so none is ever reused */
  private readonly issued = new Set<string>();
  private readonly options: ConfirmationRegistryOptions;

  constructor(
    options: Partial<ConfirmationRegistryOptions> = {},
    private readonly clock: Clock = systemClock,
  ) {
    this.options = {
      maxAgeMs: options.maxAgeMs ?? Limits.CONFIRMATION_MAX_AGE_MS,
      generateId: options.generateId ?? generateConfirmationId,
    };
  }

  create(actionKind: ConfirmationActionKindType, params: P, userId: string): string {
    const confirmationId = this.nextId();
    this.pending.set(confirmationId, {
      confirmationId,
      actionKind,
      params,
      userId,
      issuedAt: this.clock.now(),
    });
    logger.info({ confirmationId, actionKind, userId }, 'Confirmation requested');
    return confirmationId;
  }

  /**
   * Consume a token. Only its requester may resolve it; anyone else gets
   * `forbidden` and the token stays pending. A token past its age is popped
   * and reported as `expired`.
   */
  resolve(confirmationId: string, response: ConfirmationResponse, actorId?: string): ResolveResult<P> {
    const token = this.pending.get(confirmationId);
    if (!token) {
      return { status: 'not_found' };
    }
    if (actorId !== undefined && actorId !== token.userId) {
      logger.warn({ confirmationId, actorId, owner: token.userId }, 'Confirmation resolved by another user');
      return { status: 'forbidden' };
    }

    this.pending.delete(confirmationId);
    if (this.isExpired(token, this.options.maxAgeMs)) {
      logger.info({ confirmationId }, 'Confirmation expired before it was resolved');
      return { status: 'expired', token };
    }

    const status = response === 'confirm' ? 'confirmed' : 'cancelled';
    logger.info({ confirmationId, actionKind: token.actionKind, status }, 'Confirmation resolved');
    return { status, token };
  }

  /** Evict tokens older than `maxAgeMs`; returns how many were dropped */
  cleanup(maxAgeMs: number = this.options.maxAgeMs): number {
    let evicted = 0;
    for (const [confirmationId, token] of this.pending) {
      if (this.isExpired(token, maxAgeMs)) {
        this.pending.delete(confirmationId);
        evicted++;
      }
    }
    if (evicted > 0) {
      logger.info({ evicted, remaining: this.pending.size }, 'Expired confirmations evicted');
    }
    return evicted;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  private isExpired(token: ConfirmationToken<P>, maxAgeMs: number): boolean {
    return this.clock.now().getTime() - token.issuedAt.getTime() > maxAgeMs;
  }

  private nextId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const candidate = this.options.generateId();
      if (!this.issued.has(candidate)) {
        this.issued.add(candidate);
        return candidate;
      }
    }
    throw new LogicError('Could not generate an unused confirmation id', { attempts: MAX_ID_ATTEMPTS });
  }
}
