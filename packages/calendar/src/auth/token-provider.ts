import { z } from 'zod';
import { createLogger, systemClock, type Clock } from '@sundown/common';
import { DEFAULT_TIMEOUT_MS, fetchWithDeadline } from '../client/http.js';
import { GoogleAuthError, GoogleTransientError } from '../errors/index.js';
import type { FetchFn, GoogleCredentials } from '../types.js';

const logger = createLogger('google-token-provider');

export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';

/** Refresh this long before Google's stated expiry */
const EXPIRY_MARGIN_MS = 60_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
});

export interface AccessTokenSource {
  getAccessToken(signal?: AbortSignal): Promise<string>;
  invalidate(): void;
}

export function buildTokenRefreshBody(credentials: GoogleCredentials): string {
  return new URLSearchParams({
    grant_type: 'refresh_token',
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
    refresh_token: credentials.refreshToken,
  }).toString();
}

/**
 * Exchanges a long-lived refresh token for access tokens and caches the
 * current one. Concurrent callers share a single in-flight refresh.
 */
export class GoogleTokenProvider implements AccessTokenSource {
  private accessToken: string | null = null;
  private expiresAt = 0;
  private inflight: Promise<string> | null = null;

  constructor(
    private readonly credentials: GoogleCredentials,
    private readonly fetchFn: FetchFn = globalThis.fetch.bind(globalThis),
    private readonly clock: Clock = systemClock,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  async getAccessToken(signal?: AbortSignal): Promise<string> {
    if (this.accessToken && this.clock.now().getTime() < this.expiresAt) {
      return this.accessToken;
    }
    if (!this.inflight) {
      this.inflight = this.refresh(signal).finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  /** Drop the cached token so the next call refreshes it */
  invalidate(): void {
    this.accessToken = null;
    this.expiresAt = 0;
  }

  private async refresh(signal?: AbortSignal): Promise<string> {
    const response = await fetchWithDeadline(
      this.fetchFn,
      GOOGLE_TOKEN_URL,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: buildTokenRefreshBody(this.credentials),
      },
      this.timeoutMs,
      signal,
    );

    if (!response.ok) {
      const text = await response.text();
      logger.warn({ status: response.status }, 'Token refresh failed');
      if (response.status === 429 || response.status >= 500) {
        throw new GoogleTransientError(`Token refresh failed (${response.status}): ${text}`, response.status);
      }
      throw new GoogleAuthError(`Token refresh failed (${response.status}): ${text}`, response.status);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GoogleTransientError(`Unexpected token response: ${parsed.error.message}`);
    }

    this.accessToken = parsed.data.access_token;
    this.expiresAt = this.clock.now().getTime() + parsed.data.expires_in * 1000 - EXPIRY_MARGIN_MS;
    logger.debug({ expiresInSeconds: parsed.data.expires_in }, 'Access token refreshed');
    return this.accessToken;
  }
}
