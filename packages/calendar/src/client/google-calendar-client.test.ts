import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, isTransient } from '@sundown/common';
import { GoogleCalendarClient } from './google-calendar-client.js';
import { GoogleApiError, GoogleAuthError, GoogleNotFoundError, GoogleTransientError } from '../errors/index.js';
import type { AccessTokenSource } from '../auth/token-provider.js';
import type { FetchFn } from '../types.js';

const EVENTS_URL = 'https://www.googleapis.com/calendar/v3/calendars/primary/events';

function staticTokens(): AccessTokenSource & { invalidate: ReturnType<typeof vi.fn> } {
  return {
    getAccessToken: async () => 'test-token',
    invalidate: vi.fn(),
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('GoogleCalendarClient', () => {
  describe('listEvents', () => {
    it('follows pagination and filters on the private property', async () => {
      const fetchFn = vi.fn<FetchFn>(async (input) =>
        String(input).includes('pageToken=page-2')
          ? json({ items: [{ id: 'evt-2' }] })
          : json({ items: [{ id: 'evt-1' }], nextPageToken: 'page-2' }),
      );
      const client = new GoogleCalendarClient(staticTokens(), fetchFn);

      const events = await client.listEvents('primary', { privateExtendedProperty: 'type=deletion-intent' });

      expect(events.map((e) => e.id)).toEqual(['evt-1', 'evt-2']);
      expect(fetchFn.mock.calls.map(([url]) => url)).toEqual([
        `${EVENTS_URL}?singleEvents=true&showDeleted=false&maxResults=250&privateExtendedProperty=type%3Ddeletion-intent`,
        `${EVENTS_URL}?singleEvents=true&showDeleted=false&maxResults=250&privateExtendedProperty=type%3Ddeletion-intent&pageToken=page-2`,
      ]);
    });

    it('sends the bearer token', async () => {
      const fetchFn = vi.fn<FetchFn>(async () => json({ items: [] }));
      const client = new GoogleCalendarClient(staticTokens(), fetchFn);

      await client.listEvents('primary');

      const [, init] = fetchFn.mock.calls[0] ?? [];
      expect(init?.headers).toEqual({ Authorization: 'Bearer test-token', Accept: 'application/json' });
    });

    it('treats an empty calendar as no events', async () => {
      const client = new GoogleCalendarClient(staticTokens(), async () => json({}));

      await expect(client.listEvents('primary')).resolves.toEqual([]);
    });
  });

  describe('event calls', () => {
    it('encodes the event id and sends JSON bodies on patch', async () => {
      const fetchFn = vi.fn<FetchFn>(async () => json({ id: 'evt/1' }));
      const client = new GoogleCalendarClient(staticTokens(), fetchFn);

      await client.patchEvent('primary', 'evt/1', { extendedProperties: { private: { reminder_sent: 'true' } } });

      const [url, init] = fetchFn.mock.calls[0] ?? [];
      expect(url).toBe(`${EVENTS_URL}/evt%2F1`);
      expect(init?.method).toBe('PATCH');
      expect(init?.body).toBe('{"extendedProperties":{"private":{"reminder_sent":"true"}}}');
    });

    it('accepts 204 on delete', async () => {
      const client = new GoogleCalendarClient(staticTokens(), async () => new Response(null, { status: 204 }));

      await expect(client.deleteEvent('primary', 'evt-1')).resolves.toBeUndefined();
    });

    it.each([404, 410])('maps %i on an event to NotFound', async (status) => {
      const client = new GoogleCalendarClient(staticTokens(), async () => new Response('gone', { status }));

      const error = await client.deleteEvent('primary', 'evt-1').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GoogleNotFoundError);
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', 'Event not found: evt-1');
    });
  });

  describe('failure classification', () => {
    it('invalidates the cached token on 401', async () => {
      const tokens = staticTokens();
      const client = new GoogleCalendarClient(tokens, async () => new Response('expired', { status: 401 }));

      await expect(client.getEvent('primary', 'evt-1')).rejects.toBeInstanceOf(GoogleAuthError);
      expect(tokens.invalidate).toHaveBeenCalledTimes(1);
    });

    it('treats quota 403s and 5xx as transient', async () => {
      const quota = new GoogleCalendarClient(
        staticTokens(),
        async () => new Response('{"error":{"errors":[{"reason":"rateLimitExceeded"}]}}', { status: 403 }),
      );
      const outage = new GoogleCalendarClient(staticTokens(), async () => new Response('backend', { status: 500 }));

      await expect(quota.listEvents('primary')).rejects.toBeInstanceOf(GoogleTransientError);
      const error = await outage.listEvents('primary').catch((err: unknown) => err);
      expect(isTransient(error)).toBe(true);
    });

    it('treats other 4xx as non-transient', async () => {
      const client = new GoogleCalendarClient(staticTokens(), async () => new Response('bad', { status: 400 }));

      const error = await client.insertEvent('primary', {
        summary: 'x',
        description: 'x',
        start: { dateTime: '2026-10-21T23:59:59.000Z', timeZone: 'UTC' },
        end: { dateTime: '2026-10-22T00:00:59.000Z', timeZone: 'UTC' },
      }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GoogleApiError);
      expect(isTransient(error)).toBe(false);
    });

    it('wraps network failures as transient', async () => {
      const client = new GoogleCalendarClient(staticTokens(), async () => {
        throw new TypeError('fetch failed');
      });

      const error = await client.listEvents('primary').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(GoogleTransientError);
      expect(error).toHaveProperty('message', 'calendar: fetch failed');
    });
  });
});
