import { beforeEach, describe, it, expect } from 'vitest';
import { NotFoundError } from '@sundown/common';
import { CalendarEventStore, buildIntentEvent, toSnapshot } from './calendar-event-store.js';
import { GoogleCalendarClient } from '../client/google-calendar-client.js';
import type { AccessTokenSource } from '../auth/token-provider.js';
import { googleCalendarEventSchema, type FetchFn, type GoogleCalendarEvent } from '../types.js';

const EVENTS_PATH = '/calendar/v3/calendars/primary/events';

const tokens: AccessTokenSource = {
  getAccessToken: async () => 'test-token',
  invalidate: () => undefined,
};

const eventFields = googleCalendarEventSchema.omit({ id: true });

/**
 * Just enough of the Calendar API to back the store: events kept in a map,
 * patch replacing the top-level fields it is given.
 */
class FakeCalendarApi {
  readonly events = new Map<string, GoogleCalendarEvent>();
  readonly requests: Array<{ method: string; path: string; filter: string | null; body: unknown }> = [];
  private nextId = 1;

  readonly fetch: FetchFn = async (input, init) => {
    const url = new URL(String(input));
    const method = init?.method ?? 'GET';
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    this.requests.push({
      method,
      path: url.pathname,
      filter: url.searchParams.get('privateExtendedProperty'),
      body,
    });

    if (url.pathname === EVENTS_PATH) {
      if (method === 'POST') {
        const id = `evt-${this.nextId++}`;
        const event: GoogleCalendarEvent = { ...eventFields.parse(body), id, status: 'confirmed' };
        this.events.set(id, event);
        return jsonResponse(event);
      }
      return jsonResponse({ items: [...this.events.values()] });
    }

    const id = decodeURIComponent(url.pathname.slice(EVENTS_PATH.length + 1));
    const existing = this.events.get(id);
    if (!existing) {
      return new Response('Resource has been deleted', { status: 410 });
    }
    if (method === 'DELETE') {
      this.events.delete(id);
      return new Response(null, { status: 204 });
    }
    if (method === 'PATCH') {
      const patched: GoogleCalendarEvent = { ...existing, ...eventFields.partial().parse(body), id };
      this.events.set(id, patched);
      return jsonResponse(patched);
    }
    return jsonResponse(existing);
  };
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200 });
}

const newIntent = {
  resourceId: '103',
  resourceName: 'web-01',
  requestor: 'U1',
  createdAt: new Date('2026-10-19T10:00:00.000Z'),
  executeAt: new Date('2026-10-21T23:59:59.000Z'),
};

describe('buildIntentEvent', () => {
  it('builds a one-minute red event carrying the intent metadata', () => {
    expect(buildIntentEvent(newIntent)).toEqual({
      summary: 'Container 103 scheduled for deletion',
      description: 'Scheduled deletion of Proxmox container 103 (web-01).\nRequested by <@U1>',
      start: { dateTime: '2026-10-21T23:59:59.000Z', timeZone: 'UTC' },
      end: { dateTime: '2026-10-22T00:00:59.000Z', timeZone: 'UTC' },
      colorId: '11',
      reminders: { useDefault: false, overrides: [{ method: 'popup', minutes: 1440 }] },
      extendedProperties: {
        private: {
          type: 'deletion-intent',
          resource_id: '103',
          resource_name: 'web-01',
          requestor: 'U1',
          created_at: '2026-10-19T10:00:00.000Z',
          reminder_sent: 'false',
          scheduled_by: 'sundown',
        },
      },
    });
  });

  it('leaves out the requestor line when nobody is known', () => {
    const event = buildIntentEvent({ ...newIntent, resourceName: null, requestor: null });

    expect(event.description).toBe('Scheduled deletion of Proxmox container 103.');
    expect(event.extendedProperties?.private).toMatchObject({ resource_name: '', requestor: '' });
  });
});

describe('toSnapshot', () => {
  const base: GoogleCalendarEvent = {
    id: 'evt-9',
    created: '2026-10-01T00:00:00.000Z',
    start: { dateTime: '2026-10-21T23:59:59Z' },
    extendedProperties: { private: { type: 'deletion-intent', resource_id: '103', reminder_sent: 'TRUE' } },
  };

  it('reads a frozen snapshot, falling back to the event creation time', () => {
    const snapshot = toSnapshot(base);

    expect(snapshot).toEqual({
      intentId: 'evt-9',
      resourceId: '103',
      resourceName: null,
      requestor: null,
      createdAt: new Date('2026-10-01T00:00:00.000Z'),
      executeAt: new Date('2026-10-21T23:59:59.000Z'),
      reminderSent: true,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('rejects a non-numeric resource id', () => {
    expect(
      toSnapshot({ ...base, extendedProperties: { private: { type: 'deletion-intent', resource_id: 'web' } } }),
    ).toBeNull();
  });

  it('rejects an event without a timed start', () => {
    expect(toSnapshot({ ...base, start: { date: '2026-10-21' } })).toBeNull();
  });
});

describe('CalendarEventStore', () => {
  let api: FakeCalendarApi;
  let store: CalendarEventStore;

  beforeEach(() => {
    api = new FakeCalendarApi();
    store = new CalendarEventStore(new GoogleCalendarClient(tokens, api.fetch), 'primary');
  });

  it('creates an intent and lists it back', async () => {
    const intentId = await store.create(newIntent);

    expect(intentId).toBe('evt-1');
    await expect(store.listOpen()).resolves.toEqual([
      {
        intentId: 'evt-1',
        resourceId: '103',
        resourceName: 'web-01',
        requestor: 'U1',
        createdAt: new Date('2026-10-19T10:00:00.000Z'),
        executeAt: new Date('2026-10-21T23:59:59.000Z'),
        reminderSent: false,
      },
    ]);
  });

  it('skips cancelled events and events with invalid metadata', async () => {
    await store.create(newIntent);
    api.events.set('evt-cancelled', {
      id: 'evt-cancelled',
      status: 'cancelled',
      start: { dateTime: '2026-10-21T23:59:59Z' },
      extendedProperties: { private: { type: 'deletion-intent', resource_id: '104' } },
    });
    api.events.set('evt-manual', {
      id: 'evt-manual',
      start: { dateTime: '2026-10-21T23:59:59Z' },
      extendedProperties: { private: { type: 'deletion-intent' } },
    });

    const snapshots = await store.listOpen();

    expect(snapshots.map((s) => s.intentId)).toEqual(['evt-1']);
  });

  it('merges metadata updates into the stored properties', async () => {
    const intentId = await store.create(newIntent);

    await store.updateMetadata(intentId, { reminder_sent: 'true' });

    expect(api.events.get(intentId)?.extendedProperties?.private).toEqual({
      type: 'deletion-intent',
      resource_id: '103',
      resource_name: 'web-01',
      requestor: 'U1',
      created_at: '2026-10-19T10:00:00.000Z',
      reminder_sent: 'true',
      scheduled_by: 'sundown',
    });
  });

  it('never clears a sent reminder', async () => {
    const intentId = await store.create(newIntent);
    await store.updateMetadata(intentId, { reminder_sent: 'true' });

    await store.updateMetadata(intentId, { reminder_sent: 'false' });

    const [snapshot] = await store.listOpen();
    expect(snapshot?.reminderSent).toBe(true);
  });

  it('deletes an intent and reports a second delete as not found', async () => {
    const intentId = await store.create(newIntent);

    await store.delete(intentId);

    await expect(store.listOpen()).resolves.toEqual([]);
    await expect(store.delete(intentId)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('reports an update of a missing intent as not found', async () => {
    await expect(store.updateMetadata('evt-404', { reminder_sent: 'true' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('lists with the intent tag filter', async () => {
    await store.listOpen();

    expect(api.requests).toEqual([
      { method: 'GET', path: EVENTS_PATH, filter: 'type=deletion-intent', body: undefined },
    ]);
  });
});
