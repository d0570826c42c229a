import { createLogger, Limits, SundownError } from '@sundown/common';
import type { AccessTokenSource } from '../auth/token-provider.js';
import { GoogleAuthError, GoogleTransientError, classifyGoogleFailure } from '../errors/index.js';
import {
  eventListSchema,
  googleCalendarEventSchema,
  type EventPayload,
  type FetchFn,
  type GoogleCalendarEvent,
  type ListEventsOptions,
} from '../types.js';
import { DEFAULT_TIMEOUT_MS, fetchWithDeadline } from './http.js';

const logger = createLogger('google-calendar-client');

const GOOGLE_CALENDAR_BASE = 'https://www.googleapis.com/calendar/v3';

interface CalendarRequest {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE';
  url: string;
  body?: unknown;
  /** Event the request targets; enables not-found classification */
  eventId?: string;
  signal?: AbortSignal;
}

/**
 * Thin typed wrapper over the Google Calendar v3 REST API.
 */
export class GoogleCalendarClient {
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly tokens: AccessTokenSource,
    fetchFn?: FetchFn,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  /**
   * List events, following `nextPageToken` until every page is read.
   * Recurring events are expanded and deleted events are left out.
   */
  async listEvents(
    calendarId: string,
    options: ListEventsOptions = {},
    signal?: AbortSignal,
  ): Promise<GoogleCalendarEvent[]> {
    const events: GoogleCalendarEvent[] = [];
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams();
      params.set('singleEvents', 'true');
      params.set('showDeleted', 'false');
      params.set('maxResults', String(options.pageSize ?? Limits.CALENDAR_PAGE_SIZE));
      if (options.privateExtendedProperty) {
        params.set('privateExtendedProperty', options.privateExtendedProperty);
      }
      if (pageToken) {
        params.set('pageToken', pageToken);
      }

      const body = await this.request({
        method: 'GET',
        url: `${this.eventsUrl(calendarId)}?${params.toString()}`,
        signal,
      });
      const parsed = eventListSchema.safeParse(body);
      if (!parsed.success) {
        throw new GoogleTransientError(`Unexpected event list payload: ${parsed.error.message}`);
      }

      events.push(...(parsed.data.items ?? []));
      pageToken = parsed.data.nextPageToken;
    } while (pageToken);

    return events;
  }

  async getEvent(calendarId: string, eventId: string, signal?: AbortSignal): Promise<GoogleCalendarEvent> {
    const body = await this.request({
      method: 'GET',
      url: this.eventUrl(calendarId, eventId),
      eventId,
      signal,
    });
    return this.parseEvent(body);
  }

  async insertEvent(calendarId: string, event: EventPayload, signal?: AbortSignal): Promise<GoogleCalendarEvent> {
    const body = await this.request({
      method: 'POST',
      url: this.eventsUrl(calendarId),
      body: event,
      signal,
    });
    return this.parseEvent(body);
  }

  async patchEvent(
    calendarId: string,
    eventId: string,
    patch: Partial<EventPayload>,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.request({
      method: 'PATCH',
      url: this.eventUrl(calendarId, eventId),
      body: patch,
      eventId,
      signal,
    });
  }

  async deleteEvent(calendarId: string, eventId: string, signal?: AbortSignal): Promise<void> {
    await this.request({
      method: 'DELETE',
      url: this.eventUrl(calendarId, eventId),
      eventId,
      signal,
    });
  }

  private parseEvent(body: unknown): GoogleCalendarEvent {
    const parsed = googleCalendarEventSchema.safeParse(body);
    if (!parsed.success) {
      throw new GoogleTransientError(`Unexpected event payload: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private eventsUrl(calendarId: string): string {
    return `${GOOGLE_CALENDAR_BASE}/calendars/${encodeURIComponent(calendarId)}/events`;
  }

  private eventUrl(calendarId: string, eventId: string): string {
    return `${this.eventsUrl(calendarId)}/${encodeURIComponent(eventId)}`;
  }

  /**
   * Execute an authenticated request and map failures onto the error taxonomy.
   * A 401 drops the cached access token so the next call fetches a new one.
   */
  private async request(req: CalendarRequest): Promise<unknown> {
    const startTime = Date.now();
    const token = await this.tokens.getAccessToken(req.signal);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/json',
    };
    if (req.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await fetchWithDeadline(
      this.fetchFn,
      req.url,
      {
        method: req.method,
        headers,
        body: req.body === undefined ? undefined : JSON.stringify(req.body),
      },
      this.timeoutMs,
      req.signal,
    );
    const durationMs = Date.now() - startTime;

    if (!response.ok) {
      const text = await response.text();
      const error: SundownError = classifyGoogleFailure(response.status, text, req.eventId);
      if (error instanceof GoogleAuthError) {
        this.tokens.invalidate();
      }
      logger.warn(
        { method: req.method, url: req.url, status: response.status, durationMs, code: error.code },
        'Calendar request failed',
      );
      throw error;
    }

    logger.debug({ method: req.method, url: req.url, status: response.status, durationMs }, 'Calendar request successful');

    // DELETE answers 204 No Content
    if (response.status === 204) {
      return undefined;
    }
    return await response.json();
  }
}
