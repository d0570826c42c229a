import { z } from 'zod';

/**
 * Types for the Google Calendar integration
 */

/**
 * Injectable fetch function. globalThis.fetch in production, a stub in tests.
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface CalendarConfig {
  calendarId: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
}

const eventDateTimeSchema = z.object({
  dateTime: z.string().optional(),
  date: z.string().optional(),
  timeZone: z.string().optional(),
});

/** The subset of a Calendar API event resource this service reads */
export const googleCalendarEventSchema = z.object({
  id: z.string(),
  status: z.string().optional(),
  summary: z.string().optional(),
  description: z.string().optional(),
  created: z.string().optional(),
  start: eventDateTimeSchema.optional(),
  end: eventDateTimeSchema.optional(),
  extendedProperties: z
    .object({
      private: z.record(z.string()).optional(),
      shared: z.record(z.string()).optional(),
    })
    .optional(),
});

export type GoogleCalendarEvent = z.infer<typeof googleCalendarEventSchema>;

export const eventListSchema = z.object({
  items: z.array(googleCalendarEventSchema).optional(),
  nextPageToken: z.string().optional(),
});

export interface EventDateTime {
  dateTime: string;
  timeZone: string;
}

/** Body of an events.insert call */
export interface EventPayload {
  summary: string;
  description: string;
  start: EventDateTime;
  end: EventDateTime;
  colorId?: string;
  reminders?: {
    useDefault: boolean;
    overrides: Array<{ method: 'popup' | 'email'; minutes: number }>;
  };
  extendedProperties?: {
    private?: Record<string, string>;
  };
}

export interface ListEventsOptions {
  /** `key=value` filter on private extended properties */
  privateExtendedProperty?: string;
  pageSize?: number;
}
