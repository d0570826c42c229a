import {
  createLogger,
  INTENT_EVENT_TAG,
  INTENT_SCHEDULER_NAME,
  IntentMetadataKey,
  intentMetadataSchema,
  type IntentMetadata,
  type IntentSnapshot,
  type NewIntent,
} from '@sundown/common';
import type { EventStore } from '@sundown/reconciler';
import type { GoogleCalendarClient } from '../client/google-calendar-client.js';
import type { EventPayload, GoogleCalendarEvent } from '../types.js';

const logger = createLogger('calendar-event-store');

const EVENT_DURATION_MS = 60_000;
/** Red in the default Google Calendar palette */
const DELETION_COLOR_ID = '11';
const POPUP_REMINDER_MINUTES = 24 * 60;

export function intentSummary(resourceId: string): string {
  return `Container ${resourceId} scheduled for deletion`;
}

export function intentDescription(input: NewIntent): string {
  const name = input.resourceName ? ` (${input.resourceName})` : '';
  let description = `Scheduled deletion of Proxmox container ${input.resourceId}${name}.`;
  if (input.requestor) {
    description += `\nRequested by <@${input.requestor}>`;
  }
  return description;
}

export function buildIntentEvent(input: NewIntent): EventPayload {
  const metadata: IntentMetadata = {
    type: INTENT_EVENT_TAG,
    resource_id: input.resourceId,
    resource_name: input.resourceName ?? '',
    requestor: input.requestor ?? '',
    created_at: input.createdAt.toISOString(),
    reminder_sent: 'false',
    scheduled_by: INTENT_SCHEDULER_NAME,
  };

  return {
    summary: intentSummary(input.resourceId),
    description: intentDescription(input),
    start: { dateTime: input.executeAt.toISOString(), timeZone: 'UTC' },
    end: {
      dateTime: new Date(input.executeAt.getTime() + EVENT_DURATION_MS).toISOString(),
      timeZone: 'UTC',
    },
    colorId: DELETION_COLOR_ID,
    reminders: {
      useDefault: false,
      overrides: [{ method: 'popup', minutes: POPUP_REMINDER_MINUTES }],
    },
    extendedProperties: { private: { ...metadata } },
  };
}

function parseDate(value: string | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Read an event into a frozen snapshot, or null when it does not describe a
 * valid deletion intent.
 */
export function toSnapshot(event: GoogleCalendarEvent): IntentSnapshot | null {
  const parsed = intentMetadataSchema.safeParse(event.extendedProperties?.private ?? {});
  if (!parsed.success) {
    logger.warn({ eventId: event.id, issues: parsed.error.issues.length }, 'Skipping event with invalid intent metadata');
    return null;
  }

  const executeAt = parseDate(event.start?.dateTime);
  if (!executeAt) {
    logger.warn({ eventId: event.id }, 'Skipping intent event without a start time');
    return null;
  }

  const metadata = parsed.data;
  const createdAt = parseDate(metadata.created_at) ?? parseDate(event.created) ?? executeAt;

  return Object.freeze({
    intentId: event.id,
    resourceId: metadata.resource_id,
    resourceName: metadata.resource_name || null,
    requestor: metadata.requestor || null,
    createdAt,
    executeAt,
    reminderSent: metadata.reminder_sent,
  });
}

/**
 * Deletion intents stored as Google Calendar events, tagged through a private
 * extended property so that hand-made events on the same calendar are ignored.
 */
export class CalendarEventStore implements EventStore {
  constructor(
    private readonly client: GoogleCalendarClient,
    private readonly calendarId: string,
  ) {}

  async listOpen(signal?: AbortSignal): Promise<IntentSnapshot[]> {
    const events = await this.client.listEvents(
      this.calendarId,
      { privateExtendedProperty: `${IntentMetadataKey.TYPE}=${INTENT_EVENT_TAG}` },
      signal,
    );

    const snapshots: IntentSnapshot[] = [];
    for (const event of events) {
      if (event.status === 'cancelled') continue;
      const snapshot = toSnapshot(event);
      if (snapshot) snapshots.push(snapshot);
    }

    logger.debug({ events: events.length, intents: snapshots.length }, 'Listed open intents');
    return snapshots;
  }

  async create(input: NewIntent, signal?: AbortSignal): Promise<string> {
    const event = await this.client.insertEvent(this.calendarId, buildIntentEvent(input), signal);
    logger.info(
      { intentId: event.id, resourceId: input.resourceId, executeAt: input.executeAt.toISOString() },
      'Deletion intent created',
    );
    return event.id;
  }

  /**
   * Read-merge-write of the private properties. A stored `reminder_sent=true`
   * is never overwritten with `false`.
   */
  async updateMetadata(intentId: string, metadata: Partial<IntentMetadata>, signal?: AbortSignal): Promise<void> {
    const event = await this.client.getEvent(this.calendarId, intentId, signal);
    const current = event.extendedProperties?.private ?? {};

    const merged: Record<string, string> = { ...current };
    for (const [key, value] of Object.entries(metadata)) {
      if (value !== undefined) merged[key] = value;
    }
    if (current[IntentMetadataKey.REMINDER_SENT] === 'true') {
      if (metadata.reminder_sent === 'false') {
        logger.warn({ intentId }, 'Refusing to clear reminder_sent on an intent');
      }
      merged[IntentMetadataKey.REMINDER_SENT] = 'true';
    }

    await this.client.patchEvent(this.calendarId, intentId, { extendedProperties: { private: merged } }, signal);
    logger.debug({ intentId, keys: Object.keys(metadata) }, 'Intent metadata updated');
  }

  async delete(intentId: string, signal?: AbortSignal): Promise<void> {
    await this.client.deleteEvent(this.calendarId, intentId, signal);
    logger.info({ intentId }, 'Deletion intent removed');
  }
}
