// Auth
export { GoogleTokenProvider, GOOGLE_TOKEN_URL, buildTokenRefreshBody } from './auth/token-provider.js';
export type { AccessTokenSource } from './auth/token-provider.js';

// Client
export { GoogleCalendarClient } from './client/google-calendar-client.js';

// Store
export {
  CalendarEventStore,
  buildIntentEvent,
  intentSummary,
  toSnapshot,
} from './store/calendar-event-store.js';

// Errors
export {
  GoogleApiError,
  GoogleTransientError,
  GoogleNotFoundError,
  GoogleAuthError,
  classifyGoogleFailure,
} from './errors/index.js';

// Types
export type {
  CalendarConfig,
  EventPayload,
  FetchFn,
  GoogleCalendarEvent,
  GoogleCredentials,
  ListEventsOptions,
} from './types.js';
