export { InMemoryEventStore, makeSnapshot } from './in-memory-event-store.js';
export { FakeResourceControl } from './fake-resource-control.js';
export { RecordingNotifier, type SentNotification } from './recording-notifier.js';
