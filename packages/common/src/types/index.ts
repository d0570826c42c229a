export type { IntentSnapshot, IntentState, NewIntent, IntentMetadata } from './intent.js';
export type { ResourceStatus, ResourceSummary } from './resources.js';
