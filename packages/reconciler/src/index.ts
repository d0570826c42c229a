// Ports
export type { ResourceControl, EventStore, Notifier, Audience } from './ports.js';

// Intent model and state machine
export { reminderAt, deriveState } from './intent/snapshot.js';
export { decide } from './intent/decide.js';
export type { IntentAction, IntentActionType, IntentObservation } from './intent/decide.js';
export { IntentTracker } from './intent/intent-tracker.js';
export type { CyclePlan, DuplicateGroup } from './intent/intent-tracker.js';
export { FailureTracker } from './intent/failure-tracker.js';
export type { FailureRecord } from './intent/failure-tracker.js';

// Executor
export { ActionExecutor } from './executor/action-executor.js';
export type {
  ActionExecutorDeps,
  ActionExecutorOptions,
  ExecutionOutcome,
  ExecutionStatus,
} from './executor/action-executor.js';
export { reminderMessage, completionMessage, failureMessage } from './executor/messages.js';

// Workers
export { ReconciliationWorker } from './workers/reconciliation-worker.js';
export type {
  CycleReport,
  ReconciliationWorkerDeps,
  ReconciliationWorkerOptions,
  ReconciliationWorkerStatus,
} from './workers/reconciliation-worker.js';
export { ConfirmationCleanupWorker } from './workers/confirmation-cleanup-worker.js';

// Confirmations
export { ConfirmationRegistry } from './confirmation/confirmation-registry.js';
export type {
  ConfirmationToken,
  ConfirmationRegistryOptions,
  ResolveResult,
} from './confirmation/confirmation-registry.js';
