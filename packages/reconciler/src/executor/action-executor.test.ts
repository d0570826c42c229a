import { describe, it, expect, beforeEach } from 'vitest';
import {
  CollaboratorTimeoutError,
  NotFoundError,
  TransientCollaboratorError,
  ValidationError,
} from '@sundown/common';
import { ActionExecutor } from './action-executor.js';
import { IntentTracker } from '../intent/intent-tracker.js';
import { decide } from '../intent/decide.js';
import {
  FakeResourceControl,
  InMemoryEventStore,
  RecordingNotifier,
  makeSnapshot,
} from '../test-utils/index.js';
import type { ResourceControl } from '../ports.js';

const DELETED = ':wastebasket: Container 103 (web-01) has been deleted as scheduled.';
const REMINDER =
  ':alarm_clock: Reminder: container 103 (web-01) will be deleted on 2026-01-03 23:59 UTC (requested by <@U1>).';

describe('ActionExecutor', () => {
  let store: InMemoryEventStore;
  let resources: FakeResourceControl;
  let notifier: RecordingNotifier;
  let tracker: IntentTracker;
  let executor: ActionExecutor;

  beforeEach(() => {
    store = new InMemoryEventStore();
    resources = new FakeResourceControl({ '103': 'running' });
    notifier = new RecordingNotifier();
    tracker = new IntentTracker();
    executor = new ActionExecutor({ resources, eventStore: store, notifier, tracker }, { failureThreshold: 3 });
  });

  describe('execute', () => {
    it('deletes the resource, notifies, then clears the intent', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      tracker.observe([snapshot]);

      const outcome = await executor.execute({ type: 'execute', snapshot });

      expect(outcome).toEqual({ intentId: 'i-1', action: 'execute', status: 'completed' });
      expect(resources.deleteCalls).toEqual(['103']);
      expect(notifier.sent).toEqual([
        { audience: { kind: 'broadcast' }, text: DELETED },
        { audience: { kind: 'user', userId: 'U1' }, text: DELETED },
      ]);
      expect(store.intents.has('i-1')).toBe(false);
      expect(tracker.executedCount).toBe(1);
      expect(tracker.observe([snapshot]).skipped).toEqual(['i-1']);
    });

    it('clears the intent without deleting when the resource is already gone', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1', resourceId: '999' });
      store.seed(snapshot);

      const outcome = await executor.execute({ type: 'execute', snapshot });

      expect(outcome.status).toBe('completed');
      expect(resources.deleteCalls).toEqual([]);
      expect(notifier.textsFor('broadcast')).toEqual([
        ':wastebasket: Container 999 (web-01) was already removed; its scheduled deletion has been cleared.',
      ]);
      expect(store.intents.has('i-1')).toBe(false);
    });

    it('never deletes twice when executed again', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);

      await executor.execute({ type: 'execute', snapshot });
      const second = await executor.execute({ type: 'execute', snapshot });

      expect(second.status).toBe('completed');
      expect(resources.deleteCalls).toEqual(['103']);
      expect(resources.existsCalls).toEqual(['103', '103']);
    });

    it('treats NotFound from delete as success', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      resources.failOn('delete', new NotFoundError('Container', '103'));

      const outcome = await executor.execute({ type: 'execute', snapshot });

      expect(outcome.status).toBe('completed');
      expect(store.intents.has('i-1')).toBe(false);
    });

    it('leaves the intent alone when delete fails', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      resources.failOn('delete', new TransientCollaboratorError('proxmox', 'HTTP 503'));

      const outcome = await executor.execute({ type: 'execute', snapshot });

      expect(outcome.status).toBe('failed');
      expect(outcome.error).toBeInstanceOf(TransientCollaboratorError);
      expect(store.intents.has('i-1')).toBe(true);
      expect(store.calls).toEqual([]);
      expect(notifier.sent).toEqual([]);
    });

    it('reports a transient failure once it persists for the threshold', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      resources.failOn('delete', new TransientCollaboratorError('proxmox', 'HTTP 503'));

      await executor.execute({ type: 'execute', snapshot });
      await executor.execute({ type: 'execute', snapshot });
      expect(notifier.sent).toEqual([]);

      await executor.execute({ type: 'execute', snapshot });
      await executor.execute({ type: 'execute', snapshot });

      const failure =
        ':x: Failed to delete container 103 (web-01): proxmox: HTTP 503. It will be retried at the next check.';
      expect(notifier.sent).toEqual([
        { audience: { kind: 'broadcast' }, text: failure },
        { audience: { kind: 'user', userId: 'U1' }, text: failure },
      ]);
    });

    it('reports a non-transient failure straight away', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1', requestor: null });
      store.seed(snapshot);
      resources.failOn('delete', new ValidationError('bad container id'));

      await executor.execute({ type: 'execute', snapshot });

      expect(notifier.sent).toEqual([
        {
          audience: { kind: 'broadcast' },
          text: ':x: Failed to delete container 103 (web-01): bad container id. It will be retried at the next check.',
        },
      ]);
    });

    it('starts a new failure streak once the intent is purged', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      resources.failOn('delete', new TransientCollaboratorError('proxmox', 'HTTP 503'));
      await executor.execute({ type: 'execute', snapshot });
      await executor.execute({ type: 'execute', snapshot });

      await executor.execute({ type: 'purge', intentId: 'i-1', lastSeen: snapshot });
      await executor.execute({ type: 'execute', snapshot });
      await executor.execute({ type: 'execute', snapshot });

      expect(notifier.sent).toEqual([]);
    });

    it('retries the notice without a second delete when notifying fails', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      notifier.failWith = new TransientCollaboratorError('slack', 'down');

      const first = await executor.execute({ type: 'execute', snapshot });
      expect(first.status).toBe('failed');
      expect(store.intents.has('i-1')).toBe(true);

      notifier.failWith = null;
      const second = await executor.execute({ type: 'execute', snapshot });

      expect(second.status).toBe('completed');
      expect(resources.deleteCalls).toEqual(['103']);
      expect(notifier.textsFor('broadcast')).toEqual([
        ':wastebasket: Container 103 (web-01) was already removed; its scheduled deletion has been cleared.',
      ]);
      expect(store.intents.has('i-1')).toBe(false);
    });

    it('treats an intent already removed from the store as cleared', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });

      const outcome = await executor.execute({ type: 'execute', snapshot });

      expect(outcome.status).toBe('completed');
      expect(store.calls).toEqual(['delete:i-1']);
    });

    it('fails a call that outlives its timeout', async () => {
      const hanging: ResourceControl = {
        exists: () => new Promise<boolean>(() => undefined),
        status: async () => 'unknown',
        delete: async () => undefined,
      };
      const slow = new ActionExecutor(
        { resources: hanging, eventStore: store, notifier, tracker },
        { callTimeoutMs: 10 },
      );
      const snapshot = makeSnapshot({ intentId: 'i-1' });

      const outcome = await slow.execute({ type: 'execute', snapshot });

      expect(outcome.status).toBe('failed');
      expect(outcome.error).toBeInstanceOf(CollaboratorTimeoutError);
    });
  });

  describe('send_reminder', () => {
    it('notifies, then records the reminder', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);

      const outcome = await executor.execute({ type: 'send_reminder', snapshot });

      expect(outcome).toEqual({ intentId: 'i-1', action: 'send_reminder', status: 'completed' });
      expect(notifier.sent).toEqual([
        { audience: { kind: 'broadcast' }, text: REMINDER },
        { audience: { kind: 'user', userId: 'U1' }, text: REMINDER },
      ]);
      expect(store.intents.get('i-1')?.reminderSent).toBe(true);
    });

    it('does not record a reminder that was not delivered', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      store.seed(snapshot);
      notifier.failWith = new TransientCollaboratorError('slack', 'down');

      const outcome = await executor.execute({ type: 'send_reminder', snapshot });

      expect(outcome.status).toBe('failed');
      expect(store.calls).toEqual([]);
      expect(store.intents.get('i-1')?.reminderSent).toBe(false);
    });

    it('sends the reminder again next time when recording it failed', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1', executeAt: new Date('2026-01-03T23:59:59.000Z') });
      store.seed(snapshot);
      store.failOn('updateMetadata', new TransientCollaboratorError('calendar', 'HTTP 500'));
      const now = new Date('2026-01-03T12:00:00.000Z');

      const outcome = await executor.execute({ type: 'send_reminder', snapshot });
      const [stored] = await store.listOpen();

      expect(outcome.status).toBe('completed');
      expect(stored?.reminderSent).toBe(false);
      expect(stored && decide(now, { kind: 'present', snapshot: stored }).type).toBe('send_reminder');
    });

    it('carries on when the intent was cancelled mid-flight', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });

      const outcome = await executor.execute({ type: 'send_reminder', snapshot });

      expect(outcome.status).toBe('completed');
      expect(store.calls).toEqual(['updateMetadata:i-1']);
    });

    it('only messages the channel when the requestor is unknown', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1', requestor: null, resourceName: null });
      store.seed(snapshot);

      await executor.execute({ type: 'send_reminder', snapshot });

      expect(notifier.sent).toEqual([
        {
          audience: { kind: 'broadcast' },
          text: ':alarm_clock: Reminder: container 103 will be deleted on 2026-01-03 23:59 UTC.',
        },
      ]);
    });
  });

  describe('purge and none', () => {
    it('purges only local tracking', async () => {
      const snapshot = makeSnapshot({ intentId: 'i-1' });
      tracker.observe([snapshot]);

      const outcome = await executor.execute({ type: 'purge', intentId: 'i-1', lastSeen: snapshot });

      expect(outcome).toEqual({ intentId: 'i-1', action: 'purge', status: 'completed' });
      expect(tracker.trackedCount).toBe(0);
      expect(tracker.observe([]).observations).toEqual([]);
      expect(store.calls).toEqual([]);
      expect(resources.existsCalls).toEqual([]);
    });

    it('skips none', async () => {
      await expect(executor.execute({ type: 'none' })).resolves.toEqual({
        intentId: null,
        action: 'none',
        status: 'skipped',
      });
    });
  });
});
