import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { TransientCollaboratorError, ValidationError, type IntentSnapshot } from '@sundown/common';
import { FakeClock, deferred, flushPromises, waitFor } from '@sundown/common/test-utils';
import { ReconciliationWorker } from './reconciliation-worker.js';
import { ActionExecutor } from '../executor/action-executor.js';
import { IntentTracker } from '../intent/intent-tracker.js';
import {
  FakeResourceControl,
  InMemoryEventStore,
  RecordingNotifier,
  makeSnapshot,
} from '../test-utils/index.js';

const HOUR = 3_600_000;
const CHECK_INTERVAL_MS = 300_000;
const RETRY_DELAY_MS = 60_000;

class GatedEventStore extends InMemoryEventStore {
  gate = deferred<void>();

  override async listOpen(): Promise<IntentSnapshot[]> {
    await this.gate.promise;
    return super.listOpen();
  }
}

class GatedResources extends FakeResourceControl {
  gate = deferred<void>();

  override async exists(resourceId: string): Promise<boolean> {
    const exists = await super.exists(resourceId);
    await this.gate.promise;
    return exists;
  }
}

function listCalls(store: InMemoryEventStore): number {
  return store.calls.filter((call) => call === 'listOpen').length;
}

describe('ReconciliationWorker', () => {
  let clock: FakeClock;
  let store: InMemoryEventStore;
  let resources: FakeResourceControl;
  let notifier: RecordingNotifier;
  let tracker: IntentTracker;
  let worker: ReconciliationWorker;

  function build(): ReconciliationWorker {
    const executor = new ActionExecutor({ resources, eventStore: store, notifier, tracker });
    return new ReconciliationWorker({ eventStore: store, executor, tracker }, clock, {
      checkIntervalMs: CHECK_INTERVAL_MS,
      retryDelayMs: RETRY_DELAY_MS,
      graceMs: 1_000,
    });
  }

  function at(offsetMs: number, overrides: Partial<IntentSnapshot> = {}): IntentSnapshot {
    return makeSnapshot({ executeAt: new Date(clock.now().getTime() + offsetMs), ...overrides });
  }

  beforeEach(() => {
    clock = new FakeClock('2026-10-19T12:00:00.000Z');
    store = new InMemoryEventStore();
    resources = new FakeResourceControl({ '101': 'running', '102': 'stopped', '103': 'running' });
    notifier = new RecordingNotifier();
    tracker = new IntentTracker();
    worker = build();
  });

  afterEach(async () => {
    if (worker.getStatus().isRunning) {
      await worker.stop(0);
    }
  });

  describe('runOnce', () => {
    it('reminds, executes and leaves the rest alone', async () => {
      store.seed(
        at(20 * HOUR, { intentId: 'remind', resourceId: '101' }),
        at(-HOUR, { intentId: 'execute', resourceId: '102' }),
        at(72 * HOUR, { intentId: 'later', resourceId: '103' }),
      );

      const report = await worker.runOnce();

      expect(report).toMatchObject({
        listed: true,
        observed: 3,
        reminders: 1,
        executions: 1,
        purges: 0,
        failures: 0,
        duplicates: 0,
        skipped: 0,
        aborted: false,
      });
      expect(store.intents.get('remind')?.reminderSent).toBe(true);
      expect(store.intents.has('execute')).toBe(false);
      expect(resources.deleteCalls).toEqual(['102']);
    });

    it('does not remind twice across cycles', async () => {
      store.seed(at(20 * HOUR, { intentId: 'remind' }));

      await worker.runOnce();
      const second = await worker.runOnce();

      expect(second.reminders).toBe(0);
      expect(notifier.textsFor('broadcast')).toHaveLength(1);
    });

    it('purges an intent cancelled between cycles', async () => {
      store.seed(at(72 * HOUR, { intentId: 'cancel-me' }));
      await worker.runOnce();

      store.intents.delete('cancel-me');
      const report = await worker.runOnce();

      expect(report.purges).toBe(1);
      expect(tracker.trackedCount).toBe(0);
      expect(resources.existsCalls).toEqual([]);
    });

    it('keeps going after one intent fails', async () => {
      store.seed(at(-HOUR, { intentId: 'first', resourceId: '101' }), at(-HOUR, { intentId: 'second', resourceId: '102' }));
      resources.failOn('exists', new ValidationError('boom'));

      const report = await worker.runOnce();

      expect(report.failures).toBe(2);
      expect(report.executions).toBe(0);
      expect(resources.existsCalls).toEqual(['101', '102']);
    });

    it('isolates a failing intent from a healthy one', async () => {
      store.seed(at(-HOUR, { intentId: 'broken', resourceId: '101' }), at(-HOUR, { intentId: 'fine', resourceId: '102' }));
      resources.failOn('delete', new ValidationError('locked'));
      resources.resources.delete('102');

      const report = await worker.runOnce();

      expect(report.failures).toBe(1);
      expect(report.executions).toBe(1);
      expect(store.intents.has('broken')).toBe(true);
      expect(store.intents.has('fine')).toBe(false);
    });

    it('acts on the earliest of duplicate intents only', async () => {
      store.seed(
        at(-HOUR, { intentId: 'late', resourceId: '103' }),
        at(-2 * HOUR, { intentId: 'early', resourceId: '103' }),
      );

      const first = await worker.runOnce();

      expect(first.duplicates).toBe(1);
      expect(first.executions).toBe(1);
      expect(resources.deleteCalls).toEqual(['103']);
      expect([...store.intents.keys()]).toEqual(['late']);

      const second = await worker.runOnce();
      expect(second.duplicates).toBe(0);
      expect(second.executions).toBe(1);
      expect(resources.deleteCalls).toEqual(['103']);
    });

    it('ignores an executed intent that shows up again', async () => {
      const snapshot = at(-HOUR, { intentId: 'ghost', resourceId: '103' });
      store.seed(snapshot);
      await worker.runOnce();

      store.seed(snapshot);
      const report = await worker.runOnce();

      expect(report.skipped).toBe(1);
      expect(report.executions).toBe(0);
      expect(resources.existsCalls).toEqual(['103']);
    });

    it('reports a listing failure without throwing', async () => {
      store.failOn('listOpen', new TransientCollaboratorError('calendar', 'HTTP 503'));

      const report = await worker.runOnce();

      expect(report.listed).toBe(false);
      expect(worker.getStatus().consecutiveIterationFailures).toBe(1);
    });

    it('joins a cycle that is already running', async () => {
      const gated = new GatedEventStore();
      store = gated;
      worker = build();

      const first = worker.runOnce();
      const joined = worker.runOnce();
      gated.gate.resolve();

      const [a, b] = await Promise.all([first, joined]);
      expect(a).toBe(b);
      expect(listCalls(gated)).toBe(1);
    });
  });

  describe('loop', () => {
    it('runs immediately, then every check interval', async () => {
      worker.start();
      await waitFor(() => clock.pendingSleepers === 1);
      expect(listCalls(store)).toBe(1);

      clock.advance(CHECK_INTERVAL_MS - 1);
      await flushPromises();
      expect(listCalls(store)).toBe(1);

      clock.advance(1);
      await waitFor(() => listCalls(store) === 2);
    });

    it('backs off by the retry delay when listing fails', async () => {
      store.failOn('listOpen', new TransientCollaboratorError('calendar', 'HTTP 503'));
      worker.start();
      await waitFor(() => clock.pendingSleepers === 1);

      clock.advance(RETRY_DELAY_MS);
      await waitFor(() => listCalls(store) === 2);

      store.clearFailure('listOpen');
      await waitFor(() => clock.pendingSleepers === 1);
      clock.advance(RETRY_DELAY_MS);
      await flushPromises();
      expect(listCalls(store)).toBe(3);

      await waitFor(() => clock.pendingSleepers === 1);
      clock.advance(RETRY_DELAY_MS);
      await flushPromises();
      expect(listCalls(store)).toBe(3);
      expect(worker.getStatus().consecutiveIterationFailures).toBe(0);
    });

    it('lets an in-flight cycle finish on stop', async () => {
      const gated = new GatedEventStore();
      gated.seed(makeSnapshot({ intentId: 'due', resourceId: '103', executeAt: new Date('2026-10-19T00:00:00Z') }));
      store = gated;
      worker = build();

      worker.start();
      const stopping = worker.stop(1_000);
      gated.gate.resolve();
      await stopping;

      const status = worker.getStatus();
      expect(status.isRunning).toBe(false);
      expect(status.lastCycle?.executions).toBe(1);
      expect(clock.pendingSleepers).toBe(0);
    });

    it('abandons the batch at the next intent once the grace period runs out', async () => {
      const gatedResources = new GatedResources({ '101': 'running', '102': 'running' });
      resources = gatedResources;
      store.seed(at(-HOUR, { intentId: 'first', resourceId: '101' }), at(-HOUR, { intentId: 'second', resourceId: '102' }));
      worker = build();

      worker.start();
      await waitFor(() => gatedResources.existsCalls.length === 1);
      const stopping = worker.stop(1_000);
      clock.advance(1_000);
      await stopping;

      gatedResources.gate.resolve();
      await waitFor(() => worker.getStatus().lastCycle !== null);

      expect(worker.getStatus().lastCycle).toMatchObject({ executions: 1, aborted: true });
      expect(gatedResources.existsCalls).toEqual(['101']);
      expect(store.intents.has('second')).toBe(true);
    });

    it('does not restart while an abandoned batch is still running', async () => {
      const gatedResources = new GatedResources({ '101': 'running', '102': 'running' });
      resources = gatedResources;
      store.seed(at(-HOUR, { intentId: 'first', resourceId: '101' }), at(-HOUR, { intentId: 'second', resourceId: '102' }));
      worker = build();

      worker.start();
      await waitFor(() => gatedResources.existsCalls.length === 1);
      const stopping = worker.stop(1_000);
      clock.advance(1_000);
      await stopping;

      worker.start();
      expect(worker.getStatus().isRunning).toBe(false);

      gatedResources.gate.resolve();
      await waitFor(() => worker.getStatus().lastCycle !== null);
      await flushPromises();

      expect(gatedResources.deleteCalls).toEqual(['101']);
      expect(store.intents.has('second')).toBe(true);

      worker.start();
      expect(worker.getStatus().isRunning).toBe(true);
      await waitFor(() => clock.pendingSleepers === 1);
      expect(gatedResources.deleteCalls).toEqual(['101', '102']);
    });
  });
});
