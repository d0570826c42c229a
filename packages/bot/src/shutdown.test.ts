import { describe, it, expect, vi, afterEach } from 'vitest';
import { deferred } from '@sundown/common/test-utils';
import { createShutdownHandler } from './shutdown.js';

function setup() {
  const order: string[] = [];
  const exit = vi.fn((_code: number) => undefined);
  const deps = {
    cleanupWorker: { stop: vi.fn(() => order.push('cleanup')) },
    reconciliationWorker: {
      stop: vi.fn(async (_graceMs?: number) => {
        order.push('reconciliation');
      }),
    },
    slackApp: {
      stop: vi.fn(async () => {
        order.push('slack');
      }),
    },
    graceMs: 1_000,
    exit,
  };
  return { deps, order, exit };
}

describe('createShutdownHandler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('stops workers before Slack and exits cleanly', async () => {
    const { deps, order, exit } = setup();

    await createShutdownHandler(deps)('SIGTERM');

    expect(order).toEqual(['cleanup', 'reconciliation', 'slack']);
    expect(deps.reconciliationWorker.stop).toHaveBeenCalledWith(1_000);
    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('ignores a second signal while shutting down', async () => {
    const { deps, exit } = setup();
    const shutdown = createShutdownHandler(deps);

    await Promise.all([shutdown('SIGTERM'), shutdown('SIGINT')]);

    expect(deps.slackApp.stop).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('exits with an error when a step fails', async () => {
    const { deps, exit } = setup();
    deps.slackApp.stop.mockRejectedValue(new Error('socket closed'));

    await createShutdownHandler(deps)('SIGTERM');

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('forces an exit when the worker never stops', async () => {
    vi.useFakeTimers();
    const { deps, exit } = setup();
    const stuck = deferred<void>();
    deps.reconciliationWorker.stop.mockReturnValue(stuck.promise);

    void createShutdownHandler(deps)('SIGTERM');
    vi.advanceTimersByTime(5_999);
    expect(exit).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
