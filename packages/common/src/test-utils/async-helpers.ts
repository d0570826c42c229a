/**
 * Async helpers for timing-sensitive tests.
 */

/**
 * Wait for a condition to become true
 * @param timeout Maximum time to wait in milliseconds (default: 2000)
 * @param interval Check interval in milliseconds (default: 5)
 * @throws Error if timeout is reached
 *
 * @example
 * ```typescript
 * await waitFor(() => notifier.sent.length === 2);
 * ```
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout = 2000,
  interval = 5,
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await sleep(interval);
  }

  throw new Error(`Condition not met within ${timeout}ms timeout`);
}

export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let every already-queued promise continuation run. Useful after advancing a
 * FakeClock so woken sleepers get to execute their next step.
 */
export async function flushPromises(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}

/**
 * A promise whose settlement the test controls, for holding a collaborator
 * call open while asserting on what happens around it.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
