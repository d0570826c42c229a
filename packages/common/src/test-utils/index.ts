/**
 * Test utilities shared across packages.
 *
 * @example
 * ```typescript
 * import { FakeClock, waitFor, flushPromises } from '@sundown/common/test-utils';
 * ```
 */
export { FakeClock } from './fake-clock.js';
export { waitFor, flushPromises, deferred } from './async-helpers.js';
export type { Deferred } from './async-helpers.js';
