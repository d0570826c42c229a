import { describe, it, expect, vi } from 'vitest';
import { NotFoundError, TransientCollaboratorError } from './errors.js';
import { calculateBackoff, withRetry } from './retry.js';

describe('calculateBackoff', () => {
  it('doubles per attempt up to the cap', () => {
    expect(calculateBackoff(0, 1_000, 5_000, false)).toBe(1_000);
    expect(calculateBackoff(2, 1_000, 5_000, false)).toBe(4_000);
    expect(calculateBackoff(5, 1_000, 5_000, false)).toBe(5_000);
  });
});

describe('withRetry', () => {
  it('retries transient failures until one succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientCollaboratorError('proxmox', 'bad gateway'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { baseDelayMs: 0 })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry a permanent failure', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new NotFoundError('Container', '103'));

    await expect(withRetry(fn, { baseDelayMs: 0 })).rejects.toThrow('Container not found: 103');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt with the last error', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TransientCollaboratorError('calendar', 'timeout'));

    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toThrow('calendar: timeout');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
