import { errorMessage } from '@sundown/common';
import { GoogleTransientError } from '../errors/index.js';
import type { FetchFn } from '../types.js';

export const DEFAULT_TIMEOUT_MS = 15_000;

/**
 * fetch with its own deadline, also cancelled by the caller's signal.
 * Aborts and network failures surface as GoogleTransientError; HTTP
 * statuses are left to the caller to classify.
 */
export async function fetchWithDeadline(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<Response> {
  const startTime = Date.now();
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onOuterAbort = () => controller.abort();
  signal?.addEventListener('abort', onOuterAbort, { once: true });

  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new GoogleTransientError(`Request aborted after ${Date.now() - startTime}ms`, undefined, {
        cause: error,
      });
    }
    throw new GoogleTransientError(errorMessage(error), undefined, { cause: error });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener('abort', onOuterAbort);
  }
}
