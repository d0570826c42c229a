import { CollaboratorTimeoutError } from './errors.js';

/**
 * Run `fn` with its own deadline. The signal handed to `fn` is aborted when the
 * deadline passes so fetch-based callers can cancel the underlying request;
 * callers that ignore the signal still get a CollaboratorTimeoutError.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  collaborator: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
