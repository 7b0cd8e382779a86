// =============================================================================
// Timeout Bound
// =============================================================================
// Every call to an external collaborator (embedder, LLM provider, store) runs
// through withTimeout. On expiry the caller stops waiting, the signal handed to
// the operation is aborted, and a TimeoutError is raised.

import { TimeoutError } from '@chat-recall/shared-types';

/**
 * Run an operation bounded by a timeout
 *
 * @param operation - Name used in the error message (e.g., "embedding.embed")
 * @param timeoutMs - Maximum time to wait
 * @param run - The operation; receives a signal that aborts when the bound expires
 * @throws TimeoutError when the bound expires first
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      Promise.resolve().then(() => run(controller.signal)),
      expired,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
