/**
 * Cancellation is signalled with the platform AbortError (or whatever reason
 * was passed to AbortController.abort). It is never wrapped or retried.
 */

export function isAbortError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

/**
 * Rethrow `error` when it is a cancellation, or the abort reason when `signal`
 * was aborted while the failing call was in flight.
 */
export function throwIfCancelled(error: unknown, signal?: AbortSignal): void {
  if (isAbortError(error)) {
    throw error;
  }
  signal?.throwIfAborted();
}
