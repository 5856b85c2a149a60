import { setTimeout as delay } from 'node:timers/promises';

/**
 * Wait before retrying a rate-limited call. Rejects as soon as `signal`
 * aborts, with the signal's reason.
 */
export async function waitForRetry(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, signal ? { signal } : {});
  } catch (err) {
    signal?.throwIfAborted();
    throw err;
  }
}
