import { TIMEOUTS } from '../config/defaults.js';
import { TimeoutError } from './errors.js';

/**
 * Run `fn` with a signal that aborts when `timeoutMs` elapses or when
 * `parent` aborts, whichever comes first. The returned promise settles as
 * soon as either happens, even if `fn` ignores its signal.
 *
 * Rejects with a RangeError when `timeoutMs` is not a positive number no
 * larger than the timer limit (2^31 - 1 ms).
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  assertTimeout(label, timeoutMs);
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = (): void => {
    controller.abort(parent?.reason);
  };
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        reject(toError(controller.signal.reason));
      },
      { once: true },
    );
  });

  try {
    return await Promise.race([fn(controller.signal), expired, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

export function assertTimeout(label: string, timeoutMs: number): void {
  if (!(timeoutMs > 0 && timeoutMs <= TIMEOUTS.MAX_TIMEOUT)) {
    throw new RangeError(
      `${label} timeout must be between 1 and ${String(TIMEOUTS.MAX_TIMEOUT)}ms, got ${String(timeoutMs)}`,
    );
  }
}
