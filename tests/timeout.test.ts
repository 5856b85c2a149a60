import { describe, expect, it } from 'vitest';

import { TimeoutError, withTimeout } from '../src/core/index.js';
import { never } from './helpers.js';

describe('withTimeout', () => {
  it('resolves with the value of the call', async () => {
    let received: AbortSignal | undefined;

    const value = await withTimeout('op', 1000, undefined, async (signal) => {
      received = signal;
      return 42;
    });

    expect(value).toBe(42);
    expect(received?.aborted).toBe(false);
  });

  it('rejects with a TimeoutError and aborts the call', async () => {
    let received: AbortSignal | undefined;

    const pending = withTimeout('op', 10, undefined, (signal) => {
      received = signal;
      return never<number>();
    });

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow('op timed out after 10ms');
    expect(received?.aborted).toBe(true);
  });

  it('rejects with the parent reason when the parent aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error('stop')), 5);

    await expect(
      withTimeout('op', 1000, controller.signal, () => never<number>()),
    ).rejects.toThrow('stop');
  });

  it('does not start the call when the parent is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('early'));
    let called = false;

    await expect(
      withTimeout('op', 1000, controller.signal, async () => {
        called = true;
        return 1;
      }),
    ).rejects.toThrow('early');
    expect(called).toBe(false);
  });

  it('rejects delays the timer cannot represent', async () => {
    let called = false;

    await expect(
      withTimeout('Step 0 (search)', 2 ** 31, undefined, async () => {
        called = true;
        return 1;
      }),
    ).rejects.toThrow(RangeError);
    expect(called).toBe(false);
  });

  it('passes through the call rejection', async () => {
    await expect(
      withTimeout('op', 1000, undefined, () => Promise.reject(new Error('bad input'))),
    ).rejects.toThrow('bad input');
  });
});
