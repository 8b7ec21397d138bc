import { setImmediate as yieldToEventLoop, setTimeout as delay } from 'timers/promises';

/**
 * Waits `ms` milliseconds, returning early (without throwing) once `signal`
 * aborts. Resolves `false` when the wait was cut short.
 * A zero wait still yields one macrotask.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    if (ms <= 0) {
      await yieldToEventLoop(undefined, { signal });
    } else {
      await delay(ms, undefined, { signal });
    }
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}
