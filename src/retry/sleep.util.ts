import { setTimeout as delay } from 'node:timers/promises';

/** Resolves `true` once `ms` elapse, or `false` as soon as `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }

  try {
    await delay(ms, undefined, { signal });

    return true;
  } catch (error) {
    if (signal?.aborted) {
      return false;
    }

    throw error;
  }
}
