import { setTimeout as delay } from 'node:timers/promises';

/**
 * Waits `ms` milliseconds. Resolves early, without throwing, once `signal` aborts.
 * @returns false when the wait was cut short by the signal
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return false;
  }
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (error) {
    // the timer's AbortError may come from another realm, so check the signal rather than the error
    if (signal?.aborted) {
      return false;
    }
    throw error;
  }
}

/** Current time as unix seconds */
export function unixSeconds(date: Date = new Date()): number {
  return Math.floor(date.getTime() / 1000);
}
