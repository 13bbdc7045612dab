import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source for waits the supervisors perform.
 * Tests swap in a virtual clock so timing can be asserted without real delays.
 */
export interface Clock {
  now: () => number;
  /** Rejects with the signal's reason when aborted. */
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number, signal?: AbortSignal): Promise<void> => {
    if (ms <= 0) {
      signal?.throwIfAborted();
      return;
    }
    await delay(ms, undefined, { signal });
  },
};
