import { setTimeout as delay } from 'timers/promises';

/**
 * Waits for the given number of seconds. Injected into the retry policy and
 * the slot runner so tests never wait on a real timer.
 */
export type Sleep = (seconds: number) => Promise<void>;

export const sleepSeconds: Sleep = async (seconds: number): Promise<void> => {
  if (seconds <= 0) {
    return;
  }
  await delay(seconds * 1000);
};
