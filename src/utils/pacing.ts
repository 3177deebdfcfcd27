import { setTimeout as delay } from 'timers/promises';
import type { DelayRange } from '../config/settings';

export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = async (ms) => {
  if (ms > 0) {
    await delay(ms);
  }
};

export function randomBetween([min, max]: DelayRange): number {
  return min + Math.random() * (max - min);
}

/**
 * Sleep for a random duration inside the range
 */
export function pause(range: DelayRange, sleepFn: SleepFn = sleep): Promise<void> {
  return sleepFn(randomBetween(range));
}

/**
 * A SleepFn that returns early once the signal fires
 */
export function abortableSleep(signal: AbortSignal): SleepFn {
  return async (ms) => {
    if (ms <= 0 || signal.aborted) {
      return;
    }
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (!signal.aborted) {
        throw error;
      }
    }
  };
}
