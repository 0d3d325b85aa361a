import { performance } from 'node:perf_hooks';

/**
 * Time source for the engine. `now()` is a monotonic millisecond reading used
 * for every duration; `date()` is the wall clock used for result timestamps.
 */
export interface Clock {
  now(): number;
  date(): Date;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  date: () => new Date(),
};
