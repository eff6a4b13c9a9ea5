import type { Clock } from '../types.js';

export type ManualClock = {
  now: Clock;
  set: (ms: number) => void;
  advance: (ms: number) => number;
};

export function createManualClock(startMs = 0): ManualClock {
  let current = startMs;
  return {
    now: () => current,
    set: ms => {
      current = ms;
    },
    advance: ms => {
      current += ms;
      return current;
    }
  };
}
