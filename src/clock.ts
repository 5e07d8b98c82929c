/**
 * Source of monotonic nanosecond instants. Every timing operation reads time
 * only through one of these, so tests can hand in a scripted sequence.
 */
export interface Clock {
  /** Current instant in nanoseconds. Never decreases within a process. */
  now(): bigint;
}

/** Default clock: `process.hrtime.bigint()`, immune to wall-clock changes. */
export const systemClock: Clock = {
  now: () => process.hrtime.bigint(),
};

/**
 * Deterministic clock that replays `ticks` in order, then keeps returning the
 * last one.
 */
export function sequenceClock(...ticks: Array<bigint | number>): Clock {
  if (ticks.length === 0) {
    throw new RangeError("sequenceClock needs at least one tick");
  }
  const values = ticks.map((t) => BigInt(t));
  let index = 0;

  return {
    now(): bigint {
      const value = values[Math.min(index, values.length - 1)];
      index++;
      return value;
    },
  };
}
