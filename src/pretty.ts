export const NANOS_PER_MICRO = 1_000n;
export const NANOS_PER_MILLI = 1_000_000n;
export const NANOS_PER_SECOND = 1_000_000_000n;

const MILLIS_PER_SECOND = 1_000n;
const MILLIS_PER_MINUTE = 60n * MILLIS_PER_SECOND;
const MILLIS_PER_HOUR = 60n * MILLIS_PER_MINUTE;
const MILLIS_PER_DAY = 24n * MILLIS_PER_HOUR;

// Largest unit first: days, hours, minutes, seconds
const CLOCK_FACTORS = [
  MILLIS_PER_DAY,
  MILLIS_PER_HOUR,
  MILLIS_PER_MINUTE,
  MILLIS_PER_SECOND,
] as const;

/** Convert a `performance.now()`-style millisecond reading to nanoseconds. */
export function fromMillis(ms: number): bigint {
  if (!Number.isFinite(ms)) {
    throw new RangeError(`Not a finite duration: ${ms}`);
  }
  return BigInt(Math.round(ms * 1_000_000));
}

function toNanos(duration: bigint | number): bigint {
  if (typeof duration === "bigint") return duration;
  if (!Number.isSafeInteger(duration)) {
    throw new RangeError(
      `Duration must be an integer number of nanoseconds, got ${duration}`,
    );
  }
  return BigInt(duration);
}

/** `n / 1000` to three decimals. Exact, since n is already an integer. */
function thousandths(n: bigint): string {
  const sign = n < 0n ? "-" : "";
  const abs = n < 0n ? -n : n;
  const frac = (abs % 1000n).toString().padStart(3, "0");
  return `${sign}${abs / 1000n}.${frac}`;
}

function pad2(n: bigint): string {
  return n.toString().padStart(2, "0");
}

/**
 * Turn a nanosecond duration into a human-readable string, like "37 us",
 * "1.500 ms" or "45 days 08:55:01".
 *
 * Tiers are checked in order and the first match wins. Exact multiples print
 * as integers; everything else gets a fixed 3-digit fraction. From one minute
 * up the value is split into days and HH:MM:SS.
 */
export function pretty(duration: bigint | number): string {
  const ns = toNanos(duration);
  const us = ns / NANOS_PER_MICRO;
  const ms = ns / NANOS_PER_MILLI;
  const s = ns / NANOS_PER_SECOND;

  if (us === 0n && ms === 0n && s === 0n) return `${ns} ns`;
  if (ms === 0n && s === 0n) {
    return ns === us * 1000n ? `${us} us` : `${thousandths(ns)} us`;
  }
  if (s === 0n) {
    return us === ms * 1000n ? `${ms} ms` : `${thousandths(us)} ms`;
  }
  if (s < 60n) {
    return ms === s * 1000n ? `${s} s` : `${thousandths(ms)} s`;
  }

  let rest = ms;
  const parts: bigint[] = [];
  for (const millisPer of CLOCK_FACTORS) {
    parts.push(rest / millisPer);
    rest %= millisPer;
  }

  const [days, hours, minutes, seconds] = parts;
  if (
    days === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return `${ms} ms`;
  }

  const clock = `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
  return days === 0n ? clock : `${days} days ${clock}`;
}
