const NANOS_PER_MILLISECOND = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

/** Source of the current instant as nanoseconds since the Unix epoch. */
export interface Clock {
  now(): bigint;
}

/**
 * Creates a clock that reads the wall clock on every call and fills the digits below
 * one millisecond from the high-resolution timer, which `Date` does not provide.
 */
export function createSystemClock(): Clock {
  return {
    now: () =>
      BigInt(Date.now()) * NANOS_PER_MILLISECOND +
      (process.hrtime.bigint() % NANOS_PER_MILLISECOND),
  };
}

export const systemClock: Clock = createSystemClock();

/**
 * Formats an instant as an RFC 3339 UTC timestamp with up to nine fractional digits.
 * Trailing zeros of the fraction are dropped, and so is the dot when nothing is left.
 *
 *   formatTimestamp(1704067200123450000n) === '2024-01-01T00:00:00.12345Z'
 *   formatTimestamp(1704067200000000000n) === '2024-01-01T00:00:00Z'
 *
 * @param epochNanos - Nanoseconds since the Unix epoch.
 */
export function formatTimestamp(epochNanos: bigint): string {
  let seconds = epochNanos / NANOS_PER_SECOND;
  let fraction = epochNanos % NANOS_PER_SECOND;
  if (fraction < 0n) {
    seconds -= 1n;
    fraction += NANOS_PER_SECOND;
  }

  const wholeSeconds = new Date(Number(seconds) * 1000).toISOString().replace(/\.\d{3}Z$/, '');
  const digits = fraction.toString(10).padStart(9, '0').replace(/0+$/, '');

  return digits.length === 0 ? `${wholeSeconds}Z` : `${wholeSeconds}.${digits}Z`;
}
