const NANOS_PER_MICROSECOND = 1000n;
const NANOS_PER_MILLISECOND = 1_000_000n;

const MICROSECOND_THRESHOLD = 2000n;
const MILLISECOND_THRESHOLD = 2_000_000n;

/**
 * Normalises a nanosecond count to a bigint, dropping any fractional part of a number.
 *
 * @param nanos - Elapsed nanoseconds, such as a difference of `performance.now()` readings
 * scaled to nanoseconds.
 * @returns The whole nanoseconds as a bigint.
 * @throws {RangeError} When a number input is `NaN` or infinite.
 */
export function toNanoseconds(nanos: number | bigint): bigint {
  if (typeof nanos === 'bigint') {
    return nanos;
  }
  if (!Number.isFinite(nanos)) {
    throw new RangeError(`Expected a finite nanosecond count, received ${String(nanos)}`);
  }
  return BigInt(Math.trunc(nanos));
}

/**
 * Renders an elapsed time as milliseconds above 2,000,000 ns, microseconds above
 * 2,000 ns and nanoseconds otherwise. Division truncates toward zero. `NaN` and
 * infinite counts are written as-is in nanoseconds.
 *
 *   formatNanoseconds(34567890) === '34 ms'
 *   formatNanoseconds(1204000)  === '1204 μs'
 *   formatNanoseconds(500)      === '500 ns'
 */
export function formatNanoseconds(nanos: number | bigint): string {
  if (typeof nanos === 'number' && !Number.isFinite(nanos)) {
    return `${String(nanos)} ns`;
  }
  const value = toNanoseconds(nanos);

  if (value > MILLISECOND_THRESHOLD) {
    return `${(value / NANOS_PER_MILLISECOND).toString(10)} ms`;
  }
  if (value > MICROSECOND_THRESHOLD) {
    return `${(value / NANOS_PER_MICROSECOND).toString(10)} μs`;
  }
  return `${value.toString(10)} ns`;
}
