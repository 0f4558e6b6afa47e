/**
 * Severity levels in ascending order. The position of a level in this list is its rank:
 * a level with a higher rank is more severe and passes every threshold below it.
 */
export const LOG_LEVELS = Object.freeze(['trace', 'debug', 'info', 'error'] as const);

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  trace: 0,
  debug: 1,
  info: 2,
  error: 3,
});

/**
 * Returns the canonical lowercase text of a severity level.
 *
 * @param level - Level to render.
 * @returns The text used both in emitted lines and in the `level` metadata override.
 */
export function logLevelToString(level: LogLevel): string {
  return level;
}

/**
 * Narrows untrusted input to a {@link LogLevel}. Matching is exact; use
 * {@link parseLogLevel} for user supplied text.
 *
 * @param value - Candidate value.
 * @returns `true` when the value is one of the canonical level strings.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Parses severity text case-insensitively, ignoring surrounding whitespace.
 *
 * @param text - Text to interpret, such as the value of a `level` metadata entry.
 * @returns The matching level, or `undefined` when the text names no level.
 */
export function parseLogLevel(text: string): LogLevel | undefined {
  const candidate = text.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : undefined;
}

/**
 * Orders two levels by severity.
 *
 * @returns A negative number when `left` is less severe than `right`, zero when equal,
 * and a positive number otherwise.
 */
export function compareLogLevels(left: LogLevel, right: LogLevel): number {
  return LEVEL_RANK[left] - LEVEL_RANK[right];
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return compareLogLevels(level, threshold) >= 0;
}
