/**
 * Terminal outcomes a job can report. Each value doubles as the canonical text written
 * after `status:` in completion lines.
 */
export const COMPLETION_STATUSES = Object.freeze([
  'success',
  'validation_error',
  'panic',
  'error',
  'junk',
] as const);

export type CompletionStatus = (typeof COMPLETION_STATUSES)[number];

const KNOWN_STATUSES: ReadonlySet<string> = new Set<string>(COMPLETION_STATUSES);

export function completionStatusToString(status: CompletionStatus): string {
  return status;
}

export function isCompletionStatus(value: unknown): value is CompletionStatus {
  return typeof value === 'string' && KNOWN_STATUSES.has(value);
}

/**
 * Parses completion status text case-insensitively.
 *
 * @param text - Candidate status text.
 * @returns The matching status, or `undefined` when the text is not a known outcome.
 */
export function parseCompletionStatus(text: string): CompletionStatus | undefined {
  const candidate = text.trim().toLowerCase();
  return isCompletionStatus(candidate) ? candidate : undefined;
}
