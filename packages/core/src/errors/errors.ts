/** JSON-safe shape of a failure as it appears in `sink.write.failed` diagnostics. */
export interface SerialisedError {
  readonly name: string;
  readonly message: string;
  readonly stack?: string;
  readonly cause?: SerialisedError;
}

/**
 * Flattens a write failure into a `SerialisedError`, following the `cause` chain that
 * `toError` and Node's own errors attach. A cause already seen higher in the chain ends it.
 */
export function serialiseError(error: unknown): SerialisedError {
  return serialiseWithin(error, new Set());
}

function serialiseWithin(error: unknown, seen: Set<unknown>): SerialisedError {
  if (!(error instanceof Error)) {
    return { name: 'UnknownError', message: String(error) };
  }

  seen.add(error);
  const { cause } = error;
  return {
    name: error.name,
    message: error.message,
    ...(error.stack ? { stack: error.stack } : {}),
    ...(cause === undefined || seen.has(cause) ? {} : { cause: serialiseWithin(cause, seen) }),
  };
}

/**
 * Wraps thrown values that are not `Error` instances so they can travel through
 * `WriteResult.error`.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error), { cause: error });
}

/**
 * A configuration record that failed validation. `issues` holds one `path: message`
 * string per problem.
 */
export class WriterSinkConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid writer sink configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'WriterSinkConfigError';
    this.issues = Object.freeze([...issues]);
  }
}
