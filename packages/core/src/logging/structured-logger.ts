import { type Clock, formatTimestamp, systemClock } from '../formatting/timestamp.js';

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: DiagnosticLevel;
  readonly name: string;
  readonly event: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Side channel for problems the sinks absorb instead of raising, such as failed writes.
 */
export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

/**
 * Minimal interface describing a writable text target, such as `process.stderr`.
 */
export interface WritableTarget {
  write(line: string): void;
}

/**
 * Writes each diagnostic entry as one JSON document per line, stamped with the same
 * nanosecond RFC 3339 timestamps the event lines carry.
 */
export class JsonLineLogger implements StructuredLogger {
  constructor(
    private readonly target: WritableTarget,
    private readonly clock: Clock = systemClock,
  ) {}

  log(entry: StructuredLogEvent): void {
    const document = { ...entry, timestamp: formatTimestamp(this.clock.now()) };
    this.target.write(`${JSON.stringify(document)}\n`);
  }
}

/** Default diagnostics of a `WriterSink`: entries are discarded. */
export const noopLogger: StructuredLogger = Object.freeze({
  log: (): void => undefined,
});
