import { serialiseError, toError } from '../errors/index.js';
import type { CompletionStatus, EventMetadata, EventSink } from '../events/index.js';
import { shouldLog } from '../filtering/index.js';
import {
  formatEventLine,
  formatTimestamp,
  systemClock,
  type Clock,
  type EventRecord,
} from '../formatting/index.js';
import type { LogLevel } from '../levels/index.js';
import { noopLogger, type StructuredLogger } from '../logging/index.js';
import type { ByteSink, WriteResult } from '../output/index.js';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export interface WriterSinkOptions {
  readonly output: ByteSink;
  /** Events tagged with a lower `level` metadata entry are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  readonly clock?: Clock;
  /** Receives a `sink.write.failed` entry whenever the output rejects a line. */
  readonly diagnostics?: StructuredLogger;
}

/**
 * Writes events as human readable lines, one write call per line.
 *
 * ```ts
 * const sink = new WriterSink({ output: createWritableByteSink(process.stdout) });
 * sink.emitTiming('import', 'fetch', 1_204_000, { host: 'db-1' });
 * // [2024-01-01T00:00:00.123456789Z]: job:import event:fetch time:1204 μs kvs:[host:db-1]
 * ```
 *
 * Output failures never reach the caller; they are reported to the diagnostic logger.
 */
export class WriterSink implements EventSink {
  readonly level: LogLevel;
  private readonly output: ByteSink;
  private readonly clock: Clock;
  private readonly diagnostics: StructuredLogger;
  private readonly encoder = new TextEncoder();

  constructor(options: WriterSinkOptions) {
    this.output = options.output;
    this.level = options.level ?? DEFAULT_LOG_LEVEL;
    this.clock = options.clock ?? systemClock;
    this.diagnostics = options.diagnostics ?? noopLogger;
  }

  shouldLog(metadata?: EventMetadata): boolean {
    return shouldLog(metadata, this.level);
  }

  emitEvent(job: string, event: string, metadata?: EventMetadata): void {
    if (!this.shouldLog(metadata)) {
      return;
    }
    this.write({ kind: 'event', job, event, metadata });
  }

  /**
   * Writes an event annotated with `error.message`.
   *
   * @throws {TypeError} When `error` is missing, before anything is filtered or written.
   */
  emitEventErr(job: string, event: string, error: Error, metadata?: EventMetadata): void {
    if (error === null || error === undefined) {
      throw new TypeError(`emitEventErr requires an error for ${job}/${event}`);
    }
    if (!this.shouldLog(metadata)) {
      return;
    }
    this.write({ kind: 'event-error', job, event, error, metadata });
  }

  emitTiming(job: string, event: string, nanos: number | bigint, metadata?: EventMetadata): void {
    if (!this.shouldLog(metadata)) {
      return;
    }
    this.write({ kind: 'timing', job, event, nanos, metadata });
  }

  emitComplete(
    job: string,
    status: CompletionStatus,
    nanos: number | bigint,
    metadata?: EventMetadata,
  ): void {
    if (!this.shouldLog(metadata)) {
      return;
    }
    this.write({ kind: 'complete', job, status, nanos, metadata });
  }

  private write(record: EventRecord): void {
    const line = formatEventLine(record, formatTimestamp(this.clock.now()));
    const bytes = this.encoder.encode(line);

    let result: WriteResult;
    try {
      result = this.output.write(bytes);
    } catch (error) {
      result = { bytesWritten: 0, error: toError(error) };
    }

    if (result.error !== undefined || result.bytesWritten < bytes.byteLength) {
      this.reportWriteFailure(record, bytes.byteLength, result);
    }
  }

  private reportWriteFailure(record: EventRecord, expected: number, result: WriteResult): void {
    try {
      this.diagnostics.log({
        level: 'error',
        name: 'writer-sink',
        event: 'sink.write.failed',
        data: {
          job: record.job,
          kind: record.kind,
          expectedBytes: expected,
          bytesWritten: result.bytesWritten,
          error: serialiseError(result.error ?? new Error('Short write')),
        },
      });
    } catch {
      // A failing diagnostic logger is dropped like the write failure it reports.
    }
  }
}
