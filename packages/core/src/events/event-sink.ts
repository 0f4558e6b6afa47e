import type { CompletionStatus } from './completion-status.js';

/**
 * Free-form annotations attached to a single emission. `undefined` means the caller
 * attached nothing, which is rendered differently from an empty record.
 */
export type EventMetadata = Readonly<Record<string, string>>;

/** Metadata key whose value, when it names a level, decides whether an event is kept. */
export const LEVEL_METADATA_KEY = 'level';

/**
 * Output backend contract for job instrumentation. A dispatch facility fans each call
 * out to every attached sink; implementations must not throw on output failures.
 */
export interface EventSink {
  emitEvent(job: string, event: string, metadata?: EventMetadata): void;
  emitEventErr(job: string, event: string, error: Error, metadata?: EventMetadata): void;
  emitTiming(job: string, event: string, nanos: number | bigint, metadata?: EventMetadata): void;
  emitComplete(
    job: string,
    status: CompletionStatus,
    nanos: number | bigint,
    metadata?: EventMetadata,
  ): void;
}
