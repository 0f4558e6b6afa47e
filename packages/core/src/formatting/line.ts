import {
  completionStatusToString,
  type CompletionStatus,
  type EventMetadata,
} from '../events/index.js';

import { formatNanoseconds } from './duration.js';
import { formatMetadata } from './metadata.js';

const LINE_TERMINATOR = '\n';

interface EventRecordBase {
  readonly job: string;
  readonly metadata?: EventMetadata | undefined;
}

export interface PlainEventRecord extends EventRecordBase {
  readonly kind: 'event';
  readonly event: string;
}

export interface ErroredEventRecord extends EventRecordBase {
  readonly kind: 'event-error';
  readonly event: string;
  readonly error: Error;
}

export interface TimingEventRecord extends EventRecordBase {
  readonly kind: 'timing';
  readonly event: string;
  readonly nanos: number | bigint;
}

export interface CompletionEventRecord extends EventRecordBase {
  readonly kind: 'complete';
  readonly status: CompletionStatus;
  readonly nanos: number | bigint;
}

export type EventRecord =
  | PlainEventRecord
  | ErroredEventRecord
  | TimingEventRecord
  | CompletionEventRecord;

/**
 * Renders a record as a single newline-terminated line:
 *
 *   [2024-01-01T00:00:00.5Z]: job:import event:fetch err:timeout kvs:[host:a]
 *   [2024-01-01T00:00:00.5Z]: job:import status:success time:34 ms
 *
 * Job names, event names, error text and metadata are written verbatim.
 *
 * @param record - Event to render.
 * @param timestamp - Preformatted timestamp placed between the brackets.
 */
export function formatEventLine(record: EventRecord, timestamp: string): string {
  return `[${timestamp}]: job:${record.job}${formatBody(record)}${formatMetadata(record.metadata)}${LINE_TERMINATOR}`;
}

function formatBody(record: EventRecord): string {
  switch (record.kind) {
    case 'event': {
      return ` event:${record.event}`;
    }
    case 'event-error': {
      return ` event:${record.event} err:${record.error.message}`;
    }
    case 'timing': {
      return ` event:${record.event} time:${formatNanoseconds(record.nanos)}`;
    }
    case 'complete': {
      return ` status:${completionStatusToString(record.status)} time:${formatNanoseconds(record.nanos)}`;
    }
    default: {
      throw new Error('Unsupported event record kind');
    }
  }
}
