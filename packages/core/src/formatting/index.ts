export { formatNanoseconds, toNanoseconds } from './duration.js';
export { formatEventLine } from './line.js';
export type {
  CompletionEventRecord,
  ErroredEventRecord,
  EventRecord,
  PlainEventRecord,
  TimingEventRecord,
} from './line.js';
export { formatMetadata } from './metadata.js';
export { createSystemClock, formatTimestamp, systemClock } from './timestamp.js';
export type { Clock } from './timestamp.js';
