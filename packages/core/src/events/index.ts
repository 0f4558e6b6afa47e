export {
  COMPLETION_STATUSES,
  completionStatusToString,
  isCompletionStatus,
  parseCompletionStatus,
} from './completion-status.js';
export type { CompletionStatus } from './completion-status.js';
export { LEVEL_METADATA_KEY } from './event-sink.js';
export type { EventMetadata, EventSink } from './event-sink.js';
