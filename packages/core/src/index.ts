export {
  createWriterSink,
  parseWriterSinkConfig,
  writerSinkConfigSchema,
  type WriterSinkConfig,
  type WriterSinkConfigInput,
  type WriterSinkOverrides,
} from './config/index.js';

export {
  WriterSinkConfigError,
  serialiseError,
  toError,
  type SerialisedError,
} from './errors/index.js';

export {
  COMPLETION_STATUSES,
  LEVEL_METADATA_KEY,
  completionStatusToString,
  isCompletionStatus,
  parseCompletionStatus,
  type CompletionStatus,
  type EventMetadata,
  type EventSink,
} from './events/index.js';

export { shouldLog } from './filtering/index.js';

export {
  createSystemClock,
  formatEventLine,
  formatMetadata,
  formatNanoseconds,
  formatTimestamp,
  systemClock,
  toNanoseconds,
  type Clock,
  type CompletionEventRecord,
  type ErroredEventRecord,
  type EventRecord,
  type PlainEventRecord,
  type TimingEventRecord,
} from './formatting/index.js';

export {
  LOG_LEVELS,
  compareLogLevels,
  isLevelEnabled,
  isLogLevel,
  logLevelToString,
  parseLogLevel,
  type LogLevel,
} from './levels/index.js';

export {
  JsonLineLogger,
  noopLogger,
  type DiagnosticLevel,
  type StructuredLogEvent,
  type StructuredLogger,
  type WritableTarget,
} from './logging/index.js';

export {
  BufferByteSink,
  FileByteSink,
  createWritableByteSink,
  type ByteSink,
  type FileByteSinkOptions,
  type WritableByteSinkOptions,
  type WriteResult,
} from './output/index.js';

export { DEFAULT_LOG_LEVEL, WriterSink, type WriterSinkOptions } from './sinks/index.js';
