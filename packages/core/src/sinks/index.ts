export { DEFAULT_LOG_LEVEL, WriterSink } from './writer-sink.js';
export type { WriterSinkOptions } from './writer-sink.js';
