export {
  createWriterSink,
  parseWriterSinkConfig,
  writerSinkConfigSchema,
} from './writer-sink-config.js';
export type {
  WriterSinkConfig,
  WriterSinkConfigInput,
  WriterSinkOverrides,
} from './writer-sink-config.js';
