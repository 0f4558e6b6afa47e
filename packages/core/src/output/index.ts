export { BufferByteSink } from './byte-sink.js';
export type { ByteSink, WriteResult } from './byte-sink.js';
export { FileByteSink } from './file-byte-sink.js';
export type { FileByteSinkOptions } from './file-byte-sink.js';
export { createWritableByteSink } from './writable-byte-sink.js';
export type { WritableByteSinkOptions } from './writable-byte-sink.js';
