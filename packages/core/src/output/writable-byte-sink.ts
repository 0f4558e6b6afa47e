import type { Writable } from 'node:stream';

import { toError } from '../errors/index.js';

import type { ByteSink, WriteResult } from './byte-sink.js';

export interface WritableByteSinkOptions {
  /** Receives `error` events the stream emits after a write call has returned. */
  readonly onError?: (error: Error) => void;
}

/**
 * Adapts a Node.js writable stream, such as `process.stdout` or a socket, to a byte sink.
 *
 * Every line becomes exactly one `stream.write` call. Node streams report most failures
 * asynchronously, so the returned result only reflects synchronous failures. The adapter
 * listens for the stream's `error` event, which keeps a broken pipe from surfacing as an
 * uncaught exception, and hands those errors to `onError`.
 */
export function createWritableByteSink(
  stream: Writable,
  options: WritableByteSinkOptions = {},
): ByteSink {
  const { onError } = options;

  stream.on('error', (error: Error) => {
    onError?.(error);
  });

  return {
    write(bytes: Uint8Array): WriteResult {
      if (stream.destroyed || stream.writableEnded) {
        return { bytesWritten: 0, error: new Error('Cannot write to a closed stream') };
      }

      try {
        stream.write(bytes);
      } catch (error) {
        return { bytesWritten: 0, error: toError(error) };
      }

      return { bytesWritten: bytes.byteLength };
    },
  };
}
