import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import path from 'node:path';

import { toError } from '../errors/index.js';

import type { ByteSink, WriteResult } from './byte-sink.js';

export interface FileByteSinkOptions {
  /** Creates missing parent directories before opening the file. Defaults to `true`. */
  readonly createDirectories?: boolean;
  /** Permission bits used when the file is created. */
  readonly mode?: number;
}

/**
 * Appends lines to a file through a single synchronous `write` per line. The descriptor
 * is opened in append mode, so each line lands at the end of the file even when other
 * processes append to it as well.
 */
export class FileByteSink implements ByteSink {
  private fd: number | undefined;

  constructor(
    readonly filePath: string,
    options: FileByteSinkOptions = {},
  ) {
    if (options.createDirectories ?? true) {
      mkdirSync(path.dirname(filePath), { recursive: true });
    }
    this.fd = openSync(filePath, 'a', options.mode ?? 0o666);
  }

  get closed(): boolean {
    return this.fd === undefined;
  }

  write(bytes: Uint8Array): WriteResult {
    if (this.fd === undefined) {
      return { bytesWritten: 0, error: new Error(`File sink for ${this.filePath} is closed`) };
    }

    try {
      return { bytesWritten: writeSync(this.fd, bytes) };
    } catch (error) {
      return { bytesWritten: 0, error: toError(error) };
    }
  }

  close(): void {
    if (this.fd === undefined) {
      return;
    }
    const fd = this.fd;
    this.fd = undefined;
    closeSync(fd);
  }
}
