import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileByteSink } from './file-byte-sink.js';

const encoder = new TextEncoder();

describe('FileByteSink', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), 'jobtrail-file-sink-'));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it('creates missing directories and appends each line', async () => {
    const filePath = path.join(workspace, 'logs', 'jobs.log');
    const sink = new FileByteSink(filePath);

    expect(sink.write(encoder.encode('first\n'))).toEqual({ bytesWritten: 6 });
    sink.write(encoder.encode('second\n'));
    sink.close();

    await expect(readFile(filePath, 'utf8')).resolves.toBe('first\nsecond\n');
  });

  it('keeps existing file contents', async () => {
    const filePath = path.join(workspace, 'jobs.log');
    await writeFile(filePath, 'existing\n');
    const sink = new FileByteSink(filePath);

    sink.write(encoder.encode('appended\n'));
    sink.close();

    await expect(readFile(filePath, 'utf8')).resolves.toBe('existing\nappended\n');
  });

  it('returns an error result once closed', () => {
    const filePath = path.join(workspace, 'jobs.log');
    const sink = new FileByteSink(filePath);
    sink.close();
    sink.close();

    const result = sink.write(encoder.encode('late\n'));

    expect(sink.closed).toBe(true);
    expect(result.bytesWritten).toBe(0);
    expect(result.error?.message).toBe(`File sink for ${filePath} is closed`);
  });
});
