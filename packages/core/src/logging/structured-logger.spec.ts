import { describe, expect, it, vi } from 'vitest';

import type { Clock } from '../formatting/index.js';

import { JsonLineLogger, noopLogger } from './structured-logger.js';

describe('JsonLineLogger', () => {
  it('serialises diagnostic entries as newline-delimited JSON', () => {
    const clock: Clock = { now: () => 1_704_067_200_000_000_000n };
    const write = vi.fn();
    const logger = new JsonLineLogger({ write }, clock);

    const entry = {
      level: 'error',
      name: 'writer-sink',
      event: 'sink.write.failed',
      data: { job: 'import', bytesWritten: 0 },
    } as const;

    logger.log(entry);

    expect(write).toHaveBeenCalledWith(
      '{"level":"error","name":"writer-sink","event":"sink.write.failed","data":{"job":"import","bytesWritten":0},"timestamp":"2024-01-01T00:00:00Z"}\n',
    );
  });

  it('stamps each entry with a fresh nanosecond timestamp', () => {
    const now = vi
      .fn<() => bigint>()
      .mockReturnValueOnce(1_704_067_200_000_000_001n)
      .mockReturnValueOnce(1_704_067_200_000_000_002n);
    const lines: string[] = [];
    const logger = new JsonLineLogger({ write: (line) => lines.push(line) }, { now });

    logger.log({ level: 'warn', name: 'writer-sink', event: 'first' });
    logger.log({ level: 'warn', name: 'writer-sink', event: 'second' });

    expect(lines).toEqual([
      '{"level":"warn","name":"writer-sink","event":"first","timestamp":"2024-01-01T00:00:00.000000001Z"}\n',
      '{"level":"warn","name":"writer-sink","event":"second","timestamp":"2024-01-01T00:00:00.000000002Z"}\n',
    ]);
  });
});

describe('noopLogger', () => {
  it('ignores log entries', () => {
    expect(() => noopLogger.log({ level: 'debug', name: 'noop', event: 'ignored' })).not.toThrow();
  });
});
