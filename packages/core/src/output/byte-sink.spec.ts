import { describe, expect, it } from 'vitest';

import { BufferByteSink } from './byte-sink.js';

const encoder = new TextEncoder();

describe('BufferByteSink', () => {
  it('accumulates written chunks in order', () => {
    const sink = new BufferByteSink();

    expect(sink.write(encoder.encode('first\n'))).toEqual({ bytesWritten: 6 });
    sink.write(encoder.encode('second\n'));

    expect(sink.toString()).toBe('first\nsecond\n');
    expect(sink.length).toBe(13);
    expect(sink.writeCount).toBe(2);
  });

  it('counts bytes rather than characters', () => {
    const sink = new BufferByteSink();

    sink.write(encoder.encode('12 μs'));

    expect(sink.length).toBe(6);
    expect(sink.toString()).toBe('12 μs');
  });

  it('copies chunks so later mutation of the caller buffer is not observed', () => {
    const sink = new BufferByteSink();
    const chunk = encoder.encode('abc');

    sink.write(chunk);
    chunk[0] = 120;

    expect(sink.toString()).toBe('abc');
  });

  it('discards its contents on reset', () => {
    const sink = new BufferByteSink();
    sink.write(encoder.encode('line\n'));

    sink.reset();

    expect(sink.length).toBe(0);
    expect(sink.writeCount).toBe(0);
    expect(sink.toString()).toBe('');
  });
});
