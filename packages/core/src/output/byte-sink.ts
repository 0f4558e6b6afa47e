/**
 * Outcome of handing one chunk to a byte sink. `bytesWritten` smaller than the chunk
 * length, or a present `error`, marks a failed write.
 */
export interface WriteResult {
  readonly bytesWritten: number;
  readonly error?: Error | undefined;
}

/**
 * Destination for rendered lines. Each call receives one complete line; implementations
 * report failures through the result rather than by throwing.
 */
export interface ByteSink {
  write(bytes: Uint8Array): WriteResult;
}

/**
 * In-memory byte sink that accumulates every chunk it receives.
 */
export class BufferByteSink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private size = 0;
  private readonly decoder = new TextDecoder();

  get length(): number {
    return this.size;
  }

  /** Number of write calls received since construction or the last reset. */
  get writeCount(): number {
    return this.chunks.length;
  }

  write(bytes: Uint8Array): WriteResult {
    this.chunks.push(bytes.slice());
    this.size += bytes.byteLength;
    return { bytesWritten: bytes.byteLength };
  }

  bytes(): Uint8Array {
    const combined = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      combined.set(chunk, offset);
      offset += chunk.byteLength;
    }
    return combined;
  }

  toString(): string {
    return this.decoder.decode(this.bytes());
  }

  reset(): void {
    this.chunks = [];
    this.size = 0;
  }
}
