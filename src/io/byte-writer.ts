/**
 * Growable byte buffer used for every serialization path.
 *
 * Incremental updates start from the previous revision's bytes and append;
 * the buffer doubles on demand and `toBytes()` returns a trimmed copy.
 */

export interface ByteWriterOptions {
  /** Initial buffer size in bytes. Default: 65536 (64KB) */
  initialSize?: number;
}

export class ByteWriter {
  private buffer: Uint8Array;
  private offset = 0;

  /**
   * @param existingBytes - Bytes to start from (the prior revision for incremental saves)
   */
  constructor(existingBytes?: Uint8Array, options: ByteWriterOptions = {}) {
    const initialSize = Math.max(options.initialSize ?? 65536, 16);

    if (existingBytes) {
      this.buffer = new Uint8Array(Math.max(existingBytes.length * 2, initialSize));
      this.buffer.set(existingBytes);
      this.offset = existingBytes.length;
    } else {
      this.buffer = new Uint8Array(initialSize);
    }
  }

  private grow(needed: number): void {
    const requiredSize = this.offset + needed;

    if (requiredSize <= this.buffer.length) {
      return;
    }

    let newSize = this.buffer.length;

    while (newSize < requiredSize) {
      newSize *= 2;
    }

    const newBuffer = new Uint8Array(newSize);

    newBuffer.set(this.buffer.subarray(0, this.offset));
    this.buffer = newBuffer;
  }

  /** Number of bytes written so far, which is also the next write offset. */
  get position(): number {
    return this.offset;
  }

  /** Byte at an already-written position, or -1. */
  byteAt(position: number): number {
    if (position < 0 || position >= this.offset) {
      return -1;
    }

    return this.buffer[position];
  }

  writeByte(b: number): void {
    this.grow(1);
    this.buffer[this.offset++] = b;
  }

  writeBytes(data: Uint8Array): void {
    this.grow(data.length);
    this.buffer.set(data, this.offset);
    this.offset += data.length;
  }

  /**
   * Write a string known to be ASCII (keywords, numbers, names).
   */
  writeAscii(str: string): void {
    this.grow(str.length);

    for (let i = 0; i < str.length; i++) {
      this.buffer[this.offset++] = str.charCodeAt(i);
    }
  }

  writeUtf8(str: string): void {
    this.writeBytes(new TextEncoder().encode(str));
  }

  /**
   * Trimmed copy of everything written. The writer stays usable.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.offset);
  }
}
