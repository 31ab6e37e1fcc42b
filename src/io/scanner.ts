/**
 * Forward-only cursor over an in-memory PDF file.
 *
 * Every parser in this package reads through a Scanner so positions stay
 * absolute byte offsets into the original buffer, which is what xref
 * entries, `/ByteRange` and `startxref` all speak.
 */
export class Scanner {
  private offset = 0;

  constructor(readonly bytes: Uint8Array) {}

  /** Current absolute position. */
  get position(): number {
    return this.offset;
  }

  get length(): number {
    return this.bytes.length;
  }

  /** True once the cursor has passed the last byte. */
  get atEnd(): boolean {
    return this.offset >= this.bytes.length;
  }

  /**
   * Byte at the cursor without consuming it, or -1 at end of input.
   */
  peek(): number {
    return this.peekAt(this.offset);
  }

  /**
   * Byte at an absolute position, or -1 when out of range.
   */
  peekAt(position: number): number {
    if (position < 0 || position >= this.bytes.length) {
      return -1;
    }

    return this.bytes[position];
  }

  /**
   * Consume one byte and return it, or -1 at end of input.
   */
  advance(): number {
    const byte = this.peek();

    if (byte !== -1) {
      this.offset++;
    }

    return byte;
  }

  /**
   * Jump to an absolute position (clamped to the buffer).
   */
  moveTo(position: number): void {
    this.offset = Math.max(0, Math.min(position, this.bytes.length));
  }

  /**
   * Whether the bytes at `position` spell out `text` (ASCII).
   */
  matchesAt(position: number, text: string): boolean {
    if (position < 0 || position + text.length > this.bytes.length) {
      return false;
    }

    for (let i = 0; i < text.length; i++) {
      if (this.bytes[position + i] !== text.charCodeAt(i)) {
        return false;
      }
    }

    return true;
  }
}
