import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "./pdf-object";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Array object, e.g. `[0 0 612 792]` or `[3 0 R 7 0 R]`.
 */
export class PdfArray implements PdfPrimitive {
  private items: PdfObject[];

  constructor(items: Iterable<PdfObject> = []) {
    this.items = [...items];
  }

  get type(): "array" {
    return "array";
  }

  static of(...items: PdfObject[]): PdfArray {
    return new PdfArray(items);
  }

  get length(): number {
    return this.items.length;
  }

  /**
   * Item at `index` (negative counts from the end), or undefined.
   */
  at(index: number): PdfObject | undefined {
    return this.items.at(index);
  }

  push(...values: PdfObject[]): void {
    this.items.push(...values);
  }

  *[Symbol.iterator](): Iterator<PdfObject> {
    yield* this.items;
  }

  toArray(): PdfObject[] {
    return [...this.items];
  }

  /**
   * Shallow copy; items are shared.
   */
  clone(): PdfArray {
    return new PdfArray(this.items);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("[");

    this.items.forEach((item, i) => {
      if (i > 0) {
        writer.writeAscii(" ");
      }

      item.toBytes(writer);
    });

    writer.writeAscii("]");
  }
}
