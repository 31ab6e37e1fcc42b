import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * The `null` keyword. Singleton.
 */
export class PdfNull implements PdfPrimitive {
  static readonly instance = new PdfNull();

  private constructor() {}

  get type(): "null" {
    return "null";
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii("null");
  }
}
