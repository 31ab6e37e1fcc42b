import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Pre-formatted PDF syntax written verbatim.
 *
 * Reserves a fixed-width slot that is patched in place after the
 * surrounding revision has been written, such as the
 * `[0 ********** ********** **********]` `/ByteRange` placeholder.
 * Never produced by the parser.
 */
export class PdfRaw implements PdfPrimitive {
  constructor(readonly text: string) {}

  get type(): "raw" {
    return "raw";
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.text);
  }
}
