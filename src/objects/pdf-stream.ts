import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "./pdf-dict";
import { PdfName } from "./pdf-name";
import type { PdfObject } from "./pdf-object";

const LENGTH = PdfName.of("Length");

/**
 * Stream object: a dictionary followed by `stream ... endstream`.
 *
 * The data is kept exactly as stored in the file (still encoded); this
 * package never decodes stream content. `/Length` is always rewritten
 * from the data on output.
 */
export class PdfStream extends PdfDict {
  constructor(
    entries?: Iterable<[PdfName | string, PdfObject]>,
    readonly data: Uint8Array = new Uint8Array(0),
  ) {
    super(entries);
  }

  override get type(): "stream" {
    return "stream";
  }

  static fromDict(entries: Record<string, PdfObject>, data?: Uint8Array): PdfStream {
    return new PdfStream(Object.entries(entries), data);
  }

  override clone(): PdfStream {
    return new PdfStream(this, this.data);
  }

  override toBytes(writer: ByteWriter): void {
    writer.writeAscii(`<<\n/Length ${this.data.length}\n`);
    this.writeEntries(writer, LENGTH);
    writer.writeAscii(">>\nstream\n");
    writer.writeBytes(this.data);
    writer.writeAscii("\nendstream");
  }
}
