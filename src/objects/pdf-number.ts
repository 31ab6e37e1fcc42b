import { formatPdfNumber } from "#src/helpers/format";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Integer or real. Reals are written with at most five decimals.
 */
export class PdfNumber implements PdfPrimitive {
  constructor(readonly value: number) {}

  get type(): "number" {
    return "number";
  }

  static of(value: number): PdfNumber {
    return new PdfNumber(value);
  }

  isInteger(): boolean {
    return Number.isInteger(this.value);
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(formatPdfNumber(this.value));
  }
}
