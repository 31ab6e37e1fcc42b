import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

/**
 * Indirect reference `N G R`.
 *
 * Interned, so two refs to the same object compare with `===` and can be
 * used as Map keys: `PdfRef.of(5) === PdfRef.of(5, 0)`.
 */
export class PdfRef implements PdfPrimitive {
  private static cache = new Map<string, PdfRef>();

  private constructor(
    readonly objectNumber: number,
    readonly generation: number,
  ) {}

  get type(): "ref" {
    return "ref";
  }

  static of(objectNumber: number, generation = 0): PdfRef {
    const key = `${objectNumber} ${generation}`;
    let ref = PdfRef.cache.get(key);

    if (!ref) {
      ref = new PdfRef(objectNumber, generation);
      PdfRef.cache.set(key, ref);
    }

    return ref;
  }

  toString(): string {
    return `${this.objectNumber} ${this.generation} R`;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(this.toString());
  }
}
