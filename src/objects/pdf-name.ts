import { CHAR_HASH, DELIMITERS, WHITESPACE } from "#src/helpers/chars";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

const NEEDS_ESCAPE = new Set([...WHITESPACE, ...DELIMITERS, CHAR_HASH]);

/**
 * Write a name body, escaping as `#XX` every byte outside `!`..`~` plus
 * whitespace, delimiters and `#` itself (PDF 1.7, 7.3.5).
 */
function escapeName(name: string): string {
  let out = "";

  for (const byte of new TextEncoder().encode(name)) {
    if (byte < 0x21 || byte > 0x7e || NEEDS_ESCAPE.has(byte)) {
      out += `#${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    } else {
      out += String.fromCharCode(byte);
    }
  }

  return out;
}

/**
 * Name object such as `/Type` or `/Sig`, stored without the slash.
 *
 * Interned: `PdfName.of("Sig") === PdfName.Sig`, which lets dictionaries
 * key their entries by identity.
 */
export class PdfName implements PdfPrimitive {
  private static cache = new Map<string, PdfName>();

  private constructor(readonly value: string) {}

  get type(): "name" {
    return "name";
  }

  static of(name: string): PdfName {
    let cached = PdfName.cache.get(name);

    if (!cached) {
      cached = new PdfName(name);
      PdfName.cache.set(name, cached);
    }

    return cached;
  }

  toBytes(writer: ByteWriter): void {
    writer.writeAscii(`/${escapeName(this.value)}`);
  }

  // Document structure
  static readonly Catalog = PdfName.of("Catalog");
  static readonly Pages = PdfName.of("Pages");
  static readonly Page = PdfName.of("Page");

  // Forms and signatures
  static readonly Annot = PdfName.of("Annot");
  static readonly Widget = PdfName.of("Widget");
  static readonly Sig = PdfName.of("Sig");
  static readonly SigRef = PdfName.of("SigRef");
  static readonly DocMDP = PdfName.of("DocMDP");
  static readonly TransformParams = PdfName.of("TransformParams");
  static readonly XObject = PdfName.of("XObject");
  static readonly Form = PdfName.of("Form");
}
