import { BACKSLASH, PARENTHESIS_CLOSE, PARENTHESIS_OPEN } from "#src/helpers/chars";
import { bytesToHex, hexToBytes } from "#src/helpers/buffer";
import type { ByteWriter } from "#src/io/byte-writer";
import type { PdfPrimitive } from "./pdf-primitive";

const UTF16BE_BOM = [0xfe, 0xff];

/**
 * String object holding raw bytes, written back in the form it was read:
 * `(literal)` or `<hex>`.
 */
export class PdfString implements PdfPrimitive {
  constructor(
    readonly bytes: Uint8Array,
    readonly format: "literal" | "hex" = "literal",
  ) {}

  get type(): "string" {
    return "string";
  }

  /**
   * Encode a text string (PDF 1.7, 7.9.2.2). Plain ASCII is stored as is;
   * anything else becomes UTF-16BE with a byte order mark.
   */
  static fromText(text: string): PdfString {
    if (/^[\x20-\x7e]*$/.test(text)) {
      const bytes = new Uint8Array(text.length);

      for (let i = 0; i < text.length; i++) {
        bytes[i] = text.charCodeAt(i);
      }

      return new PdfString(bytes);
    }

    const bytes = new Uint8Array(2 + text.length * 2);

    bytes.set(UTF16BE_BOM);

    for (let i = 0; i < text.length; i++) {
      const unit = text.charCodeAt(i);

      bytes[2 + i * 2] = unit >> 8;
      bytes[3 + i * 2] = unit & 0xff;
    }

    return new PdfString(bytes);
  }

  static fromHex(hex: string): PdfString {
    return new PdfString(hexToBytes(hex), "hex");
  }

  /**
   * Decode as a text string: UTF-16BE when it starts with a BOM, otherwise
   * one character per byte.
   */
  asString(): string {
    const { bytes } = this;

    if (bytes.length >= 2 && bytes[0] === UTF16BE_BOM[0] && bytes[1] === UTF16BE_BOM[1]) {
      let text = "";

      for (let i = 2; i + 1 < bytes.length; i += 2) {
        text += String.fromCharCode((bytes[i] << 8) | bytes[i + 1]);
      }

      return text;
    }

    let text = "";

    for (const byte of bytes) {
      text += String.fromCharCode(byte);
    }

    return text;
  }

  toBytes(writer: ByteWriter): void {
    if (this.format === "hex") {
      writer.writeAscii(`<${bytesToHex(this.bytes)}>`);

      return;
    }

    writer.writeByte(PARENTHESIS_OPEN);

    for (const byte of this.bytes) {
      if (byte === BACKSLASH || byte === PARENTHESIS_OPEN || byte === PARENTHESIS_CLOSE) {
        writer.writeByte(BACKSLASH);
      }

      writer.writeByte(byte);
    }

    writer.writeByte(PARENTHESIS_CLOSE);
  }
}
