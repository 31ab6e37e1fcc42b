import { asciiBytes, lastIndexOfBytes } from "#src/helpers/buffer";
import { isDigit } from "#src/helpers/chars";
import { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import { MalformedDocumentError, ObjectParseError, XRefParseError } from "./errors";
import { ObjectParser } from "./object-parser";
import type { Token } from "./token";
import { TokenReader } from "./token-reader";

/**
 * Entry in a classic cross-reference table.
 */
export type XRefEntry =
  | { type: "free"; nextFree: number; generation: number }
  | { type: "uncompressed"; offset: number; generation: number };

/**
 * One `xref ... trailer << >>` section.
 */
export interface XRefSection {
  /** Offset of the `xref` keyword */
  offset: number;
  entries: Map<number, XRefEntry>;
  trailer: PdfDict;
  /** `/Prev` of the trailer */
  prev?: number;
}

const STARTXREF = asciiBytes("startxref");

/**
 * Parser for classic xref tables and their trailers.
 *
 * Cross-reference streams (PDF 1.5) are recognized and rejected.
 */
export class XRefParser {
  constructor(private readonly bytes: Uint8Array) {}

  /**
   * Offset named by the last `startxref` in the file.
   *
   * The search runs backward from the end, so trailing whitespace or
   * garbage after `%%EOF` does not matter.
   */
  findStartXRef(): number {
    const position = lastIndexOfBytes(this.bytes, STARTXREF);

    if (position === -1) {
      throw new MalformedDocumentError("Could not find startxref marker");
    }

    const reader = new TokenReader(new Scanner(this.bytes));

    reader.moveTo(position + STARTXREF.length);

    const token = reader.nextToken();

    if (token.type !== "number" || !token.isInteger || token.value < 0) {
      throw new XRefParseError("Invalid startxref offset", position);
    }

    return token.value;
  }

  parseAt(offset: number): XRefSection {
    if (offset >= this.bytes.length) {
      throw new XRefParseError(`xref offset ${offset} is beyond end of file`, offset);
    }

    const reader = new TokenReader(new Scanner(this.bytes));

    reader.moveTo(offset);

    const first = reader.nextToken();

    if (first.type === "keyword" && first.value === "xref") {
      return this.parseTable(reader, offset);
    }

    if (first.type === "number" && isDigit(this.bytes[offset])) {
      throw new MalformedDocumentError(
        `Cross-reference stream at offset ${offset} is not supported; only xref tables are`,
        offset,
      );
    }

    throw new XRefParseError(`Expected 'xref' at offset ${offset}`, offset);
  }

  private parseTable(reader: TokenReader, offset: number): XRefSection {
    const entries = new Map<number, XRefEntry>();

    for (;;) {
      const token = reader.nextToken();

      if (token.type === "keyword" && token.value === "trailer") {
        break;
      }

      const start = this.integer(token, "subsection start");
      const count = this.integer(reader.nextToken(), "subsection count");

      for (let i = 0; i < count; i++) {
        const field1 = this.integer(reader.nextToken(), "entry offset");
        const generation = this.integer(reader.nextToken(), "entry generation");
        const marker = reader.nextToken();
        const objectNumber = start + i;

        if (marker.type !== "keyword" || (marker.value !== "n" && marker.value !== "f")) {
          throw new XRefParseError(`Invalid xref entry for object ${objectNumber}`, marker.position);
        }

        // Within one section the first definition of a number wins
        if (entries.has(objectNumber)) {
          continue;
        }

        entries.set(
          objectNumber,
          marker.value === "n"
            ? { type: "uncompressed", offset: field1, generation }
            : { type: "free", nextFree: field1, generation },
        );
      }
    }

    let trailer: PdfObject;

    try {
      trailer = new ObjectParser(reader).parseObject();
    } catch (error) {
      if (error instanceof ObjectParseError) {
        throw new XRefParseError(`Invalid trailer: ${error.message}`, error.position);
      }

      throw error;
    }

    if (trailer.type !== "dict") {
      throw new XRefParseError("Trailer is not a dictionary", offset);
    }

    const prev = trailer.get("Prev");

    if (prev === undefined) {
      return { offset, entries, trailer };
    }

    if (prev.type !== "number" || !prev.isInteger()) {
      throw new XRefParseError("Trailer /Prev is not an integer", offset);
    }

    return { offset, entries, trailer, prev: prev.value };
  }

  private integer(token: Token, what: string): number {
    if (token.type !== "number" || !token.isInteger || token.value < 0) {
      throw new XRefParseError(`Expected ${what} in xref table`, token.position);
    }

    return token.value;
  }
}
