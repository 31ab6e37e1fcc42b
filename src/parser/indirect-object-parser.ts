import { CR, LF } from "#src/helpers/chars";
import type { WarningCallback } from "#src/helpers/types";
import { Scanner } from "#src/io/scanner";
import type { PdfDict } from "#src/objects/pdf-dict";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { PdfStream } from "#src/objects/pdf-stream";
import { ObjectParseError } from "./errors";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

/**
 * An `N G obj ... endobj` definition as found in the file.
 */
export interface IndirectObject {
  objNum: number;
  genNum: number;
  value: PdfObject;
  /** Offset of the object number */
  offset: number;
}

/**
 * Resolves an indirect `/Length`. Returns null when it cannot.
 */
export type LengthResolver = (ref: PdfRef) => number | null;

/**
 * Parses indirect object definitions, including stream data.
 */
export class IndirectObjectParser {
  constructor(
    private readonly bytes: Uint8Array,
    private readonly lengthResolver?: LengthResolver,
    private readonly onWarning?: WarningCallback,
  ) {}

  parseObjectAt(offset: number): IndirectObject {
    const scanner = new Scanner(this.bytes);
    const reader = new TokenReader(scanner);

    reader.moveTo(offset);

    const objNum = this.expectInteger(reader, "object number");
    const genNum = this.expectInteger(reader, "generation number");
    const keyword = reader.nextToken();

    if (keyword.type !== "keyword" || keyword.value !== "obj") {
      throw new ObjectParseError(`Expected 'obj' after ${objNum} ${genNum}`, keyword.position);
    }

    let value = new ObjectParser(reader).parseObject();
    let next = reader.peekToken();

    if (value.type === "dict" && next.type === "keyword" && next.value === "stream") {
      scanner.moveTo(next.position + "stream".length);
      value = this.readStream(scanner, value);
      reader.moveTo(scanner.position);
      next = reader.peekToken();
    }

    if (next.type === "keyword" && next.value === "endobj") {
      reader.nextToken();
    } else {
      this.onWarning?.(`Missing 'endobj' for object ${objNum} ${genNum}`, next.position);
    }

    return { objNum, genNum, value, offset };
  }

  private expectInteger(reader: TokenReader, what: string): number {
    const token = reader.nextToken();

    if (token.type !== "number" || !token.isInteger) {
      throw new ObjectParseError(`Expected ${what}`, token.position);
    }

    return token.value;
  }

  /**
   * Read stream data; `scanner` sits right after the `stream` keyword.
   */
  private readStream(scanner: Scanner, dict: PdfDict): PdfStream {
    // A single EOL follows `stream`: CRLF or LF (a lone CR is tolerated)
    if (scanner.peek() === CR) {
      scanner.advance();
    }

    if (scanner.peek() === LF) {
      scanner.advance();
    }

    const start = scanner.position;
    const length = this.resolveLength(dict, start);

    if (start + length > scanner.length) {
      throw new ObjectParseError("Stream data runs past end of file", start);
    }

    scanner.moveTo(start + length);

    const reader = new TokenReader(scanner);
    const end = reader.nextToken();

    if (end.type !== "keyword" || end.value !== "endstream") {
      throw new ObjectParseError("Expected 'endstream'", end.position);
    }

    return new PdfStream(dict, scanner.bytes.slice(start, start + length));
  }

  private resolveLength(dict: PdfDict, position: number): number {
    const entry = dict.get("Length");

    if (entry?.type === "number") {
      return entry.value;
    }

    if (entry?.type === "ref") {
      const length = this.lengthResolver?.(entry) ?? null;

      if (length === null) {
        throw new ObjectParseError(`Could not resolve /Length ${entry.toString()}`, position);
      }

      return length;
    }

    throw new ObjectParseError("Stream has no usable /Length", position);
  }
}
