import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { ObjectParseError } from "./errors";
import type { NumberToken } from "./token";
import type { TokenReader } from "./token-reader";

/**
 * Recursive descent parser for direct objects.
 *
 * `int int R` is told apart from two numbers by reading ahead and
 * rewinding the reader when the pattern does not complete. The parser
 * stops right after a dictionary's `>>`, so a following `stream`
 * keyword is left for the caller.
 */
export class ObjectParser {
  private static readonly MAX_DEPTH = 500;

  private depth = 0;

  constructor(private readonly reader: TokenReader) {}

  parseObject(): PdfObject {
    if (++this.depth > ObjectParser.MAX_DEPTH) {
      throw new ObjectParseError("Maximum nesting depth exceeded", this.reader.position);
    }

    try {
      return this.parseValue();
    } finally {
      this.depth--;
    }
  }

  private parseValue(): PdfObject {
    const token = this.reader.nextToken();

    switch (token.type) {
      case "number":
        return this.parseNumberOrRef(token);
      case "name":
        return PdfName.of(token.value);
      case "string":
        return new PdfString(token.value, token.format);
      case "keyword":
        switch (token.value) {
          case "null":
            return PdfNull.instance;
          case "true":
            return PdfBool.TRUE;
          case "false":
            return PdfBool.FALSE;
        }

        throw new ObjectParseError(`Unexpected keyword '${token.value}'`, token.position);
      case "delimiter":
        if (token.value === "[") {
          return this.parseArray();
        }

        if (token.value === "<<") {
          return this.parseDict();
        }

        throw new ObjectParseError(`Unexpected '${token.value}'`, token.position);
      case "eof":
        throw new ObjectParseError("Unexpected end of input", token.position);
    }
  }

  private parseNumberOrRef(first: NumberToken): PdfObject {
    if (!first.isInteger || first.value < 0) {
      return PdfNumber.of(first.value);
    }

    const rewind = this.reader.position;
    const second = this.reader.nextToken();

    if (second.type === "number" && second.isInteger && second.value >= 0) {
      const third = this.reader.nextToken();

      if (third.type === "keyword" && third.value === "R") {
        return PdfRef.of(first.value, second.value);
      }
    }

    this.reader.moveTo(rewind);

    return PdfNumber.of(first.value);
  }

  private parseArray(): PdfArray {
    const items: PdfObject[] = [];

    for (;;) {
      const next = this.reader.peekToken();

      if (next.type === "delimiter" && next.value === "]") {
        this.reader.nextToken();

        return new PdfArray(items);
      }

      if (next.type === "eof") {
        throw new ObjectParseError("Unterminated array", next.position);
      }

      items.push(this.parseObject());
    }
  }

  private parseDict(): PdfDict {
    const dict = new PdfDict();

    for (;;) {
      const key = this.reader.nextToken();

      if (key.type === "delimiter" && key.value === ">>") {
        return dict;
      }

      if (key.type === "eof") {
        throw new ObjectParseError("Unterminated dictionary", key.position);
      }

      if (key.type !== "name") {
        throw new ObjectParseError(`Dictionary key must be a name, got ${key.type}`, key.position);
      }

      const value = this.reader.peekToken();

      if (value.type === "delimiter" && value.value === ">>") {
        throw new ObjectParseError(`Missing value for /${key.value}`, value.position);
      }

      dict.set(key.value, this.parseObject());
    }
  }
}
