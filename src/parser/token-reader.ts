import {
  ANGLE_BRACKET_CLOSE,
  ANGLE_BRACKET_OPEN,
  BACKSLASH,
  CHAR_HASH,
  CHAR_MINUS,
  CHAR_PERIOD,
  CHAR_PLUS,
  CR,
  DIGIT_0,
  DIGIT_7,
  FF,
  hexValue,
  isDigit,
  isRegularChar,
  isWhitespace,
  LF,
  PARENTHESIS_CLOSE,
  PARENTHESIS_OPEN,
  PERCENT,
  SLASH,
  SQUARE_BRACKET_CLOSE,
  SQUARE_BRACKET_OPEN,
  TAB,
} from "#src/helpers/chars";
import type { Scanner } from "#src/io/scanner";
import { ObjectParseError } from "./errors";
import type { KeywordToken, NameToken, NumberToken, StringToken, Token } from "./token";

const BACKSPACE = 0x08;

/** Single-character escapes inside literal strings (PDF 1.7, Table 3). */
const ESCAPES = new Map<number, number>([
  [0x6e, LF], // \n
  [0x72, CR], // \r
  [0x74, TAB], // \t
  [0x62, BACKSPACE], // \b
  [0x66, FF], // \f
  [PARENTHESIS_OPEN, PARENTHESIS_OPEN],
  [PARENTHESIS_CLOSE, PARENTHESIS_CLOSE],
  [BACKSLASH, BACKSLASH],
]);

/**
 * On-demand tokenizer over a Scanner.
 *
 * Whitespace and `%` comments between tokens are skipped. A one-token
 * lookahead is kept for `peekToken()`.
 */
export class TokenReader {
  private lookahead: Token | null = null;

  constructor(private readonly scanner: Scanner) {}

  /** Position of the next unread byte (or of the peeked token). */
  get position(): number {
    return this.lookahead?.position ?? this.scanner.position;
  }

  peekToken(): Token {
    this.lookahead ??= this.readToken();

    return this.lookahead;
  }

  nextToken(): Token {
    const token = this.peekToken();

    this.lookahead = null;

    return token;
  }

  /**
   * Move to an absolute offset, dropping any lookahead.
   */
  moveTo(position: number): void {
    this.lookahead = null;
    this.scanner.moveTo(position);
  }

  skipWhitespaceAndComments(): void {
    for (;;) {
      const byte = this.scanner.peek();

      if (isWhitespace(byte)) {
        this.scanner.advance();
      } else if (byte === PERCENT) {
        while (this.scanner.peek() !== -1 && this.scanner.peek() !== LF && this.scanner.peek() !== CR) {
          this.scanner.advance();
        }
      } else {
        return;
      }
    }
  }

  private readToken(): Token {
    this.skipWhitespaceAndComments();

    const position = this.scanner.position;
    const byte = this.scanner.peek();

    switch (byte) {
      case -1:
        return { type: "eof", position };
      case SLASH:
        return this.readName(position);
      case PARENTHESIS_OPEN:
        return this.readLiteralString(position);
      case ANGLE_BRACKET_OPEN:
        this.scanner.advance();

        if (this.scanner.peek() === ANGLE_BRACKET_OPEN) {
          this.scanner.advance();

          return { type: "delimiter", value: "<<", position };
        }

        return this.readHexString(position);
      case ANGLE_BRACKET_CLOSE:
        this.scanner.advance();

        if (this.scanner.advance() !== ANGLE_BRACKET_CLOSE) {
          throw new ObjectParseError("Unexpected '>'", position);
        }

        return { type: "delimiter", value: ">>", position };
      case SQUARE_BRACKET_OPEN:
        this.scanner.advance();

        return { type: "delimiter", value: "[", position };
      case SQUARE_BRACKET_CLOSE:
        this.scanner.advance();

        return { type: "delimiter", value: "]", position };
    }

    if (isDigit(byte) || byte === CHAR_PLUS || byte === CHAR_MINUS || byte === CHAR_PERIOD) {
      return this.readNumber(position);
    }

    if (!isRegularChar(byte)) {
      throw new ObjectParseError(`Unexpected character '${String.fromCharCode(byte)}'`, position);
    }

    return this.readKeyword(position);
  }

  private readNumber(position: number): NumberToken | KeywordToken {
    let text = "";
    let hasDigit = false;
    let hasDecimal = false;

    if (this.scanner.peek() === CHAR_PLUS || this.scanner.peek() === CHAR_MINUS) {
      text += String.fromCharCode(this.scanner.advance());
    }

    for (;;) {
      const byte = this.scanner.peek();

      if (isDigit(byte)) {
        hasDigit = true;
      } else if (byte === CHAR_PERIOD && !hasDecimal) {
        hasDecimal = true;
      } else {
        break;
      }

      text += String.fromCharCode(this.scanner.advance());
    }

    // `+`, `-` or `.` with no digits is not a number
    if (!hasDigit || isRegularChar(this.scanner.peek())) {
      this.scanner.moveTo(position);

      return this.readKeyword(position);
    }

    return { type: "number", value: Number.parseFloat(text), isInteger: !hasDecimal, position };
  }

  private readName(position: number): NameToken {
    this.scanner.advance();

    const bytes: number[] = [];

    while (isRegularChar(this.scanner.peek())) {
      const byte = this.scanner.advance();

      if (byte === CHAR_HASH) {
        const high = hexValue(this.scanner.peekAt(this.scanner.position));
        const low = hexValue(this.scanner.peekAt(this.scanner.position + 1));

        if (high !== -1 && low !== -1) {
          this.scanner.advance();
          this.scanner.advance();
          bytes.push((high << 4) | low);

          continue;
        }
      }

      bytes.push(byte);
    }

    return { type: "name", value: new TextDecoder().decode(new Uint8Array(bytes)), position };
  }

  private readLiteralString(position: number): StringToken {
    this.scanner.advance();

    const bytes: number[] = [];
    let depth = 1;

    for (;;) {
      const byte = this.scanner.advance();

      if (byte === -1) {
        throw new ObjectParseError("Unterminated literal string", position);
      }

      if (byte === PARENTHESIS_OPEN) {
        depth++;
      } else if (byte === PARENTHESIS_CLOSE && --depth === 0) {
        break;
      }

      if (byte === BACKSLASH) {
        this.readEscape(bytes);
      } else if (byte === CR) {
        // CR and CRLF inside a string both mean LF
        if (this.scanner.peek() === LF) {
          this.scanner.advance();
        }

        bytes.push(LF);
      } else {
        bytes.push(byte);
      }
    }

    return { type: "string", value: new Uint8Array(bytes), format: "literal", position };
  }

  private readEscape(out: number[]): void {
    const byte = this.scanner.advance();
    const simple = ESCAPES.get(byte);

    if (simple !== undefined) {
      out.push(simple);

      return;
    }

    if (byte >= DIGIT_0 && byte <= DIGIT_7) {
      let value = byte - DIGIT_0;

      for (let i = 0; i < 2; i++) {
        const next = this.scanner.peek();

        if (next < DIGIT_0 || next > DIGIT_7) {
          break;
        }

        value = (value << 3) | (this.scanner.advance() - DIGIT_0);
      }

      out.push(value & 0xff);

      return;
    }

    // Backslash-newline is a line continuation
    if (byte === CR) {
      if (this.scanner.peek() === LF) {
        this.scanner.advance();
      }

      return;
    }

    if (byte === LF || byte === -1) {
      return;
    }

    out.push(byte);
  }

  private readHexString(position: number): StringToken {
    const bytes: number[] = [];
    let high = -1;

    for (;;) {
      const byte = this.scanner.advance();

      if (byte === ANGLE_BRACKET_CLOSE) {
        break;
      }

      if (byte === -1) {
        throw new ObjectParseError("Unterminated hex string", position);
      }

      if (isWhitespace(byte)) {
        continue;
      }

      const nibble = hexValue(byte);

      if (nibble === -1) {
        throw new ObjectParseError(
          `Invalid hex digit '${String.fromCharCode(byte)}'`,
          this.scanner.position - 1,
        );
      }

      if (high === -1) {
        high = nibble;
      } else {
        bytes.push((high << 4) | nibble);
        high = -1;
      }
    }

    // Odd digit count: the last digit is followed by an implied 0
    if (high !== -1) {
      bytes.push(high << 4);
    }

    return { type: "string", value: new Uint8Array(bytes), format: "hex", position };
  }

  private readKeyword(position: number): KeywordToken {
    let value = "";

    while (isRegularChar(this.scanner.peek())) {
      value += String.fromCharCode(this.scanner.advance());
    }

    return { type: "keyword", value, position };
  }
}
