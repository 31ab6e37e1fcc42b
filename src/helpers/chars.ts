/**
 * Byte constants for PDF syntax (PDF 1.7, section 7.2.2).
 */

export const NUL = 0x00;
export const TAB = 0x09;
export const LF = 0x0a;
export const FF = 0x0c;
export const CR = 0x0d;
export const SPACE = 0x20;

/** NUL, TAB, LF, FF, CR, SPACE */
export const WHITESPACE = new Set([NUL, TAB, LF, FF, CR, SPACE]);

export const PARENTHESIS_OPEN = 0x28; // (
export const PARENTHESIS_CLOSE = 0x29; // )
export const ANGLE_BRACKET_OPEN = 0x3c; // <
export const ANGLE_BRACKET_CLOSE = 0x3e; // >
export const SQUARE_BRACKET_OPEN = 0x5b; // [
export const SQUARE_BRACKET_CLOSE = 0x5d; // ]
export const CURLY_BRACE_OPEN = 0x7b; // {
export const CURLY_BRACE_CLOSE = 0x7d; // }
export const SLASH = 0x2f; // /
export const PERCENT = 0x25; // %
export const BACKSLASH = 0x5c; // \

/** ( ) < > [ ] { } / % */
export const DELIMITERS = new Set([
  PARENTHESIS_OPEN,
  PARENTHESIS_CLOSE,
  ANGLE_BRACKET_OPEN,
  ANGLE_BRACKET_CLOSE,
  SQUARE_BRACKET_OPEN,
  SQUARE_BRACKET_CLOSE,
  CURLY_BRACE_OPEN,
  CURLY_BRACE_CLOSE,
  SLASH,
  PERCENT,
]);

export const CHAR_PLUS = 0x2b;
export const CHAR_MINUS = 0x2d;
export const CHAR_PERIOD = 0x2e;
export const CHAR_HASH = 0x23;

export const DIGIT_0 = 0x30;
export const DIGIT_7 = 0x37;
export const DIGIT_9 = 0x39;

const CHAR_UPPER_A = 0x41;
const CHAR_UPPER_F = 0x46;
const CHAR_LOWER_A = 0x61;
const CHAR_LOWER_F = 0x66;

export function isWhitespace(byte: number): boolean {
  return WHITESPACE.has(byte);
}

/**
 * A regular character is anything that is neither whitespace nor a delimiter.
 * `-1` (end of input) is never regular.
 */
export function isRegularChar(byte: number): boolean {
  return byte !== -1 && !WHITESPACE.has(byte) && !DELIMITERS.has(byte);
}

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_0 && byte <= DIGIT_9;
}

/**
 * Numeric value of a hex digit (0-15), or -1 if the byte is not one.
 */
export function hexValue(byte: number): number {
  if (byte >= DIGIT_0 && byte <= DIGIT_9) {
    return byte - DIGIT_0;
  }

  if (byte >= CHAR_UPPER_A && byte <= CHAR_UPPER_F) {
    return byte - CHAR_UPPER_A + 10;
  }

  if (byte >= CHAR_LOWER_A && byte <= CHAR_LOWER_F) {
    return byte - CHAR_LOWER_A + 10;
  }

  return -1;
}
