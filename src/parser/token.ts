/**
 * Lexical tokens of PDF syntax (PDF 1.7, 7.2).
 *
 * Every token carries the absolute byte offset where it starts.
 */

export type Token =
  | NumberToken
  | NameToken
  | StringToken
  | KeywordToken
  | DelimiterToken
  | EofToken;

export interface NumberToken {
  type: "number";
  value: number;
  isInteger: boolean;
  position: number;
}

export interface NameToken {
  type: "name";
  /** Decoded, without the leading `/` */
  value: string;
  position: number;
}

export interface StringToken {
  type: "string";
  value: Uint8Array;
  format: "literal" | "hex";
  position: number;
}

/** Bare words: `obj`, `endobj`, `R`, `true`, `null`, `stream`, `xref`... */
export interface KeywordToken {
  type: "keyword";
  value: string;
  position: number;
}

export interface DelimiterToken {
  type: "delimiter";
  value: "[" | "]" | "<<" | ">>";
  position: number;
}

export interface EofToken {
  type: "eof";
  position: number;
}
