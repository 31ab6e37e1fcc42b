/**
 * Error classes for PDF parsing.
 *
 * Parsing never returns a partial document: any of these aborts `parse()`.
 */

/**
 * The input is not a readable PDF: no header, no `startxref`, a broken
 * or unsupported xref section, a cyclic `/Prev` chain or no `/Root`.
 */
export class MalformedDocumentError extends Error {
  constructor(
    message: string,
    /** Byte offset where the problem was detected, when known */
    readonly position?: number,
  ) {
    super(message);
    this.name = "MalformedDocumentError";
  }
}

/**
 * An xref table or trailer could not be read.
 */
export class XRefParseError extends MalformedDocumentError {
  constructor(message: string, position?: number) {
    super(message, position);
    this.name = "XRefParseError";
  }
}

/**
 * An object could not be tokenized or parsed.
 */
export class ObjectParseError extends MalformedDocumentError {
  constructor(message: string, position?: number) {
    super(message, position);
    this.name = "ObjectParseError";
  }
}

/**
 * The object graph is readable but not a valid document structure,
 * e.g. a cyclic page tree or a catalog without `/Pages`.
 */
export class StructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructureError";
  }
}
