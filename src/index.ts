/**
 * incremental-pdf-signer
 *
 * Appends signature fields and detached CMS signatures to existing PDFs
 * without rewriting a byte of the earlier revisions.
 */

export { version } from "../package.json";

// ─────────────────────────────────────────────────────────────────────────────
// Signing
// ─────────────────────────────────────────────────────────────────────────────

export * from "./signatures";

// ─────────────────────────────────────────────────────────────────────────────
// Document Structure
// ─────────────────────────────────────────────────────────────────────────────

export { PendingRevision } from "./document/pending-revision";
export {
  MalformedDocumentError,
  ObjectParseError,
  StructureError,
  XRefParseError,
} from "./parser/errors";
export type { SignatureField } from "./parser/signature-fields";
export {
  type ParsedDocument,
  type ParseOptions,
  type Revision,
  StructuralParser,
} from "./parser/structural-parser";
export {
  type IncrementalWriteOptions,
  type IncrementalWriteResult,
  verifyIncrementalSave,
  writeIncremental,
} from "./writer/incremental-writer";

// ─────────────────────────────────────────────────────────────────────────────
// Objects
// ─────────────────────────────────────────────────────────────────────────────

export { PdfArray } from "./objects/pdf-array";
export { PdfBool } from "./objects/pdf-bool";
export { PdfDict } from "./objects/pdf-dict";
export { PdfName } from "./objects/pdf-name";
export { PdfNull } from "./objects/pdf-null";
export { PdfNumber } from "./objects/pdf-number";
export { isPdfArray, isPdfDict, isPdfRef, type PdfObject } from "./objects/pdf-object";
export { PdfRaw } from "./objects/pdf-raw";
export { PdfRef } from "./objects/pdf-ref";
export { PdfStream } from "./objects/pdf-stream";
export { PdfString } from "./objects/pdf-string";
