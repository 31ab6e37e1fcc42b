/**
 * PDF value types.
 */
import type { PdfArray } from "./pdf-array";
import type { PdfBool } from "./pdf-bool";
import type { PdfDict } from "./pdf-dict";
import type { PdfName } from "./pdf-name";
import type { PdfNull } from "./pdf-null";
import type { PdfNumber } from "./pdf-number";
import type { PdfRaw } from "./pdf-raw";
import type { PdfRef } from "./pdf-ref";
import type { PdfStream } from "./pdf-stream";
import type { PdfString } from "./pdf-string";

/**
 * Every PDF value, discriminated by `type`.
 */
export type PdfObject =
  | PdfNull
  | PdfBool
  | PdfNumber
  | PdfName
  | PdfString
  | PdfRef
  | PdfArray
  | PdfDict
  | PdfStream
  | PdfRaw;

export function isPdfRef(obj: PdfObject | undefined | null): obj is PdfRef {
  return obj?.type === "ref";
}

/**
 * Dictionaries and streams (a stream's dictionary is usable as one).
 */
export function isPdfDict(obj: PdfObject | undefined | null): obj is PdfDict {
  return obj?.type === "dict" || obj?.type === "stream";
}

export function isPdfArray(obj: PdfObject | undefined | null): obj is PdfArray {
  return obj?.type === "array";
}
