import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Dereferences an indirect reference against the loaded document.
 *
 * Resolution is synchronous: the whole file is held in memory and objects
 * are parsed on first access.
 */
export type RefResolver = (ref: PdfRef) => PdfObject | null;

/**
 * Receives non-fatal findings while parsing.
 *
 * @param message - What was tolerated
 * @param position - Byte offset in the input where it was found
 */
export type WarningCallback = (message: string, position: number) => void;
