/**
 * Incremental update writer.
 *
 * An update appends to the previous file and never modifies it:
 *
 * ```
 * [previous bytes]
 * [new and rewritten objects]
 * xref
 * ...
 * trailer
 * << ... /Prev [previous xref offset] >>
 * startxref
 * ...
 * %%EOF
 * ```
 */

import { CR, LF } from "#src/helpers/chars";
import { bytesEqual } from "#src/helpers/buffer";
import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";
import { type ObjectSpan, writeIndirectObject } from "./serializer";
import { type XRefWriteEntry, writeXRefTable } from "./xref-writer";

export interface IncrementalWriteOptions {
  /** The file as it stands; kept byte for byte */
  originalBytes: Uint8Array;

  /** Offset of the newest existing xref section, written as `/Prev` */
  prevXRefOffset: number;

  root: PdfRef;

  /** Trailer `/Size` */
  size: number;

  info?: PdfRef;

  id?: PdfObject;
}

export interface IncrementalWriteResult {
  bytes: Uint8Array;

  /** Offset of the new `xref` keyword */
  xrefOffset: number;

  /** Where each written object landed, by object number */
  spans: Map<number, ObjectSpan>;
}

/**
 * Append `objects` as a new revision.
 *
 * The xref section lists only the appended objects; readers find the
 * rest through `/Prev`.
 */
export function writeIncremental(
  objects: ReadonlyMap<PdfRef, PdfObject>,
  options: IncrementalWriteOptions,
): IncrementalWriteResult {
  const { originalBytes } = options;
  const writer = new ByteWriter(originalBytes);
  const lastByte = originalBytes[originalBytes.length - 1];

  if (lastByte !== LF && lastByte !== CR) {
    writer.writeByte(LF);
  }

  const spans = new Map<number, ObjectSpan>();
  const entries: XRefWriteEntry[] = [];

  for (const [ref, obj] of objects) {
    const span = writeIndirectObject(writer, ref, obj);

    spans.set(ref.objectNumber, span);
    entries.push({
      objectNumber: ref.objectNumber,
      generation: ref.generation,
      type: "inuse",
      offset: span.start,
    });
  }

  const xrefOffset = writer.position;

  writeXRefTable(writer, {
    xrefOffset,
    entries,
    size: options.size,
    prev: options.prevXRefOffset,
    root: options.root,
    info: options.info,
    id: options.id,
  });

  return { bytes: writer.toBytes(), xrefOffset, spans };
}

/**
 * Check that `result` is `original` plus an appended revision.
 */
export function verifyIncrementalSave(
  original: Uint8Array,
  result: Uint8Array,
): { valid: boolean; error?: string } {
  if (result.length < original.length) {
    return { valid: false, error: "Result shorter than original" };
  }

  if (!bytesEqual(result.subarray(0, original.length), original)) {
    const offset = original.findIndex((byte, i) => result[i] !== byte);

    return { valid: false, error: `Byte mismatch at offset ${offset}` };
  }

  let tail = "";

  for (const byte of result.subarray(-10)) {
    tail += String.fromCharCode(byte);
  }

  if (!tail.includes("%%EOF")) {
    return { valid: false, error: "Missing %%EOF at end" };
  }

  return { valid: true };
}
