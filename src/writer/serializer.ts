/**
 * PDF object serialization.
 *
 * The byte layout of each value lives in its own `toBytes()`; this module
 * adds the indirect-object wrapper and a convenience for whole values.
 */

import { ByteWriter } from "#src/io/byte-writer";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

/**
 * Byte span `[start, end)` of an indirect object in the output.
 */
export interface ObjectSpan {
  start: number;
  end: number;
}

/**
 * Serialize a value on its own.
 */
export function serializeObject(obj: PdfObject): Uint8Array {
  const writer = new ByteWriter(undefined, { initialSize: 256 });

  obj.toBytes(writer);

  return writer.toBytes();
}

/**
 * Write `N G obj\n<value>\nendobj\n` and report where it landed.
 */
export function writeIndirectObject(writer: ByteWriter, ref: PdfRef, obj: PdfObject): ObjectSpan {
  const start = writer.position;

  writer.writeAscii(`${ref.objectNumber} ${ref.generation} obj\n`);
  obj.toBytes(writer);
  writer.writeAscii("\nendobj\n");

  return { start, end: writer.position };
}
