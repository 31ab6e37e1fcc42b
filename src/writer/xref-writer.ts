/**
 * Classic xref table and trailer writing.
 */

import type { ByteWriter } from "#src/io/byte-writer";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfNumber } from "#src/objects/pdf-number";
import type { PdfObject } from "#src/objects/pdf-object";
import type { PdfRef } from "#src/objects/pdf-ref";

export interface XRefWriteEntry {
  objectNumber: number;
  generation: number;
  type: "inuse" | "free";
  /** Byte offset for in-use entries, next free object number for free ones */
  offset: number;
}

export interface XRefWriteOptions {
  /** Byte offset of the `xref` keyword */
  xrefOffset: number;

  /** Highest object number + 1 */
  size: number;

  entries: XRefWriteEntry[];

  /** Offset of the previous xref section */
  prev?: number;

  root: PdfRef;

  info?: PdfRef;

  /** `/ID` carried over from the previous trailer */
  id?: PdfObject;
}

interface Subsection {
  start: number;
  entries: XRefWriteEntry[];
}

/**
 * Split entries into runs of consecutive object numbers.
 *
 * [1, 2, 3, 7, 8] → [{ start: 1, 3 entries }, { start: 7, 2 entries }]
 */
export function groupIntoSubsections(entries: XRefWriteEntry[]): Subsection[] {
  const sorted = [...entries].sort((a, b) => a.objectNumber - b.objectNumber);
  const subsections: Subsection[] = [];

  for (const entry of sorted) {
    const current = subsections.at(-1);

    if (current && entry.objectNumber === current.start + current.entries.length) {
      current.entries.push(entry);
    } else {
      subsections.push({ start: entry.objectNumber, entries: [entry] });
    }
  }

  return subsections;
}

/**
 * One 20-byte entry: `OOOOOOOOOO GGGGG n\r\n`.
 */
export function formatXRefTableEntry(entry: XRefWriteEntry): string {
  const offset = entry.offset.toString().padStart(10, "0");
  const generation = entry.generation.toString().padStart(5, "0");

  return `${offset} ${generation} ${entry.type === "free" ? "f" : "n"}\r\n`;
}

function buildTrailerDict(options: XRefWriteOptions): PdfDict {
  const trailer = new PdfDict([
    ["Size", PdfNumber.of(options.size)],
    ["Root", options.root],
  ]);

  if (options.prev !== undefined) {
    trailer.set("Prev", PdfNumber.of(options.prev));
  }

  if (options.info) {
    trailer.set("Info", options.info);
  }

  if (options.id) {
    trailer.set("ID", options.id);
  }

  return trailer;
}

/**
 * Write the xref table, trailer, `startxref` and `%%EOF`.
 *
 * ```
 * xref
 * 4 2
 * 0000012345 00000 n
 * 0000012567 00000 n
 * trailer
 * << /Size 6 /Root 1 0 R /Prev 9876 >>
 * startxref
 * 13000
 * %%EOF
 * ```
 */
export function writeXRefTable(writer: ByteWriter, options: XRefWriteOptions): void {
  writer.writeAscii("xref\n");

  for (const subsection of groupIntoSubsections(options.entries)) {
    writer.writeAscii(`${subsection.start} ${subsection.entries.length}\n`);

    for (const entry of subsection.entries) {
      writer.writeAscii(formatXRefTableEntry(entry));
    }
  }

  writer.writeAscii("trailer\n");
  buildTrailerDict(options).toBytes(writer);
  writer.writeAscii(`\nstartxref\n${options.xrefOffset}\n%%EOF\n`);
}
