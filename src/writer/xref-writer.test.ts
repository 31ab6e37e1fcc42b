import { describe, expect, it } from "vitest";
import { ByteWriter } from "#src/io/byte-writer";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfRef } from "#src/objects/pdf-ref";
import { PdfString } from "#src/objects/pdf-string";
import { bytesToString } from "#src/test-utils";
import {
  formatXRefTableEntry,
  groupIntoSubsections,
  writeXRefTable,
  type XRefWriteEntry,
} from "./xref-writer";

const inuse = (objectNumber: number, offset: number): XRefWriteEntry => ({
  objectNumber,
  generation: 0,
  type: "inuse",
  offset,
});

describe("formatXRefTableEntry", () => {
  it("formats in-use entries as 20 bytes", () => {
    const line = formatXRefTableEntry(inuse(1, 12345));

    expect(line).toBe("0000012345 00000 n\r\n");
    expect(line.length).toBe(20);
  });

  it("formats free entries", () => {
    expect(
      formatXRefTableEntry({ objectNumber: 0, generation: 65535, type: "free", offset: 0 }),
    ).toBe("0000000000 65535 f\r\n");
  });
});

describe("groupIntoSubsections", () => {
  it("splits on gaps", () => {
    const groups = groupIntoSubsections([inuse(8, 0), inuse(1, 0), inuse(2, 0), inuse(3, 0), inuse(7, 0)]);

    expect(groups.map(g => [g.start, g.entries.length])).toEqual([
      [1, 3],
      [7, 2],
    ]);
  });

  it("returns nothing for no entries", () => {
    expect(groupIntoSubsections([])).toEqual([]);
  });
});

describe("writeXRefTable", () => {
  it("writes subsections, trailer and footer", () => {
    const writer = new ByteWriter();

    writeXRefTable(writer, {
      entries: [inuse(1, 100), inuse(5, 400), inuse(2, 250)],
      size: 6,
      xrefOffset: 500,
      prev: 9,
      root: PdfRef.of(1),
    });

    expect(bytesToString(writer.toBytes())).toBe(
      "xref\n" +
        "1 2\n" +
        "0000000100 00000 n\r\n" +
        "0000000250 00000 n\r\n" +
        "5 1\n" +
        "0000000400 00000 n\r\n" +
        "trailer\n" +
        "<<\n/Size 6\n/Root 1 0 R\n/Prev 9\n>>\n" +
        "startxref\n500\n%%EOF\n",
    );
  });

  it("carries /Info and /ID", () => {
    const writer = new ByteWriter();
    const id = PdfArray.of(PdfString.fromHex("AB"), PdfString.fromHex("CD"));

    writeXRefTable(writer, {
      entries: [inuse(3, 10)],
      size: 4,
      xrefOffset: 50,
      root: PdfRef.of(1),
      info: PdfRef.of(2),
      id,
    });

    expect(bytesToString(writer.toBytes())).toContain(
      "<<\n/Size 4\n/Root 1 0 R\n/Info 2 0 R\n/ID [<AB> <CD>]\n>>",
    );
  });
});
