import { describe, expect, it } from "vitest";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNumber } from "#src/objects/pdf-number";
import { PdfRef } from "#src/objects/pdf-ref";
import { bytesToString, createMinimalPdf, stringToBytes } from "#src/test-utils";
import { verifyIncrementalSave, writeIncremental } from "./incremental-writer";

describe("writeIncremental", () => {
  const original = createMinimalPdf();
  const prevXRefOffset = bytesToString(original).indexOf("xref\n0 4");

  it("appends objects, xref and trailer after the original bytes", () => {
    const objects = new Map([[PdfRef.of(4), PdfDict.of({ Type: PdfName.Sig })]]);
    const result = writeIncremental(objects, {
      originalBytes: original,
      prevXRefOffset,
      root: PdfRef.of(1),
      size: 5,
    });

    const appended = bytesToString(result.bytes.subarray(original.length));
    const objectOffset = original.length;

    expect(appended).toBe(
      "4 0 obj\n<<\n/Type /Sig\n>>\nendobj\n" +
        "xref\n4 1\n" +
        `${objectOffset.toString().padStart(10, "0")} 00000 n\r\n` +
        `trailer\n<<\n/Size 5\n/Root 1 0 R\n/Prev ${prevXRefOffset}\n>>\n` +
        `startxref\n${result.xrefOffset}\n%%EOF\n`,
    );
    expect(result.spans.get(4)).toEqual({
      start: objectOffset,
      end: objectOffset + "4 0 obj\n<<\n/Type /Sig\n>>\nendobj\n".length,
    });
    expect(verifyIncrementalSave(original, result.bytes)).toEqual({ valid: true });
  });

  it("adds a newline when the original does not end with one", () => {
    const trimmed = original.subarray(0, original.length - 1);
    const result = writeIncremental(new Map([[PdfRef.of(3), PdfNumber.of(1)]]), {
      originalBytes: trimmed,
      prevXRefOffset,
      root: PdfRef.of(1),
      size: 4,
    });

    expect(result.bytes[trimmed.length]).toBe(0x0a);
    expect(result.spans.get(3)?.start).toBe(trimmed.length + 1);
  });
});

describe("verifyIncrementalSave", () => {
  const original = stringToBytes("%PDF-1.7\n%%EOF\n");

  it("accepts an appended revision", () => {
    const result = stringToBytes("%PDF-1.7\n%%EOF\n1 0 obj\nnull\nendobj\n%%EOF\n");

    expect(verifyIncrementalSave(original, result)).toEqual({ valid: true });
  });

  it("detects a changed prefix", () => {
    const changed = stringToBytes("%PDF-1.6\n%%EOF\nmore\n%%EOF\n");

    expect(verifyIncrementalSave(original, changed)).toEqual({
      valid: false,
      error: "Byte mismatch at offset 7",
    });
  });

  it("detects truncation", () => {
    expect(verifyIncrementalSave(original, original.subarray(0, 4))).toEqual({
      valid: false,
      error: "Result shorter than original",
    });
  });

  it("requires a trailing %%EOF", () => {
    const result = stringToBytes("%PDF-1.7\n%%EOF\nappended without marker\n");

    expect(verifyIncrementalSave(original, result)).toEqual({
      valid: false,
      error: "Missing %%EOF at end",
    });
  });
});
