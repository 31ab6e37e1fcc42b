import { describe, expect, it } from "vitest";
import { Scanner } from "#src/io/scanner";
import { PdfArray } from "#src/objects/pdf-array";
import { PdfBool } from "#src/objects/pdf-bool";
import { PdfDict } from "#src/objects/pdf-dict";
import { PdfName } from "#src/objects/pdf-name";
import { PdfNull } from "#src/objects/pdf-null";
import type { PdfObject } from "#src/objects/pdf-object";
import { PdfRef } from "#src/objects/pdf-ref";
import { stringToBytes } from "#src/test-utils";
import { ObjectParseError } from "./errors";
import { IndirectObjectParser } from "./indirect-object-parser";
import { ObjectParser } from "./object-parser";
import { TokenReader } from "./token-reader";

function parse(input: string): PdfObject {
  return new ObjectParser(new TokenReader(new Scanner(stringToBytes(input)))).parseObject();
}

describe("ObjectParser", () => {
  it("parses keywords", () => {
    expect(parse("null")).toBe(PdfNull.instance);
    expect(parse("true")).toBe(PdfBool.TRUE);
  });

  it("parses interned names and refs", () => {
    expect(parse("/Sig")).toBe(PdfName.Sig);
    expect(parse("12 0 R")).toBe(PdfRef.of(12, 0));
  });

  it("keeps consecutive integers as numbers", () => {
    const arr = parse("[1 2 3]");

    expect(arr).toBeInstanceOf(PdfArray);
    expect(arr.type === "array" && arr.toArray().map(item => item.type)).toEqual([
      "number",
      "number",
      "number",
    ]);
  });

  it("mixes refs and numbers in arrays", () => {
    const arr = parse("[1 0 R 5 2 0 R]");

    expect(arr.type === "array" && arr.toArray()).toEqual([
      PdfRef.of(1),
      expect.objectContaining({ value: 5 }),
      PdfRef.of(2),
    ]);
  });

  it("parses nested dictionaries", () => {
    const dict = parse("<< /Type /Annot /Rect [0 0 10 20] /MK << /BG [1] >> >>");

    expect(dict).toBeInstanceOf(PdfDict);

    if (dict.type !== "dict") {
      return;
    }

    expect(dict.getName("Type")).toBe(PdfName.Annot);
    expect(dict.getArray("Rect")?.length).toBe(4);
    expect(dict.getDict("MK")?.getArray("BG")?.length).toBe(1);
  });

  it("rejects non-name keys", () => {
    expect(() => parse("<< 1 2 >>")).toThrow(ObjectParseError);
  });

  it("rejects a key without a value", () => {
    expect(() => parse("<< /A >>")).toThrow(ObjectParseError);
  });

  it("rejects unterminated arrays", () => {
    expect(() => parse("[1 2")).toThrow(ObjectParseError);
  });

  it("limits nesting depth", () => {
    expect(() => parse("[".repeat(600))).toThrow("Maximum nesting depth exceeded");
  });
});

describe("IndirectObjectParser", () => {
  it("parses an object and its offset", () => {
    const bytes = stringToBytes("junk\n7 0 obj\n<< /A 1 >>\nendobj\n");
    const result = new IndirectObjectParser(bytes).parseObjectAt(5);

    expect(result.objNum).toBe(7);
    expect(result.genNum).toBe(0);
    expect(result.offset).toBe(5);
    expect(result.value.type).toBe("dict");
  });

  it("reads stream data by /Length", () => {
    const bytes = stringToBytes("1 0 obj\n<< /Length 5 >>\nstream\nhello\nendstream\nendobj\n");
    const result = new IndirectObjectParser(bytes).parseObjectAt(0);

    expect(result.value.type).toBe("stream");
    expect(result.value.type === "stream" && String.fromCharCode(...result.value.data)).toBe("hello");
  });

  it("resolves an indirect /Length", () => {
    const bytes = stringToBytes("1 0 obj\n<< /Length 9 0 R >>\nstream\r\nabc\nendstream\nendobj\n");
    const result = new IndirectObjectParser(bytes, ref => (ref.objectNumber === 9 ? 3 : null)).parseObjectAt(0);

    expect(result.value.type === "stream" && result.value.data.length).toBe(3);
  });

  it("fails on a wrong /Length", () => {
    const bytes = stringToBytes("1 0 obj\n<< /Length 2 >>\nstream\nhello\nendstream\nendobj\n");

    expect(() => new IndirectObjectParser(bytes).parseObjectAt(0)).toThrow("Expected 'endstream'");
  });

  it("warns on a missing endobj", () => {
    const warnings: string[] = [];
    const bytes = stringToBytes("1 0 obj\n42\n2 0 obj\n");

    new IndirectObjectParser(bytes, undefined, message => warnings.push(message)).parseObjectAt(0);

    expect(warnings).toEqual(["Missing 'endobj' for object 1 0"]);
  });
});
