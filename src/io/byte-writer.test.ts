import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { ByteWriter } from "./byte-writer";

describe("ByteWriter", () => {
  describe("construction", () => {
    it("starts empty", () => {
      const writer = new ByteWriter();

      expect(writer.position).toBe(0);
      expect(writer.toBytes()).toEqual(new Uint8Array(0));
    });

    it("starts after existing bytes", () => {
      const writer = new ByteWriter(stringToBytes("%PDF-1.7\n"));

      expect(writer.position).toBe(9);
    });

    it("appends to existing bytes without touching them", () => {
      const existing = stringToBytes("Hello");
      const writer = new ByteWriter(existing);

      writer.writeAscii(" World");

      expect(writer.toBytes()).toEqual(stringToBytes("Hello World"));
      expect(existing).toEqual(stringToBytes("Hello"));
    });
  });

  describe("writing", () => {
    it("writes single bytes", () => {
      const writer = new ByteWriter();

      writer.writeByte(0x50);
      writer.writeByte(0x44);
      writer.writeByte(0x46);

      expect(writer.toBytes()).toEqual(stringToBytes("PDF"));
    });

    it("writes byte arrays", () => {
      const writer = new ByteWriter();

      writer.writeBytes(new Uint8Array([1, 2, 3]));
      writer.writeBytes(new Uint8Array(0));

      expect(writer.position).toBe(3);
      expect(writer.toBytes()).toEqual(new Uint8Array([1, 2, 3]));
    });

    it("writes UTF-8", () => {
      const writer = new ByteWriter();

      writer.writeUtf8("é");

      expect(writer.toBytes()).toEqual(new Uint8Array([0xc3, 0xa9]));
    });

    it("grows past the initial size", () => {
      const writer = new ByteWriter(undefined, { initialSize: 16 });

      writer.writeAscii("x".repeat(100));

      expect(writer.position).toBe(100);
      expect(writer.toBytes().every(b => b === 0x78)).toBe(true);
    });
  });

  describe("byteAt()", () => {
    it("reads written bytes", () => {
      const writer = new ByteWriter(stringToBytes("abc"));

      expect(writer.byteAt(2)).toBe(0x63);
    });

    it("returns -1 past the written region", () => {
      const writer = new ByteWriter(stringToBytes("abc"));

      expect(writer.byteAt(3)).toBe(-1);
      expect(writer.byteAt(-1)).toBe(-1);
    });
  });

  it("toBytes() returns a copy", () => {
    const writer = new ByteWriter();

    writer.writeAscii("ab");

    const first = writer.toBytes();

    first[0] = 0;

    expect(writer.toBytes()).toEqual(stringToBytes("ab"));
  });
});
