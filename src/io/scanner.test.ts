import { describe, expect, it } from "vitest";
import { stringToBytes } from "#src/test-utils";
import { Scanner } from "./scanner";

describe("Scanner", () => {
  it("peeks without consuming", () => {
    const scanner = new Scanner(stringToBytes("AB"));

    expect(scanner.peek()).toBe(0x41);
    expect(scanner.position).toBe(0);
  });

  it("advances through the input", () => {
    const scanner = new Scanner(stringToBytes("AB"));

    expect(scanner.advance()).toBe(0x41);
    expect(scanner.advance()).toBe(0x42);
    expect(scanner.advance()).toBe(-1);
    expect(scanner.atEnd).toBe(true);
    expect(scanner.position).toBe(2);
  });

  it("returns -1 for out-of-range peeks", () => {
    const scanner = new Scanner(stringToBytes("A"));

    expect(scanner.peekAt(-1)).toBe(-1);
    expect(scanner.peekAt(1)).toBe(-1);
  });

  it("clamps moveTo to the buffer", () => {
    const scanner = new Scanner(stringToBytes("ABC"));

    scanner.moveTo(10);
    expect(scanner.position).toBe(3);

    scanner.moveTo(-4);
    expect(scanner.position).toBe(0);
  });

  it("matches ASCII text at a position", () => {
    const scanner = new Scanner(stringToBytes("1 0 obj"));

    expect(scanner.matchesAt(4, "obj")).toBe(true);
    expect(scanner.matchesAt(4, "obj ")).toBe(false);
    expect(scanner.matchesAt(0, "2")).toBe(false);
  });
});
