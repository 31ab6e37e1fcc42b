import { describe, expect, it } from "vitest";
import { FieldPlacementSchema, ManagerSettingsSchema, PrepareOptionsSchema, validate } from "./schemas";
import { InvalidArgumentError } from "./types";

describe("validate", () => {
  it("fills in defaults", () => {
    expect(validate(ManagerSettingsSchema, {}, "options")).toEqual({ unit: "pt", estimatedLength: 8192 });
  });

  it("collects every issue with its path", () => {
    const placement = { name: "", page: 1.5, x: 0, y: 0, width: 10, height: 10 };

    try {
      validate(FieldPlacementSchema, placement, "signature field");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidArgumentError);

      if (error instanceof InvalidArgumentError) {
        expect(error.issues).toEqual([
          "name: Field name must not be empty",
          "page: Expected integer, received float",
        ]);
      }
    }
  });

  it("rejects certification levels outside 1-3", () => {
    expect(() => validate(PrepareOptionsSchema, { certificationLevel: 4 }, "signature options")).toThrow(
      /^Invalid signature options: certificationLevel: /,
    );
  });

  it("rejects a non-positive placeholder size", () => {
    expect(() => validate(ManagerSettingsSchema, { estimatedLength: 0 }, "options")).toThrow(
      "Invalid options: estimatedLength: Number must be greater than 0",
    );
  });
});
