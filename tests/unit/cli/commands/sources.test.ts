import { InvalidArgumentError } from "commander";
import { describe, it, expect } from "vitest";

import { parseMode, parsePositiveInt } from "../../../../src/cli/commands/sources.js";

describe("cli/commands/sources", () => {
  describe("parseMode", () => {
    it("should accept modes in any case", () => {
      expect(parseMode("full")).toBe("FULL");
      expect(parseMode("Incremental")).toBe("INCREMENTAL");
    });

    it("should reject other values", () => {
      expect(() => parseMode("delta")).toThrow(InvalidArgumentError);
    });
  });

  describe("parsePositiveInt", () => {
    it("should parse decimal integers", () => {
      expect(parsePositiveInt("12")).toBe(12);
    });

    it.each(["0", "-3", "1.5", "12abc", ""])("should reject %j", (value) => {
      expect(() => parsePositiveInt(value)).toThrow("Expected a positive integer.");
    });
  });
});
