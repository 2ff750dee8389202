/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { parseNonNegativeInt, parseJson } from "../src/lib/arg.js";
import { InvalidArgumentError } from "commander";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse non-negative integers", () => {
      expect(parseNonNegativeInt("0", "--timeout")).toBe(0);
      expect(parseNonNegativeInt(" 250 ", "--timeout")).toBe(250);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "--timeout")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-1", "--timeout")).toThrow(
        "--timeout must be a non-negative integer"
      );
    });

    it("should reject fractions and words", () => {
      expect(() => parseNonNegativeInt("1.5", "--timeout")).toThrow("must be a non-negative integer");
      expect(() => parseNonNegativeInt("soon", "--timeout")).toThrow("must be a non-negative integer");
    });

    it("should honor the default upper bound", () => {
      expect(parseNonNegativeInt("10000", "n")).toBe(10000);
      expect(() => parseNonNegativeInt("10001", "n")).toThrow("n must be <= 10000");
    });

    it("should honor a custom upper bound", () => {
      expect(parseNonNegativeInt("600000", "--timeout", 600000)).toBe(600000);
      expect(() => parseNonNegativeInt("600001", "--timeout", 600000)).toThrow(
        "--timeout must be <= 600000"
      );
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"dag_size":"0","tasks":{}}', "stdin")).toEqual({ dag_size: "0", tasks: {} });
      expect(parseJson("[1,2]", "stdin")).toEqual([1, 2]);
      expect(parseJson("null", "stdin")).toBe(null);
    });

    it("should strip a BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "stdin")).toEqual({ a: 1 });
    });

    it("should name the source in the error", () => {
      expect(() => parseJson("{", "file dag.json")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{", "file dag.json")).toThrow(/^Invalid JSON in file dag\.json: /);
    });
  });
});
