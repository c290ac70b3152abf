import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import {
  isErrorCorrectionLevel,
  parseErrorCorrectionOption,
  parseIntegerOption,
  parseRatioOption,
} from "./parse-options.js";

describe("parseIntegerOption", () => {
  it("accepts integers inside the range", () => {
    const parse = parseIntegerOption(1, 8);
    expect(parse("4")).toBe(4);
    expect(parse(" 8 ")).toBe(8);
  });

  it("rejects non-integers and out-of-range values", () => {
    const parse = parseIntegerOption(1, 8);
    expect(() => parse("2.5")).toThrow(InvalidArgumentError);
    expect(() => parse("x")).toThrow('expected an integer, got "x"');
    expect(() => parse("9")).toThrow("expected a value between 1 and 8, got 9");
    expect(() => parse("0")).toThrow(InvalidArgumentError);
  });
});

describe("parseRatioOption", () => {
  it("accepts 0 through 1", () => {
    expect(parseRatioOption("0")).toBe(0);
    expect(parseRatioOption("0.35")).toBe(0.35);
    expect(parseRatioOption("1")).toBe(1);
  });

  it("rejects values outside the range", () => {
    expect(() => parseRatioOption("1.5")).toThrow(InvalidArgumentError);
    expect(() => parseRatioOption("")).toThrow(InvalidArgumentError);
    expect(() => parseRatioOption("half")).toThrow(InvalidArgumentError);
  });
});

describe("parseErrorCorrectionOption", () => {
  it("normalizes case", () => {
    expect(parseErrorCorrectionOption("q")).toBe("Q");
    expect(parseErrorCorrectionOption(" H ")).toBe("H");
  });

  it("rejects unknown levels", () => {
    expect(() => parseErrorCorrectionOption("X")).toThrow('expected one of L, M, Q, H, got "X"');
    expect(isErrorCorrectionLevel("h")).toBe(false);
  });
});
