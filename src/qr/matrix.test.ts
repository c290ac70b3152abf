import { describe, expect, it } from "vitest";
import { ModuleMatrix, moduleCountForVersion } from "./matrix.js";

describe("moduleCountForVersion", () => {
  it("maps versions 1-40 to 17 + 4v modules", () => {
    expect(moduleCountForVersion(1)).toBe(21);
    expect(moduleCountForVersion(6)).toBe(41);
    expect(moduleCountForVersion(40)).toBe(177);
  });

  it("rejects versions without a mapping", () => {
    expect(moduleCountForVersion(0)).toBeUndefined();
    expect(moduleCountForVersion(41)).toBeUndefined();
    expect(moduleCountForVersion(2.5)).toBeUndefined();
  });
});

describe("ModuleMatrix", () => {
  const rows = [
    [true, false, true],
    [false, true, false],
    [true, true, false],
  ];

  it("reads cells and treats out-of-bounds reads as inactive", () => {
    const matrix = ModuleMatrix.fromRows(rows);
    expect(matrix.size).toBe(3);
    expect(matrix.isActive(0, 0)).toBe(true);
    expect(matrix.isActive(0, 1)).toBe(false);
    expect(matrix.isActive(-1, 0)).toBe(false);
    expect(matrix.isActive(0, 3)).toBe(false);
    expect(matrix.isActive(3, 3)).toBe(false);
  });

  it("clears cells and reports whether anything changed", () => {
    const matrix = ModuleMatrix.fromRows(rows);
    expect(matrix.countActive()).toBe(5);
    expect(matrix.clear(0, 0)).toBe(true);
    expect(matrix.clear(0, 0)).toBe(false);
    expect(matrix.clear(0, 1)).toBe(false);
    expect(matrix.clear(5, 5)).toBe(false);
    expect(matrix.countActive()).toBe(4);
    expect(matrix.toRows()).toEqual([
      [false, false, true],
      [false, true, false],
      [true, true, false],
    ]);
  });

  it("rejects empty sizes", () => {
    expect(() => new ModuleMatrix(0)).toThrow(RangeError);
  });
});
