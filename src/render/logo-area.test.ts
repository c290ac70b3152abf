import { describe, expect, it } from "vitest";
import { ModuleMatrix } from "../qr/matrix.js";
import { clearLogoArea, computeLogoPlacement, logoModuleSpan } from "./logo-area.js";

function fullMatrix(size: number): ModuleMatrix {
  return new ModuleMatrix(size, () => true);
}

describe("computeLogoPlacement", () => {
  it("centres the logo, rounding the offset down", () => {
    expect(
      computeLogoPlacement({ canvasWidth: 100, canvasHeight: 100, logoWidth: 21, logoHeight: 21 }),
    ).toEqual({ left: 39, top: 39, right: 60, bottom: 60 });
    expect(
      computeLogoPlacement({ canvasWidth: 100, canvasHeight: 80, logoWidth: 40, logoHeight: 20 }),
    ).toEqual({ left: 30, top: 30, right: 70, bottom: 50 });
  });
});

describe("logoModuleSpan", () => {
  it("covers every module the placement touches", () => {
    expect(logoModuleSpan({ left: 39, top: 39, right: 60, bottom: 60 }, 10)).toEqual({
      top: 3,
      left: 3,
      bottom: 6,
      right: 6,
    });
    expect(logoModuleSpan({ left: 40, top: 40, right: 60, bottom: 60 }, 10)).toEqual({
      top: 4,
      left: 4,
      bottom: 6,
      right: 6,
    });
  });
});

describe("clearLogoArea", () => {
  it("clears the covered modules after removing the border offset", () => {
    const matrix = fullMatrix(10);
    const cleared = clearLogoArea(matrix, { left: 39, top: 39, right: 60, bottom: 60 }, 10, 1);
    expect(cleared).toBe(9);
    expect(matrix.countActive()).toBe(91);
    expect(matrix.isActive(1, 1)).toBe(true);
    expect(matrix.isActive(2, 2)).toBe(false);
    expect(matrix.isActive(4, 4)).toBe(false);
    expect(matrix.isActive(5, 5)).toBe(true);
  });

  it("counts only modules that were active", () => {
    const matrix = fullMatrix(10);
    matrix.clear(3, 3);
    expect(clearLogoArea(matrix, { left: 39, top: 39, right: 60, bottom: 60 }, 10, 1)).toBe(8);
  });

  it("skips coordinates in the border or past the matrix", () => {
    const matrix = fullMatrix(4);
    expect(clearLogoArea(matrix, { left: 0, top: 0, right: 10, bottom: 10 }, 10, 1)).toBe(0);
    expect(clearLogoArea(matrix, { left: 50, top: 50, right: 70, bottom: 70 }, 10, 1)).toBe(0);
    expect(matrix.countActive()).toBe(16);
  });
});
