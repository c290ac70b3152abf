import { describe, expect, it } from "vitest";
import { RgbCanvas, type RasterImage } from "../media/canvas.js";
import type { Rgb } from "../media/color.js";
import { composeLogo } from "./logo.js";

const BLACK: Rgb = [0, 0, 0];
const WHITE: Rgb = [255, 255, 255];

function transparentLogo(size: number): RasterImage {
  return { width: size, height: size, channels: 4, data: Buffer.alloc(size * size * 4) };
}

function setLogoPixel(logo: RasterImage, x: number, y: number, rgba: readonly number[]): void {
  logo.data.set(rgba, (y * logo.width + x) * 4);
}

describe("composeLogo", () => {
  it("paints a rounded patch and blends the logo over it", () => {
    const canvas = new RgbCanvas(30, 30, BLACK);
    const logo = transparentLogo(10);
    setLogoPixel(logo, 5, 5, [255, 0, 0, 255]);
    setLogoPixel(logo, 6, 6, [0, 0, 255, 128]);

    composeLogo(canvas, logo, { left: 10, top: 10, right: 20, bottom: 20 }, {
      boxSize: 6,
      backColor: WHITE,
    });

    // Patch corners are rounded with radius boxSize / 2.
    expect(canvas.getPixel(10, 10)).toEqual(BLACK);
    expect(canvas.getPixel(11, 11)).toEqual(WHITE);
    expect(canvas.getPixel(19, 15)).toEqual(WHITE);
    expect(canvas.getPixel(20, 15)).toEqual(BLACK);
    expect(canvas.getPixel(15, 15)).toEqual([255, 0, 0]);
    expect(canvas.getPixel(16, 16)).toEqual([127, 127, 255]);
  });

  it("leaves the canvas alone for an empty placement", () => {
    const canvas = new RgbCanvas(4, 4, BLACK);
    composeLogo(canvas, transparentLogo(1), { left: 2, top: 2, right: 2, bottom: 2 }, {
      boxSize: 6,
      backColor: WHITE,
    });
    expect(canvas.data.every((byte) => byte === 0)).toBe(true);
  });
});
