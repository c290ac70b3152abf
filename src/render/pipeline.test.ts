import path from "node:path";
import sharp from "sharp";
import { describe, expect, it } from "vitest";
import { pathExists, withTempDir, writeSolidPng } from "../../test/helpers/temp-dir.js";
import { RgbCanvas } from "../media/canvas.js";
import {
  logoMaxSize,
  planRenderGeometry,
  renderStyledQr,
  renderStyledQrToFile,
  type RenderRequest,
} from "./pipeline.js";

function request(overrides: Partial<RenderRequest> = {}): RenderRequest {
  return {
    payload: "https://example.com",
    targetSize: 64,
    fillColor: "black",
    eyeColor: "black",
    backColor: "white",
    logoPath: null,
    version: 6,
    errorCorrection: "H",
    borderSize: 0,
    supersample: 4,
    moduleRadiusRatio: 0.5,
    logoAspect: 1,
    logoPadding: 2,
    ...overrides,
  };
}

describe("planRenderGeometry", () => {
  it("derives the borderless 2048px layout", () => {
    expect(
      planRenderGeometry({ targetSize: 2048, supersample: 4, moduleCount: 41, borderSize: 0 }),
    ).toEqual({
      moduleCount: 41,
      workingSize: 8192,
      boxSize: 199,
      canvasSize: 8159,
      sampledSize: 8156,
      sampledOffset: 1,
      outputSize: 2039,
    });
  });

  it("derives the 2048px layout with the default border", () => {
    expect(
      planRenderGeometry({ targetSize: 2048, supersample: 4, moduleCount: 41, borderSize: 4 }),
    ).toEqual({
      moduleCount: 41,
      workingSize: 8192,
      boxSize: 167,
      canvasSize: 8183,
      sampledSize: 8180,
      sampledOffset: 1,
      outputSize: 2045,
    });
  });

  it("splits the trim around the sampled region", () => {
    const geometry = planRenderGeometry({
      targetSize: 64,
      supersample: 8,
      moduleCount: 21,
      borderSize: 0,
    });
    // 512 / 21 -> box 24, canvas 504; 504 is already a multiple of 8.
    expect(geometry.canvasSize).toBe(504);
    expect(geometry.sampledOffset).toBe(0);

    const trimmed = planRenderGeometry({
      targetSize: 100,
      supersample: 8,
      moduleCount: 21,
      borderSize: 0,
    });
    // 800 / 21 -> box 38, canvas 798, sampled 792.
    expect(trimmed.sampledSize).toBe(792);
    expect(trimmed.sampledOffset).toBe(3);
  });

  it("keeps at least one pixel per module", () => {
    const geometry = planRenderGeometry({
      targetSize: 10,
      supersample: 1,
      moduleCount: 21,
      borderSize: 4,
    });
    expect(geometry.boxSize).toBe(1);
    expect(geometry.canvasSize).toBe(29);
    expect(geometry.outputSize).toBe(29);
  });

  it("rejects non-positive sizes and factors", () => {
    expect(() =>
      planRenderGeometry({ targetSize: 0, supersample: 4, moduleCount: 41, borderSize: 4 }),
    ).toThrow(RangeError);
    expect(() =>
      planRenderGeometry({ targetSize: 100, supersample: 0, moduleCount: 41, borderSize: 4 }),
    ).toThrow(RangeError);
    expect(() =>
      planRenderGeometry({ targetSize: 100, supersample: 4, moduleCount: 41, borderSize: -1 }),
    ).toThrow(RangeError);
  });
});

describe("logoMaxSize", () => {
  it("is a quarter of the canvas minus the scaled padding", () => {
    expect(logoMaxSize(8159, 2, 4)).toBe(2031);
    expect(logoMaxSize(246, 2, 1)).toBe(59);
  });
});

describe("renderStyledQr", () => {
  it("downsamples the trimmed canvas to the output size", async () => {
    const result = await renderStyledQr(request());
    if (!result.ok) {
      throw result.error;
    }
    const { geometry, image } = result.value;
    expect(geometry.boxSize).toBe(6);
    expect(geometry.canvasSize).toBe(246);
    expect(geometry.sampledSize).toBe(244);
    expect(geometry.sampledOffset).toBe(1);
    expect(geometry.outputSize).toBe(61);
    expect(image.width).toBe(61);
    expect(image.height).toBe(61);
    expect(image.channels).toBe(3);
    expect(result.value.logoPlacement).toBeNull();
    expect(result.value.clearedModules).toBe(0);
  });

  it("paints eyes and modules in their own colours", async () => {
    const result = await renderStyledQr(
      request({
        targetSize: 90,
        supersample: 1,
        borderSize: 2,
        moduleRadiusRatio: 0,
        fillColor: "red",
        eyeColor: "#0000FF",
      }),
    );
    if (!result.ok) {
      throw result.error;
    }
    expect(result.value.geometry.boxSize).toBe(2);
    expect(result.value.geometry.canvasSize).toBe(90);
    const canvas = RgbCanvas.fromRaster(result.value.image);
    expect(canvas.getPixel(0, 0)).toEqual([255, 255, 255]);
    // Top-left eye: ring then pupil.
    expect(canvas.getPixel(11, 4)).toEqual([0, 0, 255]);
    expect(canvas.getPixel(11, 11)).toEqual([255, 0, 0]);
    // The always-dark module at row 33, column 8.
    expect(canvas.getPixel(20, 70)).toEqual([255, 0, 0]);
  });

  it("centres the logo on a cleared area", async () => {
    await withTempDir(async (dir) => {
      const logoPath = await writeSolidPng(path.join(dir, "logo.png"), 40, 20, {
        r: 255,
        g: 0,
        b: 0,
      });
      const result = await renderStyledQr(
        request({ targetSize: 246, supersample: 1, logoPath, fillColor: "black" }),
      );
      if (!result.ok) {
        throw result.error;
      }
      expect(result.value.geometry.canvasSize).toBe(246);
      expect(result.value.logoPlacement).toEqual({ left: 113, top: 113, right: 133, bottom: 133 });
      const canvas = RgbCanvas.fromRaster(result.value.image);
      expect(canvas.getPixel(120, 120)).toEqual([255, 0, 0]);
    });
  });

  it("fails on an unknown version", async () => {
    const result = await renderStyledQr(request({ version: 41 }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("unknown-version");
    }
  });

  it("fails on an invalid colour before encoding", async () => {
    const result = await renderStyledQr(request({ eyeColor: "not-a-color", version: 41 }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("invalid-color");
      expect(result.error.message).toContain("'not-a-color'");
    }
  });

  it("fails when the payload does not fit the version", async () => {
    const result = await renderStyledQr(request({ payload: "x".repeat(200) }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("payload-too-large");
    }
  });
});

describe("renderStyledQrToFile", () => {
  it("writes the rendered image", async () => {
    await withTempDir(async (dir) => {
      const outputPath = path.join(dir, "qr.png");
      const result = await renderStyledQrToFile({ ...request(), outputPath });
      if (!result.ok) {
        throw result.error;
      }
      expect(result.value.outputPath).toBe(outputPath);
      const meta = await sharp(outputPath).metadata();
      expect(meta.width).toBe(61);
      expect(meta.height).toBe(61);
    });
  });

  it("writes nothing when the payload does not fit", async () => {
    await withTempDir(async (dir) => {
      const outputPath = path.join(dir, "qr.png");
      const result = await renderStyledQrToFile({
        ...request({ payload: "x".repeat(200) }),
        outputPath,
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("payload-too-large");
      }
      expect(await pathExists(outputPath)).toBe(false);
    });
  });

  it("writes nothing when the logo is missing", async () => {
    await withTempDir(async (dir) => {
      const outputPath = path.join(dir, "qr.png");
      const result = await renderStyledQrToFile({
        ...request({ logoPath: path.join(dir, "missing.png") }),
        outputPath,
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("logo-not-found");
      }
      expect(await pathExists(outputPath)).toBe(false);
    });
  });
});
