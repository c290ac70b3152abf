import fs from "node:fs/promises";
import sharp from "sharp";
import { extractErrorCode, formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { QrRenderError } from "../render/errors.js";
import type { RasterImage, RgbCanvas } from "./canvas.js";

const log = createSubsystemLogger("media/image-io");

export type CropBox = { left: number; top: number; width: number; height: number };

/**
 * Largest centred region of a `srcWidth x srcHeight` image whose
 * width/height ratio is `aspect`. Scaling that region fills the target box
 * without letterboxing or distortion.
 */
export function coverCrop(srcWidth: number, srcHeight: number, aspect: number): CropBox {
  if (srcWidth / srcHeight > aspect) {
    const width = Math.max(1, Math.min(srcWidth, Math.round(srcHeight * aspect)));
    return { left: Math.floor((srcWidth - width) / 2), top: 0, width, height: srcHeight };
  }
  const height = Math.max(1, Math.min(srcHeight, Math.round(srcWidth / aspect)));
  return { left: 0, top: Math.floor((srcHeight - height) / 2), width: srcWidth, height };
}

/** Shrink-only fit into a `maxSize` square, keeping the aspect ratio. */
export function fitWithin(
  width: number,
  height: number,
  maxSize: number,
): { width: number; height: number } {
  const limit = Math.max(1, Math.floor(maxSize));
  if (width <= limit && height <= limit) {
    return { width, height };
  }
  const scale = Math.min(limit / width, limit / height);
  return {
    width: Math.max(1, Math.min(limit, Math.round(width * scale))),
    height: Math.max(1, Math.min(limit, Math.round(height * scale))),
  };
}

async function assertReadable(logoPath: string): Promise<void> {
  try {
    const stat = await fs.stat(logoPath);
    if (!stat.isFile()) {
      throw new QrRenderError("logo-decode", `Could not open logo '${logoPath}': not a file`);
    }
  } catch (err) {
    if (err instanceof QrRenderError) {
      throw err;
    }
    const code = extractErrorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new QrRenderError("logo-not-found", `Logo file '${logoPath}' not found.`, {
        cause: err,
      });
    }
    throw new QrRenderError("logo-decode", `Could not open logo '${logoPath}': ${formatErrorMessage(err)}`, {
      cause: err,
    });
  }
}

/**
 * Loads a logo, centre-crops it to `aspect` and shrinks it to fit `maxSize`.
 * Always returns RGBA so transparent logos keep their silhouette.
 */
export async function loadLogo(
  logoPath: string,
  opts: { aspect: number; maxSize: number },
): Promise<RasterImage> {
  await assertReadable(logoPath);
  try {
    const meta = await sharp(logoPath).metadata();
    if (!meta.width || !meta.height) {
      throw new Error("image has no dimensions");
    }
    const crop = coverCrop(meta.width, meta.height, opts.aspect);
    const target = fitWithin(crop.width, crop.height, opts.maxSize);
    const { data, info } = await sharp(logoPath)
      .extract(crop)
      .resize({
        width: target.width,
        height: target.height,
        fit: "fill",
        kernel: sharp.kernel.lanczos3,
      })
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });
    if (info.channels !== 4) {
      throw new Error(`expected 4 channels after alpha expansion, got ${info.channels}`);
    }
    log.debug("normalized logo", {
      source: `${meta.width}x${meta.height}`,
      crop,
      size: `${info.width}x${info.height}`,
    });
    return { width: info.width, height: info.height, channels: 4, data };
  } catch (err) {
    throw new QrRenderError(
      "logo-decode",
      `Could not open logo '${logoPath}': ${formatErrorMessage(err)}`,
      { cause: err },
    );
  }
}

/**
 * Lanczos downsample by an integer factor. The canvas must already be a
 * multiple of `factor` in both dimensions.
 */
export async function downsample(canvas: RgbCanvas, factor: number): Promise<RasterImage> {
  if (canvas.width % factor !== 0 || canvas.height % factor !== 0) {
    throw new RangeError(
      `canvas ${canvas.width}x${canvas.height} is not a multiple of supersample factor ${factor}`,
    );
  }
  if (factor === 1) {
    return canvas.toRaster();
  }
  const width = canvas.width / factor;
  const height = canvas.height / factor;
  // The canvas is our own buffer, so sharp's decompression-bomb cap does not apply.
  const { data, info } = await sharp(canvas.data, {
    raw: { width: canvas.width, height: canvas.height, channels: 3 },
    limitInputPixels: false,
  })
    .resize({ width, height, fit: "fill", kernel: sharp.kernel.lanczos3 })
    .raw()
    .toBuffer({ resolveWithObject: true });
  if (info.channels !== 3) {
    throw new Error(`expected 3 channels after downsampling, got ${info.channels}`);
  }
  return { width: info.width, height: info.height, channels: 3, data };
}

/** Encodes `image` in the format implied by the output extension. */
export async function saveImage(image: RasterImage, outputPath: string): Promise<void> {
  try {
    await sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
      limitInputPixels: false,
    }).toFile(outputPath);
  } catch (err) {
    throw new QrRenderError(
      "output-write",
      `Could not write '${outputPath}': ${formatErrorMessage(err)}`,
      { cause: err },
    );
  }
}
