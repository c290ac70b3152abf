import { RgbCanvas, type RasterImage } from "../media/canvas.js";
import { parseColor } from "../media/color.js";
import { downsample, loadLogo, saveImage } from "../media/image-io.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { moduleCountForVersion } from "../qr/matrix.js";
import {
  buildModuleMatrix,
  unknownVersionError,
  type ErrorCorrectionLevel,
} from "../qr/provider.js";
import { runStage, stageFail, stageOk, type StageResult } from "./errors.js";
import { renderEyes } from "./eyes.js";
import { composeLogo } from "./logo.js";
import { clearLogoArea, computeLogoPlacement } from "./logo-area.js";
import { renderModules } from "./modules.js";
import type { LogoPlacement, RenderConfig } from "./types.js";

const log = createSubsystemLogger("render");

export type RenderRequest = {
  payload: string;
  /** Requested output edge in pixels, before trimming to whole modules. */
  targetSize: number;
  fillColor: string;
  eyeColor: string;
  backColor: string;
  logoPath: string | null;
  version: number;
  errorCorrection: ErrorCorrectionLevel;
  borderSize: number;
  supersample: number;
  moduleRadiusRatio: number;
  /** Width/height ratio the logo is cropped to. */
  logoAspect: number;
  /** Gap kept around the logo cap, in output pixels. */
  logoPadding: number;
};

export type RenderGeometry = {
  moduleCount: number;
  workingSize: number;
  boxSize: number;
  canvasSize: number;
  /** Canvas edge trimmed to a multiple of the supersample factor. */
  sampledSize: number;
  /** Pixels trimmed before the sampled region on each axis; the rest go after it. */
  sampledOffset: number;
  outputSize: number;
};

export type RenderedQr = {
  image: RasterImage;
  geometry: RenderGeometry;
  config: RenderConfig;
  logoPlacement: LogoPlacement | null;
  clearedModules: number;
};

export function planRenderGeometry(params: {
  targetSize: number;
  supersample: number;
  moduleCount: number;
  borderSize: number;
}): RenderGeometry {
  const { targetSize, supersample, moduleCount, borderSize } = params;
  if (!Number.isInteger(targetSize) || targetSize < 1) {
    throw new RangeError(`target size must be a positive integer (got ${targetSize})`);
  }
  if (!Number.isInteger(supersample) || supersample < 1) {
    throw new RangeError(`supersample factor must be a positive integer (got ${supersample})`);
  }
  if (!Number.isInteger(borderSize) || borderSize < 0) {
    throw new RangeError(`border must be a non-negative integer (got ${borderSize})`);
  }
  const workingSize = targetSize * supersample;
  const span = moduleCount + borderSize * 2;
  const boxSize = Math.max(1, Math.floor(workingSize / span));
  const canvasSize = span * boxSize;
  const sampledSize = Math.floor(canvasSize / supersample) * supersample;
  if (sampledSize === 0) {
    throw new RangeError(
      `canvas of ${canvasSize}px is smaller than the supersample factor ${supersample}`,
    );
  }
  return {
    moduleCount,
    workingSize,
    boxSize,
    canvasSize,
    sampledSize,
    sampledOffset: Math.floor((canvasSize - sampledSize) / 2),
    outputSize: sampledSize / supersample,
  };
}

export function logoMaxSize(canvasSize: number, logoPadding: number, supersample: number): number {
  return Math.floor(canvasSize / 4) - logoPadding * supersample;
}

/**
 * Renders the styled symbol. Each stage returns a result and the first failure
 * ends the render; nothing is allocated for the canvas until the matrix and
 * the logo are ready.
 */
export async function renderStyledQr(request: RenderRequest): Promise<StageResult<RenderedQr>> {
  const startedAt = Date.now();

  const colors = await runStage(() => ({
    fill: parseColor(request.fillColor),
    eye: parseColor(request.eyeColor),
    back: parseColor(request.backColor),
  }));
  if (!colors.ok) {
    return colors;
  }

  const moduleCount = moduleCountForVersion(request.version);
  if (moduleCount === undefined) {
    return stageFail(unknownVersionError(request.version));
  }
  const geometry = planRenderGeometry({
    targetSize: request.targetSize,
    supersample: request.supersample,
    moduleCount,
    borderSize: request.borderSize,
  });
  log.debug("planned geometry", { ...geometry, supersample: request.supersample });

  const matrix = buildModuleMatrix({
    payload: request.payload,
    version: request.version,
    errorCorrection: request.errorCorrection,
  });
  if (!matrix.ok) {
    return matrix;
  }

  let logo: RasterImage | null = null;
  if (request.logoPath !== null) {
    const logoPath = request.logoPath;
    const loaded = await runStage(() =>
      loadLogo(logoPath, {
        aspect: request.logoAspect,
        maxSize: logoMaxSize(geometry.canvasSize, request.logoPadding, request.supersample),
      }),
    );
    if (!loaded.ok) {
      return loaded;
    }
    logo = loaded.value;
  }

  const config: RenderConfig = {
    boxSize: geometry.boxSize,
    borderSize: request.borderSize,
    fillColor: colors.value.fill,
    backColor: colors.value.back,
    eyeColor: colors.value.eye,
    moduleRadiusRatio: request.moduleRadiusRatio,
  };

  let logoPlacement: LogoPlacement | null = null;
  let clearedModules = 0;
  if (logo) {
    logoPlacement = computeLogoPlacement({
      canvasWidth: geometry.canvasSize,
      canvasHeight: geometry.canvasSize,
      logoWidth: logo.width,
      logoHeight: logo.height,
    });
    clearedModules = clearLogoArea(
      matrix.value,
      logoPlacement,
      geometry.boxSize,
      request.borderSize,
    );
    log.debug("cleared logo area", { placement: logoPlacement, clearedModules });
  }

  const canvas = new RgbCanvas(geometry.canvasSize, geometry.canvasSize, config.backColor);
  renderModules(canvas, matrix.value, config);
  renderEyes(canvas, config);
  if (logo && logoPlacement) {
    composeLogo(canvas, logo, logoPlacement, config);
  }

  const sampled = canvas.crop(
    geometry.sampledSize,
    geometry.sampledSize,
    geometry.sampledOffset,
    geometry.sampledOffset,
  );
  const image = await downsample(sampled, request.supersample);
  log.info("rendered qr", {
    size: `${image.width}x${image.height}`,
    boxSize: geometry.boxSize,
    ms: Date.now() - startedAt,
  });
  return stageOk({ image, geometry, config, logoPlacement, clearedModules });
}

/** Renders and writes the image; no file is written when a stage fails. */
export async function renderStyledQrToFile(
  request: RenderRequest & { outputPath: string },
): Promise<StageResult<RenderedQr & { outputPath: string }>> {
  const rendered = await renderStyledQr(request);
  if (!rendered.ok) {
    return rendered;
  }
  const saved = await runStage(() => saveImage(rendered.value.image, request.outputPath));
  if (!saved.ok) {
    return saved;
  }
  log.debug("saved qr", { outputPath: request.outputPath });
  return stageOk({ ...rendered.value, outputPath: request.outputPath });
}
