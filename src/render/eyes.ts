import { RgbCanvas } from "../media/canvas.js";
import type { RenderConfig } from "./types.js";

export const EYE_MODULES = 7;

export type EyeAnchor = { name: "top-left" | "top-right" | "bottom-left"; x: number; y: number };

/**
 * Nested rounded squares: a 7-module ring in the eye colour, a 5-module gap
 * in the background colour and a 3-module pupil in the fill colour.
 */
export function buildEyeGlyph(
  config: Pick<RenderConfig, "boxSize" | "fillColor" | "eyeColor" | "backColor">,
): RgbCanvas {
  const box = config.boxSize;
  const outer = EYE_MODULES * box;
  const gap = 5 * box;
  const pupil = 3 * box;
  const gapOffset = Math.floor((outer - gap) / 2);
  const pupilOffset = Math.floor((outer - pupil) / 2);

  const glyph = new RgbCanvas(outer, outer, config.backColor);
  glyph.fillRoundedRect(0, 0, outer, outer, box, config.eyeColor);
  glyph.fillRoundedRect(
    gapOffset,
    gapOffset,
    gapOffset + gap,
    gapOffset + gap,
    Math.floor(box / 2),
    config.backColor,
  );
  glyph.fillRoundedRect(
    pupilOffset,
    pupilOffset,
    pupilOffset + pupil,
    pupilOffset + pupil,
    Math.floor(box / 3),
    config.fillColor,
  );
  return glyph;
}

export function eyeAnchors(
  canvasWidth: number,
  canvasHeight: number,
  config: Pick<RenderConfig, "boxSize" | "borderSize">,
): EyeAnchor[] {
  const borderPx = config.borderSize * config.boxSize;
  const eyePx = EYE_MODULES * config.boxSize;
  return [
    { name: "top-left", x: borderPx, y: borderPx },
    { name: "top-right", x: canvasWidth - borderPx - eyePx, y: borderPx },
    { name: "bottom-left", x: borderPx, y: canvasHeight - borderPx - eyePx },
  ];
}

/** Replaces the three finder patterns with the custom glyph. */
export function renderEyes(canvas: RgbCanvas, config: RenderConfig): EyeAnchor[] {
  const glyph = buildEyeGlyph(config);
  const anchors = eyeAnchors(canvas.width, canvas.height, config);
  for (const anchor of anchors) {
    canvas.fillRect(
      anchor.x,
      anchor.y,
      anchor.x + glyph.width,
      anchor.y + glyph.height,
      config.backColor,
    );
    canvas.paste(glyph, anchor.x, anchor.y);
  }
  return anchors;
}
