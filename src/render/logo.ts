import type { RasterImage, RgbCanvas } from "../media/canvas.js";
import type { LogoPlacement, RenderConfig } from "./types.js";

/**
 * Paints a rounded background patch over the placement and blends the logo
 * on top of it using the logo's alpha. Runs after the eyes.
 */
export function composeLogo(
  canvas: RgbCanvas,
  logo: RasterImage,
  placement: LogoPlacement,
  config: Pick<RenderConfig, "boxSize" | "backColor">,
): void {
  if (placement.right <= placement.left || placement.bottom <= placement.top) {
    return;
  }
  // The patch is opaque, so painting it directly matches compositing it from
  // a transparent layer: only the rounded silhouette changes.
  canvas.fillRoundedRect(
    placement.left,
    placement.top,
    placement.right,
    placement.bottom,
    Math.floor(config.boxSize / 2),
    config.backColor,
  );
  canvas.composite(logo, placement.left, placement.top);
}
