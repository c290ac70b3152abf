import type { Rgb } from "../media/color.js";

export type RenderConfig = {
  readonly boxSize: number;
  readonly borderSize: number;
  readonly fillColor: Rgb;
  readonly backColor: Rgb;
  readonly eyeColor: Rgb;
  /** Corner radius as a fraction of `boxSize`. */
  readonly moduleRadiusRatio: number;
};

/** Logo rectangle in canvas pixels; `right` and `bottom` are exclusive. */
export type LogoPlacement = {
  readonly left: number;
  readonly top: number;
  readonly right: number;
  readonly bottom: number;
};

export function moduleCornerRadius(config: Pick<RenderConfig, "boxSize" | "moduleRadiusRatio">): number {
  const ratio = Number.isFinite(config.moduleRadiusRatio) ? config.moduleRadiusRatio : 0;
  const radius = Math.round(config.boxSize * Math.max(0, ratio));
  return Math.min(Math.floor(config.boxSize / 2), radius);
}
