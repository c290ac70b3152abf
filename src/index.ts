export { ConfigError, loadConfig, resolveRenderRequest } from "./config/config.js";
export type { LoadedConfig, RenderOverrides } from "./config/config.js";
export type { QrStylerConfig } from "./config/schema.js";
export { RgbCanvas } from "./media/canvas.js";
export type { Quadrant, RasterImage } from "./media/canvas.js";
export { formatRgb, parseColor } from "./media/color.js";
export type { Rgb } from "./media/color.js";
export { coverCrop, downsample, fitWithin, loadLogo, saveImage } from "./media/image-io.js";
export { ModuleMatrix, moduleCountForVersion } from "./qr/matrix.js";
export type { ReadonlyModuleMatrix } from "./qr/matrix.js";
export { buildModuleMatrix } from "./qr/provider.js";
export type { ErrorCorrectionLevel } from "./qr/provider.js";
export { QrRenderError } from "./render/errors.js";
export type { QrRenderErrorKind, StageResult } from "./render/errors.js";
export { buildEyeGlyph, eyeAnchors, renderEyes } from "./render/eyes.js";
export { composeLogo } from "./render/logo.js";
export { clearLogoArea, computeLogoPlacement, logoModuleSpan } from "./render/logo-area.js";
export { cornerStyle, renderModules } from "./render/modules.js";
export type { Corner, CornerStyle } from "./render/modules.js";
export {
  logoMaxSize,
  planRenderGeometry,
  renderStyledQr,
  renderStyledQrToFile,
} from "./render/pipeline.js";
export type { RenderedQr, RenderGeometry, RenderRequest } from "./render/pipeline.js";
export type { LogoPlacement, RenderConfig } from "./render/types.js";
