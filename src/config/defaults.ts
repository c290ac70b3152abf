import type { ErrorCorrectionLevel } from "../qr/provider.js";

export const DEFAULT_TARGET_SIZE = 2048;
export const DEFAULT_FILL_COLOR = "black";
export const DEFAULT_EYE_COLOR = "black";
export const DEFAULT_BACK_COLOR = "white";
export const DEFAULT_LOGO_PATH = "logo.png";
export const DEFAULT_OUTPUT_PATH = "my_custom_qr.png";

export const DEFAULT_QR_VERSION = 6;
export const DEFAULT_ERROR_CORRECTION: ErrorCorrectionLevel = "H";
export const DEFAULT_BORDER = 4;
export const DEFAULT_SUPERSAMPLE = 4;
export const DEFAULT_MODULE_RADIUS_RATIO = 0.5;
export const DEFAULT_LOGO_ASPECT = 1;
export const DEFAULT_LOGO_PADDING = 2;
