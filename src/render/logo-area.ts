import type { ModuleMatrix } from "../qr/matrix.js";
import type { LogoPlacement } from "./types.js";

export type ModuleSpan = {
  /** First module row/column covered, in canvas module units (border included). */
  top: number;
  left: number;
  /** Exclusive end. */
  bottom: number;
  right: number;
};

export function computeLogoPlacement(params: {
  canvasWidth: number;
  canvasHeight: number;
  logoWidth: number;
  logoHeight: number;
}): LogoPlacement {
  const left = Math.floor((params.canvasWidth - params.logoWidth) / 2);
  const top = Math.floor((params.canvasHeight - params.logoHeight) / 2);
  return {
    left,
    top,
    right: left + params.logoWidth,
    bottom: top + params.logoHeight,
  };
}

/** Every module the placement touches, even by a single pixel. */
export function logoModuleSpan(placement: LogoPlacement, boxSize: number): ModuleSpan {
  return {
    top: Math.floor(placement.top / boxSize),
    left: Math.floor(placement.left / boxSize),
    bottom: Math.ceil(placement.bottom / boxSize),
    right: Math.ceil(placement.right / boxSize),
  };
}

/**
 * Deactivates the modules under the logo. Coordinates that fall in the border
 * or past the matrix edge are skipped. Returns how many active cells were
 * cleared.
 */
export function clearLogoArea(
  matrix: ModuleMatrix,
  placement: LogoPlacement,
  boxSize: number,
  borderSize: number,
): number {
  const span = logoModuleSpan(placement, boxSize);
  let cleared = 0;
  for (let absRow = span.top; absRow < span.bottom; absRow += 1) {
    for (let absCol = span.left; absCol < span.right; absCol += 1) {
      const row = absRow - borderSize;
      const col = absCol - borderSize;
      if (row < 0 || col < 0 || row >= matrix.size || col >= matrix.size) {
        continue;
      }
      if (matrix.clear(row, col)) {
        cleared += 1;
      }
    }
  }
  return cleared;
}
