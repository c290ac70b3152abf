import type { RgbCanvas, Quadrant } from "../media/canvas.js";
import type { ReadonlyModuleMatrix } from "../qr/matrix.js";
import { moduleCornerRadius, type RenderConfig } from "./types.js";

export type Corner = Quadrant;
export type CornerStyle = "sharp" | "rounded";

export const CORNERS: readonly Corner[] = ["top-left", "top-right", "bottom-right", "bottom-left"];

// Row/column offsets of the two orthogonal neighbours that share each corner.
const CORNER_NEIGHBORS: Record<Corner, readonly [readonly [number, number], readonly [number, number]]> = {
  "top-left": [
    [-1, 0],
    [0, -1],
  ],
  "top-right": [
    [-1, 0],
    [0, 1],
  ],
  "bottom-right": [
    [1, 0],
    [0, 1],
  ],
  "bottom-left": [
    [1, 0],
    [0, -1],
  ],
};

/**
 * A corner is rounded only when both neighbours touching it are inactive, so
 * rounding appears on the outside of a blob and never where two modules meet.
 */
export function cornerStyle(
  matrix: ReadonlyModuleMatrix,
  row: number,
  col: number,
  corner: Corner,
): CornerStyle {
  const [[dr1, dc1], [dr2, dc2]] = CORNER_NEIGHBORS[corner];
  if (matrix.isActive(row + dr1, col + dc1) || matrix.isActive(row + dr2, col + dc2)) {
    return "sharp";
  }
  return "rounded";
}

export function paintModule(
  canvas: RgbCanvas,
  matrix: ReadonlyModuleMatrix,
  row: number,
  col: number,
  config: RenderConfig,
): void {
  const box = config.boxSize;
  const x = (col + config.borderSize) * box;
  const y = (row + config.borderSize) * box;

  if (!matrix.isActive(row, col)) {
    canvas.fillRect(x, y, x + box, y + box, config.backColor);
    return;
  }

  const radius = moduleCornerRadius(config);
  const fill = config.fillColor;
  canvas.fillRect(x + radius, y, x + box - radius, y + box, fill);
  canvas.fillRect(x, y + radius, x + box, y + box - radius, fill);
  if (radius === 0) {
    return;
  }

  for (const corner of CORNERS) {
    const left = corner === "top-left" || corner === "bottom-left" ? x : x + box - radius;
    const top = corner === "top-left" || corner === "top-right" ? y : y + box - radius;
    if (cornerStyle(matrix, row, col, corner) === "sharp") {
      canvas.fillRect(left, top, left + radius, top + radius, fill);
      continue;
    }
    // Outside the arc the corner square stays background.
    canvas.fillRect(left, top, left + radius, top + radius, config.backColor);
    const cx = corner === "top-left" || corner === "bottom-left" ? x + radius : x + box - radius;
    const cy = corner === "top-left" || corner === "top-right" ? y + radius : y + box - radius;
    canvas.fillQuarterDisc(cx, cy, radius, corner, fill);
  }
}

/** Paints every cell of `matrix`; the matrix is only read. */
export function renderModules(
  canvas: RgbCanvas,
  matrix: ReadonlyModuleMatrix,
  config: RenderConfig,
): void {
  for (let row = 0; row < matrix.size; row += 1) {
    for (let col = 0; col < matrix.size; col += 1) {
      paintModule(canvas, matrix, row, col, config);
    }
  }
}
