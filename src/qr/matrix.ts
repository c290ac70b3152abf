export const MIN_QR_VERSION = 1;
export const MAX_QR_VERSION = 40;

/** Module count per side for a QR version, or undefined for versions outside 1-40. */
export function moduleCountForVersion(version: number): number | undefined {
  if (!Number.isInteger(version) || version < MIN_QR_VERSION || version > MAX_QR_VERSION) {
    return undefined;
  }
  return 17 + version * 4;
}

export type ReadonlyModuleMatrix = {
  readonly size: number;
  isActive: (row: number, col: number) => boolean;
};

/**
 * Square grid of QR modules. Reads outside the grid are inactive; cells can be
 * cleared after construction but never activated again.
 */
export class ModuleMatrix implements ReadonlyModuleMatrix {
  readonly size: number;
  private readonly cells: Uint8Array;

  constructor(size: number, isDark: (row: number, col: number) => boolean = () => false) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`invalid module matrix size: ${size}`);
    }
    this.size = size;
    this.cells = new Uint8Array(size * size);
    for (let row = 0; row < size; row += 1) {
      for (let col = 0; col < size; col += 1) {
        this.cells[row * size + col] = isDark(row, col) ? 1 : 0;
      }
    }
  }

  static fromRows(rows: ReadonlyArray<ReadonlyArray<boolean>>): ModuleMatrix {
    return new ModuleMatrix(rows.length, (row, col) => rows[row]?.[col] === true);
  }

  private contains(row: number, col: number): boolean {
    return row >= 0 && col >= 0 && row < this.size && col < this.size;
  }

  isActive(row: number, col: number): boolean {
    if (!this.contains(row, col)) {
      return false;
    }
    return this.cells[row * this.size + col] === 1;
  }

  /** Marks a cell inactive. Returns true when the cell was active before. */
  clear(row: number, col: number): boolean {
    if (!this.contains(row, col)) {
      return false;
    }
    const idx = row * this.size + col;
    const wasActive = this.cells[idx] === 1;
    this.cells[idx] = 0;
    return wasActive;
  }

  countActive(): number {
    let count = 0;
    for (const cell of this.cells) {
      count += cell;
    }
    return count;
  }

  toRows(): boolean[][] {
    return Array.from({ length: this.size }, (_, row) =>
      Array.from({ length: this.size }, (_unused, col) => this.isActive(row, col)),
    );
  }
}
