export const DEFAULT_GRID_ROWS = 27;
export const DEFAULT_GRID_COLS = 48;

export type HeatMapCell = {
  row: number;
  col: number;
  hits: number;
};

export type HeatMapSnapshot = {
  rows: number;
  cols: number;
  frameCount: number;
  hits: number[];
};

export type ExclusionMask = {
  width: number;
  height: number;
  /** 1 = motion counts, 0 = excluded. */
  data: Uint8Array;
  excludedCells: number;
};

/**
 * Counts, per grid cell, the calibration frames that showed foreground motion.
 * Cell bounds are derived from the frame size on every record so the grid
 * always tiles the whole frame.
 */
export class MotionHeatMap {
  readonly rows: number;
  readonly cols: number;
  private readonly hits: Uint32Array;
  private frames = 0;

  constructor(rows = DEFAULT_GRID_ROWS, cols = DEFAULT_GRID_COLS) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new Error(`Invalid heat map grid ${cols}x${rows}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.hits = new Uint32Array(rows * cols);
  }

  get frameCount() {
    return this.frames;
  }

  record(mask: Uint8Array, width: number, height: number) {
    const columnOf = buildCellLookup(width, this.cols);
    const rowOf = buildCellLookup(height, this.rows);
    const touched = new Uint8Array(this.rows * this.cols);

    for (let y = 0; y < height; y += 1) {
      const rowOffset = rowOf[y] * this.cols;
      const pixelRow = y * width;
      for (let x = 0; x < width; x += 1) {
        if (mask[pixelRow + x] !== 0) {
          touched[rowOffset + columnOf[x]] = 1;
        }
      }
    }

    for (let i = 0; i < touched.length; i += 1) {
      if (touched[i] !== 0) {
        this.hits[i] += 1;
      }
    }
    this.frames += 1;
  }

  hitsAt(row: number, col: number): number {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) {
      return 0;
    }
    return this.hits[row * this.cols + col];
  }

  persistentCells(ratio: number): HeatMapCell[] {
    const threshold = this.frames * ratio;
    const cells: HeatMapCell[] = [];
    for (let row = 0; row < this.rows; row += 1) {
      for (let col = 0; col < this.cols; col += 1) {
        const hits = this.hits[row * this.cols + col];
        if (hits > threshold) {
          cells.push({ row, col, hits });
        }
      }
    }
    return cells;
  }

  snapshot(): HeatMapSnapshot {
    return {
      rows: this.rows,
      cols: this.cols,
      frameCount: this.frames,
      hits: Array.from(this.hits)
    };
  }

  reset() {
    this.hits.fill(0);
    this.frames = 0;
  }
}

export function cellBounds(index: number, extent: number, cells: number) {
  return {
    start: Math.floor((index * extent) / cells),
    end: Math.floor(((index + 1) * extent) / cells)
  };
}

function buildCellLookup(extent: number, cells: number): Uint16Array {
  const lookup = new Uint16Array(extent);
  for (let cell = 0; cell < cells; cell += 1) {
    const { start, end } = cellBounds(cell, extent, cells);
    lookup.fill(cell, start, end);
  }
  return lookup;
}

export function buildExclusionMask(
  heatMap: MotionHeatMap,
  width: number,
  height: number,
  ratio: number
): ExclusionMask {
  const data = new Uint8Array(width * height).fill(1);
  const cells = heatMap.persistentCells(ratio);
  const margin = Math.floor(width / heatMap.cols / 2);

  for (const cell of cells) {
    const columns = cellBounds(cell.col, width, heatMap.cols);
    const rows = cellBounds(cell.row, height, heatMap.rows);
    const x0 = Math.max(0, columns.start - margin);
    const x1 = Math.min(width, columns.end + margin);
    const y0 = Math.max(0, rows.start - margin);
    const y1 = Math.min(height, rows.end + margin);
    for (let y = y0; y < y1; y += 1) {
      data.fill(0, y * width + x0, y * width + x1);
    }
  }

  return { width, height, data, excludedCells: cells.length };
}
