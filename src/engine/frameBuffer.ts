// ============================================================================
// frameBuffer.ts - Intensity frame and depth buffer for one render pass
// ============================================================================

import { EMPTY } from "../core/types";
import type { StyleTag } from "../core/types";

/**
 * Row-major intensity cells (0-9, or EMPTY) with a style tag and a depth
 * per cell. Walls write the same depth down their whole column; sprites
 * write depth only where they paint. Cleared before every frame.
 */
export class FrameBuffer {
  readonly columns: number;
  readonly rows: number;
  readonly intensity: Int8Array;
  readonly depth: Float64Array;
  readonly styles: (StyleTag | undefined)[];

  constructor(columns: number, rows: number) {
    this.columns = columns;
    this.rows = rows;
    this.intensity = new Int8Array(columns * rows);
    this.depth = new Float64Array(columns * rows);
    this.styles = new Array<StyleTag | undefined>(columns * rows);
    this.clear();
  }

  clear(): void {
    this.intensity.fill(EMPTY);
    this.depth.fill(Infinity);
    this.styles.fill(undefined);
  }

  index(column: number, row: number): number {
    return row * this.columns + column;
  }

  get(column: number, row: number): number {
    return this.intensity[this.index(column, row)];
  }

  depthAt(column: number, row: number): number {
    return this.depth[this.index(column, row)];
  }

  styleAt(column: number, row: number): StyleTag | undefined {
    return this.styles[this.index(column, row)];
  }

  /** Paint one cell without touching its depth. */
  paint(column: number, row: number, value: number, style?: StyleTag): void {
    const i = this.index(column, row);
    this.intensity[i] = value;
    this.styles[i] = style;
  }

  /** Record `distance` for every row of a column. */
  setColumnDepth(column: number, distance: number): void {
    for (let row = 0; row < this.rows; row++) {
      this.depth[row * this.columns + column] = distance;
    }
  }
}
