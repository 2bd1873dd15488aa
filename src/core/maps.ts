/**
 * Glyphcaster - Map Model
 *
 * Builds and validates the static wall grid. A map is usable only when it
 * is rectangular and fully enclosed: every border cell is a wall, so no ray
 * and no camera can leave the grid.
 */

import { ConfigError } from "./errors";
import { type GridMap, cellIndex } from "./types";

// ============================================================
// Construction
// ============================================================

/**
 * Build a map from rows of cell values, where 0 is open floor and any
 * other value is a wall using that 1-based texture id.
 */
export function createMap(rows: readonly (readonly number[])[], source?: string): GridMap {
  const height = rows.length;
  if (height === 0) {
    throw new ConfigError("map has no rows", source);
  }
  const width = rows[0].length;
  if (width === 0) {
    throw new ConfigError("map has an empty first row", source);
  }

  const walls = new Uint8Array(width * height);
  const textures = new Uint8Array(width * height);

  for (let y = 0; y < height; y++) {
    const row = rows[y];
    if (row.length !== width) {
      throw new ConfigError(
        `map row ${y} has ${row.length} cells, expected ${width}`,
        source,
      );
    }
    for (let x = 0; x < width; x++) {
      const value = row[x];
      if (!Number.isInteger(value) || value < 0 || value > 255) {
        throw new ConfigError(`map cell (${x}, ${y}) has invalid value ${value}`, source);
      }
      const i = y * width + x;
      walls[i] = value > 0 ? 1 : 0;
      textures[i] = value;
    }
  }

  const map: GridMap = { width, height, walls, textures };
  assertEnclosed(map, source);
  return map;
}

/**
 * Parse the text map format: one line per row, one digit per cell.
 * Blank trailing lines are ignored.
 */
export function parseMap(text: string, source?: string): GridMap {
  const lines = text.replace(/\r/g, "").split("\n");
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }
  const rows = lines.map((line, y) =>
    Array.from(line, (ch, x) => {
      if (ch < "0" || ch > "9") {
        throw new ConfigError(`map cell (${x}, ${y}) is "${ch}", expected a digit`, source);
      }
      return ch.charCodeAt(0) - 48;
    }),
  );
  return createMap(rows, source);
}

// ============================================================
// Validation
// ============================================================

export function assertEnclosed(map: GridMap, source?: string): void {
  const { width, height } = map;
  for (let x = 0; x < width; x++) {
    if (!map.walls[x] || !map.walls[(height - 1) * width + x]) {
      throw new ConfigError(`map is not enclosed: open border cell in column ${x}`, source);
    }
  }
  for (let y = 0; y < height; y++) {
    if (!map.walls[y * width] || !map.walls[y * width + width - 1]) {
      throw new ConfigError(`map is not enclosed: open border cell in row ${y}`, source);
    }
  }
}

/** Every wall must reference one of the `count` loaded wall textures. */
export function assertTextureIds(map: GridMap, count: number, source?: string): void {
  for (let y = 0; y < map.height; y++) {
    for (let x = 0; x < map.width; x++) {
      const i = cellIndex(map, x, y);
      if (map.walls[i] && map.textures[i] > count) {
        throw new ConfigError(
          `map cell (${x}, ${y}) uses wall texture ${map.textures[i]} but only ${count} are loaded`,
          source,
        );
      }
    }
  }
}

// ============================================================
// Queries
// ============================================================

export function inBounds(map: GridMap, x: number, y: number): boolean {
  return x >= 0 && x < map.width && y >= 0 && y < map.height;
}

/** Cells outside the grid count as solid. */
export function isWall(map: GridMap, x: number, y: number): boolean {
  const tx = Math.floor(x);
  const ty = Math.floor(y);
  if (!inBounds(map, tx, ty)) return true;
  return map.walls[cellIndex(map, tx, ty)] !== 0;
}

export function textureIdAt(map: GridMap, x: number, y: number): number {
  return map.textures[cellIndex(map, x, y)];
}

/** Build a rectangular room of the given interior size, walls using `textureId`. */
export function createRoom(
  interiorWidth: number,
  interiorHeight: number,
  textureId: number = 1,
): GridMap {
  const rows: number[][] = [];
  for (let y = 0; y < interiorHeight + 2; y++) {
    const row: number[] = [];
    for (let x = 0; x < interiorWidth + 2; x++) {
      const border =
        x === 0 || y === 0 || x === interiorWidth + 1 || y === interiorHeight + 1;
      row.push(border ? textureId : 0);
    }
    rows.push(row);
  }
  return createMap(rows);
}
