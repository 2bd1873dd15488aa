/**
 * Glyphcaster - Minimap Overlay
 *
 * Draws a top-down window of the map around the player into the lower-right
 * corner of a finished character grid.
 */

import type { MinimapConfig } from "../core/config";
import { isWall } from "../core/maps";
import type { CameraState, CharGrid, GridMap } from "../core/types";

// ============================================================
// Glyphs
// ============================================================

const GLYPH_WALL = "#";
const GLYPH_OPEN = " ";
const GLYPH_PLAYER = "@";

// ============================================================
// Helpers
// ============================================================

function setCell(grid: CharGrid, x: number, y: number, glyph: string): void {
  if (x < 0 || x >= grid.columns || y < 0 || y >= grid.rows) return;
  grid.cells[y][x] = { glyph };
}

function inMap(map: GridMap, x: number, y: number): boolean {
  return x >= 0 && x < map.width && y >= 0 && y < map.height;
}

// ============================================================
// Minimap
// ============================================================

/**
 * One glyph per map cell, centered on the player's cell. Cells past the
 * map edge are left open. The box is `width` x `height` fractions of the
 * grid, inset `offsetX` columns and `offsetY` rows from the corner.
 */
export function drawMinimap(
  grid: CharGrid,
  map: GridMap,
  camera: CameraState,
  cfg: MinimapConfig,
): void {
  if (!cfg.enabled) return;

  const w = Math.floor(grid.columns * cfg.width);
  const h = Math.floor(grid.rows * cfg.height);
  if (w <= 0 || h <= 0) return;

  const left = grid.columns - cfg.offsetX - w;
  const top = grid.rows - cfg.offsetY - h;
  const originX = Math.floor(camera.x) - Math.floor(w / 2);
  const originY = Math.floor(camera.y) - Math.floor(h / 2);

  for (let j = 0; j < h; j++) {
    for (let i = 0; i < w; i++) {
      const mx = originX + i;
      const my = originY + j;
      const wall = inMap(map, mx, my) && isWall(map, mx, my);
      setCell(grid, left + i, top + j, wall ? GLYPH_WALL : GLYPH_OPEN);
    }
  }

  setCell(grid, left + Math.floor(w / 2), top + Math.floor(h / 2), GLYPH_PLAYER);
}
