// ============================================================================
// raycaster.ts - Grid traversal ray caster
// ============================================================================

import { ConfigError } from "../core/errors";
import { inBounds } from "../core/maps";
import { Face, cellIndex } from "../core/types";
import type { GridMap, RayHit } from "../core/types";

// Direction components smaller than this are treated as exactly parallel.
const PARALLEL_EPSILON = 1e-12;

// ============================================================================
// castRay
// ============================================================================

/**
 * Cast one ray from (originX, originY) at viewAngle + offset and walk the
 * grid one cell boundary at a time until the first wall cell.
 *
 * `distance` is measured along the view direction (rayLength * cos(offset)),
 * which keeps walls flat across the screen. Throws ConfigError if the ray
 * leaves the grid, which only an unenclosed map allows.
 */
export function castRay(
  map: GridMap,
  originX: number,
  originY: number,
  viewAngle: number,
  offset: number,
  cosOffset: number = Math.cos(offset),
): RayHit {
  const angle = viewAngle + offset;
  let dirX = Math.cos(angle);
  let dirY = Math.sin(angle);
  if (Math.abs(dirX) < PARALLEL_EPSILON) dirX = 0;
  if (Math.abs(dirY) < PARALLEL_EPSILON) dirY = 0;

  let mapX = Math.floor(originX);
  let mapY = Math.floor(originY);

  // ---- Per-axis setup ----
  // deltaX: ray length between two vertical grid lines
  // sideDistX: ray length from the origin to the first vertical grid line
  let stepX = 0;
  let stepY = 0;
  let deltaX = Infinity;
  let deltaY = Infinity;
  let sideDistX = Infinity;
  let sideDistY = Infinity;

  if (dirX !== 0) {
    deltaX = Math.abs(1 / dirX);
    if (dirX < 0) {
      stepX = -1;
      sideDistX = (originX - mapX) * deltaX;
    } else {
      stepX = 1;
      sideDistX = (mapX + 1 - originX) * deltaX;
    }
  }
  if (dirY !== 0) {
    deltaY = Math.abs(1 / dirY);
    if (dirY < 0) {
      stepY = -1;
      sideDistY = (originY - mapY) * deltaY;
    } else {
      stepY = 1;
      sideDistY = (mapY + 1 - originY) * deltaY;
    }
  }

  // ---- DDA loop ----
  // An enclosed map stops every ray within width + height crossings.
  const maxSteps = map.width + map.height;
  let steps = 0;
  let vertical = false;

  for (;;) {
    if (sideDistX < sideDistY) {
      sideDistX += deltaX;
      mapX += stepX;
      vertical = true;
    } else {
      sideDistY += deltaY;
      mapY += stepY;
      vertical = false;
    }
    steps++;

    if (!inBounds(map, mapX, mapY) || steps > maxSteps) {
      throw new ConfigError(
        `map is not enclosed: ray from (${originX}, ${originY}) at ${angle.toFixed(4)} rad left the grid`,
      );
    }
    if (map.walls[cellIndex(map, mapX, mapY)]) break;
  }

  // ---- Hit geometry ----
  let rayLength: number;
  let face: Face;
  let u: number;

  if (vertical) {
    rayLength = (mapX - originX + (stepX === 1 ? 0 : 1)) / dirX;
    const hitY = originY + rayLength * dirY;
    const frac = hitY - Math.floor(hitY);
    face = stepX === 1 ? Face.West : Face.East;
    u = face === Face.West ? frac : 1 - frac;
  } else {
    rayLength = (mapY - originY + (stepY === 1 ? 0 : 1)) / dirY;
    const hitX = originX + rayLength * dirX;
    const frac = hitX - Math.floor(hitX);
    face = stepY === 1 ? Face.North : Face.South;
    u = face === Face.South ? frac : 1 - frac;
  }

  return {
    distance: rayLength * cosOffset,
    rayLength,
    cellX: mapX,
    cellY: mapY,
    face,
    u,
    steps,
  };
}

/** True for faces that take the side darkening. */
export function isSideFace(face: Face): boolean {
  return face === Face.North || face === Face.South;
}
