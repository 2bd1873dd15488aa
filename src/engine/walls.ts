// ============================================================================
// walls.ts - Wall slice projection, texturing and distance shading
// ============================================================================

import type { ShadingConfig } from "../core/config";
import { DEFAULT_CONFIG } from "../core/config";
import { clamp } from "../core/math";
import {
  INTENSITY_MAX,
  INTENSITY_MIN,
  NEUTRAL_INTENSITY,
  texelAt,
} from "../core/types";
import type { RayHit, StyleTag, Texture } from "../core/types";
import type { FrameBuffer } from "./frameBuffer";
import { isSideFace } from "./raycaster";

// Distances are floored here before projecting so a camera touching a wall
// still yields a finite slice.
export const MIN_DISTANCE = 1e-4;

// ============================================================================
// Shading
// ============================================================================

/**
 * Shade a texel seen at `distance`.
 *
 * The distance sets a base level that falls linearly from nearLevel by
 * `falloff` per unit and bottoms out at minLevel. The texel then shifts that
 * level by (base - 6) * textureGain: 6 is neutral, lower darkens, higher
 * brightens. The sum is rounded and clipped to 0-9.
 */
export function shade(
  base: number,
  distance: number,
  params: ShadingConfig = DEFAULT_CONFIG.shading,
): number {
  const level = clamp(
    params.nearLevel - params.falloff * distance,
    params.minLevel,
    params.nearLevel,
  );
  const value = Math.round(level + params.textureGain * (base - NEUTRAL_INTENSITY));
  return clamp(value, INTENSITY_MIN, INTENSITY_MAX);
}

// ============================================================================
// Wall column
// ============================================================================

export interface WallColumnOptions {
  /** Camera height above the ground, in wall heights. */
  z: number;
  projectionScale: number;
  shading: ShadingConfig;
  /** Sample texels; when false every cell uses the neutral texel. */
  textured: boolean;
}

export interface WallSlice {
  /** Unclipped first row of the slice (may be fractional or negative). */
  top: number;
  /** Projected slice height in rows. */
  height: number;
  /** Clipped row range actually drawn, [start, end). */
  start: number;
  end: number;
}

/**
 * On-screen extent of a wall at `distance`: rows * projectionScale /
 * distance rows tall, centered, pushed down by z slice-heights.
 */
export function projectWall(
  rows: number,
  distance: number,
  z: number,
  projectionScale: number,
): WallSlice {
  const d = Math.max(distance, MIN_DISTANCE);
  const height = Math.floor((rows * projectionScale) / d);
  const top = (rows - height) / 2 + z * height;
  const start = clamp(Math.floor(top), 0, rows);
  const end = clamp(Math.floor(top + height), 0, rows);
  return { top, height, start, end };
}

/**
 * Draw one wall slice into `frame` and record the hit distance as the
 * depth of every row in the column. Touches no other column.
 */
export function drawWallColumn(
  frame: FrameBuffer,
  column: number,
  hit: RayHit,
  texture: Texture | undefined,
  options: WallColumnOptions,
): WallSlice {
  const { shading } = options;
  const slice = projectWall(frame.rows, hit.distance, options.z, options.projectionScale);
  const darken = isSideFace(hit.face) ? shading.sideDarken : 0;
  const style: StyleTag | undefined = texture?.color;
  const tex = options.textured ? texture : undefined;

  let texX = 0;
  if (tex) {
    texX = clamp(Math.floor(hit.u * tex.width), 0, tex.width - 1);
  }

  for (let y = slice.start; y < slice.end; y++) {
    let base = NEUTRAL_INTENSITY;
    if (tex) {
      const v = (y - slice.top) / slice.height;
      const texY = clamp(Math.floor(v * tex.height), 0, tex.height - 1);
      base = texelAt(tex, texX, texY);
    }
    let value = shade(base, hit.distance, shading);
    if (darken > 0) {
      value = clamp(Math.round(value - darken), INTENSITY_MIN, INTENSITY_MAX);
    }
    frame.paint(column, y, value, style);
  }

  frame.setColumnDepth(column, hit.distance);
  return slice;
}
