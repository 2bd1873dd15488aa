/**
 * Glyphcaster - Math Tables
 *
 * Per-column view angles for the current resolution. Rebuild whenever the
 * column count or field of view changes.
 */

// ============================================================
// Column angle table
// ============================================================

export interface ColumnTable {
  columns: number;
  fov: number;
  /**
   * Distance from the eye to the projection plane, in columns:
   * (columns / 2) / tan(fov / 2).
   */
  focal: number;
  /** Signed angle offset of each column from the view center, radians. */
  angles: Float64Array;
  /** cos(angles[x]), used for perpendicular-distance correction. */
  cosines: Float64Array;
}

/**
 * Column x looks along atan((x - columns/2) / focal) relative to the view
 * direction, so column 0 sits exactly at -fov/2 and column columns/2 on the
 * view axis.
 */
export function buildColumnTable(columns: number, fov: number): ColumnTable {
  const halfWidth = columns / 2;
  const focal = halfWidth / Math.tan(fov / 2);
  const angles = new Float64Array(columns);
  const cosines = new Float64Array(columns);
  for (let x = 0; x < columns; x++) {
    const rad = Math.atan2(x - halfWidth, focal);
    angles[x] = rad;
    cosines[x] = Math.cos(rad);
  }
  return { columns, fov, focal, angles, cosines };
}

// ============================================================
// Angle utilities
// ============================================================

const TWO_PI = Math.PI * 2;

/** Normalize an angle to [0, 2PI). */
export function normalizeAngle(a: number): number {
  let v = a % TWO_PI;
  if (v < 0) v += TWO_PI;
  return v;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}
