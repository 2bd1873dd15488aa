/**
 * Glyphcaster - Core Types & Constants
 *
 * Shared data model for the map, textures, sprites, camera state, per-frame
 * input and the character grid handed to the display.
 */

// ============================================================
// Intensity Domain
// ============================================================

export const INTENSITY_MIN = 0;
export const INTENSITY_MAX = 9;
/** Texel value that leaves the distance shade untouched. */
export const NEUTRAL_INTENSITY = 6;
/** Sprite texel that paints nothing. */
export const TRANSPARENT = -1;
/** Frame buffer cell with nothing drawn in it. */
export const EMPTY = -1;

/** Glyph used for frame buffer cells that were never painted. */
export const BLANK_GLYPH = " ";

// ============================================================
// Enums
// ============================================================

/**
 * Which face of a wall cell a ray struck, named by the direction the face
 * points. The map's y axis grows downward (row order), angle 0 looks east.
 */
export enum Face {
  West,
  East,
  North,
  South,
}

// ============================================================
// Map
// ============================================================

/**
 * Rectangular grid of cells, row-major. A cell is a wall when
 * `walls[i] !== 0`; `textures[i]` is its 1-based wall texture id.
 */
export interface GridMap {
  width: number;
  height: number;
  walls: Uint8Array;
  textures: Uint8Array;
}

export function cellIndex(map: GridMap, x: number, y: number): number {
  return y * map.width + x;
}

// ============================================================
// Textures & Sprites
// ============================================================

/** Optional color/style tag carried through to the display. */
export type StyleTag = string;

/**
 * Row-major texels. Wall textures hold 0-9; sprite textures may also hold
 * TRANSPARENT.
 */
export interface Texture {
  width: number;
  height: number;
  texels: Int8Array;
  color?: StyleTag;
}

export function texelAt(tex: Texture, u: number, v: number): number {
  return tex.texels[v * tex.width + u];
}

/** A billboard placed in the world. Position is owned by game logic. */
export interface Sprite {
  x: number;
  y: number;
  /** Index into the sprite texture list. */
  texture: number;
}

// ============================================================
// Camera / Player
// ============================================================

export interface Vec2 {
  x: number;
  y: number;
}

/** Horizontal movement intent: forward (+) / back (-), strafe right (+) / left (-). */
export interface MoveIntent {
  forward: number;
  strafe: number;
}

export interface CameraState {
  x: number;
  y: number;
  /** Facing angle in radians; 0 looks along +x, PI/2 along +y. */
  angle: number;
  /** Vertical eye offset above the ground (jump), in wall heights. */
  z: number;
  /** Vertical velocity, wall heights per second. */
  vz: number;
  /** Horizontal velocity applied during the last update, units per second. */
  velocity: Vec2;
  /** Intent latched at take-off, replayed until landing. */
  airborneIntent: MoveIntent | null;
}

export function createCameraState(
  x: number,
  y: number,
  angle: number = 0,
): CameraState {
  return {
    x,
    y,
    angle,
    z: 0,
    vz: 0,
    velocity: { x: 0, y: 0 },
    airborneIntent: null,
  };
}

// ============================================================
// Per-frame Input
// ============================================================

export interface FrameInput {
  /** -1..1, positive moves toward the facing direction. */
  forward: number;
  /** -1..1, positive moves to the right of the facing direction. */
  strafe: number;
  /** -1..1, positive turns right; scaled by turnSpeed * dt. */
  turn: number;
  /** Rising edge of the jump control. */
  jump: boolean;
  /** Rising edge of the texture toggle. */
  toggleTextures: boolean;
}

export const NO_INPUT: Readonly<FrameInput> = Object.freeze({
  forward: 0,
  strafe: 0,
  turn: 0,
  jump: false,
  toggleTextures: false,
});

// ============================================================
// Ray Casting
// ============================================================

export interface RayHit {
  /** Distance along the camera's forward axis. */
  distance: number;
  /** Length of the ray from the camera to the hit point. */
  rayLength: number;
  cellX: number;
  cellY: number;
  face: Face;
  /** Fractional position along the struck face, in [0, 1], left to right as seen. */
  u: number;
  /** Grid-line crossings taken before the hit. */
  steps: number;
}

// ============================================================
// Output
// ============================================================

export interface Cell {
  glyph: string;
  style?: StyleTag;
}

/** Row-major character grid; `cells[row][column]`. */
export interface CharGrid {
  rows: number;
  columns: number;
  cells: Cell[][];
}

/** Everything the asset collaborator hands the core. */
export interface World {
  map: GridMap;
  wallTextures: Texture[];
  spriteTextures: Texture[];
  sprites: Sprite[];
  start: { x: number; y: number; angle: number };
}
