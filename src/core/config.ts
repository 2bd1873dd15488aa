/**
 * Glyphcaster - Configuration
 *
 * Every tunable the renderer and player read, with defaults. Overrides are
 * merged over DEFAULT_CONFIG and validated by resolveConfig(); the first
 * invalid field raises a ConfigError naming it.
 */

import { ConfigError } from "./errors";
import { degToRad } from "./math";
import { INTENSITY_MAX, INTENSITY_MIN } from "./types";

// ============================================================
// Config shape
// ============================================================

export interface ShadingConfig {
  /** Shade level at distance 0, before the texel offset. */
  nearLevel: number;
  /** Levels lost per unit of distance. */
  falloff: number;
  /** Lowest level distance alone can reach. */
  minLevel: number;
  /** Multiplier on (texel - 6). */
  textureGain: number;
  /** Levels subtracted on north/south faces. */
  sideDarken: number;
}

export interface MovementConfig {
  /** Units per second at full intent. */
  moveSpeed: number;
  /** Radians per second at full intent. */
  turnSpeed: number;
  /** Clearance kept between the camera and walls. */
  collisionRadius: number;
}

export interface JumpConfig {
  /** Take-off vertical velocity, wall heights per second. */
  velocity: number;
  /** Downward acceleration, wall heights per second squared. */
  gravity: number;
}

export interface FloorConfig {
  /** Intensity painted on the floor half; null leaves it blank. */
  intensity: number | null;
  /** Paint every n-th column. */
  stride: number;
}

export interface MinimapConfig {
  enabled: boolean;
  /** Fraction of the frame width. */
  width: number;
  /** Fraction of the frame height. */
  height: number;
  /** Columns between the minimap and the right edge. */
  offsetX: number;
  /** Rows between the minimap and the bottom edge. */
  offsetY: number;
}

export interface RenderConfig {
  resolution: { columns: number; rows: number };
  fitTerminal: boolean;
  /** Horizontal field of view, radians. */
  fov: number;
  /** Wall height in rows at distance 1, as a fraction of the frame height. */
  projectionScale: number;
  /** Glyphs ordered dark to bright. */
  palette: string;
  shading: ShadingConfig;
  texturesOn: boolean;
  floor: FloorConfig;
  movement: MovementConfig;
  jump: JumpConfig;
  minimap: MinimapConfig;
  fps: number;
  colors: boolean;
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object
    ? T[K] extends unknown[]
      ? T[K]
      : DeepPartial<T[K]>
    : T[K];
};

// ============================================================
// Defaults
// ============================================================

export const DEFAULT_PALETTE = " .:-=+*#%@";

export const DEFAULT_CONFIG: RenderConfig = {
  resolution: { columns: 80, rows: 24 },
  fitTerminal: true,
  fov: degToRad(60),
  projectionScale: 1,
  palette: DEFAULT_PALETTE,
  shading: {
    nearLevel: 9,
    falloff: 1,
    minLevel: 1,
    textureGain: 1,
    sideDarken: 1,
  },
  texturesOn: true,
  floor: { intensity: 1, stride: 2 },
  movement: { moveSpeed: 3, turnSpeed: 2.5, collisionRadius: 0.2 },
  jump: { velocity: 1.2, gravity: 4 },
  minimap: { enabled: true, width: 0.2, height: 0.3, offsetX: 2, offsetY: 1 },
  fps: 30,
  colors: true,
};

// ============================================================
// Resolution
// ============================================================

/**
 * Merge overrides over the defaults and validate the result.
 * Unknown keys are rejected so typos in a config file surface early.
 */
export function resolveConfig(
  overrides: DeepPartial<RenderConfig> = {},
  source?: string,
): RenderConfig {
  return buildConfig(overrides, source);
}

/** Parse a JSON config document; the result goes through the same checks. */
export function parseConfig(text: string, source?: string): RenderConfig {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`invalid JSON (${String(err)})`, source);
  }
  return buildConfig(data, source);
}

type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

class ConfigReader {
  constructor(
    private readonly values: Section,
    private readonly path: string,
    private readonly source: string | undefined,
    allowed: object,
  ) {
    for (const key of Object.keys(values)) {
      if (!(key in allowed)) {
        throw new ConfigError(`unknown option "${this.name(key)}"`, source);
      }
    }
  }

  static from(
    value: unknown,
    path: string,
    source: string | undefined,
    allowed: object,
  ): ConfigReader {
    if (value === undefined) {
      return new ConfigReader({}, path, source, allowed);
    }
    if (!isRecord(value)) {
      throw new ConfigError(
        path ? `"${path}" must be an object` : "config must be an object",
        source,
      );
    }
    return new ConfigReader(value, path, source, allowed);
  }

  section(key: string, allowed: object): ConfigReader {
    return ConfigReader.from(this.values[key], this.name(key), this.source, allowed);
  }

  number(key: string, fallback: number, min: number, max = Infinity): number {
    const value = this.values[key] ?? fallback;
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ConfigError(`"${this.name(key)}" must be a finite number`, this.source);
    }
    if (value < min || value > max) {
      throw new ConfigError(
        `"${this.name(key)}" must be in [${min}, ${max}]`,
        this.source,
      );
    }
    return value;
  }

  integer(key: string, fallback: number, min: number, max = Infinity): number {
    const value = this.number(key, fallback, min, max);
    if (!Number.isInteger(value)) {
      throw new ConfigError(`"${this.name(key)}" must be an integer`, this.source);
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const value = this.values[key] ?? fallback;
    if (typeof value !== "boolean") {
      throw new ConfigError(`"${this.name(key)}" must be true or false`, this.source);
    }
    return value;
  }

  string(key: string, fallback: string): string {
    const value = this.values[key] ?? fallback;
    if (typeof value !== "string") {
      throw new ConfigError(`"${this.name(key)}" must be a string`, this.source);
    }
    return value;
  }

  has(key: string): boolean {
    return key in this.values;
  }

  raw(key: string): unknown {
    return this.values[key];
  }

  name(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }
}

function buildConfig(overrides: unknown, source: string | undefined): RenderConfig {
  const d = DEFAULT_CONFIG;
  const root = ConfigReader.from(overrides, "", source, d);

  const res = root.section("resolution", d.resolution);
  const shade = root.section("shading", d.shading);
  const floor = root.section("floor", d.floor);
  const move = root.section("movement", d.movement);
  const jump = root.section("jump", d.jump);
  const mini = root.section("minimap", d.minimap);

  const palette = root.string("palette", d.palette);
  if (Array.from(palette).length === 0) {
    throw new ConfigError(`"palette" must not be empty`, source);
  }

  const shading: ShadingConfig = {
    nearLevel: shade.number("nearLevel", d.shading.nearLevel, INTENSITY_MIN, INTENSITY_MAX),
    falloff: shade.number("falloff", d.shading.falloff, 0),
    minLevel: shade.number("minLevel", d.shading.minLevel, INTENSITY_MIN, INTENSITY_MAX),
    textureGain: shade.number("textureGain", d.shading.textureGain, 0),
    sideDarken: shade.number("sideDarken", d.shading.sideDarken, 0, INTENSITY_MAX),
  };
  if (shading.minLevel > shading.nearLevel) {
    throw new ConfigError(
      `"shading.minLevel" must not exceed "shading.nearLevel"`,
      source,
    );
  }

  let floorIntensity = d.floor.intensity;
  if (floor.has("intensity")) {
    floorIntensity =
      floor.raw("intensity") === null
        ? null
        : floor.integer("intensity", 0, INTENSITY_MIN, INTENSITY_MAX);
  }

  return {
    resolution: {
      columns: res.integer("columns", d.resolution.columns, 1),
      rows: res.integer("rows", d.resolution.rows, 1),
    },
    fitTerminal: root.boolean("fitTerminal", d.fitTerminal),
    fov: root.number("fov", d.fov, 0.01, Math.PI - 0.01),
    projectionScale: root.number("projectionScale", d.projectionScale, 0.01),
    palette,
    shading,
    texturesOn: root.boolean("texturesOn", d.texturesOn),
    floor: {
      intensity: floorIntensity,
      stride: floor.integer("stride", d.floor.stride, 1),
    },
    movement: {
      moveSpeed: move.number("moveSpeed", d.movement.moveSpeed, 0),
      turnSpeed: move.number("turnSpeed", d.movement.turnSpeed, 0),
      collisionRadius: move.number("collisionRadius", d.movement.collisionRadius, 0, 0.49),
    },
    jump: {
      velocity: jump.number("velocity", d.jump.velocity, 0),
      gravity: jump.number("gravity", d.jump.gravity, 0.01),
    },
    minimap: {
      enabled: mini.boolean("enabled", d.minimap.enabled),
      width: mini.number("width", d.minimap.width, 0, 1),
      height: mini.number("height", d.minimap.height, 0, 1),
      offsetX: mini.integer("offsetX", d.minimap.offsetX, 0),
      offsetY: mini.integer("offsetY", d.minimap.offsetY, 0),
    },
    fps: root.number("fps", d.fps, 1, 240),
    colors: root.boolean("colors", d.colors),
  };
}
