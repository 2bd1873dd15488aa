/**
 * Glyphcaster Asset Loader
 *
 * Loads the world from disk: the map, wall and sprite textures (text or
 * PNG), sprite placements and the camera start, all named by a world.json
 * manifest. PNGs are decoded with sharp and reduced to 0-9 intensities.
 */

import { readFile } from "node:fs/promises";
import { dirname, extname, resolve } from "node:path";
import sharp from "sharp";
import { ConfigError } from "../core/errors";
import { assertTextureIds, isWall, parseMap } from "../core/maps";
import { INTENSITY_MAX, TRANSPARENT } from "../core/types";
import type { Sprite, Texture, World } from "../core/types";

// ============================================================
// Text textures
// ============================================================

/** Glyph marking a transparent texel in sprite texture files. */
export const TRANSPARENT_CHAR = ".";

export interface TextureOptions {
  /** Accept TRANSPARENT_CHAR (sprite textures). */
  transparent?: boolean;
  color?: string;
  source?: string;
}

/**
 * Parse a texture written as lines of digits 0-9, one per texel. Trailing
 * blank lines are ignored; every row must have the same length.
 */
export function parseTexture(text: string, options: TextureOptions = {}): Texture {
  const { transparent = false, color, source } = options;
  const lines = text.replace(/\r/g, "").split("\n");
  while (lines.length > 0 && lines[lines.length - 1].trim() === "") {
    lines.pop();
  }

  const height = lines.length;
  if (height === 0) {
    throw new ConfigError("texture is empty", source);
  }
  const width = lines[0].length;
  if (width === 0) {
    throw new ConfigError("texture has an empty first row", source);
  }

  const texels = new Int8Array(width * height);
  for (let y = 0; y < height; y++) {
    const line = lines[y];
    if (line.length !== width) {
      throw new ConfigError(
        `texture row ${y} has ${line.length} texels, expected ${width}`,
        source,
      );
    }
    for (let x = 0; x < width; x++) {
      const ch = line[x];
      if (transparent && ch === TRANSPARENT_CHAR) {
        texels[y * width + x] = TRANSPARENT;
      } else if (ch >= "0" && ch <= "9") {
        texels[y * width + x] = ch.charCodeAt(0) - 48;
      } else {
        throw new ConfigError(`texel (${x}, ${y}) is "${ch}", expected 0-9`, source);
      }
    }
  }

  return color === undefined ? { width, height, texels } : { width, height, texels, color };
}

/** Inverse of parseTexture: one line per row, TRANSPARENT as ".". */
export function formatTexture(tex: Texture): string {
  const lines: string[] = [];
  for (let y = 0; y < tex.height; y++) {
    let line = "";
    for (let x = 0; x < tex.width; x++) {
      const v = tex.texels[y * tex.width + x];
      line += v === TRANSPARENT ? TRANSPARENT_CHAR : String(v);
    }
    lines.push(line);
  }
  return lines.join("\n") + "\n";
}

// ============================================================
// PNG textures
// ============================================================

export interface ImageOptions extends TextureOptions {
  /** Resize to this size; the image's own size otherwise. */
  width?: number;
  height?: number;
  /** With `transparent`, also treat pixels matching the top-left color as transparent. */
  keyBackground?: boolean;
}

/** Rec. 601 luma of an 8-bit RGB pixel, scaled to 0-9. */
export function lumaToIntensity(r: number, g: number, b: number): number {
  const luma = 0.299 * r + 0.587 * g + 0.114 * b;
  return Math.round((luma / 255) * INTENSITY_MAX);
}

/**
 * Decode an image with sharp and convert it to an intensity texture.
 * With `transparent`, fully transparent pixels become TRANSPARENT.
 */
export async function loadImageAsIntensity(
  path: string,
  options: ImageOptions = {},
): Promise<Texture> {
  const { transparent = false, keyBackground = false, color, width, height } = options;
  const source = options.source ?? path;

  let image = sharp(path);
  if (width !== undefined && height !== undefined) {
    image = image.resize(width, height, { fit: "fill" });
  }

  let decoded: { data: Buffer; info: sharp.OutputInfo };
  try {
    decoded = await image.ensureAlpha().raw().toBuffer({ resolveWithObject: true });
  } catch (err) {
    throw new ConfigError(`cannot decode image (${String(err)})`, source);
  }

  const { data, info } = decoded;
  // Background color = pixel at (0,0)
  const keyed = transparent && keyBackground;
  const bgR = data[0];
  const bgG = data[1];
  const bgB = data[2];

  const texels = new Int8Array(info.width * info.height);
  for (let i = 0; i < texels.length; i++) {
    const j = i * info.channels;
    const background =
      keyed && data[j] === bgR && data[j + 1] === bgG && data[j + 2] === bgB;
    if (transparent && (data[j + 3] === 0 || background)) {
      texels[i] = TRANSPARENT;
    } else {
      texels[i] = lumaToIntensity(data[j], data[j + 1], data[j + 2]);
    }
  }

  const tex: Texture = { width: info.width, height: info.height, texels };
  if (color !== undefined) tex.color = color;
  return tex;
}

/** Load a texture from a .png (via sharp) or a text file. */
export async function loadTexture(path: string, options: ImageOptions = {}): Promise<Texture> {
  if (extname(path).toLowerCase() === ".png") {
    return loadImageAsIntensity(path, options);
  }
  return parseTexture(await readText(path), { ...options, source: options.source ?? path });
}

// ============================================================
// Sprite placements
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finite(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** Parse a JSON array of { x, y, texture } placements. */
export function parseSprites(text: string, textureCount: number, source?: string): Sprite[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`invalid JSON (${String(err)})`, source);
  }
  if (!Array.isArray(data)) {
    throw new ConfigError("sprite list must be a JSON array", source);
  }

  return data.map((entry: unknown, i): Sprite => {
    if (!isRecord(entry)) {
      throw new ConfigError(`sprite ${i} must be an object`, source);
    }
    const { x, y, texture } = entry;
    if (!finite(x) || !finite(y)) {
      throw new ConfigError(`sprite ${i} needs numeric "x" and "y"`, source);
    }
    if (!finite(texture) || !Number.isInteger(texture) || texture < 0 || texture >= textureCount) {
      throw new ConfigError(
        `sprite ${i} texture must be an integer in [0, ${textureCount - 1}]`,
        source,
      );
    }
    return { x, y, texture };
  });
}

// ============================================================
// World manifest
// ============================================================

export interface TextureRef {
  file: string;
  color?: string;
}

export interface WorldManifest {
  map: string;
  wallTextures: TextureRef[];
  spriteTextures: TextureRef[];
  /** JSON placements file; omitted for a world without sprites. */
  sprites?: string;
  start: { x: number; y: number; angle: number };
  /** Size PNG textures are resized to. */
  imageSize?: { width: number; height: number };
}

function readTextureRefs(value: unknown, key: string, source: string): TextureRef[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ConfigError(`"${key}" must be an array`, source);
  }
  return value.map((entry: unknown, i): TextureRef => {
    if (typeof entry === "string") return { file: entry };
    if (isRecord(entry) && typeof entry.file === "string") {
      if (entry.color === undefined) return { file: entry.file };
      if (typeof entry.color === "string") return { file: entry.file, color: entry.color };
    }
    throw new ConfigError(
      `"${key}[${i}]" must be a file name or { "file", "color" }`,
      source,
    );
  });
}

/** Validate the shape of a parsed world.json document. */
export function parseManifest(text: string, source: string): WorldManifest {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`invalid JSON (${String(err)})`, source);
  }
  if (!isRecord(data)) {
    throw new ConfigError("world manifest must be an object", source);
  }

  if (typeof data.map !== "string") {
    throw new ConfigError(`"map" must be a file name`, source);
  }
  if (data.sprites !== undefined && typeof data.sprites !== "string") {
    throw new ConfigError(`"sprites" must be a file name`, source);
  }

  const start = data.start;
  if (!isRecord(start) || !finite(start.x) || !finite(start.y)) {
    throw new ConfigError(`"start" needs numeric "x" and "y"`, source);
  }
  const angle = start.angle ?? 0;
  if (!finite(angle)) {
    throw new ConfigError(`"start.angle" must be a number`, source);
  }

  const manifest: WorldManifest = {
    map: data.map,
    wallTextures: readTextureRefs(data.wallTextures, "wallTextures", source),
    spriteTextures: readTextureRefs(data.spriteTextures, "spriteTextures", source),
    start: { x: start.x, y: start.y, angle },
  };
  if (typeof data.sprites === "string") manifest.sprites = data.sprites;

  const size = data.imageSize;
  if (size !== undefined) {
    if (
      !isRecord(size) ||
      !finite(size.width) ||
      !finite(size.height) ||
      !Number.isInteger(size.width) ||
      !Number.isInteger(size.height) ||
      size.width < 1 ||
      size.height < 1
    ) {
      throw new ConfigError(`"imageSize" needs positive integer "width" and "height"`, source);
    }
    manifest.imageSize = { width: size.width, height: size.height };
  }

  return manifest;
}

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read file (${String(err)})`, path);
  }
}

/**
 * Load and validate a whole world from its manifest. Wall textures must
 * share one size and cover every texture id the map uses; the start
 * position must lie in an open cell.
 */
export async function loadWorld(manifestPath: string): Promise<World> {
  const dir = dirname(manifestPath);
  const manifest = parseManifest(await readText(manifestPath), manifestPath);
  const at = (file: string): string => resolve(dir, file);

  const mapPath = at(manifest.map);
  const map = parseMap(await readText(mapPath), mapPath);

  const imageSize = manifest.imageSize ?? {};
  const wallTextures = await Promise.all(
    manifest.wallTextures.map((ref) =>
      loadTexture(at(ref.file), { ...imageSize, color: ref.color }),
    ),
  );
  const spriteTextures = await Promise.all(
    manifest.spriteTextures.map((ref) =>
      loadTexture(at(ref.file), { ...imageSize, color: ref.color, transparent: true }),
    ),
  );

  if (wallTextures.length === 0) {
    throw new ConfigError("world needs at least one wall texture", manifestPath);
  }
  const first = wallTextures[0];
  wallTextures.forEach((tex, i) => {
    if (tex.width !== first.width || tex.height !== first.height) {
      throw new ConfigError(
        `wall texture ${i + 1} is ${tex.width}x${tex.height}, expected ${first.width}x${first.height}`,
        at(manifest.wallTextures[i].file),
      );
    }
  });
  assertTextureIds(map, wallTextures.length, mapPath);

  let sprites: Sprite[] = [];
  if (manifest.sprites !== undefined) {
    const spritesPath = at(manifest.sprites);
    sprites = parseSprites(await readText(spritesPath), spriteTextures.length, spritesPath);
  }

  const { start } = manifest;
  if (isWall(map, start.x, start.y)) {
    throw new ConfigError(`start (${start.x}, ${start.y}) is inside a wall`, manifestPath);
  }

  return { map, wallTextures, spriteTextures, sprites, start };
}
