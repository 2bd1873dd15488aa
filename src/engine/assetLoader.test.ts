import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../core/errors";
import { TRANSPARENT } from "../core/types";
import {
  formatTexture,
  loadImageAsIntensity,
  loadWorld,
  lumaToIntensity,
  parseManifest,
  parseSprites,
  parseTexture,
} from "./assetLoader";

const BUNDLED_WORLD = fileURLToPath(new URL("../../assets/dungeon/world.json", import.meta.url));

describe("parseTexture", () => {
  it("reads rows of digits", () => {
    const tex = parseTexture("12\n34\n");
    expect(tex.width).toBe(2);
    expect(tex.height).toBe(2);
    expect(Array.from(tex.texels)).toEqual([1, 2, 3, 4]);
    expect(tex.color).toBeUndefined();
  });

  it("reads the transparent sentinel only for sprites", () => {
    const tex = parseTexture(".9\n9.", { transparent: true, color: "yellow" });
    expect(Array.from(tex.texels)).toEqual([TRANSPARENT, 9, 9, TRANSPARENT]);
    expect(tex.color).toBe("yellow");
    expect(() => parseTexture(".9\n9.")).toThrow('texel (0, 0) is ".", expected 0-9');
  });

  it("rejects ragged and empty textures", () => {
    expect(() => parseTexture("12\n3", { source: "w.txt" })).toThrow(
      "w.txt: texture row 1 has 1 texels, expected 2",
    );
    expect(() => parseTexture("\n\n")).toThrow(ConfigError);
  });

  it("writes textures back in the same format", () => {
    const text = ".9\n90\n";
    expect(formatTexture(parseTexture(text, { transparent: true }))).toBe(text);
  });
});

describe("parseSprites", () => {
  it("reads placements", () => {
    expect(parseSprites('[{ "x": 1.5, "y": 2.5, "texture": 0 }]', 1)).toEqual([
      { x: 1.5, y: 2.5, texture: 0 },
    ]);
  });

  it("rejects bad placements", () => {
    expect(() => parseSprites('{ "x": 1 }', 1)).toThrow("sprite list must be a JSON array");
    expect(() => parseSprites('[{ "x": 1, "y": 1, "texture": 1 }]', 1)).toThrow(
      "sprite 0 texture must be an integer in [0, 0]",
    );
    expect(() => parseSprites('[{ "x": "1", "y": 1, "texture": 0 }]', 1)).toThrow(
      'sprite 0 needs numeric "x" and "y"',
    );
  });
});

describe("parseManifest", () => {
  it("accepts file names or file/color pairs", () => {
    const manifest = parseManifest(
      JSON.stringify({
        map: "m.txt",
        wallTextures: ["a.txt", { file: "b.txt", color: "red" }],
        start: { x: 1.5, y: 1.5 },
      }),
      "world.json",
    );
    expect(manifest).toEqual({
      map: "m.txt",
      wallTextures: [{ file: "a.txt" }, { file: "b.txt", color: "red" }],
      spriteTextures: [],
      start: { x: 1.5, y: 1.5, angle: 0 },
    });
  });

  it("requires a start position", () => {
    expect(() => parseManifest('{ "map": "m.txt" }', "world.json")).toThrow(
      'world.json: "start" needs numeric "x" and "y"',
    );
  });
});

describe("lumaToIntensity", () => {
  it("scales luma onto 0-9", () => {
    expect(lumaToIntensity(0, 0, 0)).toBe(0);
    expect(lumaToIntensity(255, 255, 255)).toBe(9);
    expect(lumaToIntensity(128, 128, 128)).toBe(5);
  });
});

describe("files on disk", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "glyphcaster-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writePng(name: string, width: number, pixels: number[]): Promise<string> {
    const path = join(dir, name);
    const height = pixels.length / 4 / width;
    await sharp(Buffer.from(pixels), { raw: { width, height, channels: 4 } })
      .png()
      .toFile(path);
    return path;
  }

  it("decodes a PNG into intensities with transparency", async () => {
    const path = await writePng("lamp.png", 2, [255, 255, 255, 255, 0, 0, 0, 0]);
    const tex = await loadImageAsIntensity(path, { transparent: true });
    expect(tex.width).toBe(2);
    expect(tex.height).toBe(1);
    expect(Array.from(tex.texels)).toEqual([9, TRANSPARENT]);

    const wall = await loadImageAsIntensity(path);
    expect(Array.from(wall.texels)).toEqual([9, 0]);
  });

  it("keys out the background color on request", async () => {
    const path = await writePng("key.png", 3, [0, 0, 255, 255, 0, 0, 255, 255, 255, 255, 255, 255]);
    const tex = await loadImageAsIntensity(path, { transparent: true, keyBackground: true });
    expect(Array.from(tex.texels)).toEqual([TRANSPARENT, TRANSPARENT, 9]);
  });

  it("reports an unreadable image as a configuration error", async () => {
    await expect(loadImageAsIntensity(join(dir, "missing.png"))).rejects.toThrow(ConfigError);
  });

  async function writeWorld(map: string, start: { x: number; y: number }): Promise<string> {
    await writeFile(join(dir, "map.txt"), map);
    await writeFile(join(dir, "wall.txt"), "55\n55\n");
    const manifest = join(dir, "world.json");
    await writeFile(
      manifest,
      JSON.stringify({ map: "map.txt", wallTextures: ["wall.txt"], start }),
    );
    return manifest;
  }

  it("loads a minimal world", async () => {
    const world = await loadWorld(await writeWorld("111\n101\n111\n", { x: 1.5, y: 1.5 }));
    expect(world.map.width).toBe(3);
    expect(world.wallTextures).toHaveLength(1);
    expect(world.sprites).toEqual([]);
    expect(world.start).toEqual({ x: 1.5, y: 1.5, angle: 0 });
  });

  it("rejects a start position inside a wall", async () => {
    const manifest = await writeWorld("111\n101\n111\n", { x: 0.5, y: 0.5 });
    await expect(loadWorld(manifest)).rejects.toThrow("start (0.5, 0.5) is inside a wall");
  });

  it("rejects map texture ids with no loaded texture", async () => {
    const manifest = await writeWorld("121\n101\n111\n", { x: 1.5, y: 1.5 });
    await expect(loadWorld(manifest)).rejects.toThrow(
      "map cell (1, 0) uses wall texture 2 but only 1 are loaded",
    );
  });

  it("reports a missing file with its path", async () => {
    await expect(loadWorld(join(dir, "nope.json"))).rejects.toThrow(ConfigError);
  });
});

describe("bundled world", () => {
  it("loads and validates", async () => {
    const world = await loadWorld(BUNDLED_WORLD);
    expect(world.map.width).toBe(12);
    expect(world.map.height).toBe(10);
    expect(world.wallTextures.map((t) => t.color)).toEqual(["red", "white", "green"]);
    expect(world.spriteTextures).toHaveLength(2);
    expect(world.sprites).toHaveLength(4);
    expect(world.start).toEqual({ x: 2.5, y: 1.5, angle: 0 });
  });
});
