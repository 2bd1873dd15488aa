import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG } from "../core/config";
import { EMPTY, Face } from "../core/types";
import type { RayHit, Texture } from "../core/types";
import { FrameBuffer } from "./frameBuffer";
import { drawWallColumn, projectWall, shade } from "./walls";
import type { WallColumnOptions } from "./walls";

function solid(value: number, width = 4, height = 4, color?: string): Texture {
  const tex: Texture = { width, height, texels: new Int8Array(width * height).fill(value) };
  if (color !== undefined) tex.color = color;
  return tex;
}

function hitAt(distance: number, face: Face = Face.West, u = 0): RayHit {
  return { distance, rayLength: distance, cellX: 5, cellY: 3, face, u, steps: 2 };
}

const options: WallColumnOptions = {
  z: 0,
  projectionScale: 1,
  shading: DEFAULT_CONFIG.shading,
  textured: true,
};

describe("shade", () => {
  it("offsets the distance level by the texel's distance from neutral", () => {
    // level 9 - 2 = 7, texel 5 is one below neutral
    expect(shade(5, 2)).toBe(6);
    expect(shade(6, 0)).toBe(9);
    expect(shade(8, 2)).toBe(9);
  });

  it("clips into the intensity domain", () => {
    expect(shade(9, 0)).toBe(9);
    expect(shade(0, 10)).toBe(0);
  });

  it("bottoms the distance level out at minLevel", () => {
    expect(shade(6, 50)).toBe(1);
    expect(shade(6, 50, { ...DEFAULT_CONFIG.shading, minLevel: 3 })).toBe(3);
  });

  it("never brightens as distance grows", () => {
    for (let base = 0; base <= 9; base++) {
      for (let d = 0; d < 12; d += 0.25) {
        expect(shade(base, d)).toBeGreaterThanOrEqual(shade(base, d + 0.25));
      }
    }
  });
});

describe("projectWall", () => {
  it("centers a slice of rows / distance rows", () => {
    expect(projectWall(20, 2, 0, 1)).toEqual({ top: 5, height: 10, start: 5, end: 15 });
  });

  it("clips slices taller than the frame", () => {
    expect(projectWall(20, 0.5, 0, 1)).toEqual({ top: -10, height: 40, start: 0, end: 20 });
  });

  it("shifts the slice down by the camera height", () => {
    const slice = projectWall(20, 2, 0.1, 1);
    expect(slice.start).toBe(6);
    expect(slice.end).toBe(16);
  });

  it("stays finite at zero distance", () => {
    const slice = projectWall(20, 0, 0, 1);
    expect(slice.start).toBe(0);
    expect(slice.end).toBe(20);
  });
});

describe("drawWallColumn", () => {
  it("paints the slice and records depth down the whole column", () => {
    const frame = new FrameBuffer(3, 20);
    drawWallColumn(frame, 1, hitAt(2), solid(5, 4, 4, "red"), options);

    for (let y = 0; y < 20; y++) {
      const inside = y >= 5 && y < 15;
      expect(frame.get(1, y)).toBe(inside ? 6 : EMPTY);
      expect(frame.styleAt(1, y)).toBe(inside ? "red" : undefined);
      expect(frame.depthAt(1, y)).toBe(2);
      expect(frame.get(0, y)).toBe(EMPTY);
      expect(frame.depthAt(2, y)).toBe(Infinity);
    }
  });

  it("darkens north and south faces", () => {
    const frame = new FrameBuffer(1, 20);
    drawWallColumn(frame, 0, hitAt(2, Face.North), solid(5), options);
    expect(frame.get(0, 10)).toBe(5);
  });

  it("samples texture rows down the slice", () => {
    const frame = new FrameBuffer(1, 20);
    const tex: Texture = { width: 1, height: 2, texels: Int8Array.from([1, 8]) };
    drawWallColumn(frame, 0, hitAt(2), tex, options);
    expect(frame.get(0, 5)).toBe(2);
    expect(frame.get(0, 9)).toBe(2);
    expect(frame.get(0, 10)).toBe(9);
    expect(frame.get(0, 14)).toBe(9);
  });

  it("samples the texture column from u", () => {
    const frame = new FrameBuffer(1, 20);
    const tex: Texture = { width: 2, height: 1, texels: Int8Array.from([3, 7]) };
    drawWallColumn(frame, 0, hitAt(2, Face.West, 0.75), tex, options);
    expect(frame.get(0, 10)).toBe(8);
  });

  it("uses the neutral texel with textures off", () => {
    const frame = new FrameBuffer(1, 20);
    drawWallColumn(frame, 0, hitAt(2), solid(9), { ...options, textured: false });
    expect(frame.get(0, 10)).toBe(7);
  });
});
