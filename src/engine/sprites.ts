// ============================================================================
// sprites.ts - Billboard sprite projection and depth-tested compositing
// ============================================================================

import type { ShadingConfig } from "../core/config";
import { clamp } from "../core/math";
import { TRANSPARENT, texelAt } from "../core/types";
import type { Sprite, Texture } from "../core/types";
import type { FrameBuffer } from "./frameBuffer";
import { shade } from "./walls";

// Sprites closer than this along the view axis are behind the camera plane.
const NEAR_PLANE = 0.01;

// ============================================================================
// View - the camera snapshot a projection needs
// ============================================================================

export interface SpriteView {
  x: number;
  y: number;
  angle: number;
  z: number;
  /** Projection plane distance in columns (see buildColumnTable). */
  focal: number;
  columns: number;
  rows: number;
  projectionScale: number;
}

// ============================================================================
// Projected sprite, recomputed every frame
// ============================================================================

export interface VisSprite {
  /** Index of the source sprite. */
  index: number;
  texIndex: number;
  /** Depth along the view axis, comparable with wall distances. */
  distance: number;
  /** Screen column of the sprite's center. */
  screenX: number;
  /** Unclipped top-left corner in cells. */
  left: number;
  top: number;
  width: number;
  height: number;
}

function emptyVisSprite(): VisSprite {
  return {
    index: 0,
    texIndex: 0,
    distance: 0,
    screenX: 0,
    left: 0,
    top: 0,
    width: 0,
    height: 0,
  };
}

/**
 * Project one sprite into screen space. Returns false when it is behind the
 * camera, too small to cover a cell, or entirely off-screen.
 *
 * Height uses the wall projection (rows * projectionScale / distance), so a
 * sprite is one wall tall. Width follows the texture's aspect ratio through
 * the horizontal focal length.
 */
export function projectSprite(
  sprite: Sprite,
  tex: Texture,
  view: SpriteView,
  out: VisSprite,
): boolean {
  const dx = sprite.x - view.x;
  const dy = sprite.y - view.y;
  const cos = Math.cos(view.angle);
  const sin = Math.sin(view.angle);

  // Rotate into camera space: depth along the view, lateral to the right.
  const depth = dx * cos + dy * sin;
  const lateral = -dx * sin + dy * cos;
  if (depth <= NEAR_PLANE) return false;

  const height = Math.floor((view.rows * view.projectionScale) / depth);
  const width = Math.floor((view.focal * (tex.width / tex.height)) / depth);
  if (height === 0 || width === 0) return false;

  const screenX = view.columns / 2 + (view.focal * lateral) / depth;
  const left = screenX - width / 2;
  if (left + width < 0 || left >= view.columns) return false;

  out.texIndex = sprite.texture;
  out.distance = depth;
  out.screenX = screenX;
  out.left = left;
  out.top = (view.rows - height) / 2 + view.z * height;
  out.width = width;
  out.height = height;
  return true;
}

// ============================================================================
// SpriteRenderer
// ============================================================================

export class SpriteRenderer {
  // Reusable list to avoid allocations each frame
  private pool: VisSprite[] = [];
  private count = 0;

  /**
   * Project every sprite and order the visible ones farthest first.
   * Returns the visible list; it is only valid until the next call.
   */
  project(
    sprites: readonly Sprite[],
    textures: readonly Texture[],
    view: SpriteView,
  ): readonly VisSprite[] {
    this.count = 0;

    for (let i = 0; i < sprites.length; i++) {
      const sprite = sprites[i];
      const tex = textures[sprite.texture];
      if (!tex) continue;

      if (this.count === this.pool.length) {
        this.pool.push(emptyVisSprite());
      }
      const vs = this.pool[this.count];
      if (projectSprite(sprite, tex, view, vs)) {
        vs.index = i;
        this.count++;
      }
    }

    // Insertion sort, farthest first (fast for small N, stable for ties)
    const list = this.pool;
    for (let i = 1; i < this.count; i++) {
      const key = list[i];
      let j = i - 1;
      while (j >= 0 && list[j].distance < key.distance) {
        list[j + 1] = list[j];
        j--;
      }
      list[j + 1] = key;
    }

    return list.slice(0, this.count);
  }

  /**
   * Composite projected sprites far to near. A texel is written only where
   * the sprite is strictly closer than what the depth buffer already holds
   * (wall or nearer sprite); transparent texels write neither intensity
   * nor depth. Returns the number of cells painted.
   */
  draw(
    frame: FrameBuffer,
    visible: readonly VisSprite[],
    textures: readonly Texture[],
    shading: ShadingConfig,
  ): number {
    let painted = 0;
    for (const vs of visible) {
      const tex = textures[vs.texIndex];
      if (!tex) continue;

      const startX = Math.max(0, Math.floor(vs.left));
      const endX = Math.min(frame.columns, Math.floor(vs.left) + vs.width);
      const startY = Math.max(0, Math.floor(vs.top));
      const endY = Math.min(frame.rows, Math.floor(vs.top) + vs.height);

      for (let x = startX; x < endX; x++) {
        const texX = clamp(
          Math.floor(((x - vs.left) * tex.width) / vs.width),
          0,
          tex.width - 1,
        );
        for (let y = startY; y < endY; y++) {
          const i = frame.index(x, y);
          if (vs.distance >= frame.depth[i]) continue;

          const texY = clamp(
            Math.floor(((y - vs.top) * tex.height) / vs.height),
            0,
            tex.height - 1,
          );
          const texel = texelAt(tex, texX, texY);
          if (texel === TRANSPARENT) continue;

          frame.paint(x, y, shade(texel, vs.distance, shading), tex.color);
          frame.depth[i] = vs.distance;
          painted++;
        }
      }
    }
    return painted;
  }
}
