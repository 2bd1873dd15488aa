// ============================================================================
// renderer.ts - Column raycasting renderer producing a character grid
// ============================================================================

import type { RenderConfig } from "../core/config";
import { buildColumnTable } from "../core/math";
import type { ColumnTable } from "../core/math";
import { textureIdAt } from "../core/maps";
import { BLANK_GLYPH, EMPTY } from "../core/types";
import type { CameraState, Cell, CharGrid, World } from "../core/types";
import { FrameBuffer } from "./frameBuffer";
import { GlyphTable } from "./quantizer";
import { castRay } from "./raycaster";
import { SpriteRenderer } from "./sprites";
import { drawWallColumn } from "./walls";
import type { WallColumnOptions } from "./walls";

// ============================================================================
// Renderer class
// ============================================================================

export class Renderer {
  private frame: FrameBuffer;
  private table: ColumnTable;
  private readonly glyphs: GlyphTable;
  private readonly sprites = new SpriteRenderer();
  private readonly config: RenderConfig;

  /** Sample wall textures; flipped by the texture toggle. */
  texturesOn: boolean;

  constructor(config: RenderConfig) {
    this.config = config;
    this.texturesOn = config.texturesOn;
    this.glyphs = new GlyphTable(config.palette);

    const { columns, rows } = config.resolution;
    this.frame = new FrameBuffer(columns, rows);
    this.table = buildColumnTable(columns, config.fov);
  }

  // ==========================================================================
  // Resize
  // ==========================================================================

  /** Rebuild the buffers and column table for a new output size. */
  resize(columns: number, rows: number): void {
    if (columns === this.frame.columns && rows === this.frame.rows) return;
    this.frame = new FrameBuffer(columns, rows);
    this.table = buildColumnTable(columns, this.config.fov);
  }

  // ==========================================================================
  // Main render entry point
  // ==========================================================================

  render(camera: CameraState, world: World): CharGrid {
    this.frame.clear();

    this.drawFloor();
    this.drawWalls(camera, world);
    this.drawSprites(camera, world);

    return this.quantize();
  }

  // ==========================================================================
  // Floor pattern
  // ==========================================================================

  private drawFloor(): void {
    const { intensity, stride } = this.config.floor;
    if (intensity === null) return;

    const frame = this.frame;
    for (let y = Math.floor(frame.rows / 2); y < frame.rows; y++) {
      for (let x = 0; x < frame.columns; x += stride) {
        frame.paint(x, y, intensity);
      }
    }
  }

  // ==========================================================================
  // Wall pass - one ray per column
  // ==========================================================================

  private drawWalls(camera: CameraState, world: World): void {
    const { map, wallTextures } = world;
    const table = this.table;
    const options: WallColumnOptions = {
      z: camera.z,
      projectionScale: this.config.projectionScale,
      shading: this.config.shading,
      textured: this.texturesOn,
    };

    for (let x = 0; x < this.frame.columns; x++) {
      const hit = castRay(
        map,
        camera.x,
        camera.y,
        camera.angle,
        table.angles[x],
        table.cosines[x],
      );
      const texture = wallTextures[textureIdAt(map, hit.cellX, hit.cellY) - 1];
      drawWallColumn(this.frame, x, hit, texture, options);
    }
  }

  // ==========================================================================
  // Sprite pass - runs on the completed depth buffer
  // ==========================================================================

  private drawSprites(camera: CameraState, world: World): void {
    if (world.sprites.length === 0) return;

    const visible = this.sprites.project(world.sprites, world.spriteTextures, {
      x: camera.x,
      y: camera.y,
      angle: camera.angle,
      z: camera.z,
      focal: this.table.focal,
      columns: this.frame.columns,
      rows: this.frame.rows,
      projectionScale: this.config.projectionScale,
    });
    this.sprites.draw(this.frame, visible, world.spriteTextures, this.config.shading);
  }

  // ==========================================================================
  // Quantize to glyphs
  // ==========================================================================

  private quantize(): CharGrid {
    const frame = this.frame;
    const cells: Cell[][] = [];
    for (let y = 0; y < frame.rows; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < frame.columns; x++) {
        const value = frame.get(x, y);
        if (value === EMPTY) {
          row.push({ glyph: BLANK_GLYPH });
          continue;
        }
        const style = frame.styleAt(x, y);
        row.push(
          style === undefined
            ? { glyph: this.glyphs.glyphFor(value) }
            : { glyph: this.glyphs.glyphFor(value), style },
        );
      }
      cells.push(row);
    }
    return { rows: frame.rows, columns: frame.columns, cells };
  }
}
