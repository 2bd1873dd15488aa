// ============================================================================
// compositor.ts - One frame: player update, render, overlay, hand-off
// ============================================================================

import type { RenderConfig } from "../core/config";
import type { CameraState, CharGrid, FrameInput, World } from "../core/types";
import { NO_INPUT } from "../core/types";
import { updatePlayer } from "../game/player";
import { drawMinimap } from "../ui/hud";
import { Renderer } from "./renderer";

/** Receives each finished grid. The compositor keeps no reference to it. */
export type DisplaySink = (grid: CharGrid) => void;

export class FrameCompositor {
  readonly renderer: Renderer;
  private readonly config: RenderConfig;
  private readonly display: DisplaySink | undefined;

  constructor(config: RenderConfig, display?: DisplaySink) {
    this.config = config;
    this.display = display;
    this.renderer = new Renderer(config);
  }

  /**
   * Run one frame. `camera` is mutated in place; `input` may be null or
   * undefined when nothing arrived this tick.
   */
  tick(
    camera: CameraState,
    world: World,
    input: FrameInput | null | undefined,
    dt: number,
  ): CharGrid {
    const cmd = input ?? NO_INPUT;

    updatePlayer(camera, world.map, cmd, dt, this.config);
    if (cmd.toggleTextures) {
      this.renderer.texturesOn = !this.renderer.texturesOn;
    }

    const grid = this.renderer.render(camera, world);
    drawMinimap(grid, world.map, camera, this.config.minimap);

    this.display?.(grid);
    return grid;
  }

  resize(columns: number, rows: number): void {
    this.renderer.resize(columns, rows);
  }
}
