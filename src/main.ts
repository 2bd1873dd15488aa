/**
 * Glyphcaster - Main Entry Point
 *
 * Loads the configuration and world, then runs the fixed-rate frame loop:
 * poll the keyboard, tick the compositor, blit the grid to the terminal.
 *
 * Usage: npm start -- [--config <file>] [world.json]
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { parseConfig, resolveConfig } from "./core/config";
import type { RenderConfig } from "./core/config";
import { ConfigError } from "./core/errors";
import { createCameraState } from "./core/types";
import type { CameraState, World } from "./core/types";
import { loadWorld } from "./engine/assetLoader";
import { FrameCompositor } from "./engine/compositor";
import { createInputState, pollControls, setupInput } from "./game/player";
import { TerminalDisplay } from "./ui/terminal";

const DEFAULT_WORLD = fileURLToPath(new URL("../assets/dungeon/world.json", import.meta.url));

// ============================================================
// Loading
// ============================================================

interface Options {
  configPath: string | undefined;
  worldPath: string;
}

function parseOptions(argv: string[]): Options {
  const { values, positionals } = parseArgs({
    args: argv,
    options: { config: { type: "string", short: "c" } },
    allowPositionals: true,
  });
  return {
    configPath: values.config,
    worldPath: positionals[0] ?? DEFAULT_WORLD,
  };
}

async function loadConfig(path: string | undefined): Promise<RenderConfig> {
  if (path === undefined) return resolveConfig();
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read file (${String(err)})`, path);
  }
  return parseConfig(text, path);
}

// ============================================================
// Frame Loop
// ============================================================

function run(config: RenderConfig, world: World): void {
  const display = new TerminalDisplay(process.stdout, config.colors);
  const compositor = new FrameCompositor(config, (grid) => display.draw(grid));
  const camera: CameraState = createCameraState(world.start.x, world.start.y, world.start.angle);
  const input = createInputState();

  const fit = (): void => {
    if (!config.fitTerminal) return;
    const { columns, rows } = display.size(config.resolution);
    compositor.resize(columns, rows);
  };
  fit();

  const detachInput = setupInput(process.stdin, input);
  display.enter();

  let lastTime = performance.now();
  let timer: NodeJS.Timeout | undefined;

  const shutdown = (code: number): void => {
    if (timer !== undefined) clearInterval(timer);
    process.stdout.off("resize", fit);
    detachInput();
    display.restore();
    process.exitCode = code;
  };

  const frame = (): void => {
    const now = performance.now();
    const dt = (now - lastTime) / 1000;
    lastTime = now;

    if (input.quit) {
      shutdown(0);
      console.log("Glyphcaster closed.");
      return;
    }

    try {
      compositor.tick(camera, world, pollControls(input, Date.now()), dt);
    } catch (err) {
      shutdown(1);
      if (err instanceof ConfigError) {
        console.error(`Configuration error: ${err.message}`);
      } else {
        console.error(err);
      }
    }
  };

  process.stdout.on("resize", fit);
  timer = setInterval(frame, 1000 / config.fps);
}

// ============================================================
// Entry Point
// ============================================================

async function main(): Promise<void> {
  const options = parseOptions(process.argv.slice(2));

  let config: RenderConfig;
  let world: World;
  try {
    config = await loadConfig(options.configPath);
    world = await loadWorld(options.worldPath);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  console.log(
    `Glyphcaster: ${world.map.width}x${world.map.height} map, ${world.sprites.length} sprites. w/s move, a/d turn, q/e strafe, space jump, t textures, esc quits.`,
  );
  run(config, world);
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
