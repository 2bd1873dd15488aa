/**
 * Glyphcaster - Player Controls & Input System
 *
 * Handles: terminal key capture, per-frame control polling, turning,
 * movement with wall collision and sliding, and jump/gravity kinematics.
 */

import { emitKeypressEvents } from "node:readline";
import type { JumpConfig, MovementConfig } from "../core/config";
import { clamp, normalizeAngle } from "../core/math";
import { isWall } from "../core/maps";
import { NO_INPUT } from "../core/types";
import type { CameraState, FrameInput, GridMap, MoveIntent } from "../core/types";

// ============================================================
// Input State
// ============================================================

/**
 * Terminals report key presses (and auto-repeats) but never releases, so a
 * key counts as held until KEY_HOLD_MS after its last press.
 */
export const KEY_HOLD_MS = 150;

export interface InputState {
  /** Key name -> time (ms) until which it counts as held. */
  held: Map<string, number>;
  /** Edge-triggered presses waiting for the next poll. */
  jumpPressed: boolean;
  togglePressed: boolean;
  /** Set once escape or Ctrl-C is seen. */
  quit: boolean;
}

export function createInputState(): InputState {
  return {
    held: new Map<string, number>(),
    jumpPressed: false,
    togglePressed: false,
    quit: false,
  };
}

/** The subset of a readline keypress event we read. */
export interface KeyPress {
  name?: string;
  ctrl?: boolean;
  sequence?: string;
}

/** Record one keypress at time `now` (ms). */
export function pressKey(input: InputState, key: KeyPress, now: number): void {
  const name = key.name ?? key.sequence;
  if (!name) return;

  if (name === "escape" || (key.ctrl && name === "c")) {
    input.quit = true;
    return;
  }
  if (name === "space") {
    input.jumpPressed = true;
    return;
  }
  if (name === "t") {
    input.togglePressed = true;
    return;
  }
  input.held.set(name, now + KEY_HOLD_MS);
}

/**
 * Put a TTY stdin into raw mode and feed its keypresses into `input`.
 * Returns a function that detaches the listener and restores the mode.
 */
export function setupInput(
  stdin: NodeJS.ReadStream,
  input: InputState,
  now: () => number = Date.now,
): () => void {
  emitKeypressEvents(stdin);
  const raw = stdin.isTTY;
  if (raw) stdin.setRawMode(true);

  const onKeypress = (_str: string | undefined, key: KeyPress | undefined): void => {
    if (key) pressKey(input, key, now());
  };
  stdin.on("keypress", onKeypress);
  stdin.resume();

  return () => {
    stdin.off("keypress", onKeypress);
    if (raw) stdin.setRawMode(false);
    stdin.pause();
  };
}

function isHeld(input: InputState, name: string, now: number): boolean {
  const until = input.held.get(name);
  if (until === undefined) return false;
  if (until <= now) {
    input.held.delete(name);
    return false;
  }
  return true;
}

/**
 * Convert held keys and pending edges into this frame's FrameInput.
 * Edges are consumed: each press yields exactly one jump or toggle.
 */
export function pollControls(input: InputState, now: number): FrameInput {
  let forward = 0;
  let strafe = 0;
  let turn = 0;

  // ---- Forward / backward ----
  if (isHeld(input, "w", now) || isHeld(input, "up", now)) forward += 1;
  if (isHeld(input, "s", now) || isHeld(input, "down", now)) forward -= 1;

  // ---- Turn ----
  if (isHeld(input, "a", now) || isHeld(input, "left", now)) turn -= 1;
  if (isHeld(input, "d", now) || isHeld(input, "right", now)) turn += 1;

  // ---- Strafe ----
  if (isHeld(input, "q", now)) strafe -= 1;
  if (isHeld(input, "e", now)) strafe += 1;

  const frame: FrameInput = {
    forward,
    strafe,
    turn,
    jump: input.jumpPressed,
    toggleTextures: input.togglePressed,
  };
  input.jumpPressed = false;
  input.togglePressed = false;
  return frame;
}

// ============================================================
// Player Update
// ============================================================

/** Longest frame step (seconds) the player update integrates in one go. */
export const MAX_FRAME_DT = 0.1;

/** Longest stretch of a move checked against the map at once, in cells. */
const MAX_SWEEP_STEP = 0.25;

export interface PlayerTuning {
  movement: MovementConfig;
  jump: JumpConfig;
}

/**
 * Advance the camera by one frame: turn, jump/gravity, then horizontal
 * movement with collision. A missing input counts as no input.
 */
export function updatePlayer(
  camera: CameraState,
  map: GridMap,
  input: FrameInput | null | undefined,
  frameDt: number,
  tuning: PlayerTuning,
): void {
  const cmd = input ?? NO_INPUT;
  const dt = Math.min(frameDt, MAX_FRAME_DT);
  const { movement, jump } = tuning;

  // ---- Turning ----
  camera.angle = normalizeAngle(
    camera.angle + clamp(cmd.turn, -1, 1) * movement.turnSpeed * dt,
  );

  // ---- Jump / gravity ----
  const grounded = camera.z <= 0 && camera.vz === 0;
  let intent: MoveIntent = { forward: cmd.forward, strafe: cmd.strafe };

  if (grounded && cmd.jump && jump.velocity > 0) {
    camera.vz = jump.velocity;
    camera.airborneIntent = intent;
  } else if (!grounded && camera.airborneIntent) {
    intent = camera.airborneIntent;
  }

  if (camera.z > 0 || camera.vz !== 0) {
    camera.vz -= jump.gravity * dt;
    camera.z += camera.vz * dt;
    if (camera.z <= 0) {
      camera.z = 0;
      camera.vz = 0;
      camera.airborneIntent = null;
    }
  }

  // ---- Movement ----
  const startX = camera.x;
  const startY = camera.y;
  controlMovement(camera, map, intent, movement, dt);

  if (dt > 0) {
    camera.velocity.x = (camera.x - startX) / dt;
    camera.velocity.y = (camera.y - startY) / dt;
  } else {
    camera.velocity.x = 0;
    camera.velocity.y = 0;
  }
}

/**
 * Turn a forward/strafe intent into a world-space displacement and apply it.
 * Diagonal intents are normalized so they are not faster than straight ones.
 */
export function controlMovement(
  camera: CameraState,
  map: GridMap,
  intent: MoveIntent,
  movement: MovementConfig,
  dt: number,
): void {
  let forward = clamp(intent.forward, -1, 1);
  let strafe = clamp(intent.strafe, -1, 1);
  const len = Math.hypot(forward, strafe);
  if (len === 0) return;
  if (len > 1) {
    forward /= len;
    strafe /= len;
  }

  const cos = Math.cos(camera.angle);
  const sin = Math.sin(camera.angle);
  const step = movement.moveSpeed * dt;

  // Forward is (cos, sin); right is (-sin, cos) with y growing downward
  const xmove = (forward * cos - strafe * sin) * step;
  const ymove = (forward * sin + strafe * cos) * step;

  clipMove(camera, map, xmove, ymove, movement.collisionRadius);
}

/**
 * Move one axis at a time, rejecting an axis whose path would bring the
 * camera centre, or its leading edge (position plus radius in the direction
 * of motion), into a wall. The path is checked in short steps so a long move
 * cannot pass through a wall. The other axis still applies, so the camera
 * slides along walls.
 */
export function clipMove(
  camera: CameraState,
  map: GridMap,
  xmove: number,
  ymove: number,
  radius: number,
): void {
  const steps = Math.max(1, Math.ceil(Math.max(Math.abs(xmove), Math.abs(ymove)) / MAX_SWEEP_STEP));

  // Try X movement
  if (xmove !== 0) {
    const side = xmove > 0 ? radius : -radius;
    let clear = true;
    for (let i = 1; i <= steps && clear; i++) {
      const x = camera.x + (xmove * i) / steps;
      const edge = x + side;
      clear =
        !isWall(map, x, camera.y) &&
        !isWall(map, edge, camera.y) &&
        !isWall(map, edge, camera.y - radius) &&
        !isWall(map, edge, camera.y + radius);
    }
    if (clear) camera.x += xmove;
  }

  // Try Y movement
  if (ymove !== 0) {
    const side = ymove > 0 ? radius : -radius;
    let clear = true;
    for (let i = 1; i <= steps && clear; i++) {
      const y = camera.y + (ymove * i) / steps;
      const edge = y + side;
      clear =
        !isWall(map, camera.x, y) &&
        !isWall(map, camera.x, edge) &&
        !isWall(map, camera.x - radius, edge) &&
        !isWall(map, camera.x + radius, edge);
    }
    if (clear) camera.y += ymove;
  }
}
