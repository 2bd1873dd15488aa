import { describe, it, expect, beforeEach } from "vitest";
import { DEFAULT_CONFIG } from "../core/config";
import { createMap, createRoom, isWall } from "../core/maps";
import { createCameraState } from "../core/types";
import type { CameraState, FrameInput } from "../core/types";
import {
  KEY_HOLD_MS,
  MAX_FRAME_DT,
  clipMove,
  createInputState,
  pollControls,
  pressKey,
  updatePlayer,
} from "./player";
import type { InputState, PlayerTuning } from "./player";

const tuning: PlayerTuning = { movement: DEFAULT_CONFIG.movement, jump: DEFAULT_CONFIG.jump };

function input(partial: Partial<FrameInput>): FrameInput {
  return { forward: 0, strafe: 0, turn: 0, jump: false, toggleTextures: false, ...partial };
}

describe("updatePlayer", () => {
  const room = createRoom(4, 4);
  let camera: CameraState;

  beforeEach(() => {
    camera = createCameraState(2.5, 2.5, 0);
  });

  it("treats missing input as standing still", () => {
    updatePlayer(camera, room, null, 0.1, tuning);
    updatePlayer(camera, room, undefined, 0.1, tuning);
    expect(camera.x).toBe(2.5);
    expect(camera.y).toBe(2.5);
    expect(camera.angle).toBe(0);
    expect(camera.velocity).toEqual({ x: 0, y: 0 });
  });

  it("turns by turnSpeed * dt and wraps the angle", () => {
    updatePlayer(camera, room, input({ turn: 1 }), 0.1, tuning);
    expect(camera.angle).toBeCloseTo(0.25, 12);

    camera.angle = 0;
    updatePlayer(camera, room, input({ turn: -1 }), 0.1, tuning);
    expect(camera.angle).toBeCloseTo(Math.PI * 2 - 0.25, 12);
  });

  it("moves forward along the facing direction", () => {
    updatePlayer(camera, room, input({ forward: 1 }), 0.1, tuning);
    expect(camera.x).toBeCloseTo(2.8, 12);
    expect(camera.y).toBe(2.5);
    expect(camera.velocity.x).toBeCloseTo(3, 9);
  });

  it("strafes to the right of the facing direction", () => {
    updatePlayer(camera, room, input({ strafe: 1 }), 0.1, tuning);
    expect(camera.x).toBe(2.5);
    expect(camera.y).toBeCloseTo(2.8, 12);
  });

  it("rejects a move that would bring the collision radius into a wall", () => {
    camera.x = 4.5;
    updatePlayer(camera, room, input({ forward: 1 }), 0.1, tuning);
    expect(camera.x).toBe(4.5);
    expect(camera.velocity.x).toBe(0);
  });

  it("slides along a corridor wall when moving diagonally into it", () => {
    const corridor = createMap([
      [1, 1, 1, 1, 1],
      [1, 0, 0, 0, 1],
      [1, 1, 1, 1, 1],
    ]);
    const brisk: PlayerTuning = {
      movement: { moveSpeed: 5, turnSpeed: 1, collisionRadius: 0.2 },
      jump: DEFAULT_CONFIG.jump,
    };
    camera = createCameraState(2, 1.5, Math.PI / 4);
    updatePlayer(camera, corridor, input({ forward: 1 }), 0.1, brisk);
    expect(camera.x).toBeCloseTo(2 + Math.SQRT1_2 * 0.5, 12);
    expect(camera.y).toBe(1.5);

    // into the corner: both axes blocked
    camera.x = 3.5;
    updatePlayer(camera, corridor, input({ forward: 1 }), 0.1, brisk);
    expect(camera.x).toBe(3.5);
    expect(camera.y).toBe(1.5);
  });
});

describe("long frames", () => {
  // two rooms split by a one-cell wall at x = 3
  const split = createMap([
    [1, 1, 1, 1, 1, 1, 1],
    [1, 0, 0, 1, 0, 0, 1],
    [1, 1, 1, 1, 1, 1, 1],
  ]);
  let camera: CameraState;

  beforeEach(() => {
    camera = createCameraState(2.5, 1.5, 0);
  });

  it("caps the frame step", () => {
    const room = createRoom(4, 4);
    updatePlayer(camera, room, input({ forward: 1 }), 1, tuning);
    // 3 cells/s over MAX_FRAME_DT
    expect(MAX_FRAME_DT).toBe(0.1);
    expect(camera.x).toBeCloseTo(2.8, 12);
  });

  it("never leaves the camera inside a wall after a stalled frame", () => {
    updatePlayer(camera, split, input({ forward: 1 }), 0.47, tuning);
    expect(camera.x).toBe(2.5);
    expect(isWall(split, camera.x, camera.y)).toBe(false);
  });

  it("rejects a move whose end is open but whose path crosses a wall", () => {
    // lands at 3.91 or 4.5, both open cells on the far side
    clipMove(camera, split, 1.41, 0, 0.2);
    expect(camera.x).toBe(2.5);
    clipMove(camera, split, 2, 0, 0.2);
    expect(camera.x).toBe(2.5);
  });

  it("applies a long move that stays clear", () => {
    clipMove(camera, split, -1, 0, 0.2);
    expect(camera.x).toBe(1.5);
  });
});

describe("jumping", () => {
  const room = createRoom(4, 4);
  let camera: CameraState;

  beforeEach(() => {
    camera = createCameraState(2.5, 2.5, 0);
  });

  it("takes off and integrates gravity", () => {
    updatePlayer(camera, room, input({ jump: true }), 0.1, tuning);
    // vz = 1.2 - 4 * 0.1; z = vz * 0.1
    expect(camera.vz).toBeCloseTo(0.8, 12);
    expect(camera.z).toBeCloseTo(0.08, 12);
  });

  it("keeps the take-off intent until landing", () => {
    updatePlayer(camera, room, input({ forward: 1, jump: true }), 0.1, tuning);
    expect(camera.x).toBeCloseTo(2.8, 12);
    expect(camera.airborneIntent).toEqual({ forward: 1, strafe: 0 });

    updatePlayer(camera, room, input({ strafe: 1 }), 0.1, tuning);
    expect(camera.x).toBeCloseTo(3.1, 12);
    expect(camera.y).toBe(2.5);
  });

  it("ignores a second jump while airborne", () => {
    updatePlayer(camera, room, input({ jump: true }), 0.1, tuning);
    updatePlayer(camera, room, input({ jump: true }), 0.1, tuning);
    expect(camera.vz).toBeCloseTo(0.4, 12);
  });

  it("lands on the ground and releases the latched intent", () => {
    updatePlayer(camera, room, input({ jump: true }), 0.1, tuning);
    for (let i = 0; i < 100 && camera.z > 0; i++) {
      updatePlayer(camera, room, null, 0.1, tuning);
    }
    expect(camera.z).toBe(0);
    expect(camera.vz).toBe(0);
    expect(camera.airborneIntent).toBeNull();
  });
});

describe("terminal controls", () => {
  let state: InputState;

  beforeEach(() => {
    state = createInputState();
  });

  it("holds a key for a short window after each press", () => {
    pressKey(state, { name: "w" }, 1000);
    expect(pollControls(state, 1000 + KEY_HOLD_MS - 1).forward).toBe(1);
    expect(pollControls(state, 1000 + KEY_HOLD_MS).forward).toBe(0);
  });

  it("maps turn and strafe keys", () => {
    pressKey(state, { name: "d" }, 0);
    pressKey(state, { name: "q" }, 0);
    expect(pollControls(state, 10)).toEqual({
      forward: 0,
      strafe: -1,
      turn: 1,
      jump: false,
      toggleTextures: false,
    });
  });

  it("cancels opposing keys", () => {
    pressKey(state, { name: "up" }, 0);
    pressKey(state, { name: "down" }, 0);
    expect(pollControls(state, 10).forward).toBe(0);
  });

  it("reports jump and texture toggle once per press", () => {
    pressKey(state, { name: "space" }, 0);
    pressKey(state, { name: "t" }, 0);
    const first = pollControls(state, 10);
    expect(first.jump).toBe(true);
    expect(first.toggleTextures).toBe(true);
    const second = pollControls(state, 20);
    expect(second.jump).toBe(false);
    expect(second.toggleTextures).toBe(false);
  });

  it("flags quit on escape and Ctrl-C", () => {
    pressKey(state, { name: "c" }, 0);
    expect(state.quit).toBe(false);
    pressKey(state, { name: "c", ctrl: true }, 0);
    expect(state.quit).toBe(true);

    const other = createInputState();
    pressKey(other, { name: "escape" }, 0);
    expect(other.quit).toBe(true);
  });
});
