import {
  describe,
  it,
  expect,
  vi,
  beforeEach,
  afterEach,
  type MockInstance,
} from "vitest";
import { gameBridge } from "@/game/bridge";
import { createGameSettings } from "@/game/config";

// ── Phaser mock ──────────────────────────────────────────────────
const mockGraphics = {
  clear: vi.fn(),
  fillStyle: vi.fn(),
  fillRect: vi.fn(),
  lineStyle: vi.fn(),
  strokeRect: vi.fn(),
  setDepth: vi.fn(),
  destroy: vi.fn(),
};

const mockText = {
  setOrigin: vi.fn(),
  setDepth: vi.fn(),
  setText: vi.fn(),
  destroy: vi.fn(),
};

const mockKeyboardOn = vi.fn();
const mockKeyboardOff = vi.fn();
const mockEventsOnce = vi.fn();
const mockSceneStart = vi.fn();

vi.mock("phaser", () => {
  class MockScene {
    scene = { start: mockSceneStart };
    add = {
      graphics: vi.fn(() => mockGraphics),
      text: vi.fn(() => mockText),
    };
    input = {
      keyboard: {
        on: mockKeyboardOn,
        off: mockKeyboardOff,
      },
    };
    events = { once: mockEventsOnce };
    constructor(public config?: { key: string }) {}
  }
  class MockGame {
    constructor() {}
    destroy() {}
  }
  return {
    default: {
      Game: MockGame,
      Scene: MockScene,
      AUTO: 0,
      Scale: { FIT: 1, CENTER_BOTH: 1 },
    },
    Game: MockGame,
    Scene: MockScene,
    AUTO: 0,
    Scale: { FIT: 1, CENTER_BOTH: 1 },
  };
});

import { MainScene } from "@/game/scenes/MainScene";

// ── Helpers ──────────────────────────────────────────────────────

const SMALL_BOARD = createGameSettings({ rows: 4, cols: 4 });

/** Scene on a 4x4 board whose rng always returns 0: head (0,0), food (1,0). */
function createScene(): MainScene {
  const scene = new MainScene(SMALL_BOARD);
  scene.setRng(() => 0);
  scene.create();
  return scene;
}

/** Press a key and let one frame apply it. */
function press(scene: MainScene, code: string): void {
  scene.handleKey(code);
  scene.update(0, 0);
}

let activeScene: MainScene | null = null;
let infoSpy: MockInstance<typeof console.info>;

beforeEach(() => {
  vi.clearAllMocks();
  infoSpy = vi.spyOn(console, "info").mockImplementation(() => {});
  gameBridge.setPhase("start");
  gameBridge.setBestScore(0);
  gameBridge.resetRun();
  activeScene = null;
});

afterEach(() => {
  activeScene?.shutdown();
  infoSpy.mockRestore();
});

function start(): MainScene {
  activeScene = createScene();
  return activeScene;
}

// ── Lifecycle ────────────────────────────────────────────────────

describe("MainScene lifecycle", () => {
  it("keeps the settings it was built with", () => {
    const scene = new MainScene(SMALL_BOARD);
    expect(scene.getSettings()).toBe(SMALL_BOARD);
    expect(scene.getTickDelayMs()).toBe(500);
  });

  it("create() wires keyboard input and shows the start screen", () => {
    const scene = start();
    expect(mockKeyboardOn).toHaveBeenCalledWith("keydown", expect.any(Function));
    expect(mockEventsOnce).toHaveBeenCalledWith("shutdown", expect.any(Function));
    expect(scene.getPhase()).toBe("start");
    expect(scene.getGameState()).toBeNull();
  });

  it("shutdown() detaches listeners and drops the run", () => {
    const scene = start();
    const handler = mockKeyboardOn.mock.calls[0][1];

    scene.shutdown();
    activeScene = null;

    expect(mockKeyboardOff).toHaveBeenCalledWith("keydown", handler);
    expect(mockGraphics.destroy).toHaveBeenCalledTimes(1);

    gameBridge.setPhase("playing");
    expect(scene.getGameState()).toBeNull();
  });
});

// ── Starting a run ───────────────────────────────────────────────

describe("MainScene run start", () => {
  it("starts a run on the first direction key and applies it at once", () => {
    const scene = start();
    press(scene, "ArrowRight");

    expect(scene.getPhase()).toBe("playing");
    const state = scene.getGameState();
    expect(state).not.toBeNull();
    expect(state?.getDirection()).toBe("right");
    expect(state?.getHeadPosition()).toEqual({ col: 0, row: 0 });
    expect(scene.getTickDelayMs()).toBe(425);
    expect(infoSpy).toHaveBeenCalledWith("[grid-snake]", "New run on a 4x4 grid");
  });

  it("routes keys from the Phaser keyboard handler", () => {
    const scene = start();
    const handler = mockKeyboardOn.mock.calls[0][1];
    handler({ code: "KeyD" });
    expect(scene.getPhase()).toBe("playing");
  });

  it("ignores non-direction keys on the start screen", () => {
    const scene = start();
    scene.handleKey("Escape");
    scene.handleKey("Space");
    expect(scene.getPhase()).toBe("start");
    expect(scene.getGameState()).toBeNull();
  });

  it("starts a run when the overlay switches to playing", () => {
    const scene = start();
    gameBridge.setPhase("playing");
    const state = scene.getGameState();
    expect(state?.getLength()).toBe(1);
    expect(state?.getDirection()).toBeNull();
  });
});

// ── Ticking ──────────────────────────────────────────────────────

describe("MainScene ticks", () => {
  it("waits for the full tick delay before advancing", () => {
    const scene = start();
    press(scene, "ArrowRight");

    scene.update(0, 424);
    expect(scene.getGameState()?.getHeadPosition()).toEqual({ col: 0, row: 0 });

    scene.update(0, 1);
    expect(scene.getGameState()?.getHeadPosition()).toEqual({ col: 1, row: 0 });
  });

  it("publishes score and length and speeds up after eating", () => {
    const scene = start();
    press(scene, "ArrowRight");
    scene.update(0, 425);

    expect(gameBridge.getState().score).toBe(1);
    expect(gameBridge.getState().length).toBe(2);
    expect(scene.getTickDelayMs()).toBe(361);
    expect(mockText.setText).toHaveBeenLastCalledWith("Score: 1");
  });

  it("applies queued turns right before the next tick", () => {
    const scene = start();
    press(scene, "ArrowRight");
    scene.update(0, 425);

    scene.handleKey("ArrowDown");
    expect(scene.getGameState()?.getDirection()).toBe("right");

    scene.update(0, 361);
    expect(scene.getGameState()?.getDirection()).toBe("down");
    expect(scene.getGameState()?.getHeadPosition()).toEqual({ col: 1, row: 1 });
  });

  it("carries the time past the delay into the next tick", () => {
    const scene = start();
    press(scene, "ArrowRight");

    // 5 ms past the first 425 ms delay; the next delay is 361 ms
    scene.update(0, 430);
    expect(scene.getGameState()?.getHeadPosition()).toEqual({ col: 1, row: 0 });

    scene.update(0, 356);
    expect(scene.getGameState()?.getHeadPosition()).toEqual({ col: 2, row: 0 });
  });

  it("does nothing outside the playing phase", () => {
    const scene = start();
    scene.update(0, 10_000);
    expect(mockGraphics.clear).not.toHaveBeenCalled();
  });
});

// ── Ending a run ─────────────────────────────────────────────────

describe("MainScene run end", () => {
  it("shows game over with the outcome when the snake hits a wall", () => {
    const scene = start();
    press(scene, "ArrowUp");
    scene.update(0, 425);

    expect(scene.getPhase()).toBe("gameOver");
    expect(gameBridge.getState().outcome).toBe("wall");
    expect(gameBridge.getState().bestScore).toBe(0);
    expect(infoSpy).toHaveBeenCalledWith("[grid-snake]", "Your final score is 0!");
  });

  it("records the session best after a scoring run", () => {
    const scene = start();
    press(scene, "ArrowRight");

    // Eat (1,0), (2,0) and (3,0), then run into the right wall
    scene.update(0, 425);
    scene.update(0, 361);
    scene.update(0, 307);
    expect(scene.getGameState()?.getLength()).toBe(4);
    scene.update(0, 261);

    expect(scene.getPhase()).toBe("gameOver");
    expect(gameBridge.getState().score).toBe(3);
    expect(gameBridge.getState().bestScore).toBe(3);
    expect(infoSpy).toHaveBeenCalledWith("[grid-snake]", "Your final score is 3!");
  });

  it("ignores direction keys on the game-over screen", () => {
    const scene = start();
    press(scene, "ArrowUp");
    scene.update(0, 425);

    scene.handleKey("ArrowDown");
    expect(scene.getPhase()).toBe("gameOver");
  });

  it("a fresh run resets the score but keeps the best", () => {
    const scene = start();
    press(scene, "ArrowRight");
    scene.update(0, 425);
    scene.update(0, 361);
    scene.update(0, 307);
    scene.update(0, 261);

    gameBridge.setPhase("playing");
    expect(gameBridge.getState().score).toBe(0);
    expect(gameBridge.getState().bestScore).toBe(3);
    expect(gameBridge.getState().outcome).toBe("running");
    expect(scene.getTickDelayMs()).toBe(425);
  });

  it("returns to the start screen on Escape", () => {
    const scene = start();
    press(scene, "ArrowRight");

    scene.handleKey("Escape");
    scene.update(0, 425);

    expect(scene.getPhase()).toBe("start");
    expect(scene.getGameState()).toBeNull();
    expect(infoSpy).toHaveBeenCalledWith("[grid-snake]", "Run abandoned by quit request");
  });

  it("wipes the abandoned board on Escape", () => {
    const scene = start();
    press(scene, "ArrowRight");
    scene.update(0, 425);
    expect(mockText.setText).toHaveBeenLastCalledWith("Score: 1");

    mockGraphics.clear.mockClear();
    scene.handleKey("Escape");
    scene.update(0, 361);

    expect(mockGraphics.clear).toHaveBeenCalledTimes(1);
    expect(mockText.setText).toHaveBeenLastCalledWith("Score: 0");
  });

  it("honours Escape before the snake has moved", () => {
    const scene = start();
    gameBridge.setPhase("playing");
    press(scene, "Escape");
    expect(scene.getPhase()).toBe("start");
  });
});
