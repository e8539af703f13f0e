import Phaser from "phaser";
import { DEFAULT_SETTINGS, type GameSettings } from "../config";
import { gameBridge, type GamePhase } from "../bridge";
import { GameState } from "../systems/GameState";
import { TickDelay } from "../systems/TickDelay";
import { BoardRenderer } from "../systems/BoardRenderer";
import { InputQueue, toInputCommand } from "../utils/input";
import { logger } from "../utils/logger";

/**
 * Primary gameplay scene.
 *
 * Glue between timing, input, rendering and the simulation core: it builds
 * a `GameState` per run, queues key presses between ticks, applies them in
 * one pass right before each `advance()`, and paces ticks with the
 * length-based `TickDelay` curve.
 *
 * Score and phase are published to the Phaser↔React bridge so the overlay
 * components stay in sync.
 */
export class MainScene extends Phaser.Scene {
  private readonly settings: GameSettings;

  /** Simulation for the current run (null before the first run). */
  private gameState: GameState | null = null;

  private boardRenderer: BoardRenderer | null = null;

  private readonly tickDelay: TickDelay;

  private readonly inputQueue = new InputQueue();

  /** Time accumulated towards the next tick. */
  private elapsedSinceTickMs = 0;

  /**
   * Injectable RNG function for deterministic replay sessions.
   * Returns a value in [0, 1). Defaults to Math.random.
   */
  private rng: () => number = Math.random;

  /** Bound listener for bridge phase changes (stored for cleanup). */
  private onBridgePhaseChange: ((phase: GamePhase) => void) | null = null;

  /** Stored keyboard handler reference for cleanup. */
  private keydownHandler: ((event: { code: string }) => void) | null = null;

  constructor(settings: GameSettings = DEFAULT_SETTINGS) {
    super({ key: "MainScene" });
    this.settings = settings;
    this.tickDelay = new TickDelay(
      settings.startingDelayMs,
      settings.delayFloorMs,
    );
  }

  // ── Phaser lifecycle ────────────────────────────────────────

  create(): void {
    this.boardRenderer = new BoardRenderer(this, this.settings);

    this.keydownHandler = (event: { code: string }) => {
      this.handleKey(event.code);
    };
    this.input.keyboard?.on("keydown", this.keydownHandler);

    // Phase changes can come from React overlays too
    // (StartScreen button, GameOver "Play Again").
    this.onBridgePhaseChange = (phase: GamePhase) => {
      if (phase === "playing") {
        this.startRun();
      }
    };
    gameBridge.on("phaseChange", this.onBridgePhaseChange);

    this.events.once("shutdown", () => this.shutdown());

    this.enterPhase("start");
  }

  /** Detach bridge and keyboard listeners and drop the board. */
  shutdown(): void {
    if (this.onBridgePhaseChange) {
      gameBridge.off("phaseChange", this.onBridgePhaseChange);
      this.onBridgePhaseChange = null;
    }
    if (this.keydownHandler) {
      this.input.keyboard?.off("keydown", this.keydownHandler);
      this.keydownHandler = null;
    }
    this.boardRenderer?.destroy();
    this.boardRenderer = null;
    this.gameState = null;
    this.inputQueue.clear();
  }

  update(_time: number, delta: number): void {
    if (gameBridge.getState().phase !== "playing" || !this.gameState) return;

    const state = this.gameState;

    // Idle until the first direction arrives; it applies without waiting
    // for a tick.
    if (state.getDirection() === null) {
      if (this.inputQueue.dispatch(state) === "quit") {
        this.quitRun();
        return;
      }
      this.boardRenderer?.draw(state);
      return;
    }

    this.elapsedSinceTickMs += delta;
    const tickDelayMs = this.tickDelay.current;
    if (this.elapsedSinceTickMs >= tickDelayMs) {
      // Carry the overshoot into the next tick, capped below one delay.
      this.elapsedSinceTickMs =
        (this.elapsedSinceTickMs - tickDelayMs) % tickDelayMs;

      if (this.inputQueue.dispatch(state) === "quit") {
        this.quitRun();
        return;
      }

      const ended = state.advance();
      gameBridge.setScore(state.getScore());
      gameBridge.setLength(state.getLength());

      if (ended) {
        this.boardRenderer?.draw(state);
        this.endRun();
        return;
      }

      this.tickDelay.next(state.getLength());
    }

    this.boardRenderer?.draw(state);
  }

  // ── Input ───────────────────────────────────────────────────

  /**
   * Route a raw key code. A direction key on the start screen begins a run;
   * during a run recognised keys are queued for the next tick.
   */
  handleKey(code: string): void {
    const command = toInputCommand(code);
    if (!command) return;

    const phase = gameBridge.getState().phase;
    if (phase === "start" && command.type === "direction") {
      this.enterPhase("playing");
    } else if (phase !== "playing") {
      return;
    }

    this.inputQueue.pushKey(code);
  }

  // ── Phase management ────────────────────────────────────────

  /**
   * Transition to a new game phase and notify the bridge.
   *
   * Entering "playing" from any source reaches `startRun()` through the
   * bridge listener registered in `create()`.
   */
  enterPhase(next: GamePhase): void {
    gameBridge.setPhase(next);
  }

  getPhase(): GamePhase {
    return gameBridge.getState().phase;
  }

  // ── Run lifecycle ───────────────────────────────────────────

  private startRun(): void {
    gameBridge.resetRun();
    this.inputQueue.clear();
    this.gameState = new GameState(this.settings.rows, this.settings.cols, {
      rng: this.rng,
    });
    this.tickDelay.reset();
    this.tickDelay.next(this.gameState.getLength());
    this.elapsedSinceTickMs = 0;
    logger.info(
      `New run on a ${this.settings.rows}x${this.settings.cols} grid`,
    );
    this.boardRenderer?.draw(this.gameState);
  }

  /** Publish the result of an ended run and show the game-over overlay. */
  private endRun(): void {
    if (!this.gameState) return;

    const score = this.gameState.getScore();
    logger.info(`Your final score is ${score}!`);

    if (score > gameBridge.getState().bestScore) {
      gameBridge.setBestScore(score);
    }
    gameBridge.setOutcome(this.gameState.getOutcome());
    this.enterPhase("gameOver");
  }

  /** Leave the run on a quit request and return to the start screen. */
  private quitRun(): void {
    logger.info("Run abandoned by quit request");
    this.inputQueue.clear();
    this.gameState = null;
    this.boardRenderer?.clear();
    this.enterPhase("start");
  }

  // ── Accessors (for tests and replays) ───────────────────────

  getGameState(): GameState | null {
    return this.gameState;
  }

  getTickDelayMs(): number {
    return this.tickDelay.current;
  }

  getSettings(): GameSettings {
    return this.settings;
  }

  /** Set the RNG function for deterministic replay. */
  setRng(rng: () => number): void {
    this.rng = rng;
  }
}
