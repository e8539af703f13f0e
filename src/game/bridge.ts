/**
 * Phaser ↔ React state bridge.
 *
 * A lightweight typed event emitter that Phaser scenes write to and React
 * overlays subscribe to.  Exported as a singleton so both sides import
 * the same instance.
 */
import type { GameOutcome } from "./systems/GameState";

// ── Game phases ─────────────────────────────────────────────────
export type GamePhase = "start" | "playing" | "gameOver";

// ── Bridge state shape ──────────────────────────────────────────
export interface BridgeState {
  phase: GamePhase;
  /** Food eaten this run (snake length - 1). */
  score: number;
  length: number;
  /** Best score of this browser session. Not persisted. */
  bestScore: number;
  outcome: GameOutcome;
}

// ── Event map: event name → payload ─────────────────────────────
export interface GameBridgeEvents {
  phaseChange: GamePhase;
  scoreChange: number;
  lengthChange: number;
  bestScoreChange: number;
  outcomeChange: GameOutcome;
}

export type GameBridgeEventName = keyof GameBridgeEvents;

type Listener<T> = (value: T) => void;

type ListenerRegistry = {
  [K in GameBridgeEventName]: Set<Listener<GameBridgeEvents[K]>>;
};

/**
 * Typed event emitter that also holds the latest snapshot of game state
 * so late-subscribing React components can read the current value
 * without waiting for the next event.
 */
export class GameBridge {
  private state: BridgeState = {
    phase: "start",
    score: 0,
    length: 1,
    bestScore: 0,
    outcome: "running",
  };

  private listeners: ListenerRegistry = {
    phaseChange: new Set(),
    scoreChange: new Set(),
    lengthChange: new Set(),
    bestScoreChange: new Set(),
    outcomeChange: new Set(),
  };

  // ── Getters ─────────────────────────────────────────────────
  getState(): Readonly<BridgeState> {
    return this.state;
  }

  // ── Mutations (called by Phaser scenes) ─────────────────────
  setPhase(phase: GamePhase): void {
    this.state.phase = phase;
    this.emit("phaseChange", phase);
  }

  setScore(score: number): void {
    if (this.state.score === score) return;
    this.state.score = score;
    this.emit("scoreChange", score);
  }

  setLength(length: number): void {
    if (this.state.length === length) return;
    this.state.length = length;
    this.emit("lengthChange", length);
  }

  setBestScore(bestScore: number): void {
    this.state.bestScore = bestScore;
    this.emit("bestScoreChange", bestScore);
  }

  setOutcome(outcome: GameOutcome): void {
    this.state.outcome = outcome;
    this.emit("outcomeChange", outcome);
  }

  /** Reset all per-run state (called on new game). */
  resetRun(): void {
    this.state.score = 0;
    this.state.length = 1;
    this.state.outcome = "running";
    this.emit("scoreChange", 0);
    this.emit("lengthChange", 1);
    this.emit("outcomeChange", "running");
  }

  // ── Pub / Sub ───────────────────────────────────────────────
  on<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event].add(listener);
  }

  off<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listeners[event].delete(listener);
  }

  private emit<K extends GameBridgeEventName>(
    event: K,
    value: GameBridgeEvents[K],
  ): void {
    this.listeners[event].forEach((fn) => fn(value));
  }
}

/** Singleton bridge instance shared by Phaser and React. */
export const gameBridge = new GameBridge();
