"use client";

import { useEffect, useState, useCallback, useRef } from "react";
import { gameBridge, type GamePhase } from "@/game/bridge";
import type { GameOutcome } from "@/game/systems/GameState";

const OUTCOME_MESSAGES: Record<GameOutcome, string> = {
  running: "",
  wall: "You hit the wall",
  self: "You ran into yourself",
  cleared: "Board cleared!",
};

function describeOutcome(outcome: GameOutcome): string {
  return OUTCOME_MESSAGES[outcome];
}

/**
 * Post-game overlay displayed after the run ends.
 *
 * Shows the final score and why the run ended, then waits for an
 * acknowledgement: Enter/Space plays again, Escape returns to the start
 * screen.
 */
export default function GameOver() {
  const [phase, setPhase] = useState<GamePhase>(
    () => gameBridge.getState().phase,
  );
  const [score, setScore] = useState<number>(
    () => gameBridge.getState().score,
  );
  const [bestScore, setBestScore] = useState<number>(
    () => gameBridge.getState().bestScore,
  );
  const [outcome, setOutcome] = useState<GameOutcome>(
    () => gameBridge.getState().outcome,
  );

  const playAgainRef = useRef<HTMLButtonElement | null>(null);

  useEffect(() => {
    const onPhase = (p: GamePhase) => setPhase(p);
    const onScore = (s: number) => setScore(s);
    const onBestScore = (b: number) => setBestScore(b);
    const onOutcome = (o: GameOutcome) => setOutcome(o);

    gameBridge.on("phaseChange", onPhase);
    gameBridge.on("scoreChange", onScore);
    gameBridge.on("bestScoreChange", onBestScore);
    gameBridge.on("outcomeChange", onOutcome);

    return () => {
      gameBridge.off("phaseChange", onPhase);
      gameBridge.off("scoreChange", onScore);
      gameBridge.off("bestScoreChange", onBestScore);
      gameBridge.off("outcomeChange", onOutcome);
    };
  }, []);

  useEffect(() => {
    if (phase === "gameOver") {
      playAgainRef.current?.focus();
    }
  }, [phase]);

  const playAgain = useCallback(() => {
    if (gameBridge.getState().phase !== "gameOver") return;
    gameBridge.setPhase("playing");
  }, []);

  const returnToStart = useCallback(() => {
    if (gameBridge.getState().phase !== "gameOver") return;
    gameBridge.setPhase("start");
  }, []);

  // Keyboard shortcuts: Enter/Space → play again, Escape → start screen
  useEffect(() => {
    if (phase !== "gameOver") return;

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === "Enter" || e.key === " ") {
        e.preventDefault();
        playAgain();
      } else if (e.key === "Escape") {
        e.preventDefault();
        returnToStart();
      }
    };

    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [phase, playAgain, returnToStart]);

  if (phase !== "gameOver") return <div id="game-over" />;

  return (
    <div
      id="game-over"
      className="flex h-full w-full flex-col items-center justify-center font-mono"
      role="dialog"
      aria-label="Game over"
    >
      <h2
        className="mb-2 text-4xl font-bold tracking-widest text-apple"
        data-testid="game-over-title"
      >
        GAME OVER
      </h2>

      <p className="mb-6 text-sm text-foreground/70" data-testid="outcome">
        {describeOutcome(outcome)}
      </p>

      <div className="mb-8 flex flex-col items-center gap-3 border border-foreground/30 px-8 py-6">
        <div className="text-center" data-testid="final-score">
          <span className="text-xs tracking-wide text-foreground/50">
            FINAL SCORE
          </span>
          <p className="text-3xl font-bold tabular-nums text-foreground">
            {score}
          </p>
        </div>

        <div className="text-center" data-testid="best-score">
          <span className="text-xs tracking-wide text-foreground/50">
            SESSION BEST
          </span>
          <p className="text-lg tabular-nums text-foreground/80">{bestScore}</p>
        </div>
      </div>

      <div className="flex flex-col items-center gap-3">
        <button
          ref={playAgainRef}
          className="border border-foreground px-6 py-3 text-sm font-bold tracking-widest text-foreground hover:bg-foreground/10"
          data-testid="play-again"
          onClick={playAgain}
          type="button"
        >
          PLAY AGAIN
        </button>
        <button
          className="border border-foreground/30 px-4 py-2 text-xs tracking-wide text-foreground/50 hover:text-foreground/80"
          data-testid="return-to-start"
          onClick={returnToStart}
          type="button"
        >
          MENU
        </button>
      </div>

      <p
        className="mt-4 text-[10px] tracking-wide text-foreground/30"
        data-testid="keyboard-hint"
        aria-hidden="true"
      >
        ENTER — PLAY &nbsp;&nbsp; ESC — MENU
      </p>
    </div>
  );
}

export { describeOutcome };
