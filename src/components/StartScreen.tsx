"use client";

import { useCallback, useEffect, useState } from "react";
import { gameBridge, type GamePhase } from "@/game/bridge";

export default function StartScreen() {
  const [phase, setPhase] = useState<GamePhase>(
    () => gameBridge.getState().phase,
  );
  const [bestScore, setBestScore] = useState<number>(
    () => gameBridge.getState().bestScore,
  );

  useEffect(() => {
    const onPhase = (p: GamePhase) => setPhase(p);
    const onBestScore = (b: number) => setBestScore(b);

    gameBridge.on("phaseChange", onPhase);
    gameBridge.on("bestScoreChange", onBestScore);

    return () => {
      gameBridge.off("phaseChange", onPhase);
      gameBridge.off("bestScoreChange", onBestScore);
    };
  }, []);

  const handleStart = useCallback(() => {
    if (gameBridge.getState().phase !== "start") return;
    gameBridge.setPhase("playing");
  }, []);

  if (phase !== "start") {
    return null;
  }

  return (
    <aside
      aria-label="Start screen"
      className="w-full max-w-md border border-foreground/40 bg-background/90 p-6 text-center font-mono"
    >
      <h1 className="text-3xl uppercase tracking-[0.3em] text-foreground">
        Grid Snake
      </h1>

      <p className="mt-5 text-xs uppercase tracking-[0.3em] text-apple">
        Press an arrow key
      </p>

      <p className="mt-2 text-[0.65rem] uppercase tracking-[0.2em] text-foreground/60">
        the first direction starts the snake
      </p>

      <button
        type="button"
        onClick={handleStart}
        data-testid="start-run"
        className="mt-6 border border-foreground/70 px-5 py-2 text-xs uppercase tracking-[0.2em] text-foreground hover:bg-foreground/10"
      >
        Start Run
      </button>

      {bestScore > 0 && (
        <p className="mt-6 text-xs text-foreground/70" data-testid="session-best">
          Session best: {bestScore}
        </p>
      )}
    </aside>
  );
}
