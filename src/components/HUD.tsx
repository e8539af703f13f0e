"use client";

import { useEffect, useState } from "react";
import { gameBridge, type GamePhase } from "@/game/bridge";

/**
 * HUD top bar overlay.
 *
 * Shows the score (food eaten), the snake length and the session best
 * while a run is in progress. Subscribes to the Phaser↔React bridge.
 */
export default function HUD() {
  const [phase, setPhase] = useState<GamePhase>(
    () => gameBridge.getState().phase,
  );
  const [score, setScore] = useState<number>(
    () => gameBridge.getState().score,
  );
  const [length, setLength] = useState<number>(
    () => gameBridge.getState().length,
  );
  const [bestScore, setBestScore] = useState<number>(
    () => gameBridge.getState().bestScore,
  );

  useEffect(() => {
    const onPhase = (p: GamePhase) => setPhase(p);
    const onScore = (s: number) => setScore(s);
    const onLength = (l: number) => setLength(l);
    const onBestScore = (b: number) => setBestScore(b);

    gameBridge.on("phaseChange", onPhase);
    gameBridge.on("scoreChange", onScore);
    gameBridge.on("lengthChange", onLength);
    gameBridge.on("bestScoreChange", onBestScore);

    return () => {
      gameBridge.off("phaseChange", onPhase);
      gameBridge.off("scoreChange", onScore);
      gameBridge.off("lengthChange", onLength);
      gameBridge.off("bestScoreChange", onBestScore);
    };
  }, []);

  if (phase !== "playing") return <div id="hud" />;

  return (
    <div
      id="hud"
      className="absolute inset-x-0 top-0 flex items-center justify-between px-4 py-2 font-mono text-sm"
      role="status"
      aria-label="Game HUD"
    >
      <span className="text-foreground" data-testid="hud-score">
        SCORE<span className="ml-2 tabular-nums">{score}</span>
      </span>
      <span className="text-foreground/70" data-testid="hud-length">
        LENGTH<span className="ml-2 tabular-nums">{length}</span>
      </span>
      <span className="text-apple/80" data-testid="hud-best">
        BEST<span className="ml-1 tabular-nums">{bestScore}</span>
      </span>
    </div>
  );
}
