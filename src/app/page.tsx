"use client";

import { useEffect, useState } from "react";
import dynamic from "next/dynamic";
import HUD from "@/components/HUD";
import StartScreen from "@/components/StartScreen";
import GameOver from "@/components/GameOver";
import { gameBridge, type GamePhase } from "@/game/bridge";

const Game = dynamic(() => import("@/components/Game"), { ssr: false });

export default function Home() {
  const [phase, setPhase] = useState<GamePhase>(
    () => gameBridge.getState().phase,
  );

  useEffect(() => {
    const onPhase = (p: GamePhase) => setPhase(p);
    gameBridge.on("phaseChange", onPhase);
    return () => {
      gameBridge.off("phaseChange", onPhase);
    };
  }, []);

  return (
    <main className="relative h-screen w-screen bg-background">
      {/* Layer 0: Phaser canvas */}
      <div className="h-full w-full">
        <Game />
      </div>

      {/* Layer 1: HUD overlay */}
      <div className="pointer-events-none absolute inset-0 z-10">
        <HUD />
      </div>

      {/* Layer 2: Start screen overlay. Keys bubble on to Phaser, which
          ignores them outside "playing". */}
      <div
        className={`absolute inset-0 z-20 flex items-center justify-center ${phase === "start" ? "" : "pointer-events-none"}`}
      >
        <StartScreen />
      </div>

      {/* Layer 3: Game Over overlay */}
      <div
        className={`absolute inset-0 z-30 ${phase === "gameOver" ? "bg-background/80" : "pointer-events-none"}`}
      >
        <GameOver />
      </div>
    </main>
  );
}
