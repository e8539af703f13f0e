"use client";

import dynamic from "next/dynamic";
import { useEffect, useRef } from "react";
import { logger } from "@/game/utils/logger";

type PhaserGameInstance = {
  destroy: (removeCanvas: boolean, noReturn?: boolean) => void;
  scale?: {
    refresh?: () => void;
  };
};

type CanvasFitSize = Readonly<{
  width: number;
  height: number;
  scale: number;
}>;

function clampDimension(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, Math.floor(value));
}

/**
 * Largest whole-pixel size that fits the canvas into its container while
 * keeping the canvas aspect ratio.
 */
export function fitCanvasToContainer(
  containerWidth: number,
  containerHeight: number,
  canvasWidth: number,
  canvasHeight: number,
): CanvasFitSize {
  const safeContainerWidth = clampDimension(containerWidth);
  const safeContainerHeight = clampDimension(containerHeight);
  const safeCanvasWidth = Math.max(1, clampDimension(canvasWidth));
  const safeCanvasHeight = Math.max(1, clampDimension(canvasHeight));

  if (safeContainerWidth === 0 || safeContainerHeight === 0) {
    return {
      width: 0,
      height: 0,
      scale: 0,
    };
  }

  const scale = Math.min(
    safeContainerWidth / safeCanvasWidth,
    safeContainerHeight / safeCanvasHeight,
  );

  return {
    width: Math.max(1, Math.floor(safeCanvasWidth * scale)),
    height: Math.max(1, Math.floor(safeCanvasHeight * scale)),
    scale,
  };
}

function PhaserGameMount() {
  const frameRef = useRef<HTMLDivElement | null>(null);
  const mountRef = useRef<HTMLDivElement | null>(null);
  const gameRef = useRef<PhaserGameInstance | null>(null);

  useEffect(() => {
    let cancelled = false;
    let resizeObserver: ResizeObserver | null = null;
    let resizeFrameHandle: number | null = null;
    let handleViewportResize: (() => void) | null = null;
    let canvasWidth = 0;
    let canvasHeight = 0;

    const frameNode = frameRef.current;
    const mountNode = mountRef.current;

    if (!frameNode || !mountNode || gameRef.current) {
      return;
    }

    mountNode.replaceChildren();

    const applyResponsiveSizing = () => {
      if (canvasWidth <= 0 || canvasHeight <= 0) {
        return;
      }

      const bounds = frameNode.getBoundingClientRect();
      const fit = fitCanvasToContainer(
        bounds.width,
        bounds.height,
        canvasWidth,
        canvasHeight,
      );

      mountNode.style.width = `${fit.width}px`;
      mountNode.style.height = `${fit.height}px`;
    };

    const clearResizeFrame = () => {
      if (resizeFrameHandle === null) {
        return;
      }

      window.cancelAnimationFrame(resizeFrameHandle);
      resizeFrameHandle = null;
    };

    const scheduleScaleRefresh = () => {
      if (cancelled) {
        return;
      }

      clearResizeFrame();
      resizeFrameHandle = window.requestAnimationFrame(() => {
        resizeFrameHandle = null;
        applyResponsiveSizing();
        gameRef.current?.scale?.refresh?.();
      });
    };

    void (async () => {
      try {
        const [
          { default: Phaser },
          { DEFAULT_SETTINGS, createGameConfig },
          { Boot },
          { MainScene },
        ] = await Promise.all([
          import("phaser"),
          import("@/game/config"),
          import("@/game/scenes/Boot"),
          import("@/game/scenes/MainScene"),
        ]);

        if (cancelled || !mountNode.isConnected || gameRef.current) {
          return;
        }

        canvasWidth = DEFAULT_SETTINGS.windowWidth;
        canvasHeight = DEFAULT_SETTINGS.windowHeight;

        applyResponsiveSizing();

        gameRef.current = new Phaser.Game(
          createGameConfig(
            mountNode,
            Phaser,
            [new Boot(), new MainScene(DEFAULT_SETTINGS)],
            DEFAULT_SETTINGS,
          ),
        );

        handleViewportResize = () => {
          scheduleScaleRefresh();
        };

        window.addEventListener("resize", handleViewportResize);
        window.addEventListener("orientationchange", handleViewportResize);

        if (typeof ResizeObserver !== "undefined") {
          resizeObserver = new ResizeObserver(() => {
            scheduleScaleRefresh();
          });

          resizeObserver.observe(frameNode);
        }

        scheduleScaleRefresh();
      } catch (error) {
        logger.error("Game bootstrap failed", error);
      }
    })();

    return () => {
      cancelled = true;
      clearResizeFrame();

      if (handleViewportResize) {
        window.removeEventListener("resize", handleViewportResize);
        window.removeEventListener("orientationchange", handleViewportResize);
      }

      if (resizeObserver) {
        resizeObserver.disconnect();
      }

      if (gameRef.current) {
        gameRef.current.destroy(true);
        gameRef.current = null;
      }

      mountNode.style.width = "";
      mountNode.style.height = "";
      mountNode.replaceChildren();
    };
  }, []);

  return (
    <div ref={frameRef} className="flex h-full w-full items-center justify-center">
      <div ref={mountRef} className="max-h-full max-w-full overflow-hidden" />
    </div>
  );
}

const ClientOnlyPhaserGame = dynamic(() => Promise.resolve(PhaserGameMount), {
  ssr: false,
});

export default function Game() {
  return <ClientOnlyPhaserGame />;
}
