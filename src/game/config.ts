import type Phaser from "phaser";
import { z } from "zod";
import { InvalidDimensionsError, InvalidSettingsError } from "./errors";

// ── Settings schema ──────────────────────────────────────────────

const hexColor = z
  .string()
  .regex(/^#[0-9a-fA-F]{6}$/, "Colours must be #rrggbb hex strings");

const settingsSchema = z
  .object({
    rows: z.number().int().min(2),
    cols: z.number().int().min(2),
    startingDelayMs: z.number().positive(),
    delayFloorMs: z.number().nonnegative(),
    colors: z.object({
      snake: hexColor,
      food: hexColor,
      background: hexColor,
      grid: hexColor,
    }),
    windowWidth: z.number().int().positive(),
    windowHeight: z.number().int().positive(),
  })
  .refine((settings) => settings.delayFloorMs <= settings.startingDelayMs, {
    message: "delayFloorMs must not exceed startingDelayMs",
    path: ["delayFloorMs"],
  });

export interface GameColors {
  readonly snake: string;
  readonly food: string;
  readonly background: string;
  readonly grid: string;
}

export interface GameSettings {
  readonly rows: number;
  readonly cols: number;
  /** Tick delay before the first food is eaten. */
  readonly startingDelayMs: number;
  /** Once the delay reaches this value it stops speeding up. */
  readonly delayFloorMs: number;
  readonly colors: GameColors;
  readonly windowWidth: number;
  readonly windowHeight: number;
}

export type GameSettingsOverrides = Partial<Omit<GameSettings, "colors">> & {
  colors?: Partial<GameColors>;
};

const DEFAULT_COLORS: GameColors = {
  snake: "#ffffff",
  food: "#ff0000",
  background: "#000000",
  grid: "#ffffff",
};

const DEFAULT_VALUES: GameSettings = {
  rows: 12,
  cols: 12,
  startingDelayMs: 500,
  delayFloorMs: 250,
  colors: DEFAULT_COLORS,
  windowWidth: 800,
  windowHeight: 800,
};

/**
 * Build the immutable settings for a session. Throws
 * `InvalidDimensionsError` for a bad grid size and `InvalidSettingsError`
 * for anything else the schema rejects.
 */
export function createGameSettings(
  overrides: GameSettingsOverrides = {},
): GameSettings {
  const merged = {
    ...DEFAULT_VALUES,
    ...overrides,
    colors: { ...DEFAULT_COLORS, ...overrides.colors },
  };

  const result = settingsSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues;
    if (issues.some((issue) => issue.path[0] === "rows" || issue.path[0] === "cols")) {
      throw new InvalidDimensionsError(merged.rows, merged.cols);
    }
    throw new InvalidSettingsError(issues);
  }

  return Object.freeze({
    ...result.data,
    colors: Object.freeze({ ...result.data.colors }),
  });
}

export const DEFAULT_SETTINGS: GameSettings = createGameSettings();

/** Convert a `#rrggbb` string to the packed integer Phaser draws with. */
export function hexToColor(hex: string): number {
  return Number.parseInt(hex.slice(1), 16);
}

// ── Render Depth Layers ─────────────────────────────────────────
// Higher values render on top.
export const DEPTH = {
  BOARD: 0,
  SCORE: 10,
} as const;

// ── Phaser namespace shape ──────────────────────────────────────
// Declares only the subset of the Phaser namespace used here so
// config.ts never needs a runtime `import Phaser` (which would
// crash during Next.js SSR because Phaser requires browser globals).
export interface PhaserLike {
  AUTO: number;
  Scale: {
    FIT: Phaser.Scale.ScaleModeType;
    CENTER_BOTH: Phaser.Scale.CenterType;
  };
}

// ── Game Configuration Factory ───────────────────────────────────
export function createGameConfig(
  parent: HTMLElement,
  phaser: PhaserLike,
  scenes: Phaser.Scene[],
  settings: GameSettings = DEFAULT_SETTINGS,
): Phaser.Types.Core.GameConfig {
  return {
    type: phaser.AUTO,
    width: settings.windowWidth,
    height: settings.windowHeight,
    parent,
    backgroundColor: settings.colors.background,
    scale: {
      mode: phaser.Scale.FIT,
      autoCenter: phaser.Scale.CENTER_BOTH,
    },
    scene: scenes,
  };
}
