import type Phaser from "phaser";
import { DEPTH, hexToColor, type GameSettings } from "../config";
import type { GridPos } from "../utils/grid";
import type { GameState } from "./GameState";

// ── Layout ratios ────────────────────────────────────────────────

/** Top band of the canvas kept free for the score readout. */
export const SCORE_BAND_RATIO = 0.15;

/** Share of the canvas height the grid may use below the score band. */
export const BOARD_HEIGHT_RATIO = 0.8;

/** Vertical centre of the score readout. */
export const SCORE_CENTER_RATIO = 0.075;

export const SEGMENT_SCALE = 0.7;
export const FOOD_SCALE = 0.6;

const GRID_LINE_ALPHA = 0.25;

export type BoardLayout = Readonly<{
  tileSize: number;
  originX: number;
  originY: number;
  boardWidth: number;
  boardHeight: number;
  scoreX: number;
  scoreY: number;
}>;

export type CellRect = Readonly<{
  x: number;
  y: number;
  size: number;
}>;

/**
 * Fit a `rows × cols` grid of square tiles into the canvas below the
 * score band, centred horizontally.
 */
export function computeBoardLayout(
  width: number,
  height: number,
  rows: number,
  cols: number,
): BoardLayout {
  const tileSize = Math.min((height * BOARD_HEIGHT_RATIO) / rows, width / cols);
  const boardWidth = tileSize * cols;
  const boardHeight = tileSize * rows;

  return {
    tileSize,
    originX: (width - boardWidth) / 2,
    originY: height * SCORE_BAND_RATIO,
    boardWidth,
    boardHeight,
    scoreX: width / 2,
    scoreY: height * SCORE_CENTER_RATIO,
  };
}

/** Square of `scale × tileSize` centred on a cell, as a top-left rect. */
export function cellRect(
  layout: BoardLayout,
  position: GridPos,
  scale: number,
): CellRect {
  const size = layout.tileSize * scale;
  const centerX =
    layout.originX + layout.tileSize * position.col + layout.tileSize / 2;
  const centerY =
    layout.originY + layout.tileSize * position.row + layout.tileSize / 2;

  return {
    x: centerX - size / 2,
    y: centerY - size / 2,
    size,
  };
}

// ── Renderer ─────────────────────────────────────────────────────

/**
 * Draws a `GameState` onto a Phaser scene. Reads the state through its
 * queries only and redraws the whole board every frame.
 */
export class BoardRenderer {
  private readonly gfx: Phaser.GameObjects.Graphics;

  private readonly scoreText: Phaser.GameObjects.Text;

  private readonly settings: GameSettings;

  constructor(scene: Phaser.Scene, settings: GameSettings) {
    this.settings = settings;
    this.gfx = scene.add.graphics();
    this.gfx.setDepth(DEPTH.BOARD);

    const fontSize = Math.floor(
      Math.min(settings.windowWidth, settings.windowHeight) / 20,
    );
    this.scoreText = scene.add.text(
      settings.windowWidth / 2,
      settings.windowHeight * SCORE_CENTER_RATIO,
      "Score: 0",
      {
        fontFamily: "monospace",
        fontSize: `${fontSize}px`,
        color: settings.colors.snake,
      },
    );
    this.scoreText.setOrigin(0.5);
    this.scoreText.setDepth(DEPTH.SCORE);
  }

  getLayout(state: GameState): BoardLayout {
    return computeBoardLayout(
      this.settings.windowWidth,
      this.settings.windowHeight,
      state.getRows(),
      state.getCols(),
    );
  }

  draw(state: GameState): void {
    const layout = this.getLayout(state);
    const colors = this.settings.colors;
    const backgroundColor = hexToColor(colors.background);

    this.gfx.clear();

    this.gfx.fillStyle(backgroundColor, 1);
    this.gfx.fillRect(0, 0, this.settings.windowWidth, this.settings.windowHeight);

    this.gfx.lineStyle(1, hexToColor(colors.grid), GRID_LINE_ALPHA);
    for (let row = 0; row < state.getRows(); row++) {
      for (let col = 0; col < state.getCols(); col++) {
        const rect = cellRect(layout, { col, row }, 1);
        this.gfx.strokeRect(rect.x, rect.y, rect.size, rect.size);
      }
    }

    this.gfx.fillStyle(hexToColor(colors.snake), 1);
    for (const segment of state.getSegments()) {
      this.fillCell(layout, segment, SEGMENT_SCALE);
    }

    const food = state.getFood();
    if (food) {
      this.gfx.fillStyle(hexToColor(colors.food), 1);
      this.fillCell(layout, food, FOOD_SCALE);
    }

    this.scoreText.setText(`Score: ${state.getScore()}`);
  }

  /** Wipe the board and reset the score readout. */
  clear(): void {
    this.gfx.clear();
    this.scoreText.setText("Score: 0");
  }

  destroy(): void {
    this.gfx.destroy();
    this.scoreText.destroy();
  }

  private fillCell(layout: BoardLayout, position: GridPos, scale: number): void {
    const rect = cellRect(layout, position, scale);
    this.gfx.fillRect(rect.x, rect.y, rect.size, rect.size);
  }
}
