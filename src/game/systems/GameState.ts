import { InvalidDimensionsError, InvalidPlacementError } from "../errors";
import {
  type Direction,
  type GridBounds,
  type GridPos,
  type GridVector,
  ZERO_VECTOR,
  directionToVector,
  gridEquals,
  gridKey,
  isInBounds,
  isOppositeDirection,
  stepInDirection,
} from "../utils/grid";

// ── Types ────────────────────────────────────────────────────────

export type CellTag = "empty" | "head" | "body" | "food";

type SnakeTag = Extract<CellTag, "head" | "body">;

/**
 * `running` until the run ends. `wall` and `self` are crashes; `cleared`
 * means the snake filled the board and no food could be placed.
 */
export type GameOutcome = "running" | "wall" | "self" | "cleared";

export interface GameStateOptions {
  /** Returns a value in [0, 1). Defaults to Math.random. */
  rng?: () => number;
  /** Seed the head cell instead of drawing it at random. */
  head?: GridPos;
  /** Seed the first food cell instead of drawing it at random. */
  food?: GridPos;
}

function pickIndex(rng: () => number, size: number): number {
  return Math.min(size - 1, Math.max(0, Math.floor(rng() * size)));
}

// ── Game state ───────────────────────────────────────────────────

/**
 * Simulation core for a single snake on a fixed grid.
 *
 * The only stored structures are the bounded head-position history and an
 * occupancy index keyed by cell; the grid that renderers read is derived
 * from them on demand. History is ordered oldest → newest and holds the
 * `length` live segments plus at most one stale trailing cell: the spot
 * the tail most recently left.
 *
 * Collisions and a saturated board are outcomes, never exceptions:
 * `advance()` reports them through its return value and `getOutcome()`.
 */
export class GameState {
  private readonly bounds: GridBounds;

  private readonly rng: () => number;

  /** Head positions, oldest first. Never longer than `length + 1`. */
  private readonly history: GridPos[];

  /** Live snake cells only. Food and empty cells are absent. */
  private readonly occupancy = new Map<string, SnakeTag>();

  private food: GridPos | null = null;

  private length = 1;

  /** `null` until the first direction is chosen. */
  private direction: Direction | null = null;

  /** Set once a turn is accepted; cleared by the next `advance()`. */
  private moveLocked = false;

  private outcome: GameOutcome = "running";

  constructor(rows: number, cols: number, options: GameStateOptions = {}) {
    if (
      !Number.isInteger(rows) ||
      !Number.isInteger(cols) ||
      rows < 2 ||
      cols < 2
    ) {
      throw new InvalidDimensionsError(rows, cols);
    }

    this.bounds = Object.freeze({ rows, cols });
    this.rng = options.rng ?? Math.random;

    const head: GridPos = options.head
      ? { col: options.head.col, row: options.head.row }
      : this.randomCell();
    if (!isInBounds(head, this.bounds)) {
      throw new InvalidPlacementError("Snake head is outside the grid", head);
    }

    this.history = [head];
    this.occupancy.set(gridKey(head), "head");

    if (options.food) {
      const food: GridPos = { col: options.food.col, row: options.food.row };
      if (!isInBounds(food, this.bounds)) {
        throw new InvalidPlacementError("Food is outside the grid", food);
      }
      if (this.occupancy.has(gridKey(food))) {
        throw new InvalidPlacementError("Food cannot share the head cell", food);
      }
      this.food = food;
    } else {
      this.generateFood();
    }
  }

  // ── Commands ────────────────────────────────────────────────

  /**
   * Request a new heading. Returns `true` when it was taken.
   *
   * The first direction of a run is adopted without arming the move-lock
   * so the opening keypress starts motion immediately. After that a turn
   * locks further changes until the next tick, and an exact reversal is
   * refused outright.
   */
  setDirection(direction: Direction): boolean {
    if (this.outcome !== "running" || this.moveLocked) {
      return false;
    }

    if (this.direction === null) {
      this.direction = direction;
      return true;
    }

    if (isOppositeDirection(this.direction, direction)) {
      return false;
    }

    this.direction = direction;
    this.moveLocked = true;
    return true;
  }

  /**
   * Move the snake one cell. Returns `true` once the run has ended.
   *
   * A crash leaves the board exactly as it was before the call. Before the
   * first direction is chosen the snake stays put.
   */
  advance(): boolean {
    if (this.outcome !== "running") {
      return true;
    }

    this.moveLocked = false;

    if (this.direction === null) {
      return false;
    }

    const head = this.getHeadPosition();
    const next = stepInDirection(head, this.direction);

    if (!isInBounds(next, this.bounds)) {
      this.outcome = "wall";
      return true;
    }

    const nextKey = gridKey(next);
    // The tail is still occupied at this point, so following it closely
    // counts as a bite.
    if (this.occupancy.get(nextKey) === "body") {
      this.outcome = "self";
      return true;
    }

    const ateFood = this.food !== null && gridEquals(this.food, next);
    const headKey = gridKey(head);
    if (ateFood) {
      this.length += 1;
      this.food = null;
    } else {
      // The tail leaves its cell. With one segment that is the head itself.
      const tail = this.history[this.history.length - this.length];
      this.occupancy.delete(gridKey(tail));
    }

    if (this.length > 1) {
      this.occupancy.set(headKey, "body");
    }

    this.history.push(next);
    this.occupancy.set(nextKey, "head");

    while (this.history.length > this.length + 1) {
      this.history.shift();
    }

    if (ateFood) {
      this.generateFood();
    }

    return this.outcome !== "running";
  }

  // ── Queries ─────────────────────────────────────────────────

  getRows(): number {
    return this.bounds.rows;
  }

  getCols(): number {
    return this.bounds.cols;
  }

  getBounds(): GridBounds {
    return this.bounds;
  }

  /** Tag of a single cell, or `undefined` outside the grid. */
  getCell(position: GridPos): CellTag | undefined {
    if (!isInBounds(position, this.bounds)) {
      return undefined;
    }

    const tag = this.occupancy.get(gridKey(position));
    if (tag) {
      return tag;
    }

    if (this.food && gridEquals(this.food, position)) {
      return "food";
    }

    return "empty";
  }

  /** Fresh `rows × cols` tag matrix, indexed `[row][col]`. */
  getGrid(): CellTag[][] {
    const grid: CellTag[][] = [];
    for (let row = 0; row < this.bounds.rows; row++) {
      const cells: CellTag[] = [];
      for (let col = 0; col < this.bounds.cols; col++) {
        cells.push(this.getCell({ col, row }) ?? "empty");
      }
      grid.push(cells);
    }
    return grid;
  }

  /** Head-position history, oldest first, including the stale trailing cell. */
  getPath(): GridPos[] {
    return this.history.map((pos) => ({ ...pos }));
  }

  /** Live segments, head first. */
  getSegments(): GridPos[] {
    return this.history
      .slice(this.history.length - this.length)
      .reverse()
      .map((pos) => ({ ...pos }));
  }

  /** Trailing history entries the snake has left and not re-entered since. */
  getStaleCells(): GridPos[] {
    return this.history
      .slice(0, this.history.length - this.length)
      .filter((pos) => !this.occupancy.has(gridKey(pos)))
      .map((pos) => ({ ...pos }));
  }

  getHeadPosition(): GridPos {
    const head = this.history[this.history.length - 1];
    return { col: head.col, row: head.row };
  }

  /** Current food cell, or `null` once the board is saturated. */
  getFood(): GridPos | null {
    return this.food ? { ...this.food } : null;
  }

  getLength(): number {
    return this.length;
  }

  /** Food eaten so far. */
  getScore(): number {
    return this.length - 1;
  }

  getDirection(): Direction | null {
    return this.direction;
  }

  /** Committed heading as (dx, dy); the zero vector before the first move. */
  getVelocity(): GridVector {
    return this.direction ? directionToVector(this.direction) : ZERO_VECTOR;
  }

  isMoveLocked(): boolean {
    return this.moveLocked;
  }

  getOutcome(): GameOutcome {
    return this.outcome;
  }

  isEnded(): boolean {
    return this.outcome !== "running";
  }

  /** Tab-separated tag grid, one row per line. */
  toString(): string {
    return this.getGrid()
      .map((cells) => cells.join("\t"))
      .join("\n");
  }

  // ── Internals ───────────────────────────────────────────────

  private randomCell(): GridPos {
    const row = pickIndex(this.rng, this.bounds.rows);
    const col = pickIndex(this.rng, this.bounds.cols);
    return { col, row };
  }

  /**
   * Place food uniformly over the empty cells (row-major candidate order).
   * With none left the board is saturated and the run is won.
   */
  private generateFood(): void {
    const emptyCells: GridPos[] = [];
    for (let row = 0; row < this.bounds.rows; row++) {
      for (let col = 0; col < this.bounds.cols; col++) {
        if (!this.occupancy.has(gridKey({ col, row }))) {
          emptyCells.push({ col, row });
        }
      }
    }

    if (emptyCells.length === 0) {
      this.food = null;
      this.outcome = "cleared";
      return;
    }

    this.food = emptyCells[pickIndex(this.rng, emptyCells.length)];
  }
}
