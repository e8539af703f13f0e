import type { ZodIssue } from "zod";
import type { GridPos } from "./utils/grid";

/** Raised when a board is requested with fewer than 2 rows or columns. */
export class InvalidDimensionsError extends Error {
  public readonly rows: number;
  public readonly cols: number;

  constructor(rows: number, cols: number) {
    super(
      `The grid size ${rows}x${cols} is invalid: rows and columns must be integers of at least 2`,
    );
    this.name = "InvalidDimensionsError";
    this.rows = rows;
    this.cols = cols;
  }
}

/** Raised when a seeded head or food position cannot be placed on the board. */
export class InvalidPlacementError extends Error {
  public readonly position: GridPos;

  constructor(message: string, position: GridPos) {
    super(`${message} (col ${position.col}, row ${position.row})`);
    this.name = "InvalidPlacementError";
    this.position = position;
  }
}

export class InvalidSettingsError extends Error {
  public readonly issues: ReadonlyArray<ZodIssue>;

  constructor(issues: ReadonlyArray<ZodIssue>) {
    super(issues[0]?.message ?? "Invalid game settings");
    this.name = "InvalidSettingsError";
    this.issues = issues;
  }
}
