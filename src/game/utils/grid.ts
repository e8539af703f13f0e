export type GridPos = Readonly<{
  col: number;
  row: number;
}>;

export type GridBounds = Readonly<{
  cols: number;
  rows: number;
}>;

/** Unit step as (dx, dy): `x` moves along columns, `y` along rows. */
export type GridVector = Readonly<{
  x: number;
  y: number;
}>;

export type Direction = "up" | "right" | "down" | "left";

export const CARDINAL_DIRECTIONS = [
  "up",
  "right",
  "down",
  "left",
] as const satisfies ReadonlyArray<Direction>;

export const ZERO_VECTOR: GridVector = Object.freeze({ x: 0, y: 0 });

const DIRECTION_VECTORS: Readonly<Record<Direction, GridVector>> = Object.freeze(
  {
    up: Object.freeze({ x: 0, y: -1 }),
    right: Object.freeze({ x: 1, y: 0 }),
    down: Object.freeze({ x: 0, y: 1 }),
    left: Object.freeze({ x: -1, y: 0 }),
  },
);

const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> =
  Object.freeze({
    up: "down",
    right: "left",
    down: "up",
    left: "right",
  });

export const directionToVector = (direction: Direction): GridVector =>
  DIRECTION_VECTORS[direction];

export const oppositeDirection = (direction: Direction): Direction =>
  OPPOSITE_DIRECTIONS[direction];

export const isOppositeDirection = (
  currentDirection: Direction,
  nextDirection: Direction,
): boolean => oppositeDirection(currentDirection) === nextDirection;

export const gridEquals = (first: GridPos, second: GridPos): boolean =>
  first.col === second.col && first.row === second.row;

export const gridKey = (position: GridPos): string =>
  `${position.col}:${position.row}`;

export const stepInDirection = (
  position: GridPos,
  direction: Direction,
): GridPos => {
  const vector = directionToVector(direction);

  return {
    col: position.col + vector.x,
    row: position.row + vector.y,
  };
};

export const isInBounds = (position: GridPos, bounds: GridBounds): boolean =>
  Number.isInteger(position.col) &&
  Number.isInteger(position.row) &&
  position.col >= 0 &&
  position.row >= 0 &&
  position.col < bounds.cols &&
  position.row < bounds.rows;
