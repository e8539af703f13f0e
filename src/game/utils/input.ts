import type { Direction } from "./grid";

/** Key mapping from keyboard codes to Direction. */
export const KEY_DIRECTION_MAP: Readonly<Record<string, Direction>> =
  Object.freeze({
    ArrowUp: "up",
    ArrowDown: "down",
    ArrowLeft: "left",
    ArrowRight: "right",
    KeyW: "up",
    KeyS: "down",
    KeyA: "left",
    KeyD: "right",
  });

export const QUIT_KEY_CODE = "Escape";

export type InputCommand =
  | { type: "direction"; direction: Direction }
  | { type: "quit" };

/** Translate a keyboard code; unrecognised keys give `null`. */
export function toInputCommand(code: string): InputCommand | null {
  if (code === QUIT_KEY_CODE) {
    return { type: "quit" };
  }

  const direction = KEY_DIRECTION_MAP[code];
  return direction ? { type: "direction", direction } : null;
}

/** Anything with a single-direction command entry point. */
export interface DirectionTarget {
  setDirection(direction: Direction): boolean;
}

/**
 * Commands collected between ticks, applied as one batch before the next
 * `advance()`.
 */
export class InputQueue {
  private pending: InputCommand[] = [];

  /** Queue a raw key. Returns whether the key meant anything. */
  pushKey(code: string): boolean {
    const command = toInputCommand(code);
    if (!command) return false;
    this.pending.push(command);
    return true;
  }

  get size(): number {
    return this.pending.length;
  }

  drain(): InputCommand[] {
    const drained = this.pending;
    this.pending = [];
    return drained;
  }

  clear(): void {
    this.pending = [];
  }

  /**
   * Drain the queue into `target` in arrival order. Stops at the first quit
   * command and reports it so the caller can leave its loop.
   */
  dispatch(target: DirectionTarget): "quit" | "continue" {
    for (const command of this.drain()) {
      if (command.type === "quit") {
        return "quit";
      }
      target.setDirection(command.direction);
    }
    return "continue";
  }
}
