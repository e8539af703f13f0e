/** Per-length speed-up factor applied to the starting delay. */
export const TICK_DELAY_DECAY = 0.85;

/**
 * Delay between simulation ticks as the snake grows.
 *
 * While the delay is above the floor it is recomputed from the snake length
 * as `floor(startingDelayMs * 0.85 ** length)`. The first value at or below
 * the floor is kept for the rest of the run; it is not clamped to the floor.
 */
export class TickDelay {
  private readonly startingDelayMs: number;

  private readonly delayFloorMs: number;

  private delayMs: number;

  constructor(startingDelayMs: number, delayFloorMs: number) {
    this.startingDelayMs = startingDelayMs;
    this.delayFloorMs = delayFloorMs;
    this.delayMs = startingDelayMs;
  }

  get current(): number {
    return this.delayMs;
  }

  get frozen(): boolean {
    return this.delayMs <= this.delayFloorMs;
  }

  next(length: number): number {
    if (!this.frozen) {
      this.delayMs = Math.floor(
        this.startingDelayMs * TICK_DELAY_DECAY ** length,
      );
    }

    return this.delayMs;
  }

  reset(): void {
    this.delayMs = this.startingDelayMs;
  }
}
