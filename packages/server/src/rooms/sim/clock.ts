import { tickMs, type ArenaConfig } from "./config.js";

export type ClockAdvance = {
  ticks: number;
  // Fraction of a tick left in the accumulator, for render interpolation.
  alpha: number;
  aborted: boolean;
};

/**
 * What a tick callback reports: `next` ran and wants more, `last` ran and wants no
 * more, `skipped` did not run.
 */
export type TickVerdict = "next" | "last" | "skipped";

/**
 * Fixed-timestep accumulator. Wall time goes in, whole ticks come out, and the
 * fractional remainder is carried into the next frame rather than dropped.
 */
export class SimulationClock {
  private accumulator = 0;
  private abortRequested = false;

  constructor(
    readonly stepMs: number,
    readonly maxFrameMs: number,
  ) {}

  static forConfig(config: ArenaConfig): SimulationClock {
    return new SimulationClock(tickMs(config), config.maxFrameMs);
  }

  get pendingMs(): number {
    return this.accumulator;
  }

  get aborted(): boolean {
    return this.abortRequested;
  }

  /** Stop before the next tick. A tick already running always completes. */
  abort() {
    this.abortRequested = true;
  }

  /**
   * Feed one frame's wall time and run as many ticks as it covers. Only ticks that
   * actually ran are counted and paid for; a skipped tick leaves its time in the
   * accumulator.
   */
  advance(frameMs: number, runTick: () => TickVerdict): ClockAdvance {
    const delta = Number.isFinite(frameMs) ? Math.min(Math.max(0, frameMs), this.maxFrameMs) : 0;
    this.accumulator += delta;

    let ticks = 0;
    while (this.accumulator >= this.stepMs && !this.abortRequested) {
      const verdict = runTick();
      if (verdict === "skipped") break;
      this.accumulator -= this.stepMs;
      ticks += 1;
      if (verdict === "last") break;
    }
    return { ticks, alpha: this.accumulator / this.stepMs, aborted: this.abortRequested };
  }

  reset() {
    this.accumulator = 0;
    this.abortRequested = false;
  }
}
