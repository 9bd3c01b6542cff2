import type { ShrinkSchedule } from "./config.js";
import type { PlatformPhase, Vec2 } from "./state.js";

/**
 * Shrinking platform. Radius is a pure function of elapsed match time so a replay
 * lands on identical boundaries at every tick.
 */

const MAX_STEPS = 10_000;

function stepsToMinimum(schedule: Extract<ShrinkSchedule, { mode: "stepped" }>): number {
  if (schedule.minRadius >= schedule.startRadius) return 0;
  if (schedule.fraction >= 1) return 1;
  let radius = schedule.startRadius;
  let steps = 0;
  while (radius > schedule.minRadius && steps < MAX_STEPS) {
    radius *= 1 - schedule.fraction;
    steps += 1;
  }
  return steps;
}

export function currentRadius(schedule: ShrinkSchedule, elapsedMs: number): number {
  const sinceStart = elapsedMs - schedule.shrinkStartMs;
  if (sinceStart <= 0) return schedule.startRadius;

  if (schedule.mode === "linear") {
    if (elapsedMs >= shrinkEndMs(schedule)) return schedule.minRadius;
    const shrunk = schedule.startRadius - (schedule.unitsPerSecond * sinceStart) / 1000;
    return Math.max(schedule.minRadius, shrunk);
  }

  // First step lands the moment shrinking starts; one more every interval.
  const steps = Math.floor(sinceStart / schedule.intervalMs) + 1;
  if (steps >= stepsToMinimum(schedule)) return schedule.minRadius;
  const shrunk = schedule.startRadius * Math.pow(1 - schedule.fraction, steps);
  return Math.max(schedule.minRadius, shrunk);
}

/** Elapsed time at which the radius first equals the minimum. */
export function shrinkEndMs(schedule: ShrinkSchedule): number {
  if (schedule.minRadius >= schedule.startRadius) return schedule.shrinkStartMs;
  if (schedule.mode === "linear") {
    return schedule.shrinkStartMs + ((schedule.startRadius - schedule.minRadius) / schedule.unitsPerSecond) * 1000;
  }
  // Strictly after the start, matching the `sinceStart <= 0` guard above.
  const steps = stepsToMinimum(schedule);
  return schedule.shrinkStartMs + Math.max(1e-9, (steps - 1) * schedule.intervalMs);
}

export function platformPhase(schedule: ShrinkSchedule, elapsedMs: number): PlatformPhase {
  if (elapsedMs <= schedule.shrinkStartMs) return "stable";
  return currentRadius(schedule, elapsedMs) <= schedule.minRadius ? "settled" : "shrinking";
}

export function isOutOfBounds(position: Vec2, radius: number): boolean {
  return position.x * position.x + position.y * position.y > radius * radius;
}

/** Distance from a point to the platform edge (negative outside). */
export function edgeDistance(position: Vec2, radius: number): number {
  return radius - Math.sqrt(position.x * position.x + position.y * position.y);
}
