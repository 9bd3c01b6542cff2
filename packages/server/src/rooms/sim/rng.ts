export type RngState = {
  seed: number;
};

// Simple LCG for deterministic gameplay randomness.
export function createRng(seed: number): RngState {
  return { seed: seed >>> 0 };
}

export function cloneRng(rng: RngState): RngState {
  return { seed: rng.seed };
}

/** Uniform in [0, 1). */
export function nextFloat(rng: RngState): number {
  // LCG parameters (Numerical Recipes)
  rng.seed = (Math.imul(rng.seed, 1664525) + 1013904223) >>> 0;
  return rng.seed / 0x100000000;
}

export function nextRange(rng: RngState, min: number, max: number): number {
  return min + nextFloat(rng) * (max - min);
}

/** Uniform integer in [min, max]. */
export function nextInt(rng: RngState, min: number, max: number): number {
  return Math.floor(nextRange(rng, min, max + 1));
}

export function pick<T>(rng: RngState, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[nextInt(rng, 0, items.length - 1)];
}
