import type { DifficultyTier, PowerUpKind } from "./config.js";
import type { Vec2 } from "./math.js";
import type { RngState } from "./rng.js";

export type { Vec2 } from "./math.js";
export type { PowerUpKind, DifficultyTier } from "./config.js";

export type Slot = 0 | 1;
export const SLOTS: readonly Slot[] = [0, 1];

export function otherSlot(slot: Slot): Slot {
  return slot === 0 ? 1 : 0;
}

export type InputFrame = {
  tick: number;
  slot: Slot;
  // Directional intent inside the unit disc.
  move: Vec2;
  // Pressed this tick (edge, not held).
  dash: boolean;
};

export type DashPhase = "ready" | "active" | "cooldown";

export type DashState = {
  phase: DashPhase;
  remainingTicks: number;
  charges: number;
  direction: Vec2;
};

/** Timed effects: kind -> remaining ticks. Instant kinds never appear here. */
export type EffectMap = Partial<Record<PowerUpKind, number>>;

export type ActorState = {
  slot: Slot;
  position: Vec2;
  prevPosition: Vec2;
  lastValidPosition: Vec2;
  velocity: Vec2;
  facing: Vec2;
  radius: number;
  dash: DashState;
  stocks: number;
  effects: EffectMap;
  alive: boolean;
  respawnTicks: number;
  staggerTicks: number;
  spawnPoint: Vec2;
};

export type PlatformPhase = "stable" | "shrinking" | "settled";

export type ArenaState = {
  radius: number;
  phase: PlatformPhase;
};

export type PowerUpState = {
  id: number;
  kind: PowerUpKind;
  position: Vec2;
  spawnTick: number;
  expiresAtTick: number;
  claimed: boolean;
};

export type PowerUpSlot =
  | { phase: "empty" }
  | { phase: "spawning"; spawnAtTick: number }
  | { phase: "active"; powerUp: PowerUpState };

export type MatchEndReason = "stocks" | "timeLimit";

export type MatchResult = {
  winner: Slot | null;
  reason: MatchEndReason;
  tick: number;
  eliminations: Slot[];
};

export type WorldState = {
  tick: number;
  elapsedMs: number;
  rng: RngState;
  nextId: number;
  result: MatchResult | null;
  eliminations: Slot[];
};

export type ControllerSpec = { kind: "human" } | { kind: "ai"; tier: DifficultyTier };

/** What a human could perceive of the other actor: no cooldown counters, no effect timers. */
export type PerceivedActor = {
  slot: Slot;
  position: Vec2;
  velocity: Vec2;
  radius: number;
  alive: boolean;
};

export function perceive(actor: ActorState): PerceivedActor {
  return {
    slot: actor.slot,
    position: { ...actor.position },
    velocity: { ...actor.velocity },
    radius: actor.radius,
    alive: actor.alive,
  };
}

export function cloneActor(actor: ActorState): ActorState {
  return {
    ...actor,
    position: { ...actor.position },
    prevPosition: { ...actor.prevPosition },
    lastValidPosition: { ...actor.lastValidPosition },
    velocity: { ...actor.velocity },
    facing: { ...actor.facing },
    dash: { ...actor.dash, direction: { ...actor.dash.direction } },
    effects: { ...actor.effects },
    spawnPoint: { ...actor.spawnPoint },
  };
}
