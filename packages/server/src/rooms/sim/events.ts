import type { MatchResult, PlatformPhase, PowerUpKind, Slot, Vec2 } from "./state.js";

export type EngineEvent =
  | { type: "countdown"; secondsLeft: number }
  | { type: "matchStarted" }
  | { type: "dashStarted"; slot: Slot; direction: Vec2 }
  | {
      type: "collisionOccurred";
      actors: [Slot, Slot];
      attacker: Slot | null;
      // Velocity change applied to each actor, indexed by slot.
      impulses: [Vec2, Vec2];
      impulse: number;
      point: Vec2;
    }
  | { type: "actorEliminated"; slot: Slot; stocksRemaining: number; position: Vec2 }
  | { type: "actorRespawned"; slot: Slot; position: Vec2 }
  | { type: "powerUpSpawned"; id: number; kind: PowerUpKind; position: Vec2; expiresAtTick: number }
  | { type: "powerUpClaimed"; id: number; kind: PowerUpKind; slot: Slot }
  | { type: "powerUpExpired"; id: number; kind: PowerUpKind }
  | { type: "effectExpired"; slot: Slot; kind: PowerUpKind; consumed: boolean }
  | { type: "shrinkWarning"; startsInTicks: number }
  | { type: "arenaPhaseChanged"; phase: PlatformPhase; radius: number }
  | { type: "anomaly"; slot: Slot; reason: "nonFinite" }
  | { type: "aiFallback"; slot: Slot; message: string }
  | ({ type: "matchEnded" } & MatchResult);

export type EngineTickResult = {
  tick: number;
  events: readonly EngineEvent[];
  ended: boolean;
};
