import { isDifficultyTier, type DifficultyTier } from "./sim/config.js";
import type { EngineEvent } from "./sim/events.js";
import type { MatchResult, Slot } from "./sim/state.js";
import { isBestOf, type SeriesStanding } from "./series.js";

export const PROTOCOL_VERSION = 1;

export type ArenaMode = "versus" | "ai";

export type ArenaRoomOptions = {
  mode: ArenaMode;
  aiTier: DifficultyTier;
  // Rounds in the series; odd, so a majority always exists.
  bestOf: number;
  // Omitted: the room picks one per round and records it in the replay.
  // Given: round N plays with seed + N - 1.
  seed?: number;
};

export type ArenaInitDto = {
  protocolVersion: number;
  slot: Slot;
  mode: ArenaMode;
  tickRate: number;
  stocks: number;
  platform: { startRadius: number; minRadius: number; shrinkStartMs: number };
  actorRadius: number;
  countdownMs: number;
  bestOf: number;
};

/** Held-key state; the server derives the dash press edge itself. */
export type InputMessage = {
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;
  dash: boolean;
};

export type TickEventsDto = {
  tick: number;
  events: EngineEvent[];
};

export type MatchEndedDto = MatchResult & {
  replayId: string | null;
  series: SeriesStanding;
};

export type MatchAbortedDto = {
  tick: number;
  replayId: string | null;
};

export type RoundStartedDto = {
  round: number;
  seed: number;
};

export type SeriesEndedDto = SeriesStanding & {
  // False when someone left before the series was decided.
  completed: boolean;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Returns null for anything that is not a well-formed input message. */
export function parseInputMessage(raw: unknown): InputMessage | null {
  if (!isRecord(raw)) return null;
  const { up, down, left, right, dash } = raw;
  if (
    typeof up !== "boolean" ||
    typeof down !== "boolean" ||
    typeof left !== "boolean" ||
    typeof right !== "boolean" ||
    typeof dash !== "boolean"
  ) {
    return null;
  }
  return { up, down, left, right, dash };
}

/** Room creation options; unknown values fall back to the defaults instead of failing. */
export function parseRoomOptions(raw: unknown, defaultTier: DifficultyTier): ArenaRoomOptions {
  const opts: Record<string, unknown> = isRecord(raw) ? raw : {};
  const { mode: rawMode, aiTier: rawTier, bestOf: rawBestOf, seed: rawSeed } = opts;
  const mode: ArenaMode = rawMode === "ai" ? "ai" : "versus";
  const aiTier = isDifficultyTier(rawTier) ? rawTier : defaultTier;
  const bestOf = isBestOf(rawBestOf) ? rawBestOf : 1;
  const seed =
    typeof rawSeed === "number" && Number.isInteger(rawSeed) && rawSeed >= 0 && rawSeed <= 0xffffffff
      ? rawSeed
      : undefined;
  return seed === undefined ? { mode, aiTier, bestOf } : { mode, aiTier, bestOf, seed };
}
