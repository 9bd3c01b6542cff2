import { createHash } from "node:crypto";
import { ConfigError, isDifficultyTier, parseArenaConfig, type ArenaConfig } from "../config.js";
import type { ActorSeed } from "../engine.js";
import type { ControllerSpec, InputFrame, MatchResult, Slot, Vec2 } from "../state.js";

export const REPLAY_FORMAT = "ringout-replay";
export const REPLAY_VERSION = 1;

/** One tick of input for both slots: [tick, x0, y0, dash0, x1, y1, dash1]. */
export type FrameRow = [number, number, number, 0 | 1, number, number, 0 | 1];

export type ReplaySnapshot = {
  config: ArenaConfig;
  seed: number;
  actors: [ActorSeed, ActorSeed];
  controllers: [ControllerSpec, ControllerSpec];
};

export type ReplayLog = {
  format: typeof REPLAY_FORMAT;
  version: typeof REPLAY_VERSION;
  snapshot: ReplaySnapshot;
  tickCount: number;
  frames: FrameRow[];
  // sha256 over the canonical JSON of snapshot, tickCount, frames and outcome.
  checksum: string;
  outcome: MatchResult | null;
};

export type ReplayFault = {
  kind: "unplayable" | "desync";
  reason: string;
  tick?: number;
};

export type DecodeResult = { ok: true; log: ReplayLog } | { ok: false; fault: ReplayFault };

export function toFrameRow(frames: readonly [InputFrame, InputFrame]): FrameRow {
  const [a, b] = frames;
  return [a.tick, a.move.x, a.move.y, a.dash ? 1 : 0, b.move.x, b.move.y, b.dash ? 1 : 0];
}

export function fromFrameRow(row: FrameRow): [InputFrame, InputFrame] {
  return [
    { tick: row[0], slot: 0, move: { x: row[1], y: row[2] }, dash: row[3] === 1 },
    { tick: row[0], slot: 1, move: { x: row[4], y: row[5] }, dash: row[6] === 1 },
  ];
}

/** JSON with object keys sorted, so equal values always serialize the same way. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map((v) => (v === undefined ? "null" : canonicalJson(v))).join(",")}]`;
  if (isRecord(value)) {
    const entries = Object.keys(value)
      .filter((k) => value[k] !== undefined)
      .sort()
      .map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value);
}

export function checksumLog(parts: Pick<ReplayLog, "snapshot" | "tickCount" | "frames" | "outcome">): string {
  const body = canonicalJson({
    snapshot: parts.snapshot,
    tickCount: parts.tickCount,
    frames: parts.frames,
    outcome: parts.outcome,
  });
  return createHash("sha256").update(body).digest("hex");
}

export function encodeReplay(log: ReplayLog): string {
  return JSON.stringify(log);
}

const unplayable = (reason: string, tick?: number): DecodeResult => ({
  ok: false,
  fault: tick === undefined ? { kind: "unplayable", reason } : { kind: "unplayable", reason, tick },
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSlot(value: unknown): value is Slot {
  return value === 0 || value === 1;
}

function readVec(value: unknown): Vec2 | null {
  if (!isRecord(value)) return null;
  const { x, y } = value;
  if (typeof x !== "number" || typeof y !== "number" || !Number.isFinite(x) || !Number.isFinite(y)) return null;
  return { x, y };
}

function readActorSeed(value: unknown, slot: Slot): ActorSeed | null {
  if (!isRecord(value) || value.slot !== slot) return null;
  const position = readVec(value.position);
  const facing = readVec(value.facing);
  if (!position || !facing) return null;
  return { slot, position, facing };
}

function readController(value: unknown): ControllerSpec | null {
  if (!isRecord(value)) return null;
  if (value.kind === "human") return { kind: "human" };
  if (value.kind === "ai" && isDifficultyTier(value.tier)) return { kind: "ai", tier: value.tier };
  return null;
}

function isDashFlag(value: unknown): value is 0 | 1 {
  return value === 0 || value === 1;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function readRow(value: unknown, tick: number): FrameRow | null {
  if (!Array.isArray(value) || value.length !== 7) return null;
  const [t, x0, y0, d0, x1, y1, d1]: unknown[] = value;
  if (t !== tick) return null;
  if (!isFiniteNumber(x0) || !isFiniteNumber(y0) || !isFiniteNumber(x1) || !isFiniteNumber(y1)) return null;
  if (!isDashFlag(d0) || !isDashFlag(d1)) return null;
  return [tick, x0, y0, d0, x1, y1, d1];
}

function readOutcome(value: unknown): MatchResult | null | undefined {
  if (value === null) return null;
  if (!isRecord(value)) return undefined;
  const { winner, reason, tick, eliminations } = value;
  if (winner !== null && !isSlot(winner)) return undefined;
  if (reason !== "stocks" && reason !== "timeLimit") return undefined;
  if (typeof tick !== "number" || !Number.isInteger(tick)) return undefined;
  if (!Array.isArray(eliminations) || !eliminations.every(isSlot)) return undefined;
  return { winner, reason, tick, eliminations: [...eliminations] };
}

/**
 * Parse and validate an encoded replay. Anything off (wrong format or version, broken
 * snapshot, truncated or malformed frames, an outcome off the last tick, checksum
 * mismatch) is reported as an unplayable fault before a single tick is simulated.
 */
export function decodeReplay(text: string): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return unplayable(`not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(raw)) return unplayable("replay must be an object");
  if (raw.format !== REPLAY_FORMAT) return unplayable(`unknown format ${JSON.stringify(raw.format)}`);
  if (raw.version !== REPLAY_VERSION) return unplayable(`unsupported version ${JSON.stringify(raw.version)}`);

  const rawSnapshot = raw.snapshot;
  if (!isRecord(rawSnapshot)) return unplayable("missing snapshot");
  let config: ArenaConfig;
  try {
    config = parseArenaConfig(rawSnapshot.config);
  } catch (err) {
    if (err instanceof ConfigError) return unplayable(`invalid config: ${err.message}`);
    throw err;
  }
  const seed = rawSnapshot.seed;
  if (typeof seed !== "number" || !Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    return unplayable("invalid seed");
  }
  const actors = rawSnapshot.actors;
  const controllers = rawSnapshot.controllers;
  if (!Array.isArray(actors) || actors.length !== 2) return unplayable("snapshot needs two actors");
  if (!Array.isArray(controllers) || controllers.length !== 2) return unplayable("snapshot needs two controllers");
  const a0 = readActorSeed(actors[0], 0);
  const a1 = readActorSeed(actors[1], 1);
  if (!a0 || !a1) return unplayable("invalid actor spawn state");
  const c0 = readController(controllers[0]);
  const c1 = readController(controllers[1]);
  if (!c0 || !c1) return unplayable("invalid controller");

  const tickCount = raw.tickCount;
  if (typeof tickCount !== "number" || !Number.isInteger(tickCount) || tickCount < 0) {
    return unplayable("invalid tick count");
  }
  const rawFrames = raw.frames;
  if (!Array.isArray(rawFrames)) return unplayable("missing frames");
  if (rawFrames.length !== tickCount) {
    return unplayable(`truncated frames: ${rawFrames.length} of ${tickCount}`, rawFrames.length + 1);
  }
  const frames: FrameRow[] = [];
  for (let i = 0; i < rawFrames.length; i++) {
    const row = readRow(rawFrames[i], i + 1);
    if (!row) return unplayable("malformed frame", i + 1);
    frames.push(row);
  }
  const outcome = readOutcome(raw.outcome);
  if (outcome === undefined) return unplayable("invalid outcome");
  if (outcome !== null && outcome.tick !== tickCount) {
    return unplayable(`outcome recorded at tick ${outcome.tick} but the log has ${tickCount} ticks`);
  }

  const snapshot: ReplaySnapshot = { config, seed, actors: [a0, a1], controllers: [c0, c1] };
  const parts = {
    snapshot,
    tickCount,
    frames,
    outcome,
  };
  const checksum = raw.checksum;
  if (typeof checksum !== "string" || checksum !== checksumLog(parts)) {
    return unplayable("checksum mismatch");
  }

  return { ok: true, log: { format: REPLAY_FORMAT, version: REPLAY_VERSION, ...parts, checksum } };
}
