/**
 * Utility functions shared by the archive implementations.
 */
import { randomUUID } from "node:crypto";
import { DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT, REPLAY_KEY_PREFIX } from "./constants.js";
import type { ReplayInput, ReplaySummary, StoredReplay } from "./types.js";

const REPLAY_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export function createReplayId(): string {
  return randomUUID();
}

/**
 * Ids reach the archive from URLs, so anything that is not a v4-style uuid is
 * rejected before it becomes part of a key.
 */
export function isReplayId(value: unknown): value is string {
  return typeof value === "string" && REPLAY_ID_PATTERN.test(value);
}

export function replayKey(id: string): string {
  return `${REPLAY_KEY_PREFIX}${id}`;
}

export function clampListLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_LIST_LIMIT;
  return Math.max(1, Math.min(MAX_LIST_LIMIT, Math.floor(limit)));
}

export function buildSummary(id: string, createdAt: number, input: ReplayInput): ReplaySummary {
  return {
    id,
    createdAt,
    tickCount: input.tickCount,
    winner: input.winner,
    reason: input.reason,
    bytes: Buffer.byteLength(input.encoded, "utf8"),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSummary(value: unknown): ReplaySummary | null {
  if (!isRecord(value)) return null;
  const { id, createdAt, tickCount, winner, reason, bytes } = value;
  if (!isReplayId(id)) return null;
  if (typeof createdAt !== "number" || typeof tickCount !== "number" || typeof bytes !== "number") return null;
  if (winner !== null && typeof winner !== "number") return null;
  if (reason !== null && typeof reason !== "string") return null;
  return { id, createdAt, tickCount, winner, reason, bytes };
}

/**
 * Parse a stored record. Returns null for anything that was not written by an archive.
 */
export function parseStored(raw: string | null): StoredReplay | null {
  if (raw === null) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || typeof parsed.encoded !== "string") return null;
  const summary = readSummary(parsed.summary);
  return summary ? { summary, encoded: parsed.encoded } : null;
}
