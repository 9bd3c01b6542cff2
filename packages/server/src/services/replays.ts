import Redis from "ioredis";
import { RedisReplayArchive, type ReplayArchive, type ReplaySummary } from "@ringout/replays";
import { config } from "../config.js";
import { encodeReplay, type ReplayFault, type ReplayLog } from "../rooms/sim/replay/codec.js";
import { ReplayPlayer } from "../rooms/sim/replay/player.js";
import type { MatchResult } from "../rooms/sim/state.js";

// Singleton archive, created on first use
let archive: ReplayArchive | null = null;

export function getReplayArchive(): ReplayArchive {
  if (!archive) {
    const redis = new Redis(config.redisUri, {
      enableReadyCheck: false,
      maxRetriesPerRequest: 3,
    });
    redis.on("error", (err) => {
      console.error("[replays] Redis error:", err);
    });
    archive = new RedisReplayArchive(redis, { ttlSeconds: config.replayTtlSeconds });
  }
  return archive;
}

/** Swap the archive, e.g. for an in-memory one when Redis is not available. */
export function setReplayArchive(next: ReplayArchive) {
  archive = next;
}

/**
 * Persist a finished (or aborted) match. Matches that never ran a tick are not worth keeping.
 */
export async function archiveMatch(target: ReplayArchive, log: ReplayLog): Promise<ReplaySummary | null> {
  if (log.tickCount === 0) return null;
  return target.save({
    encoded: encodeReplay(log),
    tickCount: log.tickCount,
    winner: log.outcome?.winner ?? null,
    reason: log.outcome?.reason ?? null,
  });
}

export type ReplayVerification =
  | { ok: true; ticks: number; outcome: MatchResult | null }
  | { ok: false; fault: ReplayFault };

/** Decode and fully re-simulate an encoded replay. */
export function verifyEncodedReplay(text: string): ReplayVerification {
  const loaded = ReplayPlayer.fromEncoded(text);
  if (!loaded.ok) return loaded;
  return loaded.player.runToEnd();
}
