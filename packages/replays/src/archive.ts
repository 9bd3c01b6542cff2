import { DEFAULT_REPLAY_TTL_SECONDS, REPLAY_INDEX_KEY } from "./constants.js";
import type {
  ReplayArchive,
  ReplayArchiveOptions,
  ReplayInput,
  ReplayRedis,
  ReplaySummary,
  StoredReplay,
} from "./types.js";
import { buildSummary, clampListLimit, createReplayId, isReplayId, parseStored, replayKey } from "./utils.js";

/**
 * Redis-backed replay archive.
 *
 * Key structure:
 * - `replay:{id}`: JSON `{ summary, encoded }`, expires after the configured TTL
 * - `replays:index`: sorted set of ids scored by creation time
 *
 * Bodies expire on their own; index entries whose body is gone are pruned lazily by
 * `list()`.
 */
export class RedisReplayArchive implements ReplayArchive {
  private readonly redis: ReplayRedis;
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(redis: ReplayRedis, options: ReplayArchiveOptions = {}) {
    this.redis = redis;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_REPLAY_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? createReplayId;
  }

  async save(input: ReplayInput): Promise<ReplaySummary> {
    const id = this.generateId();
    const summary = buildSummary(id, this.now(), input);
    const body = JSON.stringify({ summary, encoded: input.encoded });

    const tx = this.redis.multi();
    if (this.ttlSeconds > 0) {
      tx.set(replayKey(id), body, "EX", this.ttlSeconds);
    } else {
      tx.set(replayKey(id), body);
    }
    tx.zadd(REPLAY_INDEX_KEY, summary.createdAt, id);

    const results = await tx.exec();
    if (!results) {
      throw new Error(`Replay save aborted for ${id}`);
    }
    for (const [err] of results) {
      if (err) throw err;
    }
    return summary;
  }

  async get(id: string): Promise<StoredReplay | null> {
    if (!isReplayId(id)) return null;
    return parseStored(await this.redis.get(replayKey(id)));
  }

  async list(limit?: number): Promise<ReplaySummary[]> {
    const ids = await this.redis.zrevrange(REPLAY_INDEX_KEY, 0, clampListLimit(limit) - 1);
    if (ids.length === 0) return [];

    const bodies = await this.redis.mget(...ids.map(replayKey));
    const summaries: ReplaySummary[] = [];
    const stale: string[] = [];
    ids.forEach((id, i) => {
      const stored = parseStored(bodies[i] ?? null);
      if (stored) summaries.push(stored.summary);
      else stale.push(id);
    });

    if (stale.length > 0) {
      await this.redis.zrem(REPLAY_INDEX_KEY, ...stale);
    }
    return summaries;
  }

  async remove(id: string): Promise<boolean> {
    if (!isReplayId(id)) return false;
    const results = await this.redis.multi().del(replayKey(id)).zrem(REPLAY_INDEX_KEY, id).exec();
    if (!results) return false;
    const [deleted] = results;
    if (!deleted) return false;
    const [err, count] = deleted;
    if (err) throw err;
    return count === 1;
  }
}
