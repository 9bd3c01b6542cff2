import { DEFAULT_REPLAY_TTL_SECONDS } from "./constants.js";
import type { ReplayArchive, ReplayArchiveOptions, ReplayInput, ReplaySummary, StoredReplay } from "./types.js";
import { buildSummary, clampListLimit, createReplayId, isReplayId } from "./utils.js";

type Entry = { stored: StoredReplay; expiresAt: number };

/**
 * In-process archive with the same contract as the Redis one. Used by tests and by
 * local runs without Redis.
 */
export class MemoryReplayArchive implements ReplayArchive {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlSeconds: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: ReplayArchiveOptions = {}) {
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_REPLAY_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? createReplayId;
  }

  get size(): number {
    this.prune();
    return this.entries.size;
  }

  async save(input: ReplayInput): Promise<ReplaySummary> {
    const id = this.generateId();
    const createdAt = this.now();
    const summary = buildSummary(id, createdAt, input);
    const expiresAt = this.ttlSeconds > 0 ? createdAt + this.ttlSeconds * 1000 : Infinity;
    this.entries.set(id, { stored: { summary, encoded: input.encoded }, expiresAt });
    return { ...summary };
  }

  async get(id: string): Promise<StoredReplay | null> {
    if (!isReplayId(id)) return null;
    this.prune();
    const entry = this.entries.get(id);
    return entry ? { summary: { ...entry.stored.summary }, encoded: entry.stored.encoded } : null;
  }

  async list(limit?: number): Promise<ReplaySummary[]> {
    this.prune();
    // Newest first; equal timestamps order by id descending, as ZREVRANGE does.
    return [...this.entries.values()]
      .map((e) => e.stored.summary)
      .sort((a, b) => b.createdAt - a.createdAt || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0))
      .slice(0, clampListLimit(limit))
      .map((s) => ({ ...s }));
  }

  async remove(id: string): Promise<boolean> {
    this.prune();
    return this.entries.delete(id);
  }

  private prune() {
    const now = this.now();
    for (const [id, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(id);
    }
  }
}
