/**
 * Types for the replay archive.
 */

/**
 * Listing entry for one archived match. The encoded log itself is opaque to the
 * archive; callers decode it with the simulation's replay codec.
 */
export interface ReplaySummary {
  id: string;
  createdAt: number;
  tickCount: number;
  /** Winning slot, or null for a draw or an aborted match. */
  winner: number | null;
  reason: string | null;
  bytes: number;
}

export interface StoredReplay {
  summary: ReplaySummary;
  encoded: string;
}

/** What the caller knows about a finished match when archiving it. */
export interface ReplayInput {
  encoded: string;
  tickCount: number;
  winner: number | null;
  reason: string | null;
}

export interface ReplayArchiveOptions {
  /** Seconds before a stored replay expires. 0 disables expiry. */
  ttlSeconds?: number;
  now?: () => number;
  generateId?: () => string;
}

export interface ReplayArchive {
  save(input: ReplayInput): Promise<ReplaySummary>;
  get(id: string): Promise<StoredReplay | null>;
  /** Newest first. */
  list(limit?: number): Promise<ReplaySummary[]>;
  remove(id: string): Promise<boolean>;
}

/**
 * The Redis commands the archive issues. An ioredis client satisfies it as is; tests
 * pass an in-process stand-in.
 */
export interface ReplayRedis {
  get(key: string): Promise<string | null>;
  mget(...keys: string[]): Promise<(string | null)[]>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  zrem(key: string, ...members: string[]): Promise<number>;
  multi(): ReplayPipeline;
}

/** Queued MULTI commands; `exec` resolves to null when the transaction was discarded. */
export interface ReplayPipeline {
  set(key: string, value: string): ReplayPipeline;
  set(key: string, value: string, mode: "EX", seconds: number): ReplayPipeline;
  zadd(key: string, score: number, member: string): ReplayPipeline;
  del(key: string): ReplayPipeline;
  zrem(key: string, member: string): ReplayPipeline;
  exec(): Promise<[Error | null, unknown][] | null>;
}
