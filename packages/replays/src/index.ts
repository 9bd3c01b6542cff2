export { RedisReplayArchive } from "./archive.js";
export { MemoryReplayArchive } from "./memory.js";
export {
  DEFAULT_LIST_LIMIT,
  DEFAULT_REPLAY_TTL_SECONDS,
  MAX_LIST_LIMIT,
  REPLAY_INDEX_KEY,
  REPLAY_KEY_PREFIX,
} from "./constants.js";
export type {
  ReplayArchive,
  ReplayArchiveOptions,
  ReplayInput,
  ReplayPipeline,
  ReplayRedis,
  ReplaySummary,
  StoredReplay,
} from "./types.js";
export { clampListLimit, createReplayId, isReplayId, parseStored, replayKey } from "./utils.js";
