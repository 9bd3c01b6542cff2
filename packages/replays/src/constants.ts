/**
 * Default configuration values for the replay archive.
 */

/** Key prefix for stored replay bodies */
export const REPLAY_KEY_PREFIX = "replay:";

/** Sorted set of replay ids scored by creation time */
export const REPLAY_INDEX_KEY = "replays:index";

/** Replay TTL: 7 days */
export const DEFAULT_REPLAY_TTL_SECONDS = 60 * 60 * 24 * 7;

export const DEFAULT_LIST_LIMIT = 50;

/** Upper bound for a single list() call */
export const MAX_LIST_LIMIT = 500;
