/**
 * Environment configuration with validation
 */
import { isDifficultyTier, type DifficultyTier } from "./rooms/sim/config.js";

function optionalEnv(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function intEnv(name: string, defaultValue: number): number {
  const raw = optionalEnv(name, `${defaultValue}`);
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid integer for environment variable ${name}: ${raw}`);
  }
  return value;
}

function resolveAiTier(): DifficultyTier {
  const raw = optionalEnv("DEFAULT_AI_TIER", "medium");
  if (!isDifficultyTier(raw)) {
    throw new Error(`Invalid DEFAULT_AI_TIER: ${raw}`);
  }
  return raw;
}

export const config = {
  // Server
  port: intEnv("PORT", 2567),
  nodeEnv: optionalEnv("NODE_ENV", "development"),

  // Redis
  redisUri: optionalEnv("REDIS_URI", "redis://localhost:6379"),

  // Replay archive
  replayTtlSeconds: intEnv("REPLAY_TTL_SECONDS", 60 * 60 * 24 * 7),
  replayListLimit: intEnv("REPLAY_LIST_LIMIT", 50),

  // Room configuration
  defaultAiTier: resolveAiTier(),
  maxClients: intEnv("MAX_CLIENTS", 2),
  // Pause between rounds of a series
  roundIntermissionMs: intEnv("ROUND_INTERMISSION_MS", 3000),
} as const;

export type Config = typeof config;
