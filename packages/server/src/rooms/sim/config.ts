/**
 * Arena simulation constants.
 *
 * Units are pixels and the default rate is 60Hz. Everything gameplay-relevant lives
 * here so replay logs can carry the exact values a match was played with.
 */

export const DIFFICULTY_TIERS = ["easy", "medium", "hard", "expert"] as const;
export type DifficultyTier = (typeof DIFFICULTY_TIERS)[number];

export const POWER_UP_KINDS = [
  "speed",
  "shield",
  "sizeUp",
  "sizeDown",
  "multiDash",
  "teleport",
  "freeze",
  "magnet",
] as const;
export type PowerUpKind = (typeof POWER_UP_KINDS)[number];

export type ShrinkSchedule =
  | {
      mode: "linear";
      startRadius: number;
      minRadius: number;
      shrinkStartMs: number;
      unitsPerSecond: number;
    }
  | {
      mode: "stepped";
      startRadius: number;
      minRadius: number;
      shrinkStartMs: number;
      // Radius lost per step, as a fraction of the current radius.
      fraction: number;
      intervalMs: number;
    };

export type AiTierParams = {
  reactionMs: number;
  decisionIntervalMs: number;
  predictionMs: number;
  memoryMs: number;
  mistakeChance: number;
  aimNoise: number;
};

export type ArenaConfig = {
  tickRate: number;
  maxFrameMs: number;
  stocks: number;
  respawnMs: number;
  // Frozen lead-in before play; inputs are taken but ignored.
  countdownMs: number;
  matchTimeLimitMs: number;
  spawnOffset: number;

  actor: {
    radius: number;
    moveSpeed: number;
    accelPerSec: number;
    // Fraction of velocity kept per 1/60s.
    friction: number;
    maxSpeed: number;
  };

  dash: {
    speed: number;
    activeMs: number;
    cooldownMs: number;
    charges: number;
  };

  collision: {
    restitution: number;
    pushSpeed: number;
    knockbackScale: number;
    recoilScale: number;
    staggerMs: number;
  };

  platform: ShrinkSchedule & { warningLeadMs: number };

  powerUps: {
    enabled: boolean;
    kinds: readonly PowerUpKind[];
    slots: number;
    spawnIntervalMinMs: number;
    spawnIntervalMaxMs: number;
    lifetimeMs: number;
    radius: number;
    spawnRadiusFrac: number;
    effectMs: number;
    freezeMs: number;
    speedMult: number;
    sizeUpMult: number;
    sizeDownMult: number;
    multiDashBonus: number;
    shieldKnockbackMult: number;
    magnetRange: number;
    magnetPullPerSec: number;
    teleportRadiusFrac: number;
  };

  ai: Record<DifficultyTier, AiTierParams> & {
    fleeEdgeFrac: number;
    engageRange: number;
    punishRange: number;
    baitRange: number;
    dashDetectFrac: number;
  };
};

export const DEFAULT_ARENA_CONFIG: ArenaConfig = {
  tickRate: 60,
  maxFrameMs: 250,
  stocks: 3,
  respawnMs: 1000,
  countdownMs: 3000,
  matchTimeLimitMs: 120_000,
  spawnOffset: 150,

  actor: {
    radius: 20,
    moveSpeed: 300,
    accelPerSec: 15,
    friction: 0.92,
    maxSpeed: 800,
  },

  dash: {
    speed: 600,
    activeMs: 150,
    cooldownMs: 1000,
    charges: 1,
  },

  collision: {
    restitution: 0.7,
    pushSpeed: 250,
    knockbackScale: 1.2,
    recoilScale: 0.25,
    staggerMs: 250,
  },

  platform: {
    mode: "linear",
    startRadius: 300,
    minRadius: 100,
    shrinkStartMs: 10_000,
    unitsPerSecond: 20,
    warningLeadMs: 3000,
  },

  powerUps: {
    enabled: true,
    kinds: POWER_UP_KINDS,
    slots: 3,
    spawnIntervalMinMs: 6000,
    spawnIntervalMaxMs: 10_000,
    lifetimeMs: 15_000,
    radius: 15,
    spawnRadiusFrac: 0.7,
    effectMs: 5000,
    freezeMs: 1500,
    speedMult: 1.5,
    sizeUpMult: 1.5,
    sizeDownMult: 0.6,
    multiDashBonus: 2,
    shieldKnockbackMult: 0.25,
    magnetRange: 200,
    magnetPullPerSec: 180,
    teleportRadiusFrac: 0.5,
  },

  ai: {
    easy: { reactionMs: 500, decisionIntervalMs: 500, predictionMs: 100, memoryMs: 250, mistakeChance: 0.25, aimNoise: 0.4 },
    medium: { reactionMs: 250, decisionIntervalMs: 250, predictionMs: 200, memoryMs: 250, mistakeChance: 0.12, aimNoise: 0.2 },
    hard: { reactionMs: 100, decisionIntervalMs: 100, predictionMs: 300, memoryMs: 200, mistakeChance: 0.05, aimNoise: 0.05 },
    expert: { reactionMs: 50, decisionIntervalMs: 50, predictionMs: 400, memoryMs: 150, mistakeChance: 0.01, aimNoise: 0.01 },
    fleeEdgeFrac: 0.3,
    engageRange: 200,
    punishRange: 150,
    baitRange: 110,
    dashDetectFrac: 0.75,
  },
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type ArenaConfigOverrides = DeepPartial<Omit<ArenaConfig, "platform">> & {
  platform?: Partial<ShrinkSchedule> & { warningLeadMs?: number };
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function merge(base: unknown, patch: unknown): unknown {
  if (patch === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(patch)) return patch;
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    out[key] = merge(base[key], value);
  }
  return out;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function requireNumber(path: string, value: unknown, min = 0, max = Number.POSITIVE_INFINITY): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigError(`${path} must be a finite number`);
  }
  if (value < min || value > max) {
    throw new ConfigError(`${path} must be within [${min}, ${max}], got ${value}`);
  }
  return value;
}

function requireBoolean(path: string, value: unknown): boolean {
  if (typeof value !== "boolean") throw new ConfigError(`${path} must be a boolean`);
  return value;
}

function isPowerUpKind(value: unknown): value is PowerUpKind {
  return typeof value === "string" && POWER_UP_KINDS.some((kind) => kind === value);
}

export function isDifficultyTier(value: unknown): value is DifficultyTier {
  return typeof value === "string" && DIFFICULTY_TIERS.some((tier) => tier === value);
}

function readSchedule(raw: unknown): ArenaConfig["platform"] {
  if (!isPlainObject(raw)) throw new ConfigError("platform must be an object");
  const startRadius = requireNumber("platform.startRadius", raw.startRadius, 1);
  const minRadius = requireNumber("platform.minRadius", raw.minRadius, 0, startRadius);
  const shrinkStartMs = requireNumber("platform.shrinkStartMs", raw.shrinkStartMs);
  const warningLeadMs = requireNumber("platform.warningLeadMs", raw.warningLeadMs);
  if (raw.mode === "linear") {
    return {
      mode: "linear",
      startRadius,
      minRadius,
      shrinkStartMs,
      warningLeadMs,
      unitsPerSecond: requireNumber("platform.unitsPerSecond", raw.unitsPerSecond, Number.MIN_VALUE),
    };
  }
  if (raw.mode === "stepped") {
    return {
      mode: "stepped",
      startRadius,
      minRadius,
      shrinkStartMs,
      warningLeadMs,
      fraction: requireNumber("platform.fraction", raw.fraction, Number.MIN_VALUE, 1),
      intervalMs: requireNumber("platform.intervalMs", raw.intervalMs, 1),
    };
  }
  throw new ConfigError(`platform.mode must be "linear" or "stepped"`);
}

function readAiTier(path: string, raw: unknown): AiTierParams {
  if (!isPlainObject(raw)) throw new ConfigError(`${path} must be an object`);
  return {
    reactionMs: requireNumber(`${path}.reactionMs`, raw.reactionMs),
    decisionIntervalMs: requireNumber(`${path}.decisionIntervalMs`, raw.decisionIntervalMs),
    predictionMs: requireNumber(`${path}.predictionMs`, raw.predictionMs),
    memoryMs: requireNumber(`${path}.memoryMs`, raw.memoryMs),
    mistakeChance: requireNumber(`${path}.mistakeChance`, raw.mistakeChance, 0, 1),
    aimNoise: requireNumber(`${path}.aimNoise`, raw.aimNoise, 0, 1),
  };
}

/**
 * Validate an arbitrary value as a complete ArenaConfig and freeze it.
 * Replay snapshots go through this too, so a tampered config is rejected the same way.
 */
export function parseArenaConfig(raw: unknown): ArenaConfig {
  if (!isPlainObject(raw)) throw new ConfigError("config must be an object");
  const { actor, dash, collision, powerUps, ai } = raw;
  if (!isPlainObject(actor)) throw new ConfigError("actor must be an object");
  if (!isPlainObject(dash)) throw new ConfigError("dash must be an object");
  if (!isPlainObject(collision)) throw new ConfigError("collision must be an object");
  if (!isPlainObject(powerUps)) throw new ConfigError("powerUps must be an object");
  if (!isPlainObject(ai)) throw new ConfigError("ai must be an object");

  const kinds = powerUps.kinds;
  if (!Array.isArray(kinds) || kinds.length === 0 || !kinds.every(isPowerUpKind)) {
    throw new ConfigError("powerUps.kinds must be a non-empty list of power-up kinds");
  }
  const spawnIntervalMinMs = requireNumber("powerUps.spawnIntervalMinMs", powerUps.spawnIntervalMinMs, 1);

  const config: ArenaConfig = {
    tickRate: requireNumber("tickRate", raw.tickRate, 1, 1000),
    maxFrameMs: requireNumber("maxFrameMs", raw.maxFrameMs, 1),
    stocks: Math.floor(requireNumber("stocks", raw.stocks, 1)),
    respawnMs: requireNumber("respawnMs", raw.respawnMs),
    countdownMs: requireNumber("countdownMs", raw.countdownMs),
    matchTimeLimitMs: requireNumber("matchTimeLimitMs", raw.matchTimeLimitMs),
    spawnOffset: requireNumber("spawnOffset", raw.spawnOffset),
    actor: {
      radius: requireNumber("actor.radius", actor.radius, Number.MIN_VALUE),
      moveSpeed: requireNumber("actor.moveSpeed", actor.moveSpeed),
      accelPerSec: requireNumber("actor.accelPerSec", actor.accelPerSec),
      friction: requireNumber("actor.friction", actor.friction, 0, 1),
      maxSpeed: requireNumber("actor.maxSpeed", actor.maxSpeed, Number.MIN_VALUE),
    },
    dash: {
      speed: requireNumber("dash.speed", dash.speed),
      activeMs: requireNumber("dash.activeMs", dash.activeMs, 1),
      cooldownMs: requireNumber("dash.cooldownMs", dash.cooldownMs),
      charges: Math.floor(requireNumber("dash.charges", dash.charges, 1)),
    },
    collision: {
      restitution: requireNumber("collision.restitution", collision.restitution, 0, 1),
      pushSpeed: requireNumber("collision.pushSpeed", collision.pushSpeed),
      knockbackScale: requireNumber("collision.knockbackScale", collision.knockbackScale),
      recoilScale: requireNumber("collision.recoilScale", collision.recoilScale),
      staggerMs: requireNumber("collision.staggerMs", collision.staggerMs),
    },
    platform: readSchedule(raw.platform),
    powerUps: {
      enabled: requireBoolean("powerUps.enabled", powerUps.enabled),
      kinds: [...kinds],
      slots: Math.floor(requireNumber("powerUps.slots", powerUps.slots, 0, 16)),
      spawnIntervalMinMs,
      spawnIntervalMaxMs: requireNumber("powerUps.spawnIntervalMaxMs", powerUps.spawnIntervalMaxMs, spawnIntervalMinMs),
      lifetimeMs: requireNumber("powerUps.lifetimeMs", powerUps.lifetimeMs, 1),
      radius: requireNumber("powerUps.radius", powerUps.radius, Number.MIN_VALUE),
      spawnRadiusFrac: requireNumber("powerUps.spawnRadiusFrac", powerUps.spawnRadiusFrac, 0, 1),
      effectMs: requireNumber("powerUps.effectMs", powerUps.effectMs, 1),
      freezeMs: requireNumber("powerUps.freezeMs", powerUps.freezeMs, 1),
      speedMult: requireNumber("powerUps.speedMult", powerUps.speedMult),
      sizeUpMult: requireNumber("powerUps.sizeUpMult", powerUps.sizeUpMult, Number.MIN_VALUE),
      sizeDownMult: requireNumber("powerUps.sizeDownMult", powerUps.sizeDownMult, Number.MIN_VALUE),
      multiDashBonus: Math.floor(requireNumber("powerUps.multiDashBonus", powerUps.multiDashBonus)),
      shieldKnockbackMult: requireNumber("powerUps.shieldKnockbackMult", powerUps.shieldKnockbackMult, 0, 1),
      magnetRange: requireNumber("powerUps.magnetRange", powerUps.magnetRange),
      magnetPullPerSec: requireNumber("powerUps.magnetPullPerSec", powerUps.magnetPullPerSec),
      teleportRadiusFrac: requireNumber("powerUps.teleportRadiusFrac", powerUps.teleportRadiusFrac, 0, 1),
    },
    ai: {
      easy: readAiTier("ai.easy", ai.easy),
      medium: readAiTier("ai.medium", ai.medium),
      hard: readAiTier("ai.hard", ai.hard),
      expert: readAiTier("ai.expert", ai.expert),
      fleeEdgeFrac: requireNumber("ai.fleeEdgeFrac", ai.fleeEdgeFrac, 0, 1),
      engageRange: requireNumber("ai.engageRange", ai.engageRange),
      punishRange: requireNumber("ai.punishRange", ai.punishRange),
      baitRange: requireNumber("ai.baitRange", ai.baitRange),
      dashDetectFrac: requireNumber("ai.dashDetectFrac", ai.dashDetectFrac, 0, 1),
    },
  };

  return deepFreeze(config);
}

/** Defaults with overrides applied, validated and frozen. */
export function createArenaConfig(overrides: ArenaConfigOverrides = {}): ArenaConfig {
  return parseArenaConfig(merge(DEFAULT_ARENA_CONFIG, overrides));
}

// ═══════════════════════════════════════════════════════════════════
// Tick helpers
// ═══════════════════════════════════════════════════════════════════

export function tickMs(config: ArenaConfig): number {
  return 1000 / config.tickRate;
}

export function tickSeconds(config: ArenaConfig): number {
  return 1 / config.tickRate;
}

export function msToTicks(config: ArenaConfig, ms: number): number {
  return Math.max(0, Math.round((ms * config.tickRate) / 1000));
}

/**
 * Largest distance an actor can cover in one tick (dash with the speed effect),
 * used to size the spatial grid.
 */
export function maxTickDisplacement(config: ArenaConfig): number {
  const speedMult = Math.max(1, config.powerUps.speedMult);
  const fastest = Math.max(config.dash.speed * speedMult, config.actor.maxSpeed);
  return fastest * tickSeconds(config);
}

export function maxActorRadius(config: ArenaConfig): number {
  return config.actor.radius * Math.max(1, config.powerUps.sizeUpMult);
}
