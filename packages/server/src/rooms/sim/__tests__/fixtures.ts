import { createArenaConfig, type ArenaConfig, type ArenaConfigOverrides } from "../config.js";
import { AiController, HumanController } from "../controllers.js";
import type { EngineEvent } from "../events.js";
import { Match } from "../match.js";
import type { ActorState, InputFrame, Slot, Vec2 } from "../state.js";

/** Defaults without power-ups or countdown, so only the scripted inputs touch the RNG-free path. */
export function quietConfig(overrides: ArenaConfigOverrides = {}): ArenaConfig {
  return createArenaConfig({ countdownMs: 0, ...overrides, powerUps: { enabled: false, ...overrides.powerUps } });
}

export function makeActor(config: ArenaConfig, slot: Slot, position: Vec2, patch: Partial<ActorState> = {}): ActorState {
  return {
    slot,
    position: { ...position },
    prevPosition: { ...position },
    lastValidPosition: { ...position },
    velocity: { x: 0, y: 0 },
    facing: slot === 0 ? { x: 1, y: 0 } : { x: -1, y: 0 },
    radius: config.actor.radius,
    dash: { phase: "ready", remainingTicks: 0, charges: config.dash.charges, direction: { x: 1, y: 0 } },
    stocks: config.stocks,
    effects: {},
    alive: true,
    respawnTicks: 0,
    staggerTicks: 0,
    spawnPoint: { ...position },
    ...patch,
  };
}

export function frame(tick: number, slot: Slot, move: Vec2 = { x: 0, y: 0 }, dash = false): InputFrame {
  return { tick, slot, move, dash };
}

export function approx(actual: number, expected: number, epsilon = 1e-6): boolean {
  return Math.abs(actual - expected) <= epsilon;
}

/** Short human-vs-AI match with a one second countdown and power-ups coming in quickly. */
export function shortMatchConfig(): ArenaConfig {
  return createArenaConfig({
    countdownMs: 1000,
    matchTimeLimitMs: 3000,
    powerUps: { spawnIntervalMinMs: 500, spawnIntervalMaxMs: 1000, lifetimeMs: 1500 },
  });
}

/**
 * Play a match to its end: slot 0 holds right and taps dash every 40 ticks, slot 1 is
 * a hard AI. Returns the match and every event it produced, in order.
 */
export function playMatch(seed: number): { match: Match; events: EngineEvent[] } {
  const config = shortMatchConfig();
  const human = new HumanController();
  const match = new Match({
    config,
    seed,
    controllers: [human, new AiController(1, { kind: "ai", tier: "hard" }, config)],
  });
  const events: EngineEvent[] = [];
  human.setKeys({ right: true });
  while (!match.ended) {
    human.setKeys({ dash: (match.tick + 1) % 40 === 0 });
    const outcome = match.step();
    if (!outcome.ok) throw new Error(`tick ${outcome.fault.tick}: ${outcome.fault.reason}`);
    events.push(...outcome.result.events);
  }
  return { match, events };
}
