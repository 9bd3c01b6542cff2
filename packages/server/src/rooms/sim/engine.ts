import {
  deepFreeze,
  maxActorRadius,
  maxTickDisplacement,
  msToTicks,
  tickMs,
  type ArenaConfig,
} from "./config.js";
import { resolveContact, sweepActors } from "./collision.js";
import type { EngineEvent, EngineTickResult } from "./events.js";
import { guardFinite, sanitizeInput, stepActor } from "./integrator.js";
import { distance, length } from "./math.js";
import { currentRadius, isOutOfBounds, platformPhase } from "./platform.js";
import { PowerUpManager } from "./powerups.js";
import { createRng } from "./rng.js";
import { SpatialGrid, cellSizeFor, type GridEntity } from "./spatial/grid.js";
import {
  SLOTS,
  cloneActor,
  otherSlot,
  perceive,
  type ActorState,
  type ArenaState,
  type InputFrame,
  type MatchResult,
  type PerceivedActor,
  type PowerUpState,
  type Slot,
  type Vec2,
  type WorldState,
} from "./state.js";

/** Where an actor enters the match. Part of every replay snapshot. */
export type ActorSeed = {
  slot: Slot;
  position: Vec2;
  facing: Vec2;
};

export type EngineInit = {
  config: ArenaConfig;
  seed: number;
  actors?: readonly [ActorSeed, ActorSeed];
};

export type TickFault = { kind: "desync" | "matchOver" | "aborted"; reason: string; tick: number };

export type TickOutcome = { ok: true; result: EngineTickResult } | { ok: false; fault: TickFault };

export type ArenaSnapshot = {
  tick: number;
  // Countdown ticks still to run before play starts.
  countdownTicks: number;
  elapsedMs: number;
  arena: ArenaState;
  actors: [ActorState, ActorState];
  powerUps: PowerUpState[];
  result: MatchResult | null;
};

export type ActorObservation = {
  self: ActorState;
  opponent: PerceivedActor;
  arenaRadius: number;
};

/** Default entry points: mirrored on the x axis, facing each other. */
export function defaultActorSeeds(config: ArenaConfig): [ActorSeed, ActorSeed] {
  const offset = config.spawnOffset;
  return [
    { slot: 0, position: { x: -offset, y: 0 }, facing: { x: 1, y: 0 } },
    { slot: 1, position: { x: offset, y: 0 }, facing: { x: -1, y: 0 } },
  ];
}

function createActor(seed: ActorSeed, config: ArenaConfig): ActorState {
  return {
    slot: seed.slot,
    position: { ...seed.position },
    prevPosition: { ...seed.position },
    lastValidPosition: { ...seed.position },
    velocity: { x: 0, y: 0 },
    facing: { ...seed.facing },
    radius: config.actor.radius,
    dash: { phase: "ready", remainingTicks: 0, charges: config.dash.charges, direction: { ...seed.facing } },
    stocks: config.stocks,
    effects: {},
    alive: true,
    respawnTicks: 0,
    staggerTicks: 0,
    spawnPoint: { ...seed.position },
  };
}

/**
 * Authoritative two-actor simulation. One call to `step` is one fixed tick; the engine
 * never reads a clock, never logs and never throws mid-tick. Everything a tick decides
 * comes back as events or a fault value.
 */
export class ArenaEngine {
  readonly config: ArenaConfig;
  readonly seed: number;
  readonly actorSeeds: readonly [ActorSeed, ActorSeed];
  readonly world: WorldState;
  readonly arena: ArenaState;
  readonly actors: [ActorState, ActorState];
  readonly countdownTicks: number;

  private readonly grid: SpatialGrid;
  private readonly powerUps: PowerUpManager;
  private readonly respawnTicks: number;
  private warned = false;

  constructor(init: EngineInit) {
    this.config = init.config;
    this.seed = init.seed >>> 0;
    const seeds = init.actors ?? defaultActorSeeds(init.config);
    this.actorSeeds = [
      { ...seeds[0], position: { ...seeds[0].position }, facing: { ...seeds[0].facing } },
      { ...seeds[1], position: { ...seeds[1].position }, facing: { ...seeds[1].facing } },
    ];
    this.actors = [createActor({ ...seeds[0], slot: 0 }, init.config), createActor({ ...seeds[1], slot: 1 }, init.config)];
    this.world = {
      tick: 0,
      elapsedMs: 0,
      rng: createRng(this.seed),
      nextId: 1,
      result: null,
      eliminations: [],
    };
    const radius = currentRadius(init.config.platform, 0);
    this.arena = { radius, phase: platformPhase(init.config.platform, 0) };
    this.grid = new SpatialGrid(cellSizeFor(maxActorRadius(init.config), maxTickDisplacement(init.config)));
    this.powerUps = new PowerUpManager(init.config);
    this.respawnTicks = Math.max(1, msToTicks(init.config, init.config.respawnMs));
    this.countdownTicks = msToTicks(init.config, init.config.countdownMs);
  }

  get tick(): number {
    return this.world.tick;
  }

  get ended(): boolean {
    return this.world.result !== null;
  }

  get result(): MatchResult | null {
    return this.world.result;
  }

  get activePowerUps(): PowerUpState[] {
    return this.powerUps.active;
  }

  /** What `slot` may see when choosing its next input. */
  observationFor(slot: Slot): ActorObservation {
    const self = this.actors[slot];
    const other = this.actors[otherSlot(slot)];
    return { self: cloneActor(self), opponent: perceive(other), arenaRadius: this.arena.radius };
  }

  /**
   * Advance one tick with one frame per actor, labelled with the tick being simulated
   * (`engine.tick + 1`). A missing or mislabelled frame leaves state untouched.
   */
  step(frames: readonly InputFrame[]): TickOutcome {
    const nextTick = this.world.tick + 1;
    if (this.world.result) {
      return { ok: false, fault: { kind: "matchOver", reason: "match already ended", tick: nextTick } };
    }
    const inputs: InputFrame[] = [];
    for (const slot of SLOTS) {
      const frame = frames.find((f) => f.slot === slot);
      if (!frame) {
        return { ok: false, fault: { kind: "desync", reason: `missing frame for slot ${slot}`, tick: nextTick } };
      }
      const checked = sanitizeInput(frame, nextTick, slot);
      if (!checked.ok) return { ok: false, fault: { kind: "desync", reason: checked.reason, tick: nextTick } };
      inputs.push(checked.frame);
    }

    const events: EngineEvent[] = [];
    const world = this.world;
    world.tick = nextTick;

    // Countdown: frames were checked above and get recorded, but nothing moves.
    if (world.tick <= this.countdownTicks) {
      const left = this.secondsLeft(world.tick);
      if (world.tick === 1 || left !== this.secondsLeft(world.tick - 1)) {
        events.push({ type: "countdown", secondsLeft: left });
      }
      return { ok: true, result: { tick: world.tick, events, ended: false } };
    }
    if (this.countdownTicks > 0 && world.tick === this.countdownTicks + 1) events.push({ type: "matchStarted" });
    world.elapsedMs = (world.tick - this.countdownTicks) * tickMs(this.config);

    // 1. Platform
    this.updatePlatform(events);

    // 2. Integrate
    for (const actor of this.actors) {
      const out = stepActor(actor, inputs[actor.slot], this.config);
      if (out.dashDirection) events.push({ type: "dashStarted", slot: actor.slot, direction: out.dashDirection });
      if (out.anomaly) events.push({ type: "anomaly", slot: actor.slot, reason: "nonFinite" });
    }

    // 3. Broad phase
    this.rebuildGrid();

    // 4. Actor vs actor
    this.resolveActorCollision(events);

    // 5. Power-ups
    const ctx = { world, arenaRadius: this.arena.radius, actors: this.actors, events };
    this.powerUps.applyMagnetism(this.actors, this.grid);
    this.powerUps.expire(ctx);
    this.powerUps.collect(ctx, this.grid);
    this.powerUps.spawn(ctx);
    for (const actor of this.actors) this.powerUps.tickEffects(actor, events);

    // 6. Respawns, then eliminations
    this.updateRespawns(events);
    this.checkBoundary(events);

    // 7. Outcome
    this.checkMatchEnd(events);

    return { ok: true, result: { tick: world.tick, events, ended: this.ended } };
  }

  /** Frozen deep copy for presentation; nothing read from it can reach the simulation. */
  snapshot(): ArenaSnapshot {
    const snap: ArenaSnapshot = {
      tick: this.world.tick,
      countdownTicks: Math.max(0, this.countdownTicks - this.world.tick),
      elapsedMs: this.world.elapsedMs,
      arena: { ...this.arena },
      actors: [cloneActor(this.actors[0]), cloneActor(this.actors[1])],
      powerUps: this.powerUps.active.map((p) => ({ ...p, position: { ...p.position } })),
      result: this.world.result ? { ...this.world.result, eliminations: [...this.world.result.eliminations] } : null,
    };
    return deepFreeze(snap);
  }

  /** Whole seconds of countdown shown during `tick`: 3, 2, 1 for a three second lead-in. */
  private secondsLeft(tick: number): number {
    return Math.ceil((this.countdownTicks - tick + 1) / this.config.tickRate);
  }

  private updatePlatform(events: EngineEvent[]) {
    const schedule = this.config.platform;
    const elapsed = this.world.elapsedMs;
    this.arena.radius = currentRadius(schedule, elapsed);

    const untilShrink = schedule.shrinkStartMs - elapsed;
    if (!this.warned && untilShrink > 0 && untilShrink <= schedule.warningLeadMs) {
      this.warned = true;
      events.push({ type: "shrinkWarning", startsInTicks: msToTicks(this.config, untilShrink) });
    }

    const phase = platformPhase(schedule, elapsed);
    if (phase !== this.arena.phase) {
      this.arena.phase = phase;
      events.push({ type: "arenaPhaseChanged", phase, radius: this.arena.radius });
    }
  }

  private rebuildGrid() {
    const entities: GridEntity[] = [];
    for (const a of this.actors) {
      if (!a.alive) continue;
      entities.push({
        type: "actors",
        id: a.slot,
        x: a.position.x,
        y: a.position.y,
        fromX: a.prevPosition.x,
        fromY: a.prevPosition.y,
        radius: a.radius,
      });
    }
    for (const p of this.powerUps.active) {
      entities.push({ type: "powerUps", id: p.id, x: p.position.x, y: p.position.y });
    }
    this.grid.clearAndRebuild(entities);
  }

  private resolveActorCollision(events: EngineEvent[]) {
    const [a, b] = this.actors;
    if (!a.alive || !b.alive) return;
    const near = this.grid.querySegment(
      a.prevPosition.x,
      a.prevPosition.y,
      a.position.x,
      a.position.y,
      a.radius,
      ["actors"],
    );
    if (!near.includes(b.slot)) return;

    const contact = sweepActors(a, b);
    if (!contact) return;
    const report = resolveContact(a, b, contact, this.config);
    events.push({
      type: "collisionOccurred",
      actors: [0, 1],
      attacker: report.attacker,
      impulses: report.impulses,
      impulse: report.impulse,
      point: report.point,
    });
    if (report.shieldConsumed !== null) {
      events.push({ type: "effectExpired", slot: report.shieldConsumed, kind: "shield", consumed: true });
    }
    for (const actor of this.actors) {
      if (guardFinite(actor)) events.push({ type: "anomaly", slot: actor.slot, reason: "nonFinite" });
    }
  }

  private updateRespawns(events: EngineEvent[]) {
    for (const actor of this.actors) {
      if (actor.alive || actor.stocks <= 0) continue;
      actor.respawnTicks -= 1;
      if (actor.respawnTicks > 0) continue;

      const spawn = this.respawnPoint(actor);
      actor.alive = true;
      actor.respawnTicks = 0;
      actor.position = { ...spawn };
      actor.prevPosition = { ...spawn };
      actor.lastValidPosition = { ...spawn };
      actor.velocity = { x: 0, y: 0 };
      actor.radius = this.config.actor.radius;
      actor.dash = { phase: "ready", remainingTicks: 0, charges: this.config.dash.charges, direction: { ...actor.facing } };
      actor.staggerTicks = 0;
      events.push({ type: "actorRespawned", slot: actor.slot, position: { ...spawn } });
    }
  }

  /** Spawn point pulled inward so it sits well inside a shrunken platform. */
  private respawnPoint(actor: ActorState): Vec2 {
    const limit = this.arena.radius / 2;
    const d = length(actor.spawnPoint.x, actor.spawnPoint.y);
    if (d <= limit || d <= 1e-9) return { ...actor.spawnPoint };
    const scale = limit / d;
    return { x: actor.spawnPoint.x * scale, y: actor.spawnPoint.y * scale };
  }

  private checkBoundary(events: EngineEvent[]) {
    for (const actor of this.actors) {
      if (!actor.alive || !isOutOfBounds(actor.position, this.arena.radius)) continue;
      actor.alive = false;
      actor.stocks = Math.max(0, actor.stocks - 1);
      actor.respawnTicks = actor.stocks > 0 ? this.respawnTicks : 0;
      actor.velocity = { x: 0, y: 0 };
      actor.effects = {};
      actor.staggerTicks = 0;
      this.world.eliminations.push(actor.slot);
      events.push({
        type: "actorEliminated",
        slot: actor.slot,
        stocksRemaining: actor.stocks,
        position: { ...actor.position },
      });
    }
  }

  private checkMatchEnd(events: EngineEvent[]) {
    const [a, b] = this.actors;
    let result: MatchResult | null = null;
    const base = { tick: this.world.tick, eliminations: [...this.world.eliminations] };

    if (a.stocks <= 0 || b.stocks <= 0) {
      const winner: Slot | null = a.stocks > 0 ? 0 : b.stocks > 0 ? 1 : null;
      result = { ...base, winner, reason: "stocks" };
    } else if (this.config.matchTimeLimitMs > 0 && this.world.elapsedMs >= this.config.matchTimeLimitMs) {
      result = { ...base, winner: this.timeLimitWinner(), reason: "timeLimit" };
    }
    if (!result) return;

    this.world.result = result;
    events.push({ type: "matchEnded", ...result, eliminations: [...result.eliminations] });
  }

  /** More stocks wins, then the actor nearer the center; otherwise a draw. */
  private timeLimitWinner(): Slot | null {
    const [a, b] = this.actors;
    if (a.stocks !== b.stocks) return a.stocks > b.stocks ? 0 : 1;
    const da = a.alive ? distance(0, 0, a.position.x, a.position.y) : Number.POSITIVE_INFINITY;
    const db = b.alive ? distance(0, 0, b.position.x, b.position.y) : Number.POSITIVE_INFINITY;
    if (da === db) return null;
    return da < db ? 0 : 1;
  }
}
