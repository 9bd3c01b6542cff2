import { POWER_UP_KINDS, msToTicks, tickSeconds, type ArenaConfig } from "./config.js";
import type { EngineEvent } from "./events.js";
import { effectiveRadius, endDash, maxDashCharges } from "./integrator.js";
import { distance, segmentPointDistanceSq } from "./math.js";
import { nextInt, nextRange, pick } from "./rng.js";
import type { SpatialGrid } from "./spatial/grid.js";
import type { ActorState, PowerUpKind, PowerUpSlot, PowerUpState, WorldState } from "./state.js";

export type PowerUpTickContext = {
  world: WorldState;
  arenaRadius: number;
  actors: readonly [ActorState, ActorState];
  events: EngineEvent[];
};

/**
 * Power-up slots and timed effects.
 *
 * Each slot cycles empty -> spawning(timer) -> active -> (claimed | expired) -> empty.
 * Every random draw goes through the world RNG, in slot order, so spawns replay exactly.
 */
export class PowerUpManager {
  private readonly slots: PowerUpSlot[];
  private readonly effectTicks: number;
  private readonly freezeTicks: number;
  private readonly lifetimeTicks: number;
  private readonly spawnMinTicks: number;
  private readonly spawnMaxTicks: number;

  constructor(private readonly config: ArenaConfig) {
    const count = config.powerUps.enabled ? config.powerUps.slots : 0;
    this.slots = Array.from({ length: count }, (): PowerUpSlot => ({ phase: "empty" }));
    this.effectTicks = Math.max(1, msToTicks(config, config.powerUps.effectMs));
    this.freezeTicks = Math.max(1, msToTicks(config, config.powerUps.freezeMs));
    this.lifetimeTicks = Math.max(1, msToTicks(config, config.powerUps.lifetimeMs));
    this.spawnMinTicks = Math.max(1, msToTicks(config, config.powerUps.spawnIntervalMinMs));
    this.spawnMaxTicks = Math.max(this.spawnMinTicks, msToTicks(config, config.powerUps.spawnIntervalMaxMs));
  }

  /** Live power-ups ordered by id. */
  get active(): PowerUpState[] {
    const out: PowerUpState[] = [];
    for (const slot of this.slots) {
      if (slot.phase === "active") out.push(slot.powerUp);
    }
    return out.sort((a, b) => a.id - b.id);
  }

  /** Magnet holders drag nearby power-ups toward themselves. */
  applyMagnetism(actors: readonly ActorState[], grid: SpatialGrid) {
    const range = this.config.powerUps.magnetRange;
    const pull = this.config.powerUps.magnetPullPerSec * tickSeconds(this.config);
    for (const actor of actors) {
      if (!actor.alive || actor.effects.magnet === undefined) continue;
      const ids = grid.queryRadius(actor.position.x, actor.position.y, range, ["powerUps"]);
      for (const id of ids) {
        const pu = this.findActive(id);
        if (!pu) continue;
        const d = distance(pu.position.x, pu.position.y, actor.position.x, actor.position.y);
        if (d > range || d <= 1e-9) continue;
        const stepLen = Math.min(d, pull);
        pu.position.x += ((actor.position.x - pu.position.x) / d) * stepLen;
        pu.position.y += ((actor.position.y - pu.position.y) / d) * stepLen;
      }
    }
  }

  /** Retire power-ups whose lifetime ran out. Runs before claims, so expiry wins ties. */
  expire(ctx: PowerUpTickContext) {
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.phase !== "active" || ctx.world.tick < slot.powerUp.expiresAtTick) continue;
      ctx.events.push({ type: "powerUpExpired", id: slot.powerUp.id, kind: slot.powerUp.kind });
      this.slots[i] = { phase: "empty" };
    }
  }

  /**
   * Swept pickup: an actor claims a power-up when the segment it travelled this tick
   * passes within reach. When both reach it, the closer pass wins, then the lower slot.
   */
  collect(ctx: PowerUpTickContext, grid: SpatialGrid) {
    const radius = this.config.powerUps.radius;
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.phase !== "active") continue;
      const pu = slot.powerUp;

      let winner: ActorState | null = null;
      let best = Number.POSITIVE_INFINITY;
      for (const id of grid.queryRadius(pu.position.x, pu.position.y, radius, ["actors"])) {
        const actor = ctx.actors.find((a) => a.slot === id);
        if (!actor || !actor.alive) continue;
        const dSq = segmentPointDistanceSq(
          actor.prevPosition.x,
          actor.prevPosition.y,
          actor.position.x,
          actor.position.y,
          pu.position.x,
          pu.position.y,
        );
        const reach = radius + actor.radius;
        if (dSq > reach * reach) continue;
        if (dSq < best || (dSq === best && winner !== null && actor.slot < winner.slot)) {
          best = dSq;
          winner = actor;
        }
      }
      if (!winner) continue;

      pu.claimed = true;
      this.slots[i] = { phase: "empty" };
      ctx.events.push({ type: "powerUpClaimed", id: pu.id, kind: pu.kind, slot: winner.slot });
      this.applyPowerUp(pu.kind, winner, ctx);
    }
  }

  /** Arm empty slots and bring due ones to life. */
  spawn(ctx: PowerUpTickContext) {
    const { world } = ctx;
    for (let i = 0; i < this.slots.length; i++) {
      const slot = this.slots[i];
      if (slot.phase === "empty") {
        this.slots[i] = {
          phase: "spawning",
          spawnAtTick: world.tick + nextInt(world.rng, this.spawnMinTicks, this.spawnMaxTicks),
        };
        continue;
      }
      if (slot.phase !== "spawning" || world.tick < slot.spawnAtTick) continue;

      const kind = pick(world.rng, this.config.powerUps.kinds);
      if (kind === undefined) continue;
      const angle = nextRange(world.rng, 0, Math.PI * 2);
      const dist = nextRange(world.rng, 0, ctx.arenaRadius * this.config.powerUps.spawnRadiusFrac);
      const powerUp: PowerUpState = {
        id: world.nextId++,
        kind,
        position: { x: Math.cos(angle) * dist, y: Math.sin(angle) * dist },
        spawnTick: world.tick,
        expiresAtTick: world.tick + this.lifetimeTicks,
        claimed: false,
      };
      this.slots[i] = { phase: "active", powerUp };
      ctx.events.push({
        type: "powerUpSpawned",
        id: powerUp.id,
        kind,
        position: { ...powerUp.position },
        expiresAtTick: powerUp.expiresAtTick,
      });
    }
  }

  /** Count down timed effects; removal is tick-exact. */
  tickEffects(actor: ActorState, events: EngineEvent[]) {
    for (const kind of POWER_UP_KINDS) {
      const remaining = actor.effects[kind];
      if (remaining === undefined) continue;
      if (remaining > 1) {
        actor.effects[kind] = remaining - 1;
        continue;
      }
      delete actor.effects[kind];
      events.push({ type: "effectExpired", slot: actor.slot, kind, consumed: false });
      if (kind === "multiDash") {
        actor.dash.charges = Math.min(actor.dash.charges, maxDashCharges(actor, this.config));
      }
      if (kind === "sizeUp" || kind === "sizeDown") {
        actor.radius = effectiveRadius(actor, this.config);
      }
    }
  }

  private applyPowerUp(kind: PowerUpKind, claimer: ActorState, ctx: PowerUpTickContext) {
    const opponent = ctx.actors.find((a) => a.slot !== claimer.slot);
    switch (kind) {
      case "speed":
      case "shield":
      case "magnet":
        claimer.effects[kind] = this.effectTicks;
        return;
      case "sizeUp":
      case "sizeDown":
        delete claimer.effects[kind === "sizeUp" ? "sizeDown" : "sizeUp"];
        claimer.effects[kind] = this.effectTicks;
        claimer.radius = effectiveRadius(claimer, this.config);
        return;
      case "multiDash":
        claimer.effects.multiDash = this.effectTicks;
        claimer.dash.charges = maxDashCharges(claimer, this.config);
        if (claimer.dash.phase === "cooldown") {
          claimer.dash.phase = "ready";
          claimer.dash.remainingTicks = 0;
        }
        return;
      case "teleport": {
        const angle = nextRange(ctx.world.rng, 0, Math.PI * 2);
        const dist = nextRange(ctx.world.rng, 0, ctx.arenaRadius * this.config.powerUps.teleportRadiusFrac);
        const target = { x: Math.cos(angle) * dist, y: Math.sin(angle) * dist };
        claimer.position = { ...target };
        claimer.prevPosition = { ...target };
        claimer.lastValidPosition = { ...target };
        claimer.velocity = { x: 0, y: 0 };
        return;
      }
      case "freeze":
        if (!opponent || !opponent.alive) return;
        opponent.effects.freeze = this.freezeTicks;
        endDash(opponent, this.config);
        return;
    }
  }

  private findActive(id: number): PowerUpState | undefined {
    for (const slot of this.slots) {
      if (slot.phase === "active" && slot.powerUp.id === id) return slot.powerUp;
    }
    return undefined;
  }
}

