import { Schema, ArraySchema, MapSchema, type } from "@colyseus/schema";
import { POWER_UP_KINDS } from "../sim/config.js";
import type { ArenaSnapshot } from "../sim/engine.js";
import type { SeriesStanding } from "../series.js";
import type { ActorState, PowerUpState } from "../sim/state.js";

/**
 * Actor - one of the two combatants
 */
export class ActorSchema extends Schema {
  @type("uint8") slot: number = 0;
  @type("string") sessionId: string = "";
  @type("string") controller: string = "human";

  // Kinematics
  @type("number") x: number = 0;
  @type("number") y: number = 0;
  @type("number") vx: number = 0;
  @type("number") vy: number = 0;
  @type("number") facingX: number = 1;
  @type("number") facingY: number = 0;
  @type("number") radius: number = 0;

  @type("string") dashPhase: string = "ready";
  @type("uint8") dashCharges: number = 0;
  @type("uint8") stocks: number = 0;
  @type("boolean") alive: boolean = true;
  @type("boolean") staggered: boolean = false;

  // Series score
  @type("uint8") wins: number = 0;
  @type("uint16") kills: number = 0;

  // Active timed effects by kind
  @type(["string"]) effects = new ArraySchema<string>();

  sync(actor: ActorState) {
    this.slot = actor.slot;
    this.x = actor.position.x;
    this.y = actor.position.y;
    this.vx = actor.velocity.x;
    this.vy = actor.velocity.y;
    this.facingX = actor.facing.x;
    this.facingY = actor.facing.y;
    this.radius = actor.radius;
    this.dashPhase = actor.dash.phase;
    this.dashCharges = actor.dash.charges;
    this.stocks = actor.stocks;
    this.alive = actor.alive;
    this.staggered = actor.staggerTicks > 0;

    const kinds = POWER_UP_KINDS.filter((k) => actor.effects[k] !== undefined);
    const same = kinds.length === this.effects.length && kinds.every((k, i) => this.effects[i] === k);
    if (!same) {
      this.effects.clear();
      for (const k of kinds) this.effects.push(k);
    }
  }
}

/**
 * PowerUp - a live pickup on the platform
 */
export class PowerUpSchema extends Schema {
  @type("uint32") id: number = 0;
  @type("string") kind: string = "";
  @type("number") x: number = 0;
  @type("number") y: number = 0;
  @type("uint32") expiresAtTick: number = 0;

  sync(powerUp: PowerUpState) {
    this.id = powerUp.id;
    this.kind = powerUp.kind;
    this.x = powerUp.position.x;
    this.y = powerUp.position.y;
    this.expiresAtTick = powerUp.expiresAtTick;
  }
}

/**
 * Main arena state - the root schema synchronized to all clients
 */
export class ArenaState extends Schema {
  @type("string") mode: string = "versus";
  @type("number") tickRate: number = 60;
  @type("uint32") tick: number = 0;
  @type("boolean") started: boolean = false;
  @type("uint16") countdownTicks: number = 0;

  // Series
  @type("uint8") round: number = 1;
  @type("uint8") bestOf: number = 1;
  @type("boolean") seriesEnded: boolean = false;
  @type("int8") seriesWinner: number = -1;

  // Platform
  @type("number") radius: number = 0;
  @type("string") phase: string = "stable";

  @type([ActorSchema]) actors = new ArraySchema<ActorSchema>(new ActorSchema(), new ActorSchema());
  @type({ map: PowerUpSchema }) powerUps = new MapSchema<PowerUpSchema>();

  // Outcome; winner is -1 until decided or on a draw
  @type("boolean") ended: boolean = false;
  @type("int8") winner: number = -1;
  @type("string") endReason: string = "";

  /** Mirror a simulation snapshot into the synchronized tree. */
  applySnapshot(snapshot: ArenaSnapshot) {
    this.tick = snapshot.tick;
    this.countdownTicks = snapshot.countdownTicks;
    this.radius = snapshot.arena.radius;
    this.phase = snapshot.arena.phase;

    snapshot.actors.forEach((actor, i) => {
      const schema = this.actors[i];
      if (schema) schema.sync(actor);
    });

    const live = new Set<string>();
    for (const p of snapshot.powerUps) {
      const key = String(p.id);
      live.add(key);
      let schema = this.powerUps.get(key);
      if (!schema) {
        schema = new PowerUpSchema();
        this.powerUps.set(key, schema);
      }
      schema.sync(p);
    }
    for (const key of [...this.powerUps.keys()]) {
      if (!live.has(key)) this.powerUps.delete(key);
    }

    // A fresh round's snapshot clears the previous outcome.
    this.ended = snapshot.result !== null;
    this.winner = snapshot.result?.winner ?? -1;
    this.endReason = snapshot.result?.reason ?? "";
  }

  applyStanding(standing: SeriesStanding) {
    this.round = standing.round;
    this.bestOf = standing.bestOf;
    this.seriesEnded = standing.decided;
    this.seriesWinner = standing.winner ?? -1;
    standing.wins.forEach((wins, i) => {
      const schema = this.actors[i];
      if (!schema) return;
      schema.wins = wins;
      schema.kills = standing.kills[i] ?? 0;
    });
  }
}
