import test from "node:test";
import assert from "node:assert/strict";
import { createArenaConfig, type ArenaConfig, type PowerUpKind } from "../config.js";
import type { EngineEvent } from "../events.js";
import { PowerUpManager, type PowerUpTickContext } from "../powerups.js";
import { createRng } from "../rng.js";
import { SpatialGrid } from "../spatial/grid.js";
import type { ActorState, PowerUpState, WorldState } from "../state.js";
import { approx, makeActor } from "./fixtures.js";

function configFor(kind: PowerUpKind): ArenaConfig {
  // One slot, a spawn exactly every 60 ticks, 30 ticks of lifetime.
  return createArenaConfig({
    powerUps: { kinds: [kind], slots: 1, spawnIntervalMinMs: 1000, spawnIntervalMaxMs: 1000, lifetimeMs: 500 },
  });
}

class Harness {
  readonly world: WorldState = { tick: 0, elapsedMs: 0, rng: createRng(11), nextId: 1, result: null, eliminations: [] };
  readonly grid = new SpatialGrid(100);
  readonly manager: PowerUpManager;
  readonly actors: [ActorState, ActorState];
  events: EngineEvent[] = [];

  constructor(readonly config: ArenaConfig) {
    this.manager = new PowerUpManager(config);
    // Parked outside the spawn disc so nothing is claimed by accident.
    this.actors = [makeActor(config, 0, { x: -290, y: 0 }), makeActor(config, 1, { x: 290, y: 0 })];
  }

  /** One tick of the power-up phase, in engine order. */
  tick() {
    this.world.tick += 1;
    this.events = [];
    const ctx: PowerUpTickContext = { world: this.world, arenaRadius: 300, actors: this.actors, events: this.events };
    this.rebuild();
    this.manager.applyMagnetism(this.actors, this.grid);
    this.manager.expire(ctx);
    this.rebuild();
    this.manager.collect(ctx, this.grid);
    this.manager.spawn(ctx);
    for (const actor of this.actors) this.manager.tickEffects(actor, this.events);
  }

  runUntilSpawned(): PowerUpState {
    for (let i = 0; i < 200; i++) {
      this.tick();
      const [live] = this.manager.active;
      if (live) return live;
    }
    throw new Error("nothing spawned");
  }

  place(actor: ActorState, x: number, y: number) {
    actor.position = { x, y };
    actor.prevPosition = { x, y };
  }

  private rebuild() {
    this.grid.clearAndRebuild([
      ...this.actors.map((a) => ({
        type: "actors" as const,
        id: a.slot,
        x: a.position.x,
        y: a.position.y,
        fromX: a.prevPosition.x,
        fromY: a.prevPosition.y,
        radius: a.radius,
      })),
      ...this.manager.active.map((p) => ({ type: "powerUps" as const, id: p.id, x: p.position.x, y: p.position.y })),
    ]);
  }
}

test("a slot arms on the first tick and spawns after the interval", () => {
  const h = new Harness(configFor("speed"));
  const spawned = h.runUntilSpawned();
  assert.equal(h.world.tick, 61);
  assert.equal(spawned.id, 1);
  assert.equal(spawned.kind, "speed");
  assert.equal(spawned.expiresAtTick, 91);
  assert.ok(Math.hypot(spawned.position.x, spawned.position.y) <= 300 * 0.7);
  assert.deepEqual(h.events, [
    { type: "powerUpSpawned", id: 1, kind: "speed", position: { ...spawned.position }, expiresAtTick: 91 },
  ]);
});

test("unclaimed power-ups expire on their last tick and are never live past it", () => {
  const h = new Harness(configFor("speed"));
  h.runUntilSpawned();
  while (h.world.tick < 90) {
    h.tick();
    for (const p of h.manager.active) assert.ok(h.world.tick < p.expiresAtTick);
  }
  assert.equal(h.manager.active.length, 1);
  h.tick();
  assert.equal(h.manager.active.length, 0);
  assert.deepEqual(h.events[0], { type: "powerUpExpired", id: 1, kind: "speed" });
});

test("touching a power-up claims it and applies the effect", () => {
  const h = new Harness(configFor("speed"));
  const pu = h.runUntilSpawned();
  h.place(h.actors[1], pu.position.x + 10, pu.position.y);
  h.tick();
  assert.equal(h.manager.active.length, 0);
  assert.equal(pu.claimed, true);
  assert.deepEqual(h.events[0], { type: "powerUpClaimed", id: 1, kind: "speed", slot: 1 });
  // 300 ticks granted, one already counted down this tick.
  assert.equal(h.actors[1].effects.speed, 299);
});

test("expiry wins over a claim on the same tick", () => {
  const h = new Harness(configFor("speed"));
  const pu = h.runUntilSpawned();
  while (h.world.tick < 90) h.tick();
  h.place(h.actors[0], pu.position.x, pu.position.y);
  h.tick();
  assert.equal(pu.claimed, false);
  assert.equal(h.actors[0].effects.speed, undefined);
  assert.deepEqual(h.events[0], { type: "powerUpExpired", id: 1, kind: "speed" });
});

test("equal reach goes to the lower slot", () => {
  const h = new Harness(configFor("shield"));
  const pu = h.runUntilSpawned();
  h.place(h.actors[0], pu.position.x, pu.position.y);
  h.place(h.actors[1], pu.position.x, pu.position.y);
  h.tick();
  assert.deepEqual(h.events[0], { type: "powerUpClaimed", id: 1, kind: "shield", slot: 0 });
  assert.equal(h.actors[1].effects.shield, undefined);
});

test("freeze lands on the opponent", () => {
  const h = new Harness(configFor("freeze"));
  const pu = h.runUntilSpawned();
  h.place(h.actors[0], pu.position.x, pu.position.y);
  h.tick();
  assert.equal(h.actors[0].effects.freeze, undefined);
  // 1500 ms = 90 ticks, less this tick's countdown.
  assert.equal(h.actors[1].effects.freeze, 89);
});

test("teleport moves the claimer inside the platform and stops it", () => {
  const h = new Harness(configFor("teleport"));
  const pu = h.runUntilSpawned();
  h.place(h.actors[0], pu.position.x, pu.position.y);
  h.actors[0].velocity = { x: 250, y: 0 };
  h.tick();
  const actor = h.actors[0];
  assert.ok(Math.hypot(actor.position.x, actor.position.y) <= 300 * 0.5);
  assert.deepEqual(actor.velocity, { x: 0, y: 0 });
  assert.deepEqual(actor.prevPosition, actor.position);
});

test("sizeUp grows the claimer and shrinks back when it wears off", () => {
  const h = new Harness(configFor("sizeUp"));
  const pu = h.runUntilSpawned();
  h.place(h.actors[0], pu.position.x, pu.position.y);
  h.tick();
  assert.equal(h.actors[0].radius, 30);
  h.place(h.actors[0], -290, 0);
  h.actors[0].effects.sizeUp = 1;
  h.tick();
  assert.equal(h.actors[0].radius, 20);
  assert.ok(h.events.some((e) => e.type === "effectExpired" && e.slot === 0 && e.kind === "sizeUp"));
});

test("multiDash refills charges and cuts a cooldown short", () => {
  const h = new Harness(configFor("multiDash"));
  const pu = h.runUntilSpawned();
  const actor = h.actors[0];
  actor.dash = { phase: "cooldown", remainingTicks: 40, charges: 0, direction: { x: 1, y: 0 } };
  h.place(actor, pu.position.x, pu.position.y);
  h.tick();
  assert.equal(actor.dash.phase, "ready");
  assert.equal(actor.dash.charges, 3);
});

test("timed effects count down and report expiry", () => {
  const h = new Harness(configFor("speed"));
  h.actors[0].effects.magnet = 2;
  h.tick();
  assert.equal(h.actors[0].effects.magnet, 1);
  h.tick();
  assert.equal(h.actors[0].effects.magnet, undefined);
  assert.deepEqual(h.events, [{ type: "effectExpired", slot: 0, kind: "magnet", consumed: false }]);
});

test("magnet pulls live power-ups toward its holder", () => {
  const h = new Harness(configFor("speed"));
  const pu = h.runUntilSpawned();
  const start = { ...pu.position };
  h.place(h.actors[0], start.x + 100, start.y);
  h.actors[0].effects.magnet = 100;
  h.tick();
  // 180 units/s at 60 Hz
  assert.ok(approx(pu.position.x, start.x + 3));
  assert.ok(approx(pu.position.y, start.y));
});

test("disabled power-ups never draw from the RNG", () => {
  const config = createArenaConfig({ powerUps: { enabled: false } });
  const h = new Harness(config);
  const seed = h.world.rng.seed;
  for (let i = 0; i < 120; i++) h.tick();
  assert.equal(h.world.rng.seed, seed);
  assert.equal(h.manager.active.length, 0);
});
