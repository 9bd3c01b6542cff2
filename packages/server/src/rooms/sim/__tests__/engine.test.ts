import test from "node:test";
import assert from "node:assert/strict";
import { createArenaConfig, type ArenaConfig } from "../config.js";
import { ArenaEngine, type ActorSeed } from "../engine.js";
import type { EngineEvent } from "../events.js";
import type { InputFrame } from "../state.js";
import { frame, quietConfig } from "./fixtures.js";

function idle(tick: number): InputFrame[] {
  return [frame(tick, 0), frame(tick, 1)];
}

function seeds(x0: number, x1: number): [ActorSeed, ActorSeed] {
  return [
    { slot: 0, position: { x: x0, y: 0 }, facing: { x: 1, y: 0 } },
    { slot: 1, position: { x: x1, y: 0 }, facing: { x: -1, y: 0 } },
  ];
}

/** Step until the match ends or `maxTicks`; every event comes back tagged with its tick. */
function run(
  engine: ArenaEngine,
  input: (tick: number) => InputFrame[],
  maxTicks: number,
): { tick: number; event: EngineEvent }[] {
  const log: { tick: number; event: EngineEvent }[] = [];
  while (!engine.ended && engine.tick < maxTicks) {
    const outcome = engine.step(input(engine.tick + 1));
    assert.ok(outcome.ok);
    for (const event of outcome.result.events) log.push({ tick: outcome.result.tick, event });
  }
  return log;
}

// Pseudo-random but fixed input script: move in a slow circle, dash every 45 ticks.
function scripted(tick: number): InputFrame[] {
  const angle = tick / 20;
  return [
    frame(tick, 0, { x: Math.cos(angle), y: Math.sin(angle) }, tick % 45 === 0),
    frame(tick, 1, { x: -Math.sin(angle), y: Math.cos(angle) }, tick % 45 === 20),
  ];
}

test("same seed and inputs give identical state", () => {
  const config = createArenaConfig({ powerUps: { spawnIntervalMinMs: 500, spawnIntervalMaxMs: 1500 } });
  const a = new ArenaEngine({ config, seed: 77 });
  const b = new ArenaEngine({ config, seed: 77 });
  const eventsA = run(a, scripted, 900);
  const eventsB = run(b, scripted, 900);
  assert.deepEqual(eventsA, eventsB);
  assert.deepEqual(a.snapshot(), b.snapshot());
  assert.ok(eventsA.some((e) => e.event.type === "powerUpSpawned"));
});

test("a different seed changes power-up placement", () => {
  const config = createArenaConfig({ countdownMs: 0, powerUps: { spawnIntervalMinMs: 500, spawnIntervalMaxMs: 500 } });
  const spawnsFor = (seed: number) =>
    run(new ArenaEngine({ config, seed }), idle, 40)
      .map((e) => e.event)
      .filter((e) => e.type === "powerUpSpawned");
  const first = spawnsFor(1);
  const second = spawnsFor(2);
  assert.equal(first.length, 3);
  assert.notDeepEqual(first, second);
});

test("a dash into a resting actor knocks it off a small platform", () => {
  const config = createArenaConfig({
    countdownMs: 0,
    stocks: 1,
    actor: { radius: 4 },
    powerUps: { enabled: false },
    platform: { mode: "linear", startRadius: 50, minRadius: 10, shrinkStartMs: 0, unitsPerSecond: 1 },
  });
  const engine = new ArenaEngine({ config, seed: 1, actors: seeds(-5, 5) });
  const log = run(
    engine,
    (tick) => (tick === 30 ? [frame(tick, 0, { x: 1, y: 0 }, true), frame(tick, 1)] : idle(tick)),
    600,
  );

  const collision = log.find((e) => e.event.type === "collisionOccurred");
  assert.ok(collision);
  assert.equal(collision.tick, 30);
  assert.ok(collision.event.type === "collisionOccurred");
  assert.equal(collision.event.attacker, 0);
  assert.ok(collision.event.impulses[1].x > 0);

  const eliminated = log.filter((e) => e.event.type === "actorEliminated");
  assert.equal(eliminated.length, 1);
  assert.equal(eliminated[0].tick, 34);
  assert.deepEqual(
    log.filter((e) => e.event.type === "actorEliminated" || e.event.type === "matchEnded").map((e) => e.event.type),
    ["actorEliminated", "matchEnded"],
  );
  assert.deepEqual(engine.result, { winner: 0, reason: "stocks", tick: 34, eliminations: [1] });
});

test("a dash that passes clean through the other actor in one tick still collides", () => {
  // 30 units of travel in one tick against a combined radius of 8.
  const config = quietConfig({ actor: { radius: 4, maxSpeed: 2000 }, dash: { speed: 1800 } });
  const engine = new ArenaEngine({ config, seed: 1, actors: seeds(-12, 0) });
  const outcome = engine.step([frame(1, 0, { x: 1, y: 0 }, true), frame(1, 1)]);
  assert.ok(outcome.ok);

  const types = outcome.result.events.map((e) => e.type);
  assert.deepEqual(types.slice(0, 2), ["dashStarted", "collisionOccurred"]);
  const hit = outcome.result.events[1];
  assert.ok(hit.type === "collisionOccurred");
  assert.equal(hit.attacker, 0);
  assert.ok(hit.impulses[1].x > 0);
  assert.ok(engine.actors[0].position.x < engine.actors[1].position.x);
  assert.ok(engine.actors[1].staggerTicks > 0);
});

test("a shrinking edge eliminates an actor that never moves", () => {
  // Radius 50 - 1 per tick: the edge passes 30.5 on tick 20.
  const config = quietConfig({
    stocks: 1,
    platform: { mode: "linear", startRadius: 50, minRadius: 10, shrinkStartMs: 0, unitsPerSecond: 60 },
  });
  const engine = new ArenaEngine({ config, seed: 1, actors: seeds(-5, 30.5) });
  const log = run(engine, idle, 100);

  const eliminated = log.filter((e) => e.event.type === "actorEliminated");
  assert.equal(eliminated.length, 1);
  assert.equal(eliminated[0].tick, 20);
  assert.ok(eliminated[0].event.type === "actorEliminated");
  assert.equal(eliminated[0].event.slot, 1);
  assert.deepEqual(eliminated[0].event.position, { x: 30.5, y: 0 });
  assert.deepEqual(engine.result, { winner: 0, reason: "stocks", tick: 20, eliminations: [1] });
});

test("the countdown takes input but holds everything until play starts", () => {
  const config = quietConfig({ countdownMs: 3000, matchTimeLimitMs: 1000 });
  const engine = new ArenaEngine({ config, seed: 1 });
  assert.equal(engine.snapshot().countdownTicks, 180);
  const log = run(
    engine,
    (tick) => (tick <= 180 ? [frame(tick, 0, { x: 1, y: 0 }, true), frame(tick, 1, { x: 0, y: 1 })] : idle(tick)),
    1000,
  );

  assert.deepEqual(
    log.filter((e) => e.tick <= 181).map((e) => [e.tick, e.event]),
    [
      [1, { type: "countdown", secondsLeft: 3 }],
      [61, { type: "countdown", secondsLeft: 2 }],
      [121, { type: "countdown", secondsLeft: 1 }],
      [181, { type: "matchStarted" }],
    ],
  );
  // The time limit runs from the end of the countdown.
  assert.deepEqual(engine.result, { winner: null, reason: "timeLimit", tick: 240, eliminations: [] });
  assert.deepEqual(engine.actors[0].position, { x: -150, y: 0 });
  assert.deepEqual(engine.actors[1].position, { x: 150, y: 0 });
  assert.equal(engine.actors[0].dash.phase, "ready");
  assert.equal(engine.snapshot().countdownTicks, 0);
});

test("wrong or missing frames are a desync that leaves state untouched", () => {
  const engine = new ArenaEngine({ config: quietConfig(), seed: 3 });
  const before = engine.snapshot();

  const stale = engine.step([frame(0, 0), frame(0, 1)]);
  assert.deepEqual(stale, { ok: false, fault: { kind: "desync", reason: "frame for tick 0 fed at tick 1", tick: 1 } });
  const missing = engine.step([frame(1, 0)]);
  assert.deepEqual(missing, { ok: false, fault: { kind: "desync", reason: "missing frame for slot 1", tick: 1 } });

  assert.equal(engine.tick, 0);
  assert.deepEqual(engine.snapshot(), before);
});

test("non-finite input is zeroed, not rejected", () => {
  const engine = new ArenaEngine({ config: quietConfig(), seed: 3 });
  const outcome = engine.step([frame(1, 0, { x: Number.NaN, y: 0 }), frame(1, 1, { x: 0, y: Number.NEGATIVE_INFINITY })]);
  assert.ok(outcome.ok);
  const snap = engine.snapshot();
  assert.deepEqual(snap.actors[0].velocity, { x: 0, y: 0 });
  assert.deepEqual(snap.actors[1].velocity, { x: 0, y: 0 });
});

test("an eliminated actor with stocks left respawns after the delay", () => {
  const config = quietConfig({
    stocks: 2,
    respawnMs: 1000,
    platform: { startRadius: 50, minRadius: 50 },
  });
  // Slot 1 starts outside the platform.
  const engine = new ArenaEngine({ config, seed: 9, actors: seeds(-10, 60) });
  const log = run(engine, idle, 61);

  assert.deepEqual(log.filter((e) => e.event.type === "actorEliminated"), [
    { tick: 1, event: { type: "actorEliminated", slot: 1, stocksRemaining: 1, position: { x: 60, y: 0 } } },
  ]);
  // Pulled in to half the platform radius.
  assert.deepEqual(log.filter((e) => e.event.type === "actorRespawned"), [
    { tick: 61, event: { type: "actorRespawned", slot: 1, position: { x: 25, y: 0 } } },
  ]);
  assert.equal(engine.ended, false);
  assert.equal(engine.actors[1].alive, true);
  assert.equal(engine.actors[1].stocks, 1);
});

test("dead actors stay out until their timer runs", () => {
  const config = quietConfig({ stocks: 2, respawnMs: 1000, platform: { startRadius: 50, minRadius: 50 } });
  const engine = new ArenaEngine({ config, seed: 9, actors: seeds(-10, 60) });
  run(engine, idle, 60);
  assert.equal(engine.actors[1].alive, false);
  assert.equal(engine.actors[1].respawnTicks, 1);
});

test("simultaneous last stocks end in a draw", () => {
  const config = quietConfig({ stocks: 1, platform: { startRadius: 50, minRadius: 50 } });
  const engine = new ArenaEngine({ config, seed: 1, actors: seeds(-60, 60) });
  run(engine, idle, 10);
  assert.deepEqual(engine.result, { winner: null, reason: "stocks", tick: 1, eliminations: [0, 1] });
});

function timeLimitEngine(config: ArenaConfig, x0: number, x1: number) {
  const engine = new ArenaEngine({ config, seed: 5, actors: seeds(x0, x1) });
  run(engine, idle, 1000);
  return engine;
}

test("at the time limit the actor nearer the center wins", () => {
  const config = quietConfig({ matchTimeLimitMs: 1000 });
  const engine = timeLimitEngine(config, -10, 20);
  assert.deepEqual(engine.result, { winner: 0, reason: "timeLimit", tick: 60, eliminations: [] });
});

test("at the time limit equal standing is a draw", () => {
  const config = quietConfig({ matchTimeLimitMs: 1000 });
  const engine = timeLimitEngine(config, -30, 30);
  assert.equal(engine.result?.winner, null);
  assert.equal(engine.result?.reason, "timeLimit");
});

test("stepping a finished match is reported, not simulated", () => {
  const config = quietConfig({ matchTimeLimitMs: 100 });
  const engine = new ArenaEngine({ config, seed: 5 });
  run(engine, idle, 100);
  const endTick = engine.tick;
  const outcome = engine.step(idle(endTick + 1));
  assert.deepEqual(outcome, {
    ok: false,
    fault: { kind: "matchOver", reason: "match already ended", tick: endTick + 1 },
  });
  assert.equal(engine.tick, endTick);
});

test("platform events fire once, in order", () => {
  const config = quietConfig({
    platform: { mode: "linear", startRadius: 300, minRadius: 290, shrinkStartMs: 500, unitsPerSecond: 100, warningLeadMs: 200 },
  });
  const engine = new ArenaEngine({ config, seed: 1 });
  const log = run(engine, idle, 120).filter(
    (e) => e.event.type === "shrinkWarning" || e.event.type === "arenaPhaseChanged",
  );
  // Warning 200 ms ahead (tick 18 of 60 Hz), shrinking after 500 ms, settled 100 ms later.
  assert.deepEqual(
    log.map((e) => [e.tick, e.event.type === "arenaPhaseChanged" ? e.event.phase : "warning"]),
    [
      [18, "warning"],
      [31, "shrinking"],
      [36, "settled"],
    ],
  );
});

test("snapshots are frozen copies", () => {
  const engine = new ArenaEngine({ config: quietConfig(), seed: 1 });
  const snap = engine.snapshot();
  assert.ok(Object.isFrozen(snap));
  assert.ok(Object.isFrozen(snap.actors[0].position));
  engine.step([frame(1, 0, { x: 1, y: 0 }), frame(1, 1)]);
  assert.deepEqual(snap.actors[0].position, { x: -150, y: 0 });
  assert.notDeepEqual(engine.snapshot().actors[0].position, snap.actors[0].position);
});

test("observations hide the opponent's timers", () => {
  const engine = new ArenaEngine({ config: quietConfig(), seed: 1 });
  const obs = engine.observationFor(1);
  assert.equal(obs.self.slot, 1);
  assert.deepEqual(Object.keys(obs.opponent).sort(), ["alive", "position", "radius", "slot", "velocity"]);
  assert.equal(obs.arenaRadius, 300);
});
