import test from "node:test";
import assert from "node:assert/strict";
import { ArenaState } from "../ArenaState.js";
import { ArenaEngine, type ArenaSnapshot } from "../../sim/engine.js";
import type { PowerUpState } from "../../sim/state.js";
import { Series } from "../../series.js";
import { quietConfig } from "../../sim/__tests__/fixtures.js";

function baseSnapshot(): ArenaSnapshot {
  return new ArenaEngine({ config: quietConfig(), seed: 1 }).snapshot();
}

function powerUp(id: number, kind: PowerUpState["kind"], x: number): PowerUpState {
  return { id, kind, position: { x, y: 0 }, spawnTick: 1, expiresAtTick: 100, claimed: false };
}

test("applySnapshot mirrors actors and the platform", () => {
  const state = new ArenaState();
  state.applySnapshot(baseSnapshot());

  assert.equal(state.tick, 0);
  assert.equal(state.radius, 300);
  assert.equal(state.phase, "stable");
  assert.equal(state.actors[0]?.x, -150);
  assert.equal(state.actors[1]?.x, 150);
  assert.equal(state.actors[0]?.slot, 0);
  assert.equal(state.actors[1]?.slot, 1);
  assert.equal(state.actors[1]?.facingX, -1);
  assert.equal(state.actors[0]?.stocks, 3);
  assert.equal(state.actors[0]?.dashPhase, "ready");
  assert.equal(state.ended, false);
  assert.equal(state.winner, -1);
  assert.equal(state.countdownTicks, 0);
});

test("the countdown is mirrored while it runs", () => {
  const state = new ArenaState();
  state.applySnapshot(new ArenaEngine({ config: quietConfig({ countdownMs: 2000 }), seed: 1 }).snapshot());
  assert.equal(state.countdownTicks, 120);
});

test("effects are listed in a fixed order", () => {
  const state = new ArenaState();
  const snap = baseSnapshot();
  const [first, second] = snap.actors;
  state.applySnapshot({ ...snap, actors: [{ ...first, effects: { magnet: 10, speed: 4 } }, second] });
  assert.deepEqual(state.actors[0]?.effects.toArray(), ["speed", "magnet"]);

  state.applySnapshot({ ...snap, actors: [{ ...first, effects: {} }, second] });
  assert.deepEqual(state.actors[0]?.effects.toArray(), []);
});

test("power-ups are added, updated and removed by id", () => {
  const state = new ArenaState();
  const snap = baseSnapshot();

  state.applySnapshot({ ...snap, powerUps: [powerUp(1, "speed", 10), powerUp(2, "freeze", 20)] });
  assert.deepEqual([...state.powerUps.keys()].sort(), ["1", "2"]);
  assert.equal(state.powerUps.get("2")?.kind, "freeze");

  state.applySnapshot({ ...snap, powerUps: [powerUp(2, "freeze", 25), powerUp(3, "magnet", 30)] });
  assert.deepEqual([...state.powerUps.keys()].sort(), ["2", "3"]);
  assert.equal(state.powerUps.get("2")?.x, 25);
  assert.equal(state.powerUps.get("3")?.expiresAtTick, 100);
});

test("the outcome is mirrored once decided", () => {
  const state = new ArenaState();
  const snap = baseSnapshot();
  state.applySnapshot({ ...snap, result: { winner: 1, reason: "stocks", tick: 90, eliminations: [0, 0, 0] } });
  assert.equal(state.ended, true);
  assert.equal(state.winner, 1);
  assert.equal(state.endReason, "stocks");

  const draw = new ArenaState();
  draw.applySnapshot({ ...snap, result: { winner: null, reason: "timeLimit", tick: 7200, eliminations: [] } });
  assert.equal(draw.winner, -1);
  assert.equal(draw.endReason, "timeLimit");

  // The next round starts clean.
  state.applySnapshot(snap);
  assert.equal(state.ended, false);
  assert.equal(state.winner, -1);
  assert.equal(state.endReason, "");
});

test("series standings land on the root and on each actor", () => {
  const state = new ArenaState();
  const series = new Series(3);
  state.applyStanding(series.recordRound({ winner: 1, reason: "stocks", tick: 90, eliminations: [0, 1, 0, 0] }));
  assert.equal(state.round, 2);
  assert.equal(state.bestOf, 3);
  assert.equal(state.seriesEnded, false);
  assert.equal(state.seriesWinner, -1);
  assert.equal(state.actors[1]?.wins, 1);
  assert.equal(state.actors[1]?.kills, 3);
  assert.equal(state.actors[0]?.kills, 1);

  state.applyStanding(series.recordRound({ winner: 1, reason: "stocks", tick: 80, eliminations: [0, 0, 0] }));
  assert.equal(state.seriesEnded, true);
  assert.equal(state.seriesWinner, 1);
  assert.equal(state.round, 2);
  assert.equal(state.actors[1]?.wins, 2);
});
