import test from "node:test";
import assert from "node:assert/strict";
import { SimulationClock } from "../clock.js";

test("remainder carries into the next frame", () => {
  const clock = new SimulationClock(20, 250);
  let ran = 0;
  const first = clock.advance(30, () => {
    ran++;
    return "next";
  });
  assert.equal(first.ticks, 1);
  assert.equal(first.alpha, 0.5);
  assert.equal(clock.pendingMs, 10);

  const second = clock.advance(30, () => {
    ran++;
    return "next";
  });
  assert.equal(second.ticks, 2);
  assert.equal(clock.pendingMs, 0);
  assert.equal(ran, 3);
});

test("a long frame is clamped to maxFrameMs", () => {
  const clock = new SimulationClock(20, 250);
  const out = clock.advance(10_000, () => "next");
  assert.equal(out.ticks, 12);
  assert.equal(clock.pendingMs, 10);
});

test("non-finite and negative deltas run nothing", () => {
  const clock = new SimulationClock(20, 250);
  assert.equal(clock.advance(Number.NaN, () => "next").ticks, 0);
  assert.equal(clock.advance(-50, () => "next").ticks, 0);
  assert.equal(clock.pendingMs, 0);
});

test("a stopping tick keeps the unspent time", () => {
  const clock = new SimulationClock(20, 250);
  const out = clock.advance(100, () => "last");
  assert.equal(out.ticks, 1);
  assert.equal(clock.pendingMs, 80);
});

test("a skipped tick is neither counted nor paid for", () => {
  const clock = new SimulationClock(20, 250);
  let calls = 0;
  const out = clock.advance(100, () => {
    calls++;
    return calls < 3 ? "next" : "skipped";
  });
  assert.equal(calls, 3);
  assert.equal(out.ticks, 2);
  assert.equal(clock.pendingMs, 60);
  assert.equal(out.alpha, 3);
});

test("abort lets the running tick finish and stops before the next", () => {
  const clock = new SimulationClock(20, 250);
  let ran = 0;
  const out = clock.advance(100, () => {
    ran++;
    clock.abort();
    return "next";
  });
  assert.equal(ran, 1);
  assert.equal(out.ticks, 1);
  assert.equal(out.aborted, true);
  assert.equal(clock.advance(100, () => "next").ticks, 0);

  clock.reset();
  assert.equal(clock.aborted, false);
  assert.equal(clock.pendingMs, 0);
});
