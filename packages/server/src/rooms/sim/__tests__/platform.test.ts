import test from "node:test";
import assert from "node:assert/strict";
import type { ShrinkSchedule } from "../config.js";
import { currentRadius, edgeDistance, isOutOfBounds, platformPhase, shrinkEndMs } from "../platform.js";

const linear: ShrinkSchedule = {
  mode: "linear",
  startRadius: 300,
  minRadius: 100,
  shrinkStartMs: 10_000,
  unitsPerSecond: 20,
};

const stepped: ShrinkSchedule = {
  mode: "stepped",
  startRadius: 100,
  minRadius: 50,
  shrinkStartMs: 0,
  fraction: 0.25,
  intervalMs: 1000,
};

test("linear schedule holds, shrinks, then settles", () => {
  assert.equal(currentRadius(linear, 0), 300);
  assert.equal(currentRadius(linear, 10_000), 300);
  assert.equal(currentRadius(linear, 15_000), 200);
  assert.equal(currentRadius(linear, 20_000), 100);
  assert.equal(currentRadius(linear, 60_000), 100);
  assert.equal(shrinkEndMs(linear), 20_000);
});

test("linear phases", () => {
  assert.equal(platformPhase(linear, 9_999), "stable");
  assert.equal(platformPhase(linear, 10_000), "stable");
  assert.equal(platformPhase(linear, 10_001), "shrinking");
  assert.equal(platformPhase(linear, 20_000), "settled");
});

test("stepped schedule drops a fraction per interval", () => {
  assert.equal(currentRadius(stepped, 0), 100);
  assert.equal(currentRadius(stepped, 500), 75);
  assert.equal(currentRadius(stepped, 1000), 56.25);
  // The third step would go below the minimum, so it lands on it.
  assert.equal(currentRadius(stepped, 2000), 50);
  assert.equal(shrinkEndMs(stepped), 2000);
});

test("radius never increases and reaches the minimum at shrinkEndMs", () => {
  for (const schedule of [linear, stepped]) {
    let prev = Number.POSITIVE_INFINITY;
    for (let t = 0; t <= 40_000; t += 125) {
      const r = currentRadius(schedule, t);
      assert.ok(r <= prev, `radius grew at ${t}ms`);
      assert.ok(r >= schedule.minRadius);
      prev = r;
    }
    const end = shrinkEndMs(schedule);
    assert.equal(currentRadius(schedule, end), schedule.minRadius);
  }
});

test("boundary helpers measure from the center", () => {
  assert.equal(edgeDistance({ x: 3, y: 4 }, 10), 5);
  assert.equal(edgeDistance({ x: 6, y: 8 }, 5), -5);
  assert.equal(isOutOfBounds({ x: 3, y: 4 }, 5), false);
  assert.equal(isOutOfBounds({ x: 3, y: 4.01 }, 5), true);
});
