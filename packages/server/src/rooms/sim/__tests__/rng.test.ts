import test from "node:test";
import assert from "node:assert/strict";
import { cloneRng, createRng, nextFloat, nextInt, pick } from "../rng.js";

test("same seed yields the same stream", () => {
  const a = createRng(42);
  const b = createRng(42);
  for (let i = 0; i < 100; i++) {
    assert.equal(nextFloat(a), nextFloat(b));
  }
});

test("first draw from seed 1 follows the LCG step", () => {
  const rng = createRng(1);
  // (1 * 1664525 + 1013904223) mod 2^32
  assert.equal(nextFloat(rng), 1015568748 / 0x100000000);
  assert.equal(rng.seed, 1015568748);
});

test("nextFloat stays in [0, 1)", () => {
  const rng = createRng(0xdeadbeef);
  for (let i = 0; i < 10_000; i++) {
    const v = nextFloat(rng);
    assert.ok(v >= 0 && v < 1);
  }
});

test("nextInt is inclusive on both ends", () => {
  const rng = createRng(7);
  const seen = new Set<number>();
  for (let i = 0; i < 2000; i++) {
    const v = nextInt(rng, 3, 6);
    assert.ok(Number.isInteger(v) && v >= 3 && v <= 6);
    seen.add(v);
  }
  assert.deepEqual([...seen].sort(), [3, 4, 5, 6]);
});

test("cloneRng forks an independent copy", () => {
  const rng = createRng(99);
  nextFloat(rng);
  const fork = cloneRng(rng);
  assert.equal(nextFloat(fork), nextFloat(rng));
  nextFloat(fork);
  assert.notEqual(fork.seed, rng.seed);
});

test("pick on an empty list draws nothing", () => {
  const rng = createRng(5);
  assert.equal(pick(rng, []), undefined);
  assert.equal(rng.seed, 5);
});
