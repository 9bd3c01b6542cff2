import test from "node:test";
import assert from "node:assert/strict";
import { parseInputMessage, parseRoomOptions } from "../protocol.js";

test("input messages need every key flag", () => {
  assert.deepEqual(parseInputMessage({ up: true, down: false, left: false, right: true, dash: false }), {
    up: true,
    down: false,
    left: false,
    right: true,
    dash: false,
  });
  assert.equal(parseInputMessage({ up: true, down: false, left: false, right: true }), null);
  assert.equal(parseInputMessage({ up: 1, down: false, left: false, right: true, dash: false }), null);
  assert.equal(parseInputMessage(null), null);
  assert.equal(parseInputMessage([true, false, false, false, false]), null);
});

test("fields beyond the key flags are dropped", () => {
  const keys = { up: false, down: false, left: false, right: false, dash: true };
  assert.deepEqual(parseInputMessage({ ...keys, clientTick: 12 }), keys);
  assert.deepEqual(parseInputMessage({ ...keys, tick: 40, slot: 1 }), keys);
});

test("room options fall back to a single versus round at the default tier", () => {
  assert.deepEqual(parseRoomOptions(undefined, "hard"), { mode: "versus", aiTier: "hard", bestOf: 1 });
  assert.deepEqual(parseRoomOptions({ mode: "solo", aiTier: "godlike", bestOf: 4 }, "easy"), {
    mode: "versus",
    aiTier: "easy",
    bestOf: 1,
  });
  assert.deepEqual(parseRoomOptions({ mode: "ai", aiTier: "expert", bestOf: 5 }, "easy"), {
    mode: "ai",
    aiTier: "expert",
    bestOf: 5,
  });
});

test("room seeds must be uint32", () => {
  const versus = { mode: "versus", aiTier: "medium", bestOf: 1 };
  assert.deepEqual(parseRoomOptions({ mode: "ai", seed: 42 }, "medium"), { mode: "ai", aiTier: "medium", bestOf: 1, seed: 42 });
  assert.deepEqual(parseRoomOptions({ seed: 0xffffffff }, "medium"), { ...versus, seed: 0xffffffff });
  assert.deepEqual(parseRoomOptions({ seed: -1 }, "medium"), versus);
  assert.deepEqual(parseRoomOptions({ seed: 2 ** 32 }, "medium"), versus);
  assert.deepEqual(parseRoomOptions({ seed: 1.5 }, "medium"), versus);
});
