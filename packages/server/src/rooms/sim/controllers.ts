import { AIDecisionEngine, type AiRule } from "./ai.js";
import type { ArenaConfig } from "./config.js";
import type { ActorObservation } from "./engine.js";
import { moveFromKeys } from "./math.js";
import type { RngState } from "./rng.js";
import type { ControllerSpec, InputFrame, Slot } from "./state.js";

export type ControllerView = {
  // The tick the returned frame will be applied on.
  tick: number;
  slot: Slot;
  observation: ActorObservation;
  rng: RngState;
};

export type ControllerOutput = {
  frame: InputFrame;
  diagnostic: string | null;
};

/** Source of one actor's input. Human adapters and the AI share this seam. */
export interface ActorController {
  readonly spec: ControllerSpec;
  nextFrame(view: ControllerView): ControllerOutput;
}

export type HeldKeys = {
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;
  dash: boolean;
};

const NO_KEYS: HeldKeys = { up: false, down: false, left: false, right: false, dash: false };

/**
 * Turns held-key state (as sent by a client) into frames. Dash fires on the press edge,
 * so holding the key does not chain dashes.
 */
export class HumanController implements ActorController {
  readonly spec: ControllerSpec = { kind: "human" };
  private held: HeldKeys = { ...NO_KEYS };
  private prevDash = false;

  setKeys(keys: Partial<HeldKeys>) {
    this.held = { ...this.held, ...keys };
  }

  releaseAll() {
    this.held = { ...NO_KEYS };
  }

  nextFrame(view: ControllerView): ControllerOutput {
    const { up, down, left, right, dash } = this.held;
    const pressed = dash && !this.prevDash;
    this.prevDash = dash;
    return {
      frame: { tick: view.tick, slot: view.slot, move: moveFromKeys(up, down, left, right), dash: pressed },
      diagnostic: null,
    };
  }
}

export class AiController implements ActorController {
  readonly spec: ControllerSpec;
  readonly engine: AIDecisionEngine;

  constructor(slot: Slot, spec: Extract<ControllerSpec, { kind: "ai" }>, config: ArenaConfig, rules?: readonly AiRule[]) {
    this.spec = spec;
    this.engine = new AIDecisionEngine(slot, spec.tier, config, rules);
  }

  nextFrame(view: ControllerView): ControllerOutput {
    const decision = this.engine.decide({
      tick: view.tick,
      self: view.observation.self,
      opponent: view.observation.opponent,
      arenaRadius: view.observation.arenaRadius,
      rng: view.rng,
    });
    return { frame: decision.frame, diagnostic: decision.diagnostic };
  }
}

export function createController(slot: Slot, spec: ControllerSpec, config: ArenaConfig): ActorController {
  return spec.kind === "ai" ? new AiController(slot, spec, config) : new HumanController();
}
