import { SimulationClock } from "./clock.js";
import type { ArenaConfig } from "./config.js";
import type { ActorController } from "./controllers.js";
import { ArenaEngine, type ActorSeed, type ArenaSnapshot, type TickFault, type TickOutcome } from "./engine.js";
import type { EngineEvent, EngineTickResult } from "./events.js";
import type { ReplayLog } from "./replay/codec.js";
import { ReplayRecorder } from "./replay/recorder.js";
import { sanitizeInput } from "./integrator.js";
import { SLOTS, type InputFrame } from "./state.js";

export type MatchOptions = {
  config: ArenaConfig;
  seed: number;
  controllers: readonly [ActorController, ActorController];
  actors?: readonly [ActorSeed, ActorSeed];
};

export type FrameReport = {
  results: EngineTickResult[];
  alpha: number;
  aborted: boolean;
  fault: TickFault | null;
};

/**
 * One live match: engine, clock, both controllers and the recorder behind a single
 * tick function. Live play and tests drive it the same way.
 */
export class Match {
  readonly engine: ArenaEngine;
  readonly clock: SimulationClock;
  readonly controllers: readonly [ActorController, ActorController];
  private readonly recorder: ReplayRecorder;
  private fault: TickFault | null = null;

  constructor(options: MatchOptions) {
    this.engine = new ArenaEngine({ config: options.config, seed: options.seed, actors: options.actors });
    this.clock = SimulationClock.forConfig(options.config);
    this.controllers = options.controllers;
    this.recorder = new ReplayRecorder({
      config: options.config,
      seed: this.engine.seed,
      actors: this.engine.actorSeeds,
      controllers: [options.controllers[0].spec, options.controllers[1].spec],
    });
  }

  get tick(): number {
    return this.engine.tick;
  }

  get ended(): boolean {
    return this.engine.ended;
  }

  get aborted(): boolean {
    return this.clock.aborted;
  }

  get lastFault(): TickFault | null {
    return this.fault;
  }

  /** Run exactly one tick, regardless of wall time. */
  step(): TickOutcome {
    const tick = this.engine.tick + 1;
    if (this.clock.aborted) return { ok: false, fault: { kind: "aborted", reason: "match aborted", tick } };
    const notes: EngineEvent[] = [];
    const frames: InputFrame[] = [];
    for (const slot of SLOTS) {
      const out = this.controllers[slot].nextFrame({
        tick,
        slot,
        observation: this.engine.observationFor(slot),
        rng: this.engine.world.rng,
      });
      frames.push(out.frame);
      if (out.diagnostic) notes.push({ type: "aiFallback", slot, message: out.diagnostic });
    }

    const outcome = this.engine.step(frames);
    if (!outcome.ok) {
      this.fault = outcome.fault;
      return outcome;
    }
    // Record what the engine actually integrated, not the raw controller output.
    const [first, second] = frames.map((f) => sanitizeInput(f, tick, f.slot));
    if (first?.ok && second?.ok) this.recorder.record([first.frame, second.frame]);
    return { ok: true, result: { ...outcome.result, events: [...notes, ...outcome.result.events] } };
  }

  /** Feed one frame of wall time; runs whole ticks and stops at match end or a fault. */
  advance(frameMs: number): FrameReport {
    const results: EngineTickResult[] = [];
    let fault: TickFault | null = null;
    const { alpha, aborted } = this.clock.advance(frameMs, () => {
      if (this.engine.ended) return "skipped";
      const outcome = this.step();
      if (!outcome.ok) {
        fault = outcome.fault;
        return "skipped";
      }
      results.push(outcome.result);
      return outcome.result.ended ? "last" : "next";
    });
    return { results, alpha, aborted, fault };
  }

  /** Stop between ticks; the replay keeps every tick that completed. */
  abort() {
    this.clock.abort();
  }

  snapshot(): ArenaSnapshot {
    return this.engine.snapshot();
  }

  toReplay(): ReplayLog {
    return this.recorder.finish(this.engine.result);
  }
}
