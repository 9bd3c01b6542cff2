import type { ArenaConfig } from "../config.js";
import type { ActorSeed } from "../engine.js";
import type { ControllerSpec, InputFrame, MatchResult } from "../state.js";
import {
  REPLAY_FORMAT,
  REPLAY_VERSION,
  checksumLog,
  toFrameRow,
  type FrameRow,
  type ReplayLog,
  type ReplaySnapshot,
} from "./codec.js";

/**
 * Captures the accepted input of every tick. Only inputs are stored: positions and
 * events are a pure function of them and get recomputed on playback.
 */
export class ReplayRecorder {
  private readonly snapshot: ReplaySnapshot;
  private readonly frames: FrameRow[] = [];

  constructor(params: {
    config: ArenaConfig;
    seed: number;
    actors: readonly [ActorSeed, ActorSeed];
    controllers: readonly [ControllerSpec, ControllerSpec];
  }) {
    this.snapshot = {
      config: params.config,
      seed: params.seed >>> 0,
      actors: [
        { slot: 0, position: { ...params.actors[0].position }, facing: { ...params.actors[0].facing } },
        { slot: 1, position: { ...params.actors[1].position }, facing: { ...params.actors[1].facing } },
      ],
      controllers: [{ ...params.controllers[0] }, { ...params.controllers[1] }],
    };
  }

  get tickCount(): number {
    return this.frames.length;
  }

  /** Frames must arrive in tick order starting at 1; anything else is rejected. */
  record(frames: readonly [InputFrame, InputFrame]): boolean {
    const expected = this.frames.length + 1;
    if (frames[0].tick !== expected || frames[1].tick !== expected) return false;
    this.frames.push(toFrameRow(frames));
    return true;
  }

  finish(outcome: MatchResult | null): ReplayLog {
    const parts = {
      snapshot: this.snapshot,
      tickCount: this.frames.length,
      frames: this.frames.map((row): FrameRow => [...row]),
      outcome: outcome ? { ...outcome, eliminations: [...outcome.eliminations] } : null,
    };
    return { format: REPLAY_FORMAT, version: REPLAY_VERSION, ...parts, checksum: checksumLog(parts) };
  }
}
