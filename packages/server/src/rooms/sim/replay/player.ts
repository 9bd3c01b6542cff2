import { AIDecisionEngine } from "../ai.js";
import { SimulationClock } from "../clock.js";
import { clamp } from "../math.js";
import { ArenaEngine, type ArenaSnapshot } from "../engine.js";
import type { EngineEvent, EngineTickResult } from "../events.js";
import { SLOTS, type InputFrame, type MatchResult } from "../state.js";
import { decodeReplay, fromFrameRow, type ReplayFault, type ReplayLog } from "./codec.js";

export const MIN_PLAYBACK_SPEED = 0.25;
export const MAX_PLAYBACK_SPEED = 4;

export type PlayerStatus = "playing" | "paused" | "finished" | "faulted";

export type ReplayStep = { ok: true; result: EngineTickResult } | { ok: false; fault: ReplayFault };

export type ReplayRun = { ok: true; outcome: MatchResult | null; ticks: number } | { ok: false; fault: ReplayFault };

export type ReplayPlayerOptions = {
  speed?: number;
  onTick?: (result: EngineTickResult) => void;
};

function sameOutcome(a: MatchResult | null, b: MatchResult | null): boolean {
  if (a === null || b === null) return a === b;
  return (
    a.winner === b.winner &&
    a.reason === b.reason &&
    a.tick === b.tick &&
    a.eliminations.length === b.eliminations.length &&
    a.eliminations.every((slot, i) => slot === b.eliminations[i])
  );
}

function sameFrame(a: InputFrame, b: InputFrame): boolean {
  return a.tick === b.tick && a.slot === b.slot && a.move.x === b.move.x && a.move.y === b.move.y && a.dash === b.dash;
}

/**
 * Re-drives a fresh engine from a replay log. Playback speed only changes how much wall
 * time one tick takes; the tick itself is the same fixed step the match was played at.
 * Any disagreement with the log halts playback with a desync fault.
 */
export class ReplayPlayer {
  readonly log: ReplayLog;
  private engine: ArenaEngine;
  private ai: [AIDecisionEngine | null, AIDecisionEngine | null];
  private clock: SimulationClock;
  private readonly onTick: ((result: EngineTickResult) => void) | undefined;
  private speedValue = 1;
  private pausedFlag = false;
  private muted = false;
  private faultValue: ReplayFault | null = null;

  constructor(log: ReplayLog, options: ReplayPlayerOptions = {}) {
    this.log = log;
    this.onTick = options.onTick;
    this.engine = this.freshEngine();
    this.ai = this.freshAi();
    this.clock = this.freshClock();
    if (options.speed !== undefined) this.setSpeed(options.speed);
  }

  static fromEncoded(
    text: string,
    options?: ReplayPlayerOptions,
  ): { ok: true; player: ReplayPlayer } | { ok: false; fault: ReplayFault } {
    const decoded = decodeReplay(text);
    if (!decoded.ok) return decoded;
    return { ok: true, player: new ReplayPlayer(decoded.log, options) };
  }

  get tick(): number {
    return this.engine.tick;
  }

  get speed(): number {
    return this.speedValue;
  }

  get fault(): ReplayFault | null {
    return this.faultValue;
  }

  get status(): PlayerStatus {
    if (this.faultValue) return "faulted";
    if (this.engine.tick >= this.log.tickCount) return "finished";
    return this.pausedFlag ? "paused" : "playing";
  }

  snapshot(): ArenaSnapshot {
    return this.engine.snapshot();
  }

  /** Returns the speed actually applied. */
  setSpeed(speed: number): number {
    this.speedValue = Number.isFinite(speed) ? clamp(speed, MIN_PLAYBACK_SPEED, MAX_PLAYBACK_SPEED) : 1;
    return this.speedValue;
  }

  pause() {
    this.pausedFlag = true;
  }

  resume() {
    this.pausedFlag = false;
  }

  /**
   * Pace playback by wall time. Returns the ticks run; stops at the end of the log or
   * on the first fault.
   */
  advance(wallMs: number): number {
    if (this.status !== "playing") return 0;
    const { ticks } = this.clock.advance(wallMs * this.speedValue, () => {
      const before = this.engine.tick;
      const stepped = this.step();
      if (this.engine.tick === before) return "skipped";
      return stepped.ok && this.status === "playing" ? "next" : "last";
    });
    return ticks;
  }

  /** One tick, ignoring pause and pacing. */
  step(): ReplayStep {
    if (this.faultValue) return { ok: false, fault: this.faultValue };
    const tick = this.engine.tick + 1;
    if (this.engine.tick >= this.log.tickCount) {
      return this.halt({ kind: "desync", reason: "no frames left", tick });
    }
    const row = this.log.frames[this.engine.tick];
    if (!row || row[0] !== tick) {
      return this.halt({ kind: "desync", reason: `missing frame for tick ${tick}`, tick });
    }
    const frames = fromFrameRow(row);

    // AI slots re-decide so the shared RNG stream is consumed exactly as it was live.
    const notes: EngineEvent[] = [];
    for (const slot of SLOTS) {
      const ai = this.ai[slot];
      if (!ai) continue;
      const obs = this.engine.observationFor(slot);
      const decision = ai.decide({
        tick,
        self: obs.self,
        opponent: obs.opponent,
        arenaRadius: obs.arenaRadius,
        rng: this.engine.world.rng,
      });
      if (!sameFrame(decision.frame, frames[slot])) {
        return this.halt({ kind: "desync", reason: `AI input for slot ${slot} diverged`, tick });
      }
      if (decision.diagnostic) notes.push({ type: "aiFallback", slot, message: decision.diagnostic });
    }

    const outcome = this.engine.step(frames);
    if (!outcome.ok) return this.halt({ kind: "desync", reason: outcome.fault.reason, tick });

    const result: EngineTickResult = { ...outcome.result, events: [...notes, ...outcome.result.events] };
    const atEnd = this.engine.tick === this.log.tickCount;
    if (this.engine.ended && !atEnd) {
      return this.halt({ kind: "desync", reason: "match ended before the log did", tick });
    }
    if (atEnd && this.log.outcome !== null && !sameOutcome(this.engine.result, this.log.outcome)) {
      return this.halt({ kind: "desync", reason: "outcome differs from the recorded one", tick });
    }
    if (!this.muted) this.onTick?.(result);
    return { ok: true, result };
  }

  /** Play every remaining tick, regardless of pause. */
  runToEnd(): ReplayRun {
    while (this.engine.tick < this.log.tickCount) {
      const stepped = this.step();
      if (!stepped.ok) return stepped;
    }
    if (this.faultValue) return { ok: false, fault: this.faultValue };
    return { ok: true, outcome: this.engine.result, ticks: this.engine.tick };
  }

  /** Jump to `tick` by re-simulating from the snapshot. Tick callbacks stay quiet. */
  seek(tick: number): ReplayStep | null {
    const target = clamp(Math.floor(tick), 0, this.log.tickCount);
    if (target < this.engine.tick || this.faultValue) {
      this.engine = this.freshEngine();
      this.ai = this.freshAi();
      this.faultValue = null;
    }
    this.clock = this.freshClock();
    let last: ReplayStep | null = null;
    while (this.engine.tick < target) {
      last = this.stepQuietly();
      if (!last.ok) return last;
    }
    return last;
  }

  private stepQuietly(): ReplayStep {
    this.muted = true;
    try {
      return this.step();
    } finally {
      this.muted = false;
    }
  }

  private halt(fault: ReplayFault): ReplayStep {
    this.faultValue = fault;
    return { ok: false, fault };
  }

  private freshEngine(): ArenaEngine {
    const { config, seed, actors } = this.log.snapshot;
    return new ArenaEngine({ config, seed, actors });
  }

  private freshAi(): [AIDecisionEngine | null, AIDecisionEngine | null] {
    const { config, controllers } = this.log.snapshot;
    const [first, second] = controllers;
    return [
      first.kind === "ai" ? new AIDecisionEngine(0, first.tier, config) : null,
      second.kind === "ai" ? new AIDecisionEngine(1, second.tier, config) : null,
    ];
  }

  private freshClock(): SimulationClock {
    const { config } = this.log.snapshot;
    const clock = SimulationClock.forConfig(config);
    return new SimulationClock(clock.stepMs, clock.maxFrameMs * MAX_PLAYBACK_SPEED);
  }
}
