import { msToTicks, tickSeconds, type AiTierParams, type ArenaConfig, type DifficultyTier } from "./config.js";
import { canDash } from "./integrator.js";
import { distance, length, normalize, quantizeDirection, rotate, type Vec2 } from "./math.js";
import { edgeDistance } from "./platform.js";
import { nextFloat, nextRange, type RngState } from "./rng.js";
import type { ActorState, InputFrame, PerceivedActor, Slot } from "./state.js";

export const AI_MODES = ["idle", "approach", "retreat", "bait", "punish", "fleeBoundary", "recover"] as const;
export type AiMode = (typeof AI_MODES)[number];

/** Opponent dash phase as a spectator would read it off the screen. */
export type InferredDash = "ready" | "active" | "cooldown";

export type AiObservation = {
  tick: number;
  self: Readonly<ActorState>;
  opponent: PerceivedActor;
  arenaRadius: number;
  rng: RngState;
};

export type AiFacts = {
  distance: number;
  ownEdgeDistance: number;
  opponentEdgeDistance: number;
  opponentDash: InferredDash;
  opponentAlive: boolean;
  ownDashReady: boolean;
  staggered: boolean;
  arenaRadius: number;
};

export type AiRule = {
  mode: AiMode;
  when: (facts: AiFacts, config: ArenaConfig) => boolean;
};

/** Ordered priority table; the first matching rule wins. */
export const DEFAULT_AI_RULES: readonly AiRule[] = [
  { mode: "fleeBoundary", when: (f, c) => f.ownEdgeDistance < c.ai.fleeEdgeFrac * f.arenaRadius },
  { mode: "recover", when: (f) => f.staggered },
  { mode: "idle", when: (f) => !f.opponentAlive },
  {
    mode: "punish",
    when: (f, c) => f.opponentDash !== "ready" && f.ownDashReady && f.distance <= c.ai.punishRange,
  },
  { mode: "retreat", when: (f, c) => f.opponentDash === "active" && f.distance <= c.ai.engageRange },
  { mode: "approach", when: (f, c) => f.distance > c.ai.engageRange || f.opponentDash === "cooldown" },
  { mode: "bait", when: (f, c) => f.distance <= c.ai.engageRange && f.opponentDash === "ready" },
];

export type AiDecision = {
  frame: InputFrame;
  mode: AiMode;
  // Set when no rule matched and the engine fell back to idle.
  diagnostic: string | null;
};

type Observation = { tick: number; position: Vec2; velocity: Vec2; alive: boolean };

/**
 * Scripted opponent. Produces the same InputFrame a keyboard would: 8-way movement and
 * a dash press. It sees the other actor only through a delayed observation buffer and
 * draws its mistakes from the shared match RNG.
 */
export class AIDecisionEngine {
  readonly tier: DifficultyTier;
  private readonly params: AiTierParams;
  private readonly reactionTicks: number;
  private readonly decisionTicks: number;
  private readonly memoryTicks: number;
  private readonly history: Observation[] = [];
  private lastSeenDashTick = Number.NEGATIVE_INFINITY;

  private mode: AiMode = "idle";
  private nextDecisionTick = 0;
  private aimOffset = 0;
  private fumbled = false;

  constructor(
    readonly slot: Slot,
    tier: DifficultyTier,
    private readonly config: ArenaConfig,
    private readonly rules: readonly AiRule[] = DEFAULT_AI_RULES,
  ) {
    this.tier = tier;
    this.params = config.ai[tier];
    this.reactionTicks = msToTicks(config, this.params.reactionMs);
    this.decisionTicks = Math.max(1, msToTicks(config, this.params.decisionIntervalMs));
    this.memoryTicks = Math.max(1, msToTicks(config, this.params.memoryMs));
  }

  get currentMode(): AiMode {
    return this.mode;
  }

  decide(obs: AiObservation): AiDecision {
    this.observe(obs);
    const seen = this.perceived(obs.tick);
    const self = obs.self;
    const idle: InputFrame = { tick: obs.tick, slot: this.slot, move: { x: 0, y: 0 }, dash: false };

    // Nothing is known about the opponent until the reaction delay has passed once.
    if (!seen || !self.alive) return { frame: idle, mode: this.mode, diagnostic: null };

    let diagnostic: string | null = null;
    const decisionTick = obs.tick >= this.nextDecisionTick;
    if (decisionTick) {
      const facts = this.facts(obs, seen);
      const rule = this.rules.find((r) => r.when(facts, this.config));
      if (rule) {
        this.mode = rule.mode;
      } else {
        this.mode = "idle";
        diagnostic = `no rule matched (distance ${facts.distance.toFixed(1)}, opponent ${facts.opponentDash})`;
      }
      this.nextDecisionTick = obs.tick + this.decisionTicks;
      // Exactly two draws per decision keep the shared stream aligned.
      this.fumbled = nextFloat(obs.rng) < this.params.mistakeChance;
      this.aimOffset = nextRange(obs.rng, -this.params.aimNoise, this.params.aimNoise) * Math.PI;
    }

    const predicted = this.predict(seen);
    const opponentEdge = edgeDistance(seen.position, obs.arenaRadius);
    let dir = this.steer(self, seen, predicted);
    let dash = false;
    if (dir) {
      dir = rotate(dir, this.fumbled ? Math.sign(this.aimOffset || 1) * (Math.PI / 2) : this.aimOffset);
      dash = decisionTick && !this.fumbled && this.wantsDash(self, seen, predicted, opponentEdge) && canDash(self);
    }
    const move = dir ? quantizeDirection(dir.x, dir.y) : { x: 0, y: 0 };
    if (move.x === 0 && move.y === 0) dash = false;

    return { frame: { tick: obs.tick, slot: this.slot, move, dash }, mode: this.mode, diagnostic };
  }

  private observe(obs: AiObservation) {
    this.history.push({
      tick: obs.tick,
      position: { ...obs.opponent.position },
      velocity: { ...obs.opponent.velocity },
      alive: obs.opponent.alive,
    });
    const keep = this.reactionTicks + this.memoryTicks + 1;
    while (this.history.length > keep) this.history.shift();

    const dashFloor = this.config.ai.dashDetectFrac * this.config.dash.speed;
    const delayed = this.perceived(obs.tick);
    if (delayed && delayed.alive && length(delayed.velocity.x, delayed.velocity.y) >= dashFloor) {
      this.lastSeenDashTick = delayed.tick;
    }
  }

  /** Latest observation at least the reaction delay old, or null before there is one. */
  private perceived(tick: number): Observation | null {
    const cutoff = tick - this.reactionTicks;
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].tick <= cutoff) return this.history[i];
    }
    return null;
  }

  private inferDash(seen: Observation): InferredDash {
    const dashFloor = this.config.ai.dashDetectFrac * this.config.dash.speed;
    if (length(seen.velocity.x, seen.velocity.y) >= dashFloor) return "active";
    const cooldown = msToTicks(this.config, this.config.dash.activeMs + this.config.dash.cooldownMs);
    return seen.tick - this.lastSeenDashTick <= cooldown ? "cooldown" : "ready";
  }

  private facts(obs: AiObservation, seen: Observation): AiFacts {
    const self = obs.self;
    return {
      distance: distance(self.position.x, self.position.y, seen.position.x, seen.position.y),
      ownEdgeDistance: edgeDistance(self.position, obs.arenaRadius),
      opponentEdgeDistance: edgeDistance(seen.position, obs.arenaRadius),
      opponentDash: this.inferDash(seen),
      opponentAlive: seen.alive,
      ownDashReady: canDash(self),
      staggered: self.staggerTicks > 0,
      arenaRadius: obs.arenaRadius,
    };
  }

  /** Lead the target by the prediction window, using velocity averaged over memory. */
  private predict(seen: Observation): Vec2 {
    let vx = seen.velocity.x;
    let vy = seen.velocity.y;
    const older = this.history.find((o) => o.tick >= seen.tick - this.memoryTicks);
    if (older && older.tick < seen.tick) {
      const span = (seen.tick - older.tick) * tickSeconds(this.config);
      vx = (seen.position.x - older.position.x) / span;
      vy = (seen.position.y - older.position.y) / span;
    }
    const lead = this.params.predictionMs / 1000;
    return { x: seen.position.x + vx * lead, y: seen.position.y + vy * lead };
  }

  private steer(self: Readonly<ActorState>, seen: Observation, predicted: Vec2): Vec2 | null {
    const toCenter = normalize(-self.position.x, -self.position.y);
    const toTarget = normalize(predicted.x - self.position.x, predicted.y - self.position.y);
    switch (this.mode) {
      case "idle":
        return null;
      case "fleeBoundary":
      case "recover":
        return toCenter;
      case "approach":
      case "punish":
        return toTarget;
      case "retreat": {
        const awayX = self.position.x - seen.position.x;
        const awayY = self.position.y - seen.position.y;
        const away = normalize(awayX, awayY) ?? toCenter;
        if (!away) return null;
        return normalize(away.x + (toCenter?.x ?? 0) * 0.5, away.y + (toCenter?.y ?? 0) * 0.5) ?? away;
      }
      case "bait": {
        if (!toTarget) return toCenter;
        // Strafe on whichever side keeps us further from the edge.
        const left = { x: -toTarget.y, y: toTarget.x };
        const right = { x: toTarget.y, y: -toTarget.x };
        if (!toCenter) return left;
        return left.x * toCenter.x + left.y * toCenter.y >= right.x * toCenter.x + right.y * toCenter.y ? left : right;
      }
    }
  }

  private wantsDash(self: Readonly<ActorState>, seen: Observation, predicted: Vec2, opponentEdge: number): boolean {
    if (!seen.alive) return false;
    const d = distance(self.position.x, self.position.y, predicted.x, predicted.y);
    if (this.mode === "punish") return d <= this.config.ai.punishRange;
    // Ring-out attempt on an opponent standing near its own edge.
    if (this.mode === "approach" || this.mode === "bait") {
      return d <= this.config.ai.baitRange && opponentEdge < this.config.ai.baitRange;
    }
    return false;
  }
}
