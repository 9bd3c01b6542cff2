import { msToTicks, tickSeconds, type ArenaConfig } from "./config.js";
import { clamp, isFiniteVec, length, normalize } from "./math.js";
import type { ActorState, InputFrame, Slot, Vec2 } from "./state.js";

export type InputCheck = { ok: true; frame: InputFrame } | { ok: false; reason: string };

/**
 * Single validation path for every input frame, human or AI. Out-of-range vectors are
 * clamped into the unit disc; a frame for the wrong tick or slot is a desync.
 */
export function sanitizeInput(frame: InputFrame, tick: number, slot: Slot): InputCheck {
  if (frame.tick !== tick) {
    return { ok: false, reason: `frame for tick ${frame.tick} fed at tick ${tick}` };
  }
  if (frame.slot !== slot) {
    return { ok: false, reason: `frame for slot ${frame.slot} fed to slot ${slot}` };
  }
  let x = Number.isFinite(frame.move.x) ? frame.move.x : 0;
  let y = Number.isFinite(frame.move.y) ? frame.move.y : 0;
  const len = length(x, y);
  if (len > 1) {
    x /= len;
    y /= len;
  }
  return { ok: true, frame: { tick, slot, move: { x, y }, dash: frame.dash === true } };
}

// ═══════════════════════════════════════════════════════════════════
// Effect-derived stats
// ═══════════════════════════════════════════════════════════════════

export function effectiveRadius(actor: ActorState, config: ArenaConfig): number {
  let r = config.actor.radius;
  if (actor.effects.sizeUp !== undefined) r *= config.powerUps.sizeUpMult;
  if (actor.effects.sizeDown !== undefined) r *= config.powerUps.sizeDownMult;
  return r;
}

export function speedMultiplier(actor: ActorState, config: ArenaConfig): number {
  return actor.effects.speed !== undefined ? config.powerUps.speedMult : 1;
}

export function maxDashCharges(actor: ActorState, config: ArenaConfig): number {
  return config.dash.charges + (actor.effects.multiDash !== undefined ? config.powerUps.multiDashBonus : 0);
}

export function isFrozen(actor: ActorState): boolean {
  return actor.effects.freeze !== undefined;
}

// ═══════════════════════════════════════════════════════════════════
// Dash state machine
// ═══════════════════════════════════════════════════════════════════

export function canDash(actor: ActorState): boolean {
  return actor.alive && actor.dash.phase === "ready" && actor.dash.charges > 0 && actor.staggerTicks <= 0 && !isFrozen(actor);
}

/** Leave the active phase: straight back to ready while charges remain, otherwise cool down. */
export function endDash(actor: ActorState, config: ArenaConfig) {
  if (actor.dash.phase !== "active") return;
  if (actor.dash.charges > 0) {
    actor.dash.phase = "ready";
    actor.dash.remainingTicks = 0;
  } else {
    actor.dash.phase = "cooldown";
    actor.dash.remainingTicks = msToTicks(config, config.dash.cooldownMs);
    if (actor.dash.remainingTicks <= 0) refillDash(actor, config);
  }
}

function refillDash(actor: ActorState, config: ArenaConfig) {
  actor.dash.phase = "ready";
  actor.dash.remainingTicks = 0;
  actor.dash.charges = maxDashCharges(actor, config);
}

function advanceDashTimer(actor: ActorState, config: ArenaConfig) {
  const dash = actor.dash;
  if (dash.phase === "ready") return;
  dash.remainingTicks -= 1;
  if (dash.remainingTicks > 0) return;
  if (dash.phase === "active") endDash(actor, config);
  else refillDash(actor, config);
}

// ═══════════════════════════════════════════════════════════════════
// Integration
// ═══════════════════════════════════════════════════════════════════

export type StepOutcome = {
  dashDirection: Vec2 | null;
  anomaly: boolean;
};

/**
 * Advance one actor by one fixed tick. The frame must already have passed sanitizeInput.
 *
 * Order: dash trigger, steering (skipped while dashing, staggered or frozen), friction,
 * velocity cap, position, timers, finite guard.
 */
export function stepActor(actor: ActorState, frame: InputFrame, config: ArenaConfig): StepOutcome {
  const outcome: StepOutcome = { dashDirection: null, anomaly: false };
  actor.prevPosition = { ...actor.position };
  if (!actor.alive) return outcome;

  const dt = tickSeconds(config);
  const speedMult = speedMultiplier(actor, config);
  actor.radius = effectiveRadius(actor, config);

  const controllable = actor.staggerTicks <= 0 && !isFrozen(actor);
  const moveDir = controllable ? normalize(frame.move.x, frame.move.y) : null;
  if (moveDir) actor.facing = moveDir;

  if (frame.dash && canDash(actor)) {
    const direction = { ...(moveDir ?? actor.facing) };
    actor.dash.phase = "active";
    actor.dash.remainingTicks = Math.max(1, msToTicks(config, config.dash.activeMs));
    actor.dash.charges -= 1;
    actor.dash.direction = { ...direction };
    outcome.dashDirection = direction;
  }

  if (actor.dash.phase === "active") {
    const dashSpeed = config.dash.speed * speedMult;
    actor.velocity = { x: actor.dash.direction.x * dashSpeed, y: actor.dash.direction.y * dashSpeed };
  } else {
    if (controllable) {
      const target = config.actor.moveSpeed * speedMult;
      const k = clamp(config.actor.accelPerSec * dt, 0, 1);
      actor.velocity.x += (frame.move.x * target - actor.velocity.x) * k;
      actor.velocity.y += (frame.move.y * target - actor.velocity.y) * k;
    }
    // Friction is tuned per 1/60s.
    const friction = Math.pow(config.actor.friction, dt * 60);
    actor.velocity.x *= friction;
    actor.velocity.y *= friction;

    const speed = length(actor.velocity.x, actor.velocity.y);
    if (speed > config.actor.maxSpeed) {
      const scale = config.actor.maxSpeed / speed;
      actor.velocity.x *= scale;
      actor.velocity.y *= scale;
    }
  }

  actor.position.x += actor.velocity.x * dt;
  actor.position.y += actor.velocity.y * dt;

  advanceDashTimer(actor, config);
  if (actor.staggerTicks > 0) actor.staggerTicks -= 1;

  outcome.anomaly = guardFinite(actor);
  return outcome;
}

/**
 * Reset an actor whose position or velocity went non-finite to its last valid position.
 * Returns true when a reset happened.
 */
export function guardFinite(actor: ActorState): boolean {
  if (isFiniteVec(actor.position) && isFiniteVec(actor.velocity)) {
    actor.lastValidPosition = { ...actor.position };
    return false;
  }
  actor.position = { ...actor.lastValidPosition };
  actor.prevPosition = { ...actor.lastValidPosition };
  actor.velocity = { x: 0, y: 0 };
  return true;
}
