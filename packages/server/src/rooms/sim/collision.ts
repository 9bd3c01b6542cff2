import { msToTicks, type ArenaConfig } from "./config.js";
import { endDash } from "./integrator.js";
import { length, lerp, normalize, timeOfImpact } from "./math.js";
import type { ActorState, Slot, Vec2 } from "./state.js";

export type Contact = {
  // Fraction of the tick at which the bodies first touch (0 when they started overlapping).
  toi: number;
  // Unit normal pointing from `a` to `b`.
  normal: Vec2;
};

export type CollisionReport = {
  attacker: Slot | null;
  impulses: [Vec2, Vec2];
  impulse: number;
  point: Vec2;
  shieldConsumed: Slot | null;
};

/**
 * Continuous actor-vs-actor test on relative motion over the tick. Catches a dash that
 * passes straight through the other body, which an end-of-tick overlap test misses.
 */
export function sweepActors(a: ActorState, b: ActorState): Contact | null {
  if (!a.alive || !b.alive) return null;
  const from = { x: b.prevPosition.x - a.prevPosition.x, y: b.prevPosition.y - a.prevPosition.y };
  const to = { x: b.position.x - a.position.x, y: b.position.y - a.position.y };
  const toi = timeOfImpact(from, to, a.radius + b.radius);
  if (toi === null) return null;

  const at = contactPositions(a, b, toi);
  const normal =
    normalize(at.b.x - at.a.x, at.b.y - at.a.y) ??
    normalize(a.velocity.x - b.velocity.x, a.velocity.y - b.velocity.y) ??
    normalize(a.facing.x, a.facing.y) ?? { x: 1, y: 0 };
  return { toi, normal };
}

function contactPositions(a: ActorState, b: ActorState, toi: number): { a: Vec2; b: Vec2 } {
  // Starting overlap: resolve where the bodies ended up rather than rewinding the tick.
  if (toi <= 0) return { a: { ...a.position }, b: { ...b.position } };
  return {
    a: { x: lerp(a.prevPosition.x, a.position.x, toi), y: lerp(a.prevPosition.y, a.position.y, toi) },
    b: { x: lerp(b.prevPosition.x, b.position.x, toi), y: lerp(b.prevPosition.y, b.position.y, toi) },
  };
}

function dashAttacker(a: ActorState, b: ActorState): Slot | null {
  const aDash = a.dash.phase === "active";
  const bDash = b.dash.phase === "active";
  if (aDash && !bDash) return a.slot;
  if (bDash && !aDash) return b.slot;
  if (!aDash) return null;
  // Head-on dashes: the faster body wins, equal speeds trade without knockback.
  const aSpeed = length(a.velocity.x, a.velocity.y);
  const bSpeed = length(b.velocity.x, b.velocity.y);
  if (aSpeed === bSpeed) return null;
  return aSpeed > bSpeed ? a.slot : b.slot;
}

/**
 * Resolve a detected contact: move both bodies to the contact configuration, push them
 * apart along the normal, exchange momentum (mass = radius²) and apply dash knockback.
 */
export function resolveContact(a: ActorState, b: ActorState, contact: Contact, config: ArenaConfig): CollisionReport {
  const n = contact.normal;
  const at = contactPositions(a, b, contact.toi);
  const massA = a.radius * a.radius;
  const massB = b.radius * b.radius;
  const total = massA + massB;

  const gap = (at.b.x - at.a.x) * n.x + (at.b.y - at.a.y) * n.y;
  const overlap = Math.max(0, a.radius + b.radius - gap);
  a.position = { x: at.a.x - n.x * overlap * (massB / total), y: at.a.y - n.y * overlap * (massB / total) };
  b.position = { x: at.b.x + n.x * overlap * (massA / total), y: at.b.y + n.y * overlap * (massA / total) };

  const startA = { ...a.velocity };
  const startB = { ...b.velocity };
  const attacker = dashAttacker(a, b);

  const approach = (a.velocity.x - b.velocity.x) * n.x + (a.velocity.y - b.velocity.y) * n.y;
  if (approach > 0) {
    const j = ((1 + config.collision.restitution) * approach) / (1 / massA + 1 / massB);
    a.velocity.x -= (n.x * j) / massA;
    a.velocity.y -= (n.y * j) / massA;
    b.velocity.x += (n.x * j) / massB;
    b.velocity.y += (n.y * j) / massB;
  }

  // Flat separation push, lighter body gets more of it.
  const push = config.collision.pushSpeed;
  a.velocity.x -= n.x * push * ((2 * massB) / total);
  a.velocity.y -= n.y * push * ((2 * massB) / total);
  b.velocity.x += n.x * push * ((2 * massA) / total);
  b.velocity.y += n.y * push * ((2 * massA) / total);

  let shieldConsumed: Slot | null = null;
  if (attacker !== null) {
    const hitter = attacker === a.slot ? a : b;
    const target = attacker === a.slot ? b : a;
    const dir = attacker === a.slot ? n : { x: -n.x, y: -n.y };
    const hitSpeed = attacker === a.slot ? length(startA.x, startA.y) : length(startB.x, startB.y);

    let knockback = config.collision.knockbackScale * hitSpeed;
    if (target.effects.shield !== undefined) {
      knockback *= config.powerUps.shieldKnockbackMult;
      delete target.effects.shield;
      shieldConsumed = target.slot;
    }
    target.velocity.x += dir.x * knockback;
    target.velocity.y += dir.y * knockback;
    hitter.velocity.x -= dir.x * knockback * config.collision.recoilScale;
    hitter.velocity.y -= dir.y * knockback * config.collision.recoilScale;

    target.staggerTicks = Math.max(target.staggerTicks, msToTicks(config, config.collision.staggerMs));
    endDash(target, config);
    endDash(hitter, config);
  } else if (a.dash.phase === "active" && b.dash.phase === "active") {
    endDash(a, config);
    endDash(b, config);
  }

  const deltaA = { x: a.velocity.x - startA.x, y: a.velocity.y - startA.y };
  const deltaB = { x: b.velocity.x - startB.x, y: b.velocity.y - startB.y };
  const impulses: [Vec2, Vec2] = a.slot === 0 ? [deltaA, deltaB] : [deltaB, deltaA];
  const impulse =
    attacker === null
      ? Math.max(length(deltaA.x, deltaA.y), length(deltaB.x, deltaB.y))
      : length(impulses[attacker === 0 ? 1 : 0].x, impulses[attacker === 0 ? 1 : 0].y);

  return {
    attacker,
    impulses,
    impulse,
    point: { x: (a.position.x + b.position.x) / 2, y: (a.position.y + b.position.y) / 2 },
    shieldConsumed,
  };
}
