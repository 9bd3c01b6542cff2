export type Vec2 = { x: number; y: number };

export function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n));
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

export function length(x: number, y: number): number {
  return Math.sqrt(x * x + y * y);
}

export function distance(x1: number, y1: number, x2: number, y2: number): number {
  return length(x2 - x1, y2 - y1);
}

export function distanceSq(x1: number, y1: number, x2: number, y2: number): number {
  const dx = x2 - x1;
  const dy = y2 - y1;
  return dx * dx + dy * dy;
}

/** Unit vector, or null when the input is (near) zero-length. */
export function normalize(x: number, y: number): Vec2 | null {
  const len = length(x, y);
  if (len < 1e-9) return null;
  return { x: x / len, y: y / len };
}

export function isFiniteVec(v: Vec2): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y);
}

/**
 * Parameter t in [0, 1] of the point on segment (x0,y0)-(x1,y1) closest to (px,py).
 */
export function closestSegmentT(x0: number, y0: number, x1: number, y1: number, px: number, py: number): number {
  const dx = x1 - x0;
  const dy = y1 - y0;
  const lenSq = dx * dx + dy * dy;
  if (lenSq <= 1e-12) return 0;
  return clamp(((px - x0) * dx + (py - y0) * dy) / lenSq, 0, 1);
}

export function segmentPointDistanceSq(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  px: number,
  py: number,
): number {
  const t = closestSegmentT(x0, y0, x1, y1, px, py);
  return distanceSq(x0 + (x1 - x0) * t, y0 + (y1 - y0) * t, px, py);
}

/**
 * Earliest t in [0, 1] at which a point moving from `from` to `to` comes within `r`
 * of the origin, or null if it never does. Used on relative motion for swept tests.
 */
export function timeOfImpact(from: Vec2, to: Vec2, r: number): number | null {
  const rSq = r * r;
  const c = from.x * from.x + from.y * from.y - rSq;
  // Already overlapping; resting contact (within epsilon) only counts when approaching.
  if (c < -1e-6) return 0;
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const a = dx * dx + dy * dy;
  if (a <= 1e-12) return null;
  const b = 2 * (from.x * dx + from.y * dy);
  if (b >= 0) return null; // moving apart
  const disc = b * b - 4 * a * c;
  if (disc < 0) return null;
  const t = (-b - Math.sqrt(disc)) / (2 * a);
  return t <= 1 ? Math.max(0, t) : null;
}

/** 8-way movement vector; diagonals scaled so the result stays inside the unit disc. */
export const DIAGONAL = 0.707;

export function moveFromKeys(up: boolean, down: boolean, left: boolean, right: boolean): Vec2 {
  const x = (right ? 1 : 0) - (left ? 1 : 0);
  const y = (down ? 1 : 0) - (up ? 1 : 0);
  if (x !== 0 && y !== 0) return { x: x * DIAGONAL, y: y * DIAGONAL };
  return { x, y };
}

/** Nearest of the eight key directions (or none) for an arbitrary direction. */
export function quantizeDirection(x: number, y: number, deadzone = 0.3): Vec2 {
  return moveFromKeys(y < -deadzone, y > deadzone, x < -deadzone, x > deadzone);
}

export function rotate(v: Vec2, angleRad: number): Vec2 {
  const c = Math.cos(angleRad);
  const s = Math.sin(angleRad);
  return { x: v.x * c - v.y * s, y: v.x * s + v.y * c };
}
