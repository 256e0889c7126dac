/** Planar [x, y] pair in arbitrary consistent units. */
export type Vec2 = readonly [number, number];

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return [a[0] - b[0], a[1] - b[1]];
}

export function scale(v: Vec2, k: number): Vec2 {
  return [v[0] * k, v[1] * k];
}

export function dot(a: Vec2, b: Vec2): number {
  return a[0] * b[0] + a[1] * b[1];
}

export function norm(v: Vec2): number {
  return Math.hypot(v[0], v[1]);
}

/** Position after travelling at `vel` for `t` time units. */
export function advance(pos: Vec2, vel: Vec2, t: number): Vec2 {
  return [pos[0] + vel[0] * t, pos[1] + vel[1] * t];
}
