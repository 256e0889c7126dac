import type { Vec2 } from './vec2.js';

const RAD_TO_DEG = 180 / Math.PI;

/**
 * Compass bearing of a displacement, in degrees clockwise from +y.
 *
 * Note the `atan2(dx, dy)` argument order: swapping it rotates every
 * bearing by 90 degrees.
 *
 * @returns Bearing in the range [0, 360).
 */
export function bearingFromDxDy(dx: number, dy: number): number {
  return (Math.atan2(dx, dy) * RAD_TO_DEG + 360) % 360;
}

export function bearingOf(v: Vec2): number {
  return bearingFromDxDy(v[0], v[1]);
}

/** Map any angle in degrees to [0, 360). */
export function normalizeAngle(deg: number): number {
  return ((deg % 360) + 360) % 360;
}
