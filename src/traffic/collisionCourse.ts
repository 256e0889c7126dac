import { logger } from '../config/logger.js';
import { bearingOf } from './bearing.js';
import { CoincidentVesselsError, InvalidRangeError } from './errors.js';
import { add, norm, scale, sub } from './vec2.js';
import type { Kinematics } from './Vessel.js';

export interface CollisionCourse {
  speed: number;
  /** Compass heading in degrees, [0, 360). */
  heading: number;
  /** Rate `a` at which the candidate closes the ownship-to-target displacement. */
  closingRate: number;
  /** Time until the candidate meets ownship, 1 / closingRate. */
  timeToCollision: number;
}

function validate(n: number, minSpeed: number, maxSpeed: number): void {
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidRangeError(`Solution count must be a positive integer, got ${n}`);
  }
  if (!Number.isFinite(minSpeed) || !Number.isFinite(maxSpeed)) {
    throw new InvalidRangeError(`Speed bounds must be finite, got [${minSpeed}, ${maxSpeed}]`);
  }
  if (minSpeed <= 0) {
    throw new InvalidRangeError(`minSpeed must be positive, got ${minSpeed}`);
  }
  if (minSpeed > maxSpeed) {
    throw new InvalidRangeError(`minSpeed ${minSpeed} exceeds maxSpeed ${maxSpeed}`);
  }
}

/**
 * Candidate speeds and headings for `target`, from its current position,
 * that lead to a collision with ownship.
 *
 * Each candidate velocity is Vt = -D·a + Vo, with D the ownship-to-target
 * displacement. Relative to ownship the target then closes D at rate `a`,
 * so the two meet at t = 1 / a. `a` is sampled at `n` evenly spaced values
 * from minSpeed / ‖D‖ up to (excluding) maxSpeed / ‖D‖, so `minSpeed` and
 * `maxSpeed` bound the closing speed along the line of sight. `minSpeed`
 * must be positive: a closing rate of zero or less never meets ownship.
 *
 * @returns Candidates in increasing order of closing rate.
 */
export function coursesToCollide(
  ownship: Kinematics,
  target: Kinematics,
  n: number,
  minSpeed: number,
  maxSpeed: number
): CollisionCourse[] {
  validate(n, minSpeed, maxSpeed);

  const d = sub(target.position, ownship.position);
  const dNorm = norm(d);
  if (dNorm === 0) {
    throw new CoincidentVesselsError();
  }

  const minA = minSpeed / dNorm;
  const maxA = maxSpeed / dNorm;
  const step = (maxA - minA) / n;

  const courses: CollisionCourse[] = [];
  for (let i = 0; i < n; i++) {
    const a = minA + i * step;
    const vt = add(scale(d, -a), ownship.velocity);
    courses.push({
      speed: norm(vt),
      heading: bearingOf(vt),
      closingRate: a,
      timeToCollision: 1 / a,
    });
  }

  logger.debug(`Collision courses: ${n} candidates, closing speed ${minSpeed}..${maxSpeed}, range ${dNorm}`);
  return courses;
}
