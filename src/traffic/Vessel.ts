import { env } from '../config/env.js';
import { bearingFromDxDy, bearingOf } from './bearing.js';
import { coursesToCollide, type CollisionCourse } from './collisionCourse.js';
import { collisionRisk, type CollisionRisk, type RiskSettings } from './CollisionRisk.js';
import { computeCPA, type CpaOptions, type CpaResult } from './cpa.js';
import { InvalidVesselError } from './errors.js';
import { norm, type Vec2 } from './vec2.js';

/** Position and velocity, the only state the CPA math reads. */
export interface Kinematics {
  readonly position: Vec2;
  readonly velocity: Vec2;
}

const DEG_TO_RAD = Math.PI / 180;

/**
 * Velocity for a compass heading: 0 degrees is +y, 90 degrees is +x.
 * A negative speed points the vector backwards along the heading.
 */
export function velocityFromHeading(speed: number, headingDeg: number): Vec2 {
  const h = headingDeg * DEG_TO_RAD;
  return [speed * Math.sin(h), speed * Math.cos(h)];
}

/**
 * A point vessel moving at constant speed and heading.
 *
 * `velocity` is derived once, in the constructor. There are no mutators, so
 * it always matches the `speed` and `heading` the vessel was built with.
 * `heading` is kept exactly as given (450 stays 450).
 */
export class Vessel implements Kinematics {
  readonly length: number;
  readonly position: Vec2;
  readonly speed: number;
  readonly heading: number;
  readonly velocity: Vec2;

  constructor(length: number, x: number, y: number, speed: number, heading: number) {
    const fields = { length, x, y, speed, heading };
    for (const [name, value] of Object.entries(fields)) {
      if (!Number.isFinite(value)) {
        throw new InvalidVesselError(`Vessel ${name} must be a finite number, got ${value}`);
      }
    }
    this.length = length;
    this.position = Object.freeze([x, y] as const);
    this.speed = speed;
    this.heading = heading;
    this.velocity = Object.freeze(velocityFromHeading(speed, heading));
    Object.freeze(this);
  }

  /** Build a vessel from a velocity vector, deriving speed and heading. */
  static fromVelocity(length: number, position: Vec2, velocity: Vec2): Vessel {
    return new Vessel(length, position[0], position[1], norm(velocity), bearingOf(velocity));
  }

  static bearingFromDxDy(dx: number, dy: number): number {
    return bearingFromDxDy(dx, dy);
  }

  /** Closest point of approach with this vessel as ownship. */
  cpa(target: Kinematics, options?: CpaOptions): CpaResult {
    return computeCPA(this, target, options);
  }

  /**
   * Speeds and headings for `target` that put it on a collision course
   * with this vessel.
   */
  coursesToCollide(
    target: Kinematics,
    n: number = env.collisionCourse.count,
    minSpeed: number = env.collisionCourse.minSpeed,
    maxSpeed: number = env.collisionCourse.maxSpeed
  ): CollisionCourse[] {
    return coursesToCollide(this, target, n, minSpeed, maxSpeed);
  }

  collisionRisk(target: Vessel, settings?: RiskSettings): CollisionRisk {
    return collisionRisk(this, target, settings);
  }
}
