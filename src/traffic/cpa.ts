import { env } from '../config/env.js';
import { logger } from '../config/logger.js';
import { bearingOf } from './bearing.js';
import { DegenerateRelativeVelocityError, InvalidToleranceError } from './errors.js';
import { advance, dot, norm, sub, type Vec2 } from './vec2.js';
import type { Kinematics } from './Vessel.js';

export interface CpaResult {
  /** Time to CPA; negative means CPA has already passed. */
  tcpa: number;
  targetAtCpa: Vec2;
  ownshipAtCpa: Vec2;
  rangeAtCpa: number;
  /** Bearing from ownship to target at CPA, degrees in [0, 360). */
  bearingAtCpa: number;
  /** True when the fallback for equal velocities was used (tcpa = 0). */
  degenerate: boolean;
}

export interface CpaOptions {
  /**
   * Relative velocities with ‖Vr‖ ≤ epsilon · max(‖Vo‖, ‖Vt‖) count as zero.
   */
  epsilon?: number;
  /** Return the flagged current-position fallback instead of throwing. */
  allowDegenerate?: boolean;
}

function resultAt(ownship: Kinematics, target: Kinematics, t: number, degenerate: boolean): CpaResult {
  const targetAtCpa = advance(target.position, target.velocity, t);
  const ownshipAtCpa = advance(ownship.position, ownship.velocity, t);
  const d = sub(targetAtCpa, ownshipAtCpa);
  return {
    tcpa: t,
    targetAtCpa,
    ownshipAtCpa,
    rangeAtCpa: norm(d),
    bearingAtCpa: bearingOf(d),
    degenerate,
  };
}

function isFiniteResult(r: CpaResult): boolean {
  return [r.tcpa, r.rangeAtCpa, r.bearingAtCpa, ...r.targetAtCpa, ...r.ownshipAtCpa].every(Number.isFinite);
}

/**
 * Closest point of approach between ownship and target, both holding
 * course and speed.
 *
 * Range squared is a quadratic in t with leading coefficient ‖Vr‖², so its
 * minimum sits at tcpa = -(Vr · D) / (Vr · Vr), where Vr is the target's
 * velocity relative to ownship and D the target's relative position.
 * A relative speed so small that Vr · Vr underflows, or a tcpa whose
 * positions overflow, takes the degenerate path too.
 *
 * @throws InvalidToleranceError when `epsilon` is negative or not finite.
 * @throws DegenerateRelativeVelocityError when the vessels share a velocity,
 *         unless `allowDegenerate` is set.
 */
export function computeCPA(ownship: Kinematics, target: Kinematics, options: CpaOptions = {}): CpaResult {
  const epsilon = options.epsilon ?? env.cpaDegenerateEpsilon;
  if (!Number.isFinite(epsilon) || epsilon < 0) {
    throw new InvalidToleranceError(epsilon);
  }
  const vr = sub(target.velocity, ownship.velocity);
  const d = sub(target.position, ownship.position);

  const scale = Math.max(norm(ownship.velocity), norm(target.velocity));
  const vr2 = dot(vr, vr);
  if (norm(vr) > epsilon * scale && vr2 > 0) {
    const result = resultAt(ownship, target, -dot(vr, d) / vr2, false);
    if (isFiniteResult(result)) return result;
  }

  const fallback = resultAt(ownship, target, 0, true);
  if (!options.allowDegenerate) {
    throw new DegenerateRelativeVelocityError(fallback);
  }
  logger.debug(`CPA degenerate: relative velocity ~0, range held at ${fallback.rangeAtCpa}`);
  return fallback;
}
