import { env } from '../config/env.js';
import { bearingOf, normalizeAngle } from './bearing.js';
import { computeCPA, type CpaResult } from './cpa.js';
import { sub } from './vec2.js';
import type { Vessel } from './Vessel.js';

export type Encounter =
  | 'headOn'
  | 'crossingStarboard'
  | 'crossingPort'
  | 'overtaking'
  | 'none';

export interface RiskSettings {
  /** CPA range at or below which the encounter is a risk. */
  safeRange: number;
  /** Only CPAs between now and this many time units ahead count. */
  tcpaHorizon: number;
}

export interface CollisionRisk {
  cpa: CpaResult;
  /** Bearing of the target relative to ownship's bow, degrees in [0, 360). */
  relativeBearing: number;
  encounter: Encounter;
  risk: boolean;
}

/**
 * Classify an encounter from the target's relative bearing.
 *
 * @param relativeBearingDeg Bearing of the target off ownship's bow.
 *                           Any numeric input is normalized to 0-360.
 */
export function classifyEncounter(relativeBearingDeg: number): Exclude<Encounter, 'none'> {
  const beta = normalizeAngle(relativeBearingDeg);

  // fine on the bow
  if (beta <= 5 || beta >= 355) {
    return 'headOn';
  }

  // target abaft the beam
  if (beta > 112.5 && beta < 247.5) {
    return 'overtaking';
  }

  return beta <= 112.5 ? 'crossingStarboard' : 'crossingPort';
}

/**
 * Decide whether the target poses a risk of collision: its CPA falls within
 * `safeRange` and occurs within the next `tcpaHorizon` time units. A target
 * sharing ownship's velocity is a risk only if it is already within range.
 */
export function collisionRisk(
  ownship: Vessel,
  target: Vessel,
  settings: RiskSettings = env.risk
): CollisionRisk {
  const cpa = computeCPA(ownship, target, { allowDegenerate: true });
  const relativeBearing = normalizeAngle(
    bearingOf(sub(target.position, ownship.position)) - ownship.heading
  );

  const risk =
    cpa.rangeAtCpa <= settings.safeRange &&
    cpa.tcpa >= 0 &&
    cpa.tcpa <= settings.tcpaHorizon;

  return {
    cpa,
    relativeBearing,
    encounter: risk ? classifyEncounter(relativeBearing) : 'none',
    risk,
  };
}
