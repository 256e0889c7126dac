export { Vessel, velocityFromHeading, type Kinematics } from './traffic/Vessel.js';
export { computeCPA, type CpaOptions, type CpaResult } from './traffic/cpa.js';
export { coursesToCollide, type CollisionCourse } from './traffic/collisionCourse.js';
export {
  classifyEncounter,
  collisionRisk,
  type CollisionRisk,
  type Encounter,
  type RiskSettings,
} from './traffic/CollisionRisk.js';
export { bearingFromDxDy, bearingOf, normalizeAngle } from './traffic/bearing.js';
export {
  CoincidentVesselsError,
  DegenerateRelativeVelocityError,
  InvalidRangeError,
  InvalidToleranceError,
  InvalidVesselError,
  VesselError,
  type VesselErrorCode,
} from './traffic/errors.js';
export type { Vec2 } from './traffic/vec2.js';
export { Scenarios, type Scenario } from './traffic/Scenarios.js';
export { buildScenario, type Rng } from './traffic/buildScenario.js';
export { env, readEnv, type VesselEnv } from './config/env.js';
export { logger } from './config/logger.js';
