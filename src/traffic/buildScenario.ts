// Random encounter generator for profiling
import type { Scenario } from './Scenarios.js';
import { Vessel } from './Vessel.js';

export type Rng = () => number;

const AREA_NM = 20;

function randInRange(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

function randSpeed(rng: Rng): number {
  const base = 13; // knots
  return base * randInRange(rng, 0.5, 1.5);
}

function randVessel(rng: Rng): Vessel {
  return new Vessel(
    randInRange(rng, 20, 300),
    randInRange(rng, -AREA_NM, AREA_NM),
    randInRange(rng, -AREA_NM, AREA_NM),
    randSpeed(rng),
    randInRange(rng, 0, 360)
  );
}

/** A random ownship/target pair inside a 40 x 40 NM box. */
export function buildScenario(rng: Rng = Math.random, name = 'random'): Scenario {
  return { name, ownship: randVessel(rng), target: randVessel(rng) };
}

export default buildScenario;
