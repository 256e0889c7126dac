import type { CpaResult } from './cpa.js';

export type VesselErrorCode =
  | 'DEGENERATE_RELATIVE_VELOCITY'
  | 'COINCIDENT_VESSELS'
  | 'INVALID_RANGE'
  | 'INVALID_VESSEL'
  | 'INVALID_TOLERANCE';

export class VesselError extends Error {
  readonly code: VesselErrorCode;

  constructor(code: VesselErrorCode, message: string) {
    super(message);
    this.name = 'VesselError';
    this.code = code;
  }
}

/**
 * The vessels share a velocity, so the time of closest approach is
 * undefined. `fallback` holds the range and bearing at the current
 * positions with `tcpa = 0`.
 */
export class DegenerateRelativeVelocityError extends VesselError {
  readonly fallback: CpaResult;

  constructor(fallback: CpaResult) {
    super(
      'DEGENERATE_RELATIVE_VELOCITY',
      `Relative velocity is zero; CPA time undefined (current range ${fallback.rangeAtCpa})`
    );
    this.name = 'DegenerateRelativeVelocityError';
    this.fallback = fallback;
  }
}

export class CoincidentVesselsError extends VesselError {
  constructor() {
    super('COINCIDENT_VESSELS', 'Vessels share a position; no bearing from ownship to target');
    this.name = 'CoincidentVesselsError';
  }
}

export class InvalidRangeError extends VesselError {
  constructor(message: string) {
    super('INVALID_RANGE', message);
    this.name = 'InvalidRangeError';
  }
}

export class InvalidVesselError extends VesselError {
  constructor(message: string) {
    super('INVALID_VESSEL', message);
    this.name = 'InvalidVesselError';
  }
}

export class InvalidToleranceError extends VesselError {
  constructor(epsilon: number) {
    super('INVALID_TOLERANCE', `Degeneracy tolerance must be a finite number >= 0, got ${epsilon}`);
    this.name = 'InvalidToleranceError';
  }
}
