import { config } from 'dotenv'

config()

const toNumber = (value: string | undefined, fallback: number) => {
  if (!value) return fallback
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : fallback
}

const defaultLogLevel = (nodeEnv: string | undefined) => {
  if (nodeEnv === 'test') return 'warn'
  return 'info'
}

export interface VesselEnv {
  logLevel: string
  /** Relative tolerance on ‖Vr‖ below which CPA time is undefined. */
  cpaDegenerateEpsilon: number
  collisionCourse: {
    count: number
    minSpeed: number
    maxSpeed: number
  }
  risk: {
    safeRange: number
    tcpaHorizon: number
  }
}

/** Read settings from an environment map; unset or non-numeric values fall back to defaults. */
export function readEnv(source: NodeJS.ProcessEnv): VesselEnv {
  return {
    logLevel: source.LOG_LEVEL?.trim() || defaultLogLevel(source.NODE_ENV),
    cpaDegenerateEpsilon: toNumber(source.CPA_DEGENERATE_EPSILON, 1e-9),
    collisionCourse: {
      count: toNumber(source.COLLISION_COURSE_COUNT, 10),
      minSpeed: toNumber(source.COLLISION_COURSE_MIN_SPEED, 2),
      maxSpeed: toNumber(source.COLLISION_COURSE_MAX_SPEED, 25),
    },
    risk: {
      safeRange: toNumber(source.CPA_SAFE_RANGE, 0.5),
      tcpaHorizon: toNumber(source.TCPA_HORIZON, 0.25),
    },
  }
}

export const env = readEnv(process.env)
