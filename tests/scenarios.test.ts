import { describe, test, expect } from 'vitest'
import { buildScenario, type Rng } from '../src/traffic/buildScenario.js'
import { DegenerateRelativeVelocityError } from '../src/traffic/errors.js'
import { Scenarios } from '../src/traffic/Scenarios.js'

// Deterministic stand-in for Math.random.
function seeded(seed: number): Rng {
  let s = seed
  return () => {
    s = (s * 1664525 + 1013904223) % 4294967296
    return s / 4294967296
  }
}

describe('named scenarios', () => {
  for (const scenario of Scenarios.all().filter((s) => s.name !== 'parallel')) {
    test(`${scenario.name}: stepped ranges never beat the CPA`, () => {
      const { ownship, target } = scenario
      const cpa = ownship.cpa(target)

      let minDist = Infinity
      for (let i = 0; i <= 600; i++) {
        const t = i * 0.05
        const d = Math.hypot(
          target.position[0] + target.velocity[0] * t - (ownship.position[0] + ownship.velocity[0] * t),
          target.position[1] + target.velocity[1] * t - (ownship.position[1] + ownship.velocity[1] * t)
        )
        minDist = Math.min(minDist, d)
      }

      expect(minDist).toBeGreaterThanOrEqual(cpa.rangeAtCpa - 1e-9)
    })
  }

  test('parallel scenario has no CPA time', () => {
    const { ownship, target } = Scenarios.parallel
    expect(() => ownship.cpa(target)).toThrow(DegenerateRelativeVelocityError)
  })
})

describe('buildScenario', () => {
  test('same seed gives the same pair', () => {
    const a = buildScenario(seeded(42))
    const b = buildScenario(seeded(42))
    expect(a.ownship.position).toEqual(b.ownship.position)
    expect(a.target.heading).toBe(b.target.heading)
  })

  test('vessels stay inside the area and speed band', () => {
    const rng = seeded(7)
    for (let i = 0; i < 50; i++) {
      const { name, ownship, target } = buildScenario(rng, `pair${i}`)
      expect(name).toBe(`pair${i}`)
      for (const v of [ownship, target]) {
        expect(Math.abs(v.position[0])).toBeLessThanOrEqual(20)
        expect(Math.abs(v.position[1])).toBeLessThanOrEqual(20)
        expect(v.speed).toBeGreaterThanOrEqual(6.5)
        expect(v.speed).toBeLessThanOrEqual(19.5)
        expect(v.heading).toBeGreaterThanOrEqual(0)
        expect(v.heading).toBeLessThan(360)
      }
      const cpa = ownship.cpa(target, { allowDegenerate: true })
      const now = Math.hypot(target.position[0] - ownship.position[0], target.position[1] - ownship.position[1])
      expect(cpa.rangeAtCpa).toBeLessThanOrEqual(now + 1e-9)
    }
  })
})
