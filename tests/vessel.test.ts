import { describe, test, expect } from 'vitest'
import { Vessel, velocityFromHeading } from '../src/traffic/Vessel.js'
import { InvalidVesselError, VesselError } from '../src/traffic/errors.js'

describe('Vessel construction', () => {
  test('stores position and derives velocity along the compass heading', () => {
    const north = new Vessel(30, 1, 2, 10, 0)
    expect(north.position).toEqual([1, 2])
    expect(north.velocity[0]).toBeCloseTo(0, 12)
    expect(north.velocity[1]).toBeCloseTo(10, 12)

    const east = new Vessel(30, 0, 0, 10, 90)
    expect(east.velocity[0]).toBeCloseTo(10, 12)
    expect(east.velocity[1]).toBeCloseTo(0, 12)
  })

  test('velocity magnitude equals |speed| for any heading', () => {
    for (const heading of [0, 17, 90, 135.5, 222, 359, -45]) {
      for (const speed of [0, 3.5, 12, -8]) {
        const v = new Vessel(1, 0, 0, speed, heading)
        expect(Math.hypot(v.velocity[0], v.velocity[1])).toBeCloseTo(Math.abs(speed), 12)
      }
    }
  })

  test('negative speed runs backwards along the heading', () => {
    const v = new Vessel(1, 0, 0, -5, 30)
    expect(v.velocity[0]).toBeCloseTo(-2.5, 12)
    expect(v.velocity[1]).toBeCloseTo(-4.330127018922193, 12)
    expect(v.speed).toBe(-5)
  })

  test('heading is kept as given but behaves periodically', () => {
    const wrapped = new Vessel(1, 0, 0, 10, 450)
    const plain = new Vessel(1, 0, 0, 10, 90)
    expect(wrapped.heading).toBe(450)
    expect(wrapped.velocity[0]).toBeCloseTo(plain.velocity[0], 12)
    expect(wrapped.velocity[1]).toBeCloseTo(plain.velocity[1], 12)
  })

  test('vessel and its vectors are frozen', () => {
    const v = new Vessel(1, 4, 5, 6, 7)
    expect(Object.isFrozen(v)).toBe(true)
    expect(Object.isFrozen(v.position)).toBe(true)
    expect(Object.isFrozen(v.velocity)).toBe(true)
  })

  test('rejects non-finite inputs', () => {
    expect(() => new Vessel(1, Number.NaN, 0, 1, 0)).toThrow(InvalidVesselError)
    expect(() => new Vessel(1, 0, 0, Number.POSITIVE_INFINITY, 0)).toThrow(VesselError)
    expect(() => new Vessel(1, 0, 0, 1, Number.NaN)).toThrow('Vessel heading must be a finite number, got NaN')
  })

  test('fromVelocity recovers speed and heading', () => {
    const v = Vessel.fromVelocity(20, [1, 1], [3, 4])
    expect(v.speed).toBeCloseTo(5, 12)
    expect(v.heading).toBeCloseTo(36.86989764584402, 10)
    expect(v.velocity[0]).toBeCloseTo(3, 12)
    expect(v.velocity[1]).toBeCloseTo(4, 12)
    expect(v.length).toBe(20)
  })

  test('velocityFromHeading matches the constructor', () => {
    const v = new Vessel(1, 0, 0, 7, 200)
    expect(velocityFromHeading(7, 200)).toEqual(v.velocity)
  })

  test('bearing helper is reachable from the class', () => {
    expect(Vessel.bearingFromDxDy(-1, 0)).toBeCloseTo(270, 12)
  })
})
