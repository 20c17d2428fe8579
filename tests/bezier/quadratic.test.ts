import { describe, expect, it } from '@jest/globals'
import { QuadraticBezier } from '../../src/bezier/quadratic'
import { rectContainsPoint } from '../../src/geometry/rect'
import { Point } from '../../src/types/base'

function quadratic(start: Point, control: Point, end: Point): QuadraticBezier {
  return new QuadraticBezier({ start, control, end })
}

describe('QuadraticBezier', () => {
  const arch = quadratic({ x: 0, y: 0 }, { x: 1, y: 2 }, { x: 2, y: 0 })

  describe('evaluate', () => {
    it('hits the endpoints at t = 0 and t = 1', () => {
      const start = arch.evaluate(0)
      const end = arch.evaluate(1)
      expect(start.x).toBeCloseTo(0)
      expect(start.y).toBeCloseTo(0)
      expect(end.x).toBeCloseTo(2)
      expect(end.y).toBeCloseTo(0)
    })

    it('reaches the apex at t = 0.5', () => {
      const apex = arch.evaluate(0.5)
      expect(apex.x).toBeCloseTo(1)
      expect(apex.y).toBeCloseTo(1)
    })

    it('extrapolates outside [0, 1]', () => {
      const line = quadratic({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 })
      const point = line.evaluate(2)
      expect(point.x).toBeCloseTo(4)
      expect(point.y).toBeCloseTo(0)
    })
  })

  describe('bounds', () => {
    it('includes the extremum at t = 0.5', () => {
      expect(arch.bounds()).toEqual({ min: { x: 0, y: 0 }, max: { x: 2, y: 1 } })
    })

    it('falls back to the endpoints when the control point is evenly spaced on the chord', () => {
      const degenerate = quadratic({ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 2 })
      expect(degenerate.bounds()).toEqual({ min: { x: 0, y: 0 }, max: { x: 2, y: 2 } })
    })

    it('contains both endpoints', () => {
      const curve = quadratic({ x: 4, y: -1 }, { x: -3, y: 6 }, { x: 1, y: 2 })
      const bounds = curve.bounds()
      expect(rectContainsPoint(bounds, curve.start)).toBe(true)
      expect(rectContainsPoint(bounds, curve.end)).toBe(true)
    })

    it('encloses every point on the curve', () => {
      const curve = quadratic({ x: 0, y: 0 }, { x: 3, y: 5 }, { x: 1, y: -2 })
      const { min, max } = curve.bounds()
      for (let i = 0; i <= 100; i++) {
        const point = curve.evaluate(i / 100)
        expect(point.x).toBeGreaterThanOrEqual(min.x - 1e-9)
        expect(point.x).toBeLessThanOrEqual(max.x + 1e-9)
        expect(point.y).toBeGreaterThanOrEqual(min.y - 1e-9)
        expect(point.y).toBeLessThanOrEqual(max.y + 1e-9)
      }
    })

    it('does not depend on which end is the start', () => {
      const reversed = quadratic(arch.end, arch.control, arch.start)
      const a = arch.bounds()
      const b = reversed.bounds()
      expect(b.min.x).toBeCloseTo(a.min.x)
      expect(b.min.y).toBeCloseTo(a.min.y)
      expect(b.max.x).toBeCloseTo(a.max.x)
      expect(b.max.y).toBeCloseTo(a.max.y)
    })
  })

  describe('length', () => {
    it('measures a straight curve to within one percent', () => {
      const line = quadratic({ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 2, y: 0 })
      expect(Math.abs(line.length() - 2) / 2).toBeLessThan(0.01)
    })

    it('lies between the chord and the control polygon', () => {
      const length = arch.length()
      expect(length).toBeGreaterThan(2)
      expect(length).toBeLessThan(2 * Math.sqrt(5))
    })

    it('is zero for a curve collapsed to a point', () => {
      const point = { x: 7, y: -3 }
      expect(quadratic(point, point, point).length()).toBeCloseTo(0, 9)
    })
  })

  it('returns the endpoints unchanged from from() and to()', () => {
    expect(arch.from()).toBe(arch.start)
    expect(arch.to()).toBe(arch.end)
  })
})
