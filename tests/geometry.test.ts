import { describe, expect, it } from '@jest/globals'
import { Line } from '../src/geometry/line'
import {
  rectContainsPoint,
  rectFromPoints,
  rectHeight,
  rectWidth,
  unionRects
} from '../src/geometry/rect'
import { SegmentType } from '../src/types/segments'

describe('Line', () => {
  const line = new Line({ x: 0, y: 0 }, { x: 3, y: 4 })

  it('is tagged as a line segment', () => {
    expect(line.type).toBe(SegmentType.Line)
  })

  it('measures the Euclidean distance', () => {
    expect(line.length()).toBe(5)
  })

  it('interpolates linearly', () => {
    expect(line.evaluate(0.5)).toEqual({ x: 1.5, y: 2 })
  })

  it('bounds its endpoints regardless of direction', () => {
    const reversed = new Line({ x: 3, y: 4 }, { x: 0, y: -1 })
    expect(reversed.bounds()).toEqual({ min: { x: 0, y: -1 }, max: { x: 3, y: 4 } })
  })

  it('returns its endpoints from from() and to()', () => {
    expect(line.from()).toBe(line.start)
    expect(line.to()).toBe(line.end)
  })
})

describe('Rect helpers', () => {
  it('orders the corners', () => {
    expect(rectFromPoints({ x: 5, y: 1 }, { x: 2, y: 7 })).toEqual({
      min: { x: 2, y: 1 },
      max: { x: 5, y: 7 }
    })
  })

  it('unions two rects', () => {
    const a = rectFromPoints({ x: 0, y: 0 }, { x: 2, y: 2 })
    const b = rectFromPoints({ x: 1, y: -3 }, { x: 4, y: 1 })
    expect(unionRects(a, b)).toEqual({ min: { x: 0, y: -3 }, max: { x: 4, y: 2 } })
  })

  it('checks containment inclusively', () => {
    const rect = rectFromPoints({ x: 0, y: 0 }, { x: 2, y: 1 })
    expect(rectContainsPoint(rect, { x: 2, y: 1 })).toBe(true)
    expect(rectContainsPoint(rect, { x: 1, y: 0.5 })).toBe(true)
    expect(rectContainsPoint(rect, { x: 2.5, y: 0.5 })).toBe(false)
  })

  it('reports width and height', () => {
    const rect = rectFromPoints({ x: -1, y: 2 }, { x: 3, y: 7 })
    expect(rectWidth(rect)).toBe(4)
    expect(rectHeight(rect)).toBe(5)
  })
})
