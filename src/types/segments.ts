import { Point, Rect } from './base'
import type { Line } from '../geometry/line'
import type { QuadraticBezier } from '../bezier/quadratic'
import type { CubicBezier } from '../bezier/cubic'

export enum SegmentType {
  Line = 'line',
  Quadratic = 'quadratic',
  Cubic = 'cubic'
}

// The capabilities every path segment offers, whatever its degree.
export interface CurveSegment {
  readonly type: SegmentType
  evaluate(t: number): Point
  bounds(): Rect
  length(): number
  from(): Point
  to(): Point
}

// Union of the segment kinds a path can hold. Narrow on `type`.
export type Segment = Line | QuadraticBezier | CubicBezier
