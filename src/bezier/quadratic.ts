import { QUAD_LENGTH_APPROXIMATION_INTERVAL } from '../constants'
import { Point, Rect } from '../types/base'
import { CurveSegment, SegmentType } from '../types/segments'
import { approximateLength, quadraticBezierExtrema, quadraticBezierPolynomial } from './math'

export interface BezierPointsQuadratic {
  start: Point
  control: Point
  end: Point
}

// A second degree Bezier curve.
export class QuadraticBezier implements CurveSegment {
  public readonly type = SegmentType.Quadratic
  public readonly start: Point
  public readonly control: Point
  public readonly end: Point

  constructor(points: BezierPointsQuadratic) {
    this.start = points.start
    this.control = points.control
    this.end = points.end
  }

  public bounds(): Rect {
    const x = quadraticBezierExtrema(this.start.x, this.control.x, this.end.x)
    const y = quadraticBezierExtrema(this.start.y, this.control.y, this.end.y)
    return {
      min: { x: x.min, y: y.min },
      max: { x: x.max, y: y.max }
    }
  }

  // Approximate, see approximateLength.
  public length(): number {
    return approximateLength((t) => this.evaluate(t), QUAD_LENGTH_APPROXIMATION_INTERVAL)
  }

  // Defined for any t; only [0, 1] lies on the drawn curve.
  public evaluate(t: number): Point {
    return {
      x: quadraticBezierPolynomial(this.start.x, this.control.x, this.end.x, t),
      y: quadraticBezierPolynomial(this.start.y, this.control.y, this.end.y, t)
    }
  }

  public from(): Point {
    return this.start
  }

  public to(): Point {
    return this.end
  }
}
