import { CUBIC_LENGTH_APPROXIMATION_INTERVAL } from '../constants'
import { Point, Rect } from '../types/base'
import { CurveSegment, SegmentType } from '../types/segments'
import { approximateLength, cubicBezierExtrema, cubicBezierPolynomial } from './math'

export interface BezierPointsCubic {
  start: Point
  control1: Point
  control2: Point
  end: Point
}

// A third degree Bezier curve.
export class CubicBezier implements CurveSegment {
  public readonly type = SegmentType.Cubic
  public readonly start: Point
  public readonly control1: Point
  public readonly control2: Point
  public readonly end: Point

  constructor(points: BezierPointsCubic) {
    this.start = points.start
    this.control1 = points.control1
    this.control2 = points.control2
    this.end = points.end
  }

  public bounds(): Rect {
    // Seed with the endpoints only; control points count through the extrema.
    let minX = Math.min(this.start.x, this.end.x)
    let maxX = Math.max(this.start.x, this.end.x)
    let minY = Math.min(this.start.y, this.end.y)
    let maxY = Math.max(this.start.y, this.end.y)

    const xExtrema = cubicBezierExtrema(this.start.x, this.control1.x, this.control2.x, this.end.x)
    const yExtrema = cubicBezierExtrema(this.start.y, this.control1.y, this.control2.y, this.end.y)

    for (const xValue of xExtrema) {
      minX = Math.min(minX, xValue)
      maxX = Math.max(maxX, xValue)
    }
    for (const yValue of yExtrema) {
      minY = Math.min(minY, yValue)
      maxY = Math.max(maxY, yValue)
    }

    return {
      min: { x: minX, y: minY },
      max: { x: maxX, y: maxY }
    }
  }

  public length(): number {
    return approximateLength((t) => this.evaluate(t), CUBIC_LENGTH_APPROXIMATION_INTERVAL)
  }

  public evaluate(t: number): Point {
    return {
      x: cubicBezierPolynomial(this.start.x, this.control1.x, this.control2.x, this.end.x, t),
      y: cubicBezierPolynomial(this.start.y, this.control1.y, this.control2.y, this.end.y, t)
    }
  }

  public from(): Point {
    return this.start
  }

  public to(): Point {
    return this.end
  }
}
