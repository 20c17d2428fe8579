import { Point, Rect } from '../types/base'
import { CurveSegment, SegmentType } from '../types/segments'
import { computePointToPointDistance, interpolateLine } from '../utils/geometry'
import { rectFromPoints } from './rect'

// A straight segment between two points.
export class Line implements CurveSegment {
  public readonly type = SegmentType.Line

  constructor(public readonly start: Point, public readonly end: Point) {}

  public evaluate(t: number): Point {
    return interpolateLine(this.start, this.end, t)
  }

  public bounds(): Rect {
    return rectFromPoints(this.start, this.end)
  }

  public length(): number {
    return computePointToPointDistance(this.start, this.end)
  }

  public from(): Point {
    return this.start
  }

  public to(): Point {
    return this.end
  }
}
