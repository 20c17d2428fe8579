import { CubicBezier } from '../bezier/cubic'
import { QuadraticBezier } from '../bezier/quadratic'
import { Line } from '../geometry/line'
import { Point } from '../types/base'
import { PathCommand, PathCommandType } from '../types/paths'
import { Segment, SegmentType } from '../types/segments'
import { arePointsEqual, reflectPoint } from '../utils/geometry'
import { Path, PathError, Subpath } from './path'

function isRelative(type: PathCommandType): boolean {
  return type.endsWith('Relative')
}

// Read a parameter pair as an absolute point; relative pairs are offsets from `origin`.
function readPoint(command: PathCommand, index: number, origin: Point): Point {
  const x = command.parameters[index]
  const y = command.parameters[index + 1]
  if (x === undefined || y === undefined) {
    throw new PathError(`Missing parameters for ${command.type}`)
  }
  return isRelative(command.type) ? { x: origin.x + x, y: origin.y + y } : { x, y }
}

// Turns parsed commands into segments, one subpath per moveto.
export class PathBuilder {
  private subpaths: Subpath[] = []
  private current: Subpath | null = null
  private subpathStart: Point = { x: 0, y: 0 }
  private previous: Segment | null = null

  private reset(): void {
    this.subpaths = []
    this.current = null
    this.subpathStart = { x: 0, y: 0 }
    this.previous = null
  }

  private pushSegment(segment: Segment): void {
    if (!this.current) {
      // Drawing straight after a close continues from the closed subpath's start.
      this.current = { segments: [], closed: false }
      this.subpaths.push(this.current)
    }
    this.current.segments.push(segment)
    this.previous = segment
  }

  private smoothQuadraticControl(start: Point): Point {
    // Reflect the previous control point, or use the current point if the
    // previous segment was not a quadratic.
    if (this.previous && this.previous.type === SegmentType.Quadratic) {
      return reflectPoint(this.previous.control, start)
    }
    return start
  }

  private smoothCubicControl(start: Point): Point {
    if (this.previous && this.previous.type === SegmentType.Cubic) {
      return reflectPoint(this.previous.control2, start)
    }
    return start
  }

  private closeSubpath(start: Point): void {
    if (!arePointsEqual(start, this.subpathStart)) {
      this.pushSegment(new Line(start, this.subpathStart))
    }
    if (this.current) {
      this.current.closed = true
    }
    this.current = null
    this.previous = null
  }

  private handleCommand(command: PathCommand): void {
    const start = command.startPositionAbsolute
    const end = command.endPositionAbsolute

    switch (command.type) {
      case PathCommandType.MoveAbsolute:
      case PathCommandType.MoveRelative:
        this.current = null
        this.previous = null
        this.subpathStart = end
        break

      case PathCommandType.LineAbsolute:
      case PathCommandType.LineRelative:
      case PathCommandType.HorizontalLineAbsolute:
      case PathCommandType.HorizontalLineRelative:
      case PathCommandType.VerticalLineAbsolute:
      case PathCommandType.VerticalLineRelative:
        this.pushSegment(new Line(start, end))
        break

      case PathCommandType.QuadraticBezierAbsolute:
      case PathCommandType.QuadraticBezierRelative:
        this.pushSegment(new QuadraticBezier({ start, control: readPoint(command, 0, start), end }))
        break

      case PathCommandType.QuadraticBezierSmoothAbsolute:
      case PathCommandType.QuadraticBezierSmoothRelative:
        this.pushSegment(
          new QuadraticBezier({ start, control: this.smoothQuadraticControl(start), end })
        )
        break

      case PathCommandType.CubicBezierAbsolute:
      case PathCommandType.CubicBezierRelative:
        this.pushSegment(
          new CubicBezier({
            start,
            control1: readPoint(command, 0, start),
            control2: readPoint(command, 2, start),
            end
          })
        )
        break

      case PathCommandType.CubicBezierSmoothAbsolute:
      case PathCommandType.CubicBezierSmoothRelative:
        this.pushSegment(
          new CubicBezier({
            start,
            control1: this.smoothCubicControl(start),
            control2: readPoint(command, 0, start),
            end
          })
        )
        break

      case PathCommandType.StopAbsolute:
      case PathCommandType.StopRelative:
        this.closeSubpath(start)
        break

      default:
        throw new PathError(`Unsupported path command: ${command.type}`)
    }
  }

  public build(commands: PathCommand[]): Path {
    this.reset()
    for (const command of commands) {
      this.handleCommand(command)
    }
    return new Path(this.subpaths)
  }
}

export function buildPath(commands: PathCommand[]): Path {
  return new PathBuilder().build(commands)
}
