import { unionRects } from '../geometry/rect'
import { Point, Rect } from '../types/base'
import { Segment } from '../types/segments'

export class PathError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'PathError'
  }
}

// A run of connected segments started by a moveto.
export interface Subpath {
  segments: Segment[]
  closed: boolean
}

export class Path {
  constructor(public readonly subpaths: Subpath[]) {}

  public segments(): Segment[] {
    return this.subpaths.flatMap((subpath) => subpath.segments)
  }

  public isEmpty(): boolean {
    return this.segments().length === 0
  }

  // Union of the segment bounds. A path made only of movetos has no outline.
  public bounds(): Rect {
    const segments = this.segments()
    if (segments.length === 0) {
      throw new PathError('Cannot compute bounds of a path without segments')
    }

    return segments
      .slice(1)
      .reduce((rect, segment) => unionRects(rect, segment.bounds()), segments[0].bounds())
  }

  public length(): number {
    return this.segments().reduce((total, segment) => total + segment.length(), 0)
  }

  public from(): Point {
    const segments = this.segments()
    if (segments.length === 0) {
      throw new PathError('Path has no segments')
    }
    return segments[0].from()
  }

  public to(): Point {
    const segments = this.segments()
    if (segments.length === 0) {
      throw new PathError('Path has no segments')
    }
    return segments[segments.length - 1].to()
  }
}
