import { Point } from '../types/base'

export function computePointToPointDistance(point1: Point, point2: Point): number {
  return Math.sqrt((point1.x - point2.x) ** 2 + (point1.y - point2.y) ** 2)
}

export function interpolateLine(start: Point, end: Point, t: number): Point {
  return {
    x: (1 - t) * start.x + t * end.x,
    y: (1 - t) * start.y + t * end.y
  }
}

export function reflectPoint(point: Point, about: Point): Point {
  // Mirror `point` through `about`, as SVG does for smooth curve controls.
  return {
    x: 2 * about.x - point.x,
    y: 2 * about.y - point.y
  }
}

export function arePointsEqual(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y
}
