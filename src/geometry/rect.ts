import { Point, Rect } from '../types/base'

export function rectFromPoints(a: Point, b: Point): Rect {
  return {
    min: { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) },
    max: { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) }
  }
}

export function unionRects(a: Rect, b: Rect): Rect {
  return {
    min: { x: Math.min(a.min.x, b.min.x), y: Math.min(a.min.y, b.min.y) },
    max: { x: Math.max(a.max.x, b.max.x), y: Math.max(a.max.y, b.max.y) }
  }
}

export function rectContainsPoint(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.min.x && point.x <= rect.max.x && point.y >= rect.min.y && point.y <= rect.max.y
  )
}

export function rectWidth(rect: Rect): number {
  return rect.max.x - rect.min.x
}

export function rectHeight(rect: Rect): number {
  return rect.max.y - rect.min.y
}
