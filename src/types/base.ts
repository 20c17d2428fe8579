export type Point = {
  x: number
  y: number
}

// Axis-aligned box. Built from min/max so min <= max always holds per axis.
export type Rect = {
  min: Point
  max: Point
}
