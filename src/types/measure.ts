import { Rect } from './base'

// Options that control measurement output.
export type MeasureOptions = {
  precision?: number // Decimal places when formatting, default DEFAULT_PRECISION.
}

export type PathMeasurement = {
  id: string
  bounds: Rect
  length: number
  segmentCount: number
}
