export { CubicBezier } from './bezier/cubic'
export type { BezierPointsCubic } from './bezier/cubic'
export { QuadraticBezier } from './bezier/quadratic'
export type { BezierPointsQuadratic } from './bezier/quadratic'
export {
  approximateLength,
  cubicBezierExtrema,
  cubicBezierPolynomial,
  quadraticBezierExtrema,
  quadraticBezierPolynomial
} from './bezier/math'
export {
  CUBIC_LENGTH_APPROXIMATION_INTERVAL,
  QUAD_LENGTH_APPROXIMATION_INTERVAL
} from './constants'
export { Line } from './geometry/line'
export { rectContainsPoint, rectFromPoints, rectHeight, rectWidth, unionRects } from './geometry/rect'
export {
  formatMeasurement,
  formatMeasurements,
  measurePath,
  measureSvg,
  MeasureError,
  parsePathData
} from './measure'
export { ParseError } from './parsers/exceptions'
export { SvgPathParser } from './parsers/path'
export { buildPath, PathBuilder } from './paths/builder'
export { Path, PathError } from './paths/path'
export type { Subpath } from './paths/path'
export { SvgReader, SvgReadError } from './reader/base'
export { PathReadError } from './reader/path'
export type { Point, Rect } from './types/base'
export type { MeasureOptions, PathMeasurement } from './types/measure'
export { SegmentType } from './types/segments'
export type { CurveSegment, Segment } from './types/segments'
