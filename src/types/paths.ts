import { Point } from './base'

export enum PathCommandType {
  NotSet = 'NotSet',
  MoveAbsolute = 'MoveAbsolute',
  MoveRelative = 'MoveRelative',
  LineAbsolute = 'LineAbsolute',
  LineRelative = 'LineRelative',
  HorizontalLineAbsolute = 'HorizontalLineAbsolute',
  HorizontalLineRelative = 'HorizontalLineRelative',
  VerticalLineAbsolute = 'VerticalLineAbsolute',
  VerticalLineRelative = 'VerticalLineRelative',
  QuadraticBezierAbsolute = 'QuadraticBezierAbsolute',
  QuadraticBezierRelative = 'QuadraticBezierRelative',
  QuadraticBezierSmoothAbsolute = 'QuadraticBezierSmoothAbsolute',
  QuadraticBezierSmoothRelative = 'QuadraticBezierSmoothRelative',
  CubicBezierAbsolute = 'CubicBezierAbsolute',
  CubicBezierRelative = 'CubicBezierRelative',
  CubicBezierSmoothAbsolute = 'CubicBezierSmoothAbsolute',
  CubicBezierSmoothRelative = 'CubicBezierSmoothRelative',
  EllipticalArcAbsolute = 'EllipticalArcAbsolute',
  EllipticalArcRelative = 'EllipticalArcRelative',
  StopAbsolute = 'StopAbsolute',
  StopRelative = 'StopRelative'
}

export interface PathCommand {
  type: PathCommandType
  parameters: number[]
  startPositionAbsolute: Point // Absolute position before the command is executed.
  endPositionAbsolute: Point // Absolute position after the command is executed.
}

export interface ParsedPath {
  commands: PathCommand[]
  startPosition: Point
}

// Mutable scanner state while reading a `d` attribute.
export interface PathState {
  command: PathCommandType
  values: number[]
  valueBuffer: string
  currentPoint: Point
  isPathOpen: boolean
  subPathStart: Point | null
  firstMoveCompleted: boolean
}

// The SVG path commands and our nicer names.
export const SvgPathCommandMap: Record<string, PathCommandType> = {
  A: PathCommandType.EllipticalArcAbsolute,
  a: PathCommandType.EllipticalArcRelative,
  C: PathCommandType.CubicBezierAbsolute,
  c: PathCommandType.CubicBezierRelative,
  H: PathCommandType.HorizontalLineAbsolute,
  h: PathCommandType.HorizontalLineRelative,
  L: PathCommandType.LineAbsolute,
  l: PathCommandType.LineRelative,
  M: PathCommandType.MoveAbsolute,
  m: PathCommandType.MoveRelative,
  Q: PathCommandType.QuadraticBezierAbsolute,
  q: PathCommandType.QuadraticBezierRelative,
  S: PathCommandType.CubicBezierSmoothAbsolute,
  s: PathCommandType.CubicBezierSmoothRelative,
  T: PathCommandType.QuadraticBezierSmoothAbsolute,
  t: PathCommandType.QuadraticBezierSmoothRelative,
  V: PathCommandType.VerticalLineAbsolute,
  v: PathCommandType.VerticalLineRelative,
  Z: PathCommandType.StopAbsolute,
  z: PathCommandType.StopRelative
}

// Number of values each command consumes per repetition.
export const PathCommandParameterCount: Record<PathCommandType, number> = {
  [PathCommandType.NotSet]: 0,
  [PathCommandType.MoveAbsolute]: 2,
  [PathCommandType.MoveRelative]: 2,
  [PathCommandType.LineAbsolute]: 2,
  [PathCommandType.LineRelative]: 2,
  [PathCommandType.HorizontalLineAbsolute]: 1,
  [PathCommandType.HorizontalLineRelative]: 1,
  [PathCommandType.VerticalLineAbsolute]: 1,
  [PathCommandType.VerticalLineRelative]: 1,
  [PathCommandType.CubicBezierAbsolute]: 6,
  [PathCommandType.CubicBezierRelative]: 6,
  [PathCommandType.CubicBezierSmoothAbsolute]: 4,
  [PathCommandType.CubicBezierSmoothRelative]: 4,
  [PathCommandType.QuadraticBezierAbsolute]: 4,
  [PathCommandType.QuadraticBezierRelative]: 4,
  [PathCommandType.QuadraticBezierSmoothAbsolute]: 2,
  [PathCommandType.QuadraticBezierSmoothRelative]: 2,
  [PathCommandType.EllipticalArcAbsolute]: 7,
  [PathCommandType.EllipticalArcRelative]: 7,
  [PathCommandType.StopAbsolute]: 0,
  [PathCommandType.StopRelative]: 0
}
