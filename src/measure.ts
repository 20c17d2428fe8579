import { DEFAULT_PRECISION } from './constants'
import { SvgPathParser } from './parsers/path'
import { Path } from './paths/path'
import { buildPath } from './paths/builder'
import { SvgReader } from './reader/base'
import { MeasureOptions, PathMeasurement } from './types/measure'

export class MeasureError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'MeasureError'
  }
}

export function parsePathData(d: string): Path {
  const parser = new SvgPathParser()
  return buildPath(parser.parsePath(d).commands)
}

export function measurePath(d: string, id: string = 'path'): PathMeasurement {
  const path = parsePathData(d)
  return {
    id,
    bounds: path.bounds(),
    length: path.length(),
    segmentCount: path.segments().length
  }
}

export async function measureSvg(input: string): Promise<PathMeasurement[]> {
  const svg = await new SvgReader().readFile(input)
  const measurements: PathMeasurement[] = []

  svg.paths.forEach((element, index) => {
    const id = element.id ?? `path${index + 1}`

    let path: Path
    try {
      path = parsePathData(element.d)
    } catch (error) {
      throw new MeasureError(
        `Failed to measure ${id}: ${error instanceof Error ? error.message : 'Unknown error'}`
      )
    }

    if (path.isEmpty()) {
      console.warn(`Skipping ${id}: path has no drawable segments`)
      return
    }

    measurements.push({
      id,
      bounds: path.bounds(),
      length: path.length(),
      segmentCount: path.segments().length
    })
  })

  return measurements
}

// Decimal places must suit Number.prototype.toFixed.
export function validatePrecision(precision: number, raw: string = String(precision)): number {
  if (!Number.isInteger(precision) || precision < 0 || precision > 20) {
    throw new MeasureError(`Invalid precision: ${raw}`)
  }
  return precision
}

export function formatMeasurement(
  measurement: PathMeasurement,
  options: MeasureOptions = {}
): string {
  const precision = validatePrecision(options.precision ?? DEFAULT_PRECISION)

  const round = (value: number): number => Number(value.toFixed(precision))
  const { min, max } = measurement.bounds
  const bounds = [min.x, min.y, max.x, max.y].map(round).join(', ')

  const length = round(measurement.length)

  return `${measurement.id}: bounds=[${bounds}] length=${length} segments=${measurement.segmentCount}`
}

export function formatMeasurements(
  measurements: PathMeasurement[],
  options: MeasureOptions = {}
): string {
  return measurements.map((measurement) => formatMeasurement(measurement, options)).join('\n')
}
