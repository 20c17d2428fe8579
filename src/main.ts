#!/usr/bin/env node
import { formatMeasurements, measureSvg, validatePrecision } from './measure'
import { MeasureOptions } from './types/measure'

export function parseOptions(flags: string[]): MeasureOptions {
  const options: MeasureOptions = {}

  for (const flag of flags) {
    const [name, value] = flag.split('=')
    if (name === '--precision') {
      options.precision = validatePrecision(value ? Number(value) : NaN, value ?? '')
    } else {
      throw new Error(`Unknown option: ${flag}`)
    }
  }

  return options
}

export async function main(args: string[]): Promise<number> {
  // Separate flags from file arguments.
  const flags = args.filter((arg) => arg.startsWith('--'))
  const fileArgs = args.filter((arg) => !arg.startsWith('--'))

  if (fileArgs.length < 1) {
    console.log('Usage: svg-curve-metrics <inputFile> [--precision=N]')
    console.log('Example: svg-curve-metrics ./drawing.svg --precision=2')
    return 1
  }

  const inputFile = fileArgs[0]

  try {
    const options = parseOptions(flags)
    const measurements = await measureSvg(inputFile)
    if (measurements.length === 0) {
      console.log(`No measurable paths in ${inputFile}`)
      return 0
    }
    console.log(formatMeasurements(measurements, options))
    return 0
  } catch (error) {
    console.error('Measurement failed:', error instanceof Error ? error.message : error)
    return 1
  }
}

// Only run when executed directly.
if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code
    })
    .catch((error) => {
      console.error(error)
      process.exitCode = 1
    })
}
