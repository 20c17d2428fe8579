import { Point } from '../types/base'
import { Line } from '../geometry/line'

export type Extrema = {
  min: number
  max: number
}

export function quadraticBezierPolynomial(a: number, b: number, c: number, t: number): number {
  // B(t) = (1-t)²A + 2(1-t)tB + t²C
  return Math.pow(1 - t, 2) * a + 2 * (1 - t) * t * b + t * t * c
}

export function cubicBezierPolynomial(
  a: number,
  b: number,
  c: number,
  d: number,
  t: number
): number {
  // B(t) = A(1-t)³ + 3Bt(1-t)² + 3C(1-t)t² + Dt³
  return a * Math.pow(1 - t, 3) + 3 * b * t * Math.pow(1 - t, 2) + 3 * c * (1 - t) * t * t + d * t * t * t
}

export function quadraticBezierExtrema(a: number, b: number, c: number): Extrema {
  let min = Math.min(a, c)
  let max = Math.max(a, c)

  // Zero of the derivative. A zero denominator gives ±Infinity or NaN here, which
  // fails the range test below.
  const t = (b - a) / (2 * b - a - c)
  if (t >= 0 && t <= 1) {
    const extreme = quadraticBezierPolynomial(a, b, c, t)
    min = Math.min(min, extreme)
    max = Math.max(max, extreme)
  }

  return { min, max }
}

// Values of the cubic at the zeros of its derivative that fall in [0, 1].
export function cubicBezierExtrema(a: number, b: number, c: number, d: number): number[] {
  // Coefficients of the derivative, a quadratic in t.
  const qa = 3 * d - 9 * c + 9 * b - 3 * a
  const qb = 6 * a - 12 * b + 6 * c
  const qc = 3 * (b - a)

  const discriminant = Math.pow(qb, 2) - 4 * qa * qc
  if (discriminant < 0) {
    return []
  }

  // No special case for qa === 0: the roots come out non-finite and are dropped.
  const solution1 = (-qb + Math.sqrt(discriminant)) / (2 * qa)
  const solution2 = (-qb - Math.sqrt(discriminant)) / (2 * qa)

  const result: number[] = []
  if (solution1 >= 0 && solution1 <= 1) {
    result.push(cubicBezierPolynomial(a, b, c, d, solution1))
  }
  if (solution2 >= 0 && solution2 <= 1) {
    result.push(cubicBezierPolynomial(a, b, c, d, solution2))
  }
  return result
}

export function approximateLength(evaluate: (t: number) => Point, step: number): number {
  // Polyline through points `step` apart. The running t is accumulated, so the
  // loop stops as soon as it reaches 1 and never adds a final partial chord.
  let length = 0
  for (let t = 0; t < 1; t += step) {
    const segment = new Line(evaluate(t), evaluate(t + step))
    length += segment.length()
  }
  return length
}
