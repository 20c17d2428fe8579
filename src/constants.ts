// Parameter step used when approximating quadratic Bezier length as a polyline.
export const QUAD_LENGTH_APPROXIMATION_INTERVAL = 0.01

// Cubics get a finer step since they can bend twice.
export const CUBIC_LENGTH_APPROXIMATION_INTERVAL = 0.005

// Decimal places used when printing measurements.
export const DEFAULT_PRECISION = 3
