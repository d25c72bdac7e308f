export interface AxisStats {
  readonly mean: number
  readonly variance: number
  readonly range: number
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1)
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0
  }

  let sum = 0
  for (const value of values) {
    sum += value
  }
  return sum / values.length
}

/**
 * Population variance (divides by n).
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) {
    return 0
  }

  const avg = mean(values)
  let sum = 0
  for (const value of values) {
    const diff = value - avg
    sum += diff * diff
  }
  return sum / values.length
}

export function range(values: readonly number[]): number {
  if (values.length === 0) {
    return 0
  }

  return Math.max(...values) - Math.min(...values)
}

export function axisStats(values: readonly number[]): AxisStats {
  return {
    mean: mean(values),
    variance: variance(values),
    range: range(values),
  }
}

export function magnitude(x: number, y: number, z: number): number {
  return Math.sqrt(x * x + y * y + z * z)
}
