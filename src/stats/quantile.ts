/**
 * Quantile and Percentile Calculations
 * Linear interpolation between order statistics by default
 */

import { sortedCopy } from '../data/vec.ts'
import { assertInRange } from './errors.ts'

export type InterpolationMethod =
  | 'linear' // Linear interpolation (default)
  | 'lower' // Floor index
  | 'higher' // Ceil index
  | 'nearest' // Nearest index
  | 'midpoint' // Average of lower and higher

export interface InterquartileRange {
  q1: number
  q3: number
  iqr: number
}

/**
 * Compute quantile of sorted array
 * @param sorted - Pre-sorted array
 * @param p - Quantile (0 to 1)
 * @param method - Interpolation method
 */
export function quantileSorted(
  sorted: ArrayLike<number>,
  p: number,
  method: InterpolationMethod = 'linear'
): number {
  const n = sorted.length
  if (n === 0) return NaN
  if (n === 1) return sorted[0]!
  if (p <= 0) return sorted[0]!
  if (p >= 1) return sorted[n - 1]!

  const index = p * (n - 1)
  const lower = Math.floor(index)
  const upper = Math.ceil(index)
  const frac = index - lower

  switch (method) {
    case 'lower':
      return sorted[lower]!
    case 'higher':
      return sorted[upper]!
    case 'nearest':
      return frac < 0.5 ? sorted[lower]! : sorted[upper]!
    case 'midpoint':
      return (sorted[lower]! + sorted[upper]!) / 2
    case 'linear':
    default:
      if (lower === upper) return sorted[lower]!
      return sorted[lower]! * (1 - frac) + sorted[upper]! * frac
  }
}

/**
 * Quantile of unsorted values (0 to 1)
 * Creates a sorted copy internally
 */
export function quantile(
  values: ArrayLike<number>,
  p: number,
  method: InterpolationMethod = 'linear'
): number {
  assertInRange('p', p, 0, 1)
  return quantileSorted(sortedCopy(values), p, method)
}

/**
 * Compute multiple quantiles with a single sort
 */
export function quantiles(
  values: ArrayLike<number>,
  ps: number[],
  method: InterpolationMethod = 'linear'
): number[] {
  for (const p of ps) assertInRange('p', p, 0, 1)
  const sorted = sortedCopy(values)
  return ps.map((p) => quantileSorted(sorted, p, method))
}

/**
 * Percentile (0-100 scale)
 */
export function percentile(
  values: ArrayLike<number>,
  q: number,
  method: InterpolationMethod = 'linear'
): number {
  assertInRange('q', q, 0, 100)
  return quantileSorted(sortedCopy(values), q / 100, method)
}

export function median(values: ArrayLike<number>): number {
  return quantileSorted(sortedCopy(values), 0.5)
}

/**
 * Quartiles and their spread (Q3 - Q1)
 */
export function iqr(values: ArrayLike<number>): InterquartileRange {
  const sorted = sortedCopy(values)
  const q1 = quantileSorted(sorted, 0.25)
  const q3 = quantileSorted(sorted, 0.75)
  return { q1, q3, iqr: q3 - q1 }
}

/**
 * Median Absolute Deviation (MAD)
 * Raw median of |x - median|, no consistency constant
 */
export function mad(values: ArrayLike<number>, medianValue?: number): number {
  const n = values.length
  if (n === 0) return NaN

  const med = medianValue ?? median(values)

  const deviations = new Float64Array(n)
  for (let i = 0; i < n; i++) {
    deviations[i] = Math.abs(values[i]! - med)
  }

  deviations.sort()
  return quantileSorted(deviations, 0.5)
}
