/**
 * Sequence transforms
 * Differences, cumulative sums and the empirical CDF
 */

import { type Vec64, vec64, nanVec, sortedCopy } from '../data/vec.ts'
import { assertInteger } from './errors.ts'

export interface Ecdf {
  values: Vec64 // Sorted ascending
  probabilities: Vec64 // i / n for 1-indexed rank i
}

/**
 * Sequence of n missing values
 */
export function padNan(n: number): Vec64 {
  assertInteger('n', n, 0)
  return nanVec(n)
}

/**
 * out[i] = x[i] - x[i - periods], NaN for i < periods
 */
export function diff(values: ArrayLike<number>, periods = 1): Vec64 {
  assertInteger('periods', periods, 1)
  const n = values.length
  const out = nanVec(n)
  for (let i = periods; i < n; i++) {
    out[i] = values[i]! - values[i - periods]!
  }
  return out
}

/**
 * out[i] = x[i] / x[i - periods] - 1; division by zero gives NaN
 */
export function pctChange(values: ArrayLike<number>, periods = 1): Vec64 {
  assertInteger('periods', periods, 1)
  const n = values.length
  const out = nanVec(n)
  for (let i = periods; i < n; i++) {
    const change = values[i]! / values[i - periods]! - 1
    out[i] = Number.isFinite(change) ? change : NaN
  }
  return out
}

export function cumsum(values: ArrayLike<number>): Vec64 {
  const out = vec64(values.length)
  let sum = 0
  for (let i = 0; i < values.length; i++) {
    sum += values[i]!
    out[i] = sum
  }
  return out
}

export function cummean(values: ArrayLike<number>): Vec64 {
  const out = vec64(values.length)
  let sum = 0
  for (let i = 0; i < values.length; i++) {
    sum += values[i]!
    out[i] = sum / (i + 1)
  }
  return out
}

/**
 * Empirical CDF; the last probability is exactly 1
 */
export function ecdf(values: ArrayLike<number>): Ecdf {
  const n = values.length
  const probabilities = vec64(n)
  for (let i = 0; i < n; i++) {
    probabilities[i] = (i + 1) / n
  }
  return { values: sortedCopy(values), probabilities }
}
