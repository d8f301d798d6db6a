/**
 * Descriptive statistics
 * Scalar reductions, their NaN-aware variants and axis means
 */

import { type Vec64, vec64, nanVec, sortedCopy } from '../data/vec.ts'
import { type Matrix, getValue } from '../data/matrix.ts'
import { reduceColumns, type ColumnOptions } from './columns.ts'
import { InvalidArgumentError, assertInRange } from './errors.ts'

export interface DemeanedSigns {
  demeaned: Vec64
  signs: Int8Array
}

// --- Plain reductions (NaN-free input expected) ---

export function mean(values: ArrayLike<number>): number {
  const n = values.length
  if (n === 0) return NaN
  let sum = 0
  for (let i = 0; i < n; i++) sum += values[i]!
  return sum / n
}

/**
 * Sample variance, two-pass, n - 1 denominator
 */
export function variance(values: ArrayLike<number>): number {
  const n = values.length
  if (n < 2) return NaN
  const m = mean(values)
  let ss = 0
  for (let i = 0; i < n; i++) {
    const d = values[i]! - m
    ss += d * d
  }
  return ss / (n - 1)
}

export function std(values: ArrayLike<number>): number {
  return Math.sqrt(variance(values))
}

/**
 * Elementwise (x - mean) / std.
 * All NaN when the sample standard deviation is 0 or undefined.
 */
export function zscore(values: ArrayLike<number>): Vec64 {
  const n = values.length
  const m = mean(values)
  const s = std(values)
  if (!(s > 0)) return nanVec(n)

  const out = vec64(n)
  for (let i = 0; i < n; i++) {
    out[i] = (values[i]! - m) / s
  }
  return out
}

// --- NaN-aware reductions (skip missing entries) ---

export function meanNan(values: ArrayLike<number>): number {
  let sum = 0
  let n = 0
  for (let i = 0; i < values.length; i++) {
    const x = values[i]!
    if (Number.isNaN(x)) continue
    sum += x
    n++
  }
  return n === 0 ? NaN : sum / n
}

export function varianceNan(values: ArrayLike<number>): number {
  const m = meanNan(values)
  let ss = 0
  let n = 0
  for (let i = 0; i < values.length; i++) {
    const x = values[i]!
    if (Number.isNaN(x)) continue
    const d = x - m
    ss += d * d
    n++
  }
  return n < 2 ? NaN : ss / (n - 1)
}

export function stdNan(values: ArrayLike<number>): number {
  return Math.sqrt(varianceNan(values))
}

// --- Robust location ---

/**
 * Mean after cutting floor(n * proportion / 2) sorted values from each tail
 */
export function trimmedMean(values: ArrayLike<number>, proportion: number): number {
  if (!(proportion >= 0 && proportion < 1)) {
    throw new InvalidArgumentError('proportion', `expected a value in [0, 1), got ${proportion}`)
  }
  const n = values.length
  const cut = Math.floor((n * proportion) / 2)
  if (n - 2 * cut <= 0) return NaN

  const sorted = sortedCopy(values)
  return mean(sorted.subarray(cut, n - cut))
}

// --- Signs ---

export function signMask(values: ArrayLike<number>): Int8Array {
  const out = new Int8Array(values.length)
  for (let i = 0; i < values.length; i++) {
    const x = values[i]!
    out[i] = x > 0 ? 1 : x < 0 ? -1 : 0
  }
  return out
}

/**
 * Subtract the mean, then report the sign of each deviation
 */
export function demeanWithSigns(values: ArrayLike<number>): DemeanedSigns {
  const m = mean(values)
  const demeaned = vec64(values.length)
  for (let i = 0; i < values.length; i++) {
    demeaned[i] = values[i]! - m
  }
  return { demeaned, signs: signMask(demeaned) }
}

// --- Matrix axis reductions ---

/**
 * axis 0: one mean per column; axis 1: one mean per row
 */
export function meanAxis(m: Matrix, axis: 0 | 1, options: ColumnOptions = {}): Vec64 {
  assertInRange('axis', axis, 0, 1)

  if (axis === 0) {
    return reduceColumns(m, (column) => mean(column), options)
  }

  const out = vec64(m.rows)
  for (let r = 0; r < m.rows; r++) {
    if (m.cols === 0) {
      out[r] = NaN
      continue
    }
    let sum = 0
    for (let c = 0; c < m.cols; c++) sum += getValue(m, r, c)
    out[r] = sum / m.cols
  }
  return out
}
