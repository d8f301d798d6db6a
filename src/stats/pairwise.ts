/**
 * Covariance and Correlation
 * Pairs, p x p matrices, and rolling windows over pairs
 */

import { type Vec64, nanVec, clamp } from '../data/vec.ts'
import { type Matrix, createMatrix, getColumn, setValue } from '../data/matrix.ts'
import { columnBlocks, type ColumnOptions } from './columns.ts'
import { SlidingCoMoments, slideWindow } from './window.ts'
import { assertSameLength, assertWindow, InvalidArgumentError } from './errors.ts'
import type { RollingNanOptions } from './rolling.ts'

/**
 * Centered cross and square sums over the usable pairs
 */
interface PairSums {
  n: number
  sxy: number
  sxx: number
  syy: number
}

function pairSums(x: ArrayLike<number>, y: ArrayLike<number>, skipNaN: boolean): PairSums {
  assertSameLength(x, y)
  const len = x.length
  const usable = (i: number) => !skipNaN || !(Number.isNaN(x[i]!) || Number.isNaN(y[i]!))

  let n = 0
  let sumX = 0
  let sumY = 0
  for (let i = 0; i < len; i++) {
    if (!usable(i)) continue
    sumX += x[i]!
    sumY += y[i]!
    n++
  }
  if (n === 0) return { n, sxy: NaN, sxx: NaN, syy: NaN }

  const mx = sumX / n
  const my = sumY / n
  let sxy = 0
  let sxx = 0
  let syy = 0
  for (let i = 0; i < len; i++) {
    if (!usable(i)) continue
    const dx = x[i]! - mx
    const dy = y[i]! - my
    sxy += dx * dy
    sxx += dx * dx
    syy += dy * dy
  }
  return { n, sxy, sxx, syy }
}

function covFromSums(s: PairSums): number {
  return s.n < 2 ? NaN : s.sxy / (s.n - 1)
}

function corrFromSums(s: PairSums): number {
  if (s.n < 2 || !(s.sxx > 0) || !(s.syy > 0)) return NaN
  return clamp(s.sxy / Math.sqrt(s.sxx * s.syy), -1, 1)
}

// --- Pairs ---

export function cov(x: ArrayLike<number>, y: ArrayLike<number>): number {
  return covFromSums(pairSums(x, y, false))
}

/**
 * Pearson correlation; NaN when either sequence is constant
 */
export function corr(x: ArrayLike<number>, y: ArrayLike<number>): number {
  return corrFromSums(pairSums(x, y, false))
}

/**
 * Covariance over indices where both x[i] and y[i] are valid
 */
export function covNan(x: ArrayLike<number>, y: ArrayLike<number>): number {
  return covFromSums(pairSums(x, y, true))
}

export function corrNan(x: ArrayLike<number>, y: ArrayLike<number>): number {
  return corrFromSums(pairSums(x, y, true))
}

// --- Matrices ---

/**
 * p x p sample covariance of the matrix columns
 */
export function covMatrix(m: Matrix, options: ColumnOptions = {}): Matrix {
  const p = m.cols
  const out = createMatrix(p, p)
  const columns: Vec64[] = []
  for (let c = 0; c < p; c++) columns.push(getColumn(m, c))

  for (const block of columnBlocks(p, options.parallelism)) {
    for (let i = block.start; i < block.end; i++) {
      for (let j = i; j < p; j++) {
        const c = covFromSums(pairSums(columns[i]!, columns[j]!, false))
        setValue(out, i, j, c)
        setValue(out, j, i, c)
      }
    }
  }
  return out
}

/**
 * p x p correlation of the matrix columns.
 * Diagonal is exactly 1; a constant column gives a NaN row and column.
 */
export function corrMatrix(m: Matrix, options: ColumnOptions = {}): Matrix {
  const p = m.cols
  const c = covMatrix(m, options)
  const out = createMatrix(p, p)
  const scale = new Float64Array(p)
  for (let i = 0; i < p; i++) scale[i] = c.data[i * p + i]!

  for (let i = 0; i < p; i++) {
    const vi = scale[i]!
    setValue(out, i, i, vi > 0 ? 1 : NaN)
    for (let j = i + 1; j < p; j++) {
      const vj = scale[j]!
      const r = vi > 0 && vj > 0 ? clamp(c.data[i * p + j]! / Math.sqrt(vi * vj), -1, 1) : NaN
      setValue(out, i, j, r)
      setValue(out, j, i, r)
    }
  }
  return out
}

// --- Rolling pairs ---

type CoMomentsStat = (moments: SlidingCoMoments) => number

function rollingPair(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  window: number,
  skipNaN: boolean,
  stat: CoMomentsStat
): Vec64 {
  assertSameLength(x, y)
  assertWindow(window, x.length)
  const out = nanVec(x.length)
  const moments = new SlidingCoMoments(x, y, skipNaN)
  slideWindow(x.length, window, moments, (i) => {
    out[i] = stat(moments)
  })
  return out
}

function pairMinPeriods(options: RollingNanOptions, window: number): number {
  const minPeriods = options.minPeriods ?? 2
  if (!Number.isInteger(minPeriods) || minPeriods < 2 || minPeriods > window) {
    throw new InvalidArgumentError(
      'minPeriods',
      `expected an integer in [2, ${window}], got ${minPeriods}`
    )
  }
  return minPeriods
}

export function rollingCov(x: ArrayLike<number>, y: ArrayLike<number>, window: number): Vec64 {
  return rollingPair(x, y, window, false, (m) => m.covariance())
}

export function rollingCorr(x: ArrayLike<number>, y: ArrayLike<number>, window: number): Vec64 {
  return rollingPair(x, y, window, false, (m) => m.correlation())
}

/**
 * Rolling covariance over valid pairs only; NaN with fewer than
 * `minPeriods` (default 2) valid pairs in the window
 */
export function rollingCovNan(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  window: number,
  options: RollingNanOptions = {}
): Vec64 {
  assertWindow(window, x.length)
  const minPeriods = pairMinPeriods(options, window)
  return rollingPair(x, y, window, true, (m) => m.covariance(minPeriods))
}

export function rollingCorrNan(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  window: number,
  options: RollingNanOptions = {}
): Vec64 {
  assertWindow(window, x.length)
  const minPeriods = pairMinPeriods(options, window)
  return rollingPair(x, y, window, true, (m) => m.correlation(minPeriods))
}
