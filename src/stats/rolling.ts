/**
 * Rolling Window Statistics
 * Causal windows [i - w + 1, i]; outputs keep the input length and
 * carry NaN until the first full window
 */

import { type Vec64, nanVec, vec64 } from '../data/vec.ts'
import { type Matrix, createMatrix, getColumn, setColumn } from '../data/matrix.ts'
import { columnBlocks, mapColumns, type ColumnOptions } from './columns.ts'
import { SlidingMoments, slideWindow } from './window.ts'
import { assertWindow, InvalidArgumentError } from './errors.ts'

export interface RollingMeanStd {
  mean: Vec64
  std: Vec64
}

export interface RollingMeanStdMatrix {
  mean: Matrix
  std: Matrix
}

/**
 * Minimum number of valid values a window needs before it emits.
 * Mean-type statistics default to 1, variance-type statistics to 2.
 */
export interface RollingNanOptions {
  minPeriods?: number
}

type MomentsStat = (moments: SlidingMoments, value: number) => number

function rollingMoments(
  values: ArrayLike<number>,
  window: number,
  skipNaN: boolean,
  stat: MomentsStat
): Vec64 {
  assertWindow(window, values.length)
  const out = nanVec(values.length)
  const moments = new SlidingMoments(values, skipNaN)
  slideWindow(values.length, window, moments, (i) => {
    out[i] = stat(moments, values[i]!)
  })
  return out
}

function minPeriodsOf(options: RollingNanOptions, fallback: number, window: number): number {
  const minPeriods = options.minPeriods ?? fallback
  if (!Number.isInteger(minPeriods) || minPeriods < 1 || minPeriods > window) {
    throw new InvalidArgumentError(
      'minPeriods',
      `expected an integer in [1, ${window}], got ${minPeriods}`
    )
  }
  return minPeriods
}

function zscoreOf(value: number, mean: number, std: number): number {
  if (!(std > 0)) return NaN
  return (value - mean) / std
}

// --- Plain rolling statistics (a NaN in the window yields NaN) ---

export function rollingMean(values: ArrayLike<number>, window: number): Vec64 {
  return rollingMoments(values, window, false, (m) => m.mean())
}

export function rollingVar(values: ArrayLike<number>, window: number): Vec64 {
  return rollingMoments(values, window, false, (m) => m.variance())
}

export function rollingStd(values: ArrayLike<number>, window: number): Vec64 {
  return rollingMoments(values, window, false, (m) => Math.sqrt(m.variance()))
}

/**
 * Mean and standard deviation from the same sliding sums
 */
export function rollingMeanStd(values: ArrayLike<number>, window: number): RollingMeanStd {
  assertWindow(window, values.length)
  const mean = nanVec(values.length)
  const std = nanVec(values.length)
  const moments = new SlidingMoments(values, false)
  slideWindow(values.length, window, moments, (i) => {
    mean[i] = moments.mean()
    std[i] = Math.sqrt(moments.variance())
  })
  return { mean, std }
}

/**
 * (x[i] - rolling mean) / rolling std
 */
export function rollingZscore(values: ArrayLike<number>, window: number): Vec64 {
  return rollingMoments(values, window, false, (m, x) =>
    zscoreOf(x, m.mean(), Math.sqrt(m.variance()))
  )
}

/**
 * out[0] = x[0], out[i] = alpha * x[i] + (1 - alpha) * out[i - 1]
 * No bias adjustment
 */
export function ewma(values: ArrayLike<number>, alpha: number): Vec64 {
  if (!(alpha > 0 && alpha <= 1)) {
    throw new InvalidArgumentError('alpha', `expected a value in (0, 1], got ${alpha}`)
  }
  const n = values.length
  const out = vec64(n)
  if (n === 0) return out

  let prev = values[0]!
  out[0] = prev
  for (let i = 1; i < n; i++) {
    prev = alpha * values[i]! + (1 - alpha) * prev
    out[i] = prev
  }
  return out
}

// --- NaN-aware rolling statistics (missing values skipped) ---

export function rollingMeanNan(
  values: ArrayLike<number>,
  window: number,
  options: RollingNanOptions = {}
): Vec64 {
  assertWindow(window, values.length)
  const minPeriods = minPeriodsOf(options, 1, window)
  return rollingMoments(values, window, true, (m) => m.mean(minPeriods))
}

export function rollingVarNan(
  values: ArrayLike<number>,
  window: number,
  options: RollingNanOptions = {}
): Vec64 {
  assertWindow(window, values.length)
  const minPeriods = minPeriodsOf(options, 2, window)
  return rollingMoments(values, window, true, (m) => m.variance(minPeriods))
}

export function rollingStdNan(
  values: ArrayLike<number>,
  window: number,
  options: RollingNanOptions = {}
): Vec64 {
  assertWindow(window, values.length)
  const minPeriods = minPeriodsOf(options, 2, window)
  return rollingMoments(values, window, true, (m) => Math.sqrt(m.variance(minPeriods)))
}

/**
 * NaN where x[i] itself is missing or the window has too few valid values
 */
export function rollingZscoreNan(
  values: ArrayLike<number>,
  window: number,
  options: RollingNanOptions = {}
): Vec64 {
  assertWindow(window, values.length)
  const minPeriods = minPeriodsOf(options, 2, window)
  return rollingMoments(values, window, true, (m, x) =>
    Number.isNaN(x) ? NaN : zscoreOf(x, m.mean(), Math.sqrt(m.variance(minPeriods)))
  )
}

// --- Matrix column-wise rolling (shape preserving) ---

function assertMatrixWindow(m: Matrix, window: number): void {
  assertWindow(window, m.rows)
}

export function rollingMeanAxis0(m: Matrix, window: number, options: ColumnOptions = {}): Matrix {
  assertMatrixWindow(m, window)
  return mapColumns(m, (column) => rollingMean(column, window), options)
}

export function rollingVarAxis0(m: Matrix, window: number, options: ColumnOptions = {}): Matrix {
  assertMatrixWindow(m, window)
  return mapColumns(m, (column) => rollingVar(column, window), options)
}

export function rollingStdAxis0(m: Matrix, window: number, options: ColumnOptions = {}): Matrix {
  assertMatrixWindow(m, window)
  return mapColumns(m, (column) => rollingStd(column, window), options)
}

export function rollingZscoreAxis0(
  m: Matrix,
  window: number,
  options: ColumnOptions = {}
): Matrix {
  assertMatrixWindow(m, window)
  return mapColumns(m, (column) => rollingZscore(column, window), options)
}

export function rollingMeanStdAxis0(
  m: Matrix,
  window: number,
  options: ColumnOptions = {}
): RollingMeanStdMatrix {
  assertMatrixWindow(m, window)
  const mean = createMatrix(m.rows, m.cols)
  const std = createMatrix(m.rows, m.cols)

  for (const block of columnBlocks(m.cols, options.parallelism)) {
    for (let c = block.start; c < block.end; c++) {
      const result = rollingMeanStd(getColumn(m, c), window)
      setColumn(mean, c, result.mean)
      setColumn(std, c, result.std)
    }
  }
  return { mean, std }
}
