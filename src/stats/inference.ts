/**
 * Inferential Statistics
 * t-tests, chi-square tests, effect sizes and Mann-Whitney U
 */

import { type Vec64, vec64 } from '../data/vec.ts'
import { type Matrix, createMatrix, getValue, matrixFromRows, setValue } from '../data/matrix.ts'
import { mean, variance } from './descriptive.ts'
import {
  type Alternative,
  chiSquareSf,
  normalSf,
  studentTCdf,
  symmetricPValue,
} from './distributions.ts'
import { assertNonEmpty, assertSameLength, InvalidArgumentError } from './errors.ts'

export interface TestResult {
  statistic: number
  pValue: number
}

export interface TTestResult extends TestResult {
  df: number
}

export interface ChiSquareResult extends TestResult {
  df: number
}

export interface ContingencyResult extends ChiSquareResult {
  expected: Matrix
}

export interface TTest2SampOptions {
  equalVar?: boolean // Pooled variance (true, default) or Welch (false)
  alternative?: Alternative
}

export interface ContingencyOptions {
  correction?: boolean // Yates' continuity correction when df = 1 (default true)
}

export interface CohensDOptions {
  pooled?: boolean // Pooled (default) or average-variance denominator
}

export interface RankResult {
  ranks: Vec64
  tieTerm: number // Sum of t^3 - t over tie groups
}

const UNDEFINED_T: TTestResult = { statistic: NaN, pValue: NaN, df: NaN }

function tResult(statistic: number, df: number, alternative: Alternative): TTestResult {
  if (!Number.isFinite(statistic)) return { statistic: NaN, pValue: NaN, df }
  return {
    statistic,
    pValue: symmetricPValue(statistic, alternative, (t) => studentTCdf(t, df)),
    df,
  }
}

/**
 * One-sample t-test of mean(x) against mu
 */
export function tTest1Samp(
  x: ArrayLike<number>,
  mu = 0,
  alternative: Alternative = 'two-sided'
): TTestResult {
  assertNonEmpty('x', x)
  const n = x.length
  if (n < 2) return UNDEFINED_T

  const se = Math.sqrt(variance(x) / n)
  return tResult((mean(x) - mu) / se, n - 1, alternative)
}

/**
 * Two-sample t-test: pooled variance, or Welch with
 * Welch-Satterthwaite degrees of freedom
 */
export function tTest2Samp(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  options: TTest2SampOptions = {}
): TTestResult {
  const { equalVar = true, alternative = 'two-sided' } = options
  assertNonEmpty('x', x)
  assertNonEmpty('y', y)
  const n1 = x.length
  const n2 = y.length
  if (n1 < 2 || n2 < 2) return UNDEFINED_T

  const v1 = variance(x)
  const v2 = variance(y)
  const delta = mean(x) - mean(y)

  if (equalVar) {
    const df = n1 + n2 - 2
    const pooled = ((n1 - 1) * v1 + (n2 - 1) * v2) / df
    const se = Math.sqrt(pooled * (1 / n1 + 1 / n2))
    return tResult(delta / se, df, alternative)
  }

  const a = v1 / n1
  const b = v2 / n2
  const df = ((a + b) * (a + b)) / ((a * a) / (n1 - 1) + (b * b) / (n2 - 1))
  return tResult(delta / Math.sqrt(a + b), df, alternative)
}

/**
 * Chi-square goodness of fit; uniform expectation when `expected` is omitted
 */
export function chi2Gof(
  observed: ArrayLike<number>,
  expected?: ArrayLike<number>
): ChiSquareResult {
  assertNonEmpty('observed', observed)
  const k = observed.length
  let total = 0
  for (let i = 0; i < k; i++) total += observed[i]!

  if (expected !== undefined) assertSameLength(observed, expected)

  let statistic = 0
  for (let i = 0; i < k; i++) {
    const e = expected === undefined ? total / k : expected[i]!
    if (!(e > 0)) {
      throw new InvalidArgumentError('expected', `expected frequencies must be > 0, got ${e} at ${i}`)
    }
    const d = observed[i]! - e
    statistic += (d * d) / e
  }

  const df = k - 1
  return { statistic, pValue: chiSquareSf(statistic, df), df }
}

/**
 * Chi-square test of independence on an r x c contingency table
 */
export function chi2Independence(
  table: Matrix | ArrayLike<number>[],
  options: ContingencyOptions = {}
): ContingencyResult {
  const observed = Array.isArray(table) ? matrixFromRows(table) : table
  const { rows, cols } = observed
  if (rows === 0 || cols === 0) {
    throw new InvalidArgumentError('table', 'contingency table must not be empty')
  }

  const rowSums = new Float64Array(rows)
  const colSums = new Float64Array(cols)
  let total = 0
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const o = getValue(observed, r, c)
      rowSums[r] = rowSums[r]! + o
      colSums[c] = colSums[c]! + o
      total += o
    }
  }

  const df = (rows - 1) * (cols - 1)
  const yates = (options.correction ?? true) && df === 1
  const expected = createMatrix(rows, cols)
  let statistic = 0

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const e = (rowSums[r]! * colSums[c]!) / total
      if (!(e > 0)) {
        throw new InvalidArgumentError('table', `zero expected frequency at (${r}, ${c})`)
      }
      setValue(expected, r, c, e)
      let d = Math.abs(getValue(observed, r, c) - e)
      if (yates) d = Math.max(0, d - 0.5)
      statistic += (d * d) / e
    }
  }

  const pValue = df === 0 ? 1 : chiSquareSf(statistic, df)
  return { statistic, pValue, df, expected }
}

/**
 * Standardized mean difference (mean(x) - mean(y)) / s
 */
export function cohensD(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  options: CohensDOptions = {}
): number {
  const n1 = x.length
  const n2 = y.length
  if (n1 < 2 || n2 < 2) return NaN

  const v1 = variance(x)
  const v2 = variance(y)
  const s = (options.pooled ?? true)
    ? Math.sqrt(((n1 - 1) * v1 + (n2 - 1) * v2) / (n1 + n2 - 2))
    : Math.sqrt((v1 + v2) / 2)
  if (!(s > 0)) return NaN
  return (mean(x) - mean(y)) / s
}

/**
 * Cohen's d (pooled) times the small-sample factor 1 - 3 / (4 df - 1)
 */
export function hedgesG(x: ArrayLike<number>, y: ArrayLike<number>): number {
  const df = x.length + y.length - 2
  return cohensD(x, y) * (1 - 3 / (4 * df - 1))
}

/**
 * 1-based ranks with ties given their average rank
 */
export function averageRanks(values: ArrayLike<number>): RankResult {
  const n = values.length
  const order = Array.from({ length: n }, (_, i) => i)
  order.sort((a, b) => values[a]! - values[b]!)

  const ranks = vec64(n)
  let tieTerm = 0
  let i = 0
  while (i < n) {
    let j = i
    while (j + 1 < n && values[order[j + 1]!]! === values[order[i]!]!) j++
    const rank = (i + j) / 2 + 1
    for (let k = i; k <= j; k++) ranks[order[k]!] = rank
    const t = j - i + 1
    tieTerm += t * t * t - t
    i = j + 1
  }
  return { ranks, tieTerm }
}

/**
 * Mann-Whitney U for x against y.
 * Statistic is U of x; the p-value uses the tie-corrected normal
 * approximation with a 0.5 continuity correction.
 */
export function mannWhitneyU(
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  alternative: Alternative = 'two-sided'
): TestResult {
  assertNonEmpty('x', x)
  assertNonEmpty('y', y)
  const n1 = x.length
  const n2 = y.length
  const total = n1 + n2

  const combined = new Float64Array(total)
  combined.set(x, 0)
  combined.set(y, n1)
  const { ranks, tieTerm } = averageRanks(combined)

  let rankSum = 0
  for (let i = 0; i < n1; i++) rankSum += ranks[i]!
  const u1 = rankSum - (n1 * (n1 + 1)) / 2
  const u2 = n1 * n2 - u1

  const mu = (n1 * n2) / 2
  const sigma = Math.sqrt(((n1 * n2) / 12) * (total + 1 - tieTerm / (total * (total - 1))))
  if (!(sigma > 0)) return { statistic: u1, pValue: NaN }

  const u = alternative === 'greater' ? u1 : alternative === 'less' ? u2 : Math.max(u1, u2)
  const z = (u - mu - 0.5) / sigma
  let pValue = normalSf(z)
  if (alternative === 'two-sided') pValue *= 2

  return { statistic: u1, pValue: Math.min(1, Math.max(0, pValue)) }
}
