/**
 * Statistical Dispersion Metrics
 * Robust spread, scaling, clipping, binning and outlier flags
 */

import { type Vec64, vec64, nanVec, minmax, sortedCopy, sortedValid } from '../data/vec.ts'
import { welfordFromArray, welfordVariance } from './welford.ts'
import { quantileSorted, mad as madOf, median as medianOf } from './quantile.ts'
import { zscore } from './descriptive.ts'
import { assertInRange, assertInteger, InvalidArgumentError } from './errors.ts'

/**
 * Full dispersion statistics over the non-missing values
 */
export interface Dispersion {
  // Count
  n: number
  missing: number

  // Central tendency
  mean: number
  median: number

  // Spread measures
  variance: number // Sample variance
  stdDev: number
  coefficientOfVariation: number // stdDev / |mean| (relative spread)

  // Range measures
  min: number
  max: number
  range: number

  // Quartiles
  q1: number
  q3: number
  iqr: number // Interquartile range

  // Robust measures
  mad: number // Median absolute deviation
  madStdDev: number // MAD-based estimate of std dev (MAD * 1.4826)

  // Percentiles
  p5: number
  p10: number
  p90: number
  p95: number
}

export interface MinMaxScaled {
  scaled: Vec64
  min: number
  max: number
}

export interface RobustScaled {
  scaled: Vec64
  median: number
  mad: number
}

export interface RobustScaleOptions {
  epsilon?: number // Denominator used when MAD is exactly 0 (default 1e-12)
}

// Consistency constant for a normal distribution
export const MAD_NORMAL_SCALE = 1.4826

/**
 * Compute full dispersion statistics for an array
 * NaN entries are counted as missing and left out
 */
export function computeDispersion(values: ArrayLike<number>): Dispersion {
  const sorted = sortedValid(values)
  const n = sorted.length
  const missing = values.length - n

  if (n === 0) {
    return {
      n: 0,
      missing,
      mean: NaN,
      median: NaN,
      variance: NaN,
      stdDev: NaN,
      coefficientOfVariation: NaN,
      min: NaN,
      max: NaN,
      range: NaN,
      q1: NaN,
      q3: NaN,
      iqr: NaN,
      mad: NaN,
      madStdDev: NaN,
      p5: NaN,
      p10: NaN,
      p90: NaN,
      p95: NaN,
    }
  }

  const welford = welfordFromArray(sorted)
  const variance = welfordVariance(welford)
  const stdDev = Math.sqrt(variance)

  const q1 = quantileSorted(sorted, 0.25)
  const medianVal = quantileSorted(sorted, 0.5)
  const q3 = quantileSorted(sorted, 0.75)
  const madVal = madOf(sorted, medianVal)

  return {
    n,
    missing,
    mean: welford.mean,
    median: medianVal,
    variance,
    stdDev,
    coefficientOfVariation: welford.mean !== 0 ? stdDev / Math.abs(welford.mean) : NaN,
    min: welford.min,
    max: welford.max,
    range: welford.max - welford.min,
    q1,
    q3,
    iqr: q3 - q1,
    mad: madVal,
    madStdDev: madVal * MAD_NORMAL_SCALE,
    p5: quantileSorted(sorted, 0.05),
    p10: quantileSorted(sorted, 0.1),
    p90: quantileSorted(sorted, 0.9),
    p95: quantileSorted(sorted, 0.95),
  }
}

/**
 * (x - min) / (max - min); all NaN when the range is 0
 */
export function minmaxScale(values: ArrayLike<number>): MinMaxScaled {
  const n = values.length
  if (n === 0) return { scaled: vec64(0), min: NaN, max: NaN }

  const [min, max] = minmax(values)
  const range = max - min
  if (range === 0) return { scaled: nanVec(n), min, max }

  const scaled = vec64(n)
  for (let i = 0; i < n; i++) {
    scaled[i] = (values[i]! - min) / range
  }
  return { scaled, min, max }
}

/**
 * (x - median) / (MAD * scaleFactor)
 */
export function robustScale(
  values: ArrayLike<number>,
  scaleFactor = MAD_NORMAL_SCALE,
  options: RobustScaleOptions = {}
): RobustScaled {
  const epsilon = options.epsilon ?? 1e-12
  const n = values.length
  if (n === 0) return { scaled: vec64(0), median: NaN, mad: NaN }

  const med = medianOf(values)
  const madVal = madOf(values, med)
  const denom = madVal === 0 ? epsilon : madVal * scaleFactor

  const scaled = vec64(n)
  for (let i = 0; i < n; i++) {
    scaled[i] = (values[i]! - med) / denom
  }
  return { scaled, median: med, mad: madVal }
}

/**
 * Clip values to the [lowerQ, upperQ] quantile values
 */
export function winsorize(
  values: ArrayLike<number>,
  lowerQ = 0.05,
  upperQ = 0.95
): Vec64 {
  assertInRange('lowerQ', lowerQ, 0, 1)
  assertInRange('upperQ', upperQ, 0, 1)
  if (lowerQ > upperQ) {
    throw new InvalidArgumentError('lowerQ', `lowerQ ${lowerQ} exceeds upperQ ${upperQ}`)
  }

  const sorted = sortedCopy(values)
  const lower = quantileSorted(sorted, lowerQ)
  const upper = quantileSorted(sorted, upperQ)

  const out = vec64(values.length)
  for (let i = 0; i < values.length; i++) {
    out[i] = Math.min(upper, Math.max(lower, values[i]!))
  }
  return out
}

/**
 * Bin label 0..nBins-1 per element from nBins + 1 quantile edges.
 * A value equal to an inner edge belongs to the lower bin.
 */
export function quantileBins(values: ArrayLike<number>, nBins: number): Int32Array {
  assertInteger('nBins', nBins, 1)
  const n = values.length
  const out = new Int32Array(n)
  if (n === 0) return out

  const sorted = sortedCopy(values)
  const edges = new Float64Array(nBins + 1)
  for (let i = 0; i <= nBins; i++) {
    edges[i] = quantileSorted(sorted, i / nBins)
  }

  for (let i = 0; i < n; i++) {
    const x = values[i]!
    // First edge >= x
    let lo = 0
    let hi = nBins + 1
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (edges[mid]! < x) lo = mid + 1
      else hi = mid
    }
    out[i] = Math.min(nBins - 1, Math.max(0, lo - 1))
  }
  return out
}

/**
 * Flag x < Q1 - k*IQR or x > Q3 + k*IQR
 */
export function iqrOutliers(values: ArrayLike<number>, k = 1.5): boolean[] {
  const sorted = sortedCopy(values)
  const q1 = quantileSorted(sorted, 0.25)
  const q3 = quantileSorted(sorted, 0.75)
  const spread = q3 - q1

  const lowerBound = q1 - k * spread
  const upperBound = q3 + k * spread

  const flags: boolean[] = []
  for (let i = 0; i < values.length; i++) {
    const v = values[i]!
    flags.push(v < lowerBound || v > upperBound)
  }
  return flags
}

/**
 * Flag |z| > threshold using the sample mean and standard deviation
 */
export function zscoreOutliers(values: ArrayLike<number>, threshold = 3): boolean[] {
  const z = zscore(values)
  const flags: boolean[] = []
  for (let i = 0; i < z.length; i++) {
    flags.push(Math.abs(z[i]!) > threshold)
  }
  return flags
}

/**
 * Summary statistics string
 */
export function dispersionSummary(d: Dispersion): string {
  if (d.n === 0) return 'No data'

  return [
    `n=${d.n}`,
    `missing=${d.missing}`,
    `μ=${d.mean.toFixed(4)}`,
    `σ=${d.stdDev.toFixed(4)}`,
    `med=${d.median.toFixed(4)}`,
    `IQR=${d.iqr.toFixed(4)}`,
    `MAD=${d.mad.toFixed(4)}`,
    `range=[${d.min.toFixed(4)}, ${d.max.toFixed(4)}]`,
  ].join(', ')
}
