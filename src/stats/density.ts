/**
 * Gaussian Kernel Density Estimate
 * Evaluated on an evenly spaced grid padded past the data range
 */

import { type Vec64, vec64, linspace, minmax, sortedCopy } from '../data/vec.ts'
import { quantileSorted } from './quantile.ts'
import { std } from './descriptive.ts'
import { assertInteger, assertNonEmpty, InvalidArgumentError } from './errors.ts'

export type BandwidthRule = 'silverman' | 'scott'

export interface KdeOptions {
  bandwidth?: number | BandwidthRule // Explicit width or rule of thumb (default 'silverman')
  padding?: number // Grid padding beyond [min, max], in bandwidths (default 3)
}

export interface KdeResult {
  grid: Vec64
  density: Vec64
  bandwidth: number
}

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI)

/**
 * Rule-of-thumb bandwidth.
 *   silverman: 0.9 * min(sd, IQR / 1.34) * n^(-1/5)
 *   scott:     1.06 * sd * n^(-1/5)
 * A sample with no spread at all falls back to a unit scale.
 */
export function selectBandwidth(values: ArrayLike<number>, rule: BandwidthRule = 'silverman'): number {
  assertNonEmpty('values', values)
  const n = values.length
  const sd = std(values)
  const sorted = sortedCopy(values)
  const iqrScale = (quantileSorted(sorted, 0.75) - quantileSorted(sorted, 0.25)) / 1.34

  let spread: number
  let factor: number
  if (rule === 'scott') {
    spread = sd
    factor = 1.06
  } else {
    const positive = [sd, iqrScale].filter((s) => s > 0)
    spread = positive.length > 0 ? Math.min(...positive) : NaN
    factor = 0.9
  }

  if (!(spread > 0)) spread = 1
  return factor * spread * Math.pow(n, -0.2)
}

export function kdeGaussian(
  values: ArrayLike<number>,
  nPoints = 256,
  options: KdeOptions = {}
): KdeResult {
  assertNonEmpty('values', values)
  assertInteger('nPoints', nPoints, 2)

  const requested = options.bandwidth ?? 'silverman'
  let bandwidth: number
  if (typeof requested === 'number') {
    if (!(requested > 0) || !Number.isFinite(requested)) {
      throw new InvalidArgumentError('bandwidth', `expected a positive number, got ${requested}`)
    }
    bandwidth = requested
  } else {
    bandwidth = selectBandwidth(values, requested)
  }

  const padding = options.padding ?? 3
  if (!(padding >= 0)) {
    throw new InvalidArgumentError('padding', `expected a value >= 0, got ${padding}`)
  }

  const n = values.length
  const [lo, hi] = minmax(values)
  const grid = linspace(lo - padding * bandwidth, hi + padding * bandwidth, nPoints)
  const density = vec64(nPoints)
  const norm = INV_SQRT_2PI / (n * bandwidth)

  for (let g = 0; g < nPoints; g++) {
    const at = grid[g]!
    let sum = 0
    for (let i = 0; i < n; i++) {
      const z = (at - values[i]!) / bandwidth
      sum += Math.exp(-0.5 * z * z)
    }
    density[g] = sum * norm
  }

  return { grid, density, bandwidth }
}
