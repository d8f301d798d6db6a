/**
 * Tests for dispersion, scaling and outlier flags
 */

import { describe, it, expect } from 'vitest'
import {
  computeDispersion,
  dispersionSummary,
  minmaxScale,
  robustScale,
  winsorize,
  quantileBins,
  iqrOutliers,
  zscoreOutliers,
} from './dispersion.ts'
import { InvalidArgumentError } from './errors.ts'

describe('computeDispersion', () => {
  it('should summarize the valid values and count the missing ones', () => {
    const d = computeDispersion([1, 2, NaN, 3, 4])
    expect(d.n).toBe(4)
    expect(d.missing).toBe(1)
    expect(d.mean).toBe(2.5)
    expect(d.median).toBe(2.5)
    expect(d.variance).toBeCloseTo(5 / 3, 12)
    expect(d.min).toBe(1)
    expect(d.max).toBe(4)
    expect(d.range).toBe(3)
    expect(d.q1).toBe(1.75)
    expect(d.q3).toBe(3.25)
    expect(d.mad).toBe(1)
  })

  it('should be all NaN without valid values', () => {
    const d = computeDispersion([NaN])
    expect(d.n).toBe(0)
    expect(d.missing).toBe(1)
    expect(d.mean).toBeNaN()
    expect(dispersionSummary(d)).toBe('No data')
  })
})

describe('minmaxScale', () => {
  it('should map to [0, 1]', () => {
    const { scaled, min, max } = minmaxScale([2, 4, 6])
    expect(Array.from(scaled)).toEqual([0, 0.5, 1])
    expect(min).toBe(2)
    expect(max).toBe(6)
  })

  it('should be all NaN when the range is 0', () => {
    const { scaled, min, max } = minmaxScale([5, 5, 5])
    expect(Array.from(scaled).every(Number.isNaN)).toBe(true)
    expect(min).toBe(5)
    expect(max).toBe(5)
  })

  it('should handle empty input', () => {
    const { scaled, min } = minmaxScale([])
    expect(scaled.length).toBe(0)
    expect(min).toBeNaN()
  })
})

describe('robustScale', () => {
  it('should center on the median and divide by MAD * factor', () => {
    const { scaled, median, mad } = robustScale([1, 2, 3, 4, 100], 1)
    expect(median).toBe(3)
    expect(mad).toBe(1)
    expect(Array.from(scaled)).toEqual([-2, -1, 0, 1, 97])
  })

  it('should use the normal consistency factor by default', () => {
    const { scaled } = robustScale([1, 2, 3, 4, 100])
    expect(scaled[0]).toBeCloseTo(-2 / 1.4826, 12)
    expect(scaled[2]).toBe(0)
  })

  it('should fall back to epsilon when MAD is exactly 0', () => {
    expect(robustScale([5, 5, 5, 6]).scaled[3]).toBeCloseTo(1e12, 0)
    expect(Array.from(robustScale([5, 5, 5, 6], 1, { epsilon: 0.5 }).scaled)).toEqual([0, 0, 0, 2])
  })
})

describe('winsorize', () => {
  it('should clip to the quantile values', () => {
    const values = Array.from({ length: 10 }, (_, i) => i + 1)
    const out = winsorize(values, 0.1, 0.9)
    expect(out[0]).toBeCloseTo(1.9, 12)
    expect(out[1]).toBe(2)
    expect(out[8]).toBe(9)
    expect(out[9]).toBeCloseTo(9.1, 12)
  })

  it('should reject inverted or out-of-range bounds', () => {
    expect(() => winsorize([1, 2, 3], 0.9, 0.1)).toThrow(InvalidArgumentError)
    expect(() => winsorize([1, 2, 3], 0, 1.5)).toThrow(InvalidArgumentError)
  })
})

describe('quantileBins', () => {
  it('should split evenly spaced data into equal bins', () => {
    const values = Array.from({ length: 50 }, (_, i) => i + 1)
    const labels = quantileBins(values, 5)
    const counts = [0, 0, 0, 0, 0]
    for (const label of labels) counts[label]!++
    expect(counts).toEqual([10, 10, 10, 10, 10])
    expect(labels[0]).toBe(0)
    expect(labels[49]).toBe(4)
  })

  it('should put a value on an edge in the lower bin', () => {
    expect(Array.from(quantileBins([1, 2, 3, 4, 5], 2))).toEqual([0, 0, 0, 1, 1])
  })

  it('should reject fewer than one bin', () => {
    expect(() => quantileBins([1, 2], 0)).toThrow(InvalidArgumentError)
  })
})

describe('outlier flags', () => {
  it('should flag values beyond k * IQR from the quartiles', () => {
    const flags = iqrOutliers([10, 12, 11, 13, 9, 8, 50, -20, 10, 11], 1.5)
    expect(flags.flatMap((f, i) => (f ? [i] : []))).toEqual([6, 7])
  })

  it('should flag |z| above the threshold', () => {
    const values = [...Array.from({ length: 19 }, () => 0), 10]
    const flags = zscoreOutliers(values, 3)
    expect(flags.flatMap((f, i) => (f ? [i] : []))).toEqual([19])
  })

  it('should flag nothing on constant data', () => {
    expect(zscoreOutliers([2, 2, 2])).toEqual([false, false, false])
  })
})
