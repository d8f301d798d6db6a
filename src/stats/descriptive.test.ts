import { describe, it, expect } from 'vitest'
import {
  mean,
  variance,
  std,
  zscore,
  meanNan,
  varianceNan,
  stdNan,
  trimmedMean,
  signMask,
  demeanWithSigns,
  meanAxis,
} from './descriptive.ts'
import { InvalidArgumentError } from './errors.ts'
import { matrixFromRows } from '../data/matrix.ts'

describe('mean / variance / std', () => {
  it('should compute the sample statistics', () => {
    expect(mean([1, 2, 3, 4])).toBe(2.5)
    expect(variance([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(32 / 7, 12)
    expect(std([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 12)
  })

  it('should return NaN on insufficient data', () => {
    expect(mean([])).toBeNaN()
    expect(variance([1])).toBeNaN()
    expect(std([])).toBeNaN()
  })

  it('should accept typed arrays', () => {
    expect(mean(new Float64Array([1, 2, 3]))).toBe(2)
  })
})

describe('zscore', () => {
  it('should standardize with the sample std', () => {
    expect(Array.from(zscore([1, 2, 3]))).toEqual([-1, 0, 1])
  })

  it('should be all NaN for a constant input', () => {
    expect(Array.from(zscore([4, 4, 4])).every(Number.isNaN)).toBe(true)
  })
})

describe('NaN-aware reductions', () => {
  it('should skip missing values', () => {
    expect(meanNan([1, NaN, 3])).toBe(2)
    expect(varianceNan([1, NaN, 3])).toBe(2)
    expect(stdNan([1, NaN, 3])).toBeCloseTo(Math.SQRT2, 12)
  })

  it('should return NaN instead of throwing when too little is left', () => {
    expect(meanNan([NaN, NaN])).toBeNaN()
    expect(varianceNan([NaN, 5])).toBeNaN()
    expect(meanNan([])).toBeNaN()
  })
})

describe('trimmedMean', () => {
  it('should drop floor(n * p / 2) values from each tail', () => {
    expect(trimmedMean([1, 2, 3, 4, 100], 0.4)).toBe(3)
    expect(trimmedMean([100, 4, 3, 2, 1], 0.4)).toBe(3)
  })

  it('should equal the mean with no trimming', () => {
    expect(trimmedMean([1, 2, 6], 0)).toBe(3)
  })

  it('should return NaN when nothing remains', () => {
    expect(trimmedMean([], 0.2)).toBeNaN()
  })

  it('should reject proportions outside [0, 1)', () => {
    expect(() => trimmedMean([1, 2], 1)).toThrow(InvalidArgumentError)
    expect(() => trimmedMean([1, 2], -0.1)).toThrow(InvalidArgumentError)
  })
})

describe('signs', () => {
  it('should map values to -1, 0, 1', () => {
    const signs = signMask([-2, 0, 3.5])
    expect(signs).toBeInstanceOf(Int8Array)
    expect(Array.from(signs)).toEqual([-1, 0, 1])
  })

  it('should demean before taking signs', () => {
    const { demeaned, signs } = demeanWithSigns([1, 2, 6])
    expect(Array.from(demeaned)).toEqual([-2, -1, 3])
    expect(Array.from(signs)).toEqual([-1, -1, 1])
  })
})

describe('meanAxis', () => {
  const m = matrixFromRows([
    [1, 2],
    [3, 4],
    [5, 6],
  ])

  it('should average columns on axis 0', () => {
    expect(Array.from(meanAxis(m, 0))).toEqual([3, 4])
  })

  it('should average rows on axis 1', () => {
    expect(Array.from(meanAxis(m, 1))).toEqual([1.5, 3.5, 5.5])
  })

  it('should not depend on the column block count', () => {
    expect(meanAxis(m, 0, { parallelism: 2 })).toEqual(meanAxis(m, 0))
  })
})
