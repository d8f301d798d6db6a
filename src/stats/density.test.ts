import { describe, it, expect } from 'vitest'
import { selectBandwidth, kdeGaussian } from './density.ts'
import { InvalidArgumentError } from './errors.ts'
import { normalishSeries } from '../testing/random.ts'

const trapezoid = (x: Float64Array, y: Float64Array) => {
  let area = 0
  for (let i = 1; i < x.length; i++) {
    area += ((y[i]! + y[i - 1]!) / 2) * (x[i]! - x[i - 1]!)
  }
  return area
}

describe('selectBandwidth', () => {
  const values = [1, 2, 3, 4, 5]

  it('should use the smaller of sd and IQR / 1.34 for Silverman', () => {
    // sd = sqrt(2.5) > IQR / 1.34 = 2 / 1.34
    expect(selectBandwidth(values)).toBeCloseTo(0.9 * (2 / 1.34) * Math.pow(5, -0.2), 12)
  })

  it('should use sd for Scott', () => {
    expect(selectBandwidth(values, 'scott')).toBeCloseTo(1.06 * Math.sqrt(2.5) * Math.pow(5, -0.2), 12)
  })

  it('should fall back to a unit spread for constant data', () => {
    expect(selectBandwidth([3, 3, 3, 3])).toBeCloseTo(0.9 * Math.pow(4, -0.2), 12)
  })
})

describe('kdeGaussian', () => {
  it('should integrate to about 1', () => {
    const values = normalishSeries(21, 200, 10, 2)
    const { grid, density } = kdeGaussian(values, 512)
    const area = trapezoid(grid, density)
    expect(area).toBeGreaterThan(0.95)
    expect(area).toBeLessThan(1.05)
  })

  it('should pad the grid by padding * bandwidth', () => {
    const values = [0, 1, 2, 3]
    const { grid, bandwidth } = kdeGaussian(values, 64, { padding: 2 })
    expect(grid.length).toBe(64)
    expect(grid[0]).toBeCloseTo(0 - 2 * bandwidth, 12)
    expect(grid[63]).toBeCloseTo(3 + 2 * bandwidth, 12)
  })

  it('should evaluate the normal kernel with an explicit bandwidth', () => {
    const { grid, density, bandwidth } = kdeGaussian([0], 3, { bandwidth: 1, padding: 1 })
    expect(bandwidth).toBe(1)
    expect(Array.from(grid)).toEqual([-1, 0, 1])
    expect(density[1]).toBeCloseTo(1 / Math.sqrt(2 * Math.PI), 12)
    expect(density[0]).toBeCloseTo(Math.exp(-0.5) / Math.sqrt(2 * Math.PI), 12)
    expect(density[2]).toBeCloseTo(density[0]!, 15)
  })

  it('should reject bad arguments', () => {
    expect(() => kdeGaussian([], 16)).toThrow(InvalidArgumentError)
    expect(() => kdeGaussian([1, 2], 1)).toThrow(InvalidArgumentError)
    expect(() => kdeGaussian([1, 2], 16, { bandwidth: -1 })).toThrow(InvalidArgumentError)
  })
})
