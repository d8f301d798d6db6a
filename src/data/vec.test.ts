import { describe, it, expect } from 'vitest'
import { vec64From, nanVec, sortedCopy, sortedValid, minmax, countValid, clamp, linspace } from './vec.ts'

describe('Vec64 helpers', () => {
  it('should copy instead of aliasing', () => {
    const source = [3, 1, 2]
    const v = vec64From(source)
    v[0] = 9
    expect(source[0]).toBe(3)
    expect(Array.from(sortedCopy(source))).toEqual([1, 2, 3])
  })

  it('should drop missing values before sorting', () => {
    expect(Array.from(sortedValid([3, NaN, 1]))).toEqual([1, 3])
    expect(countValid([3, NaN, 1, NaN])).toBe(2)
    expect(Array.from(nanVec(2)).every(Number.isNaN)).toBe(true)
  })

  it('should find the range and clamp', () => {
    expect(minmax([4, -1, 7])).toEqual([-1, 7])
    expect(clamp(5, 0, 1)).toBe(1)
  })

  it('should end linspace exactly on the last point', () => {
    const grid = linspace(0, 1, 11)
    expect(grid.length).toBe(11)
    expect(grid[0]).toBe(0)
    expect(grid[10]).toBe(1)
    expect(Array.from(linspace(2, 5, 1))).toEqual([2])
  })
})
