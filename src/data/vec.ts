/**
 * Vec64 TypedArray utilities
 * Every engine output is a freshly allocated Float64Array
 */

export type Vec64 = Float64Array

// Create vectors
export const vec64 = (length: number): Vec64 => new Float64Array(length)

export const vec64From = (arr: ArrayLike<number>): Vec64 => new Float64Array(arr)

// NaN-filled vector (positions not yet defined)
export function nanVec(length: number): Vec64 {
  return new Float64Array(length).fill(NaN)
}

// Ascending sorted copy; NaN-free input expected
export function sortedCopy(v: ArrayLike<number>): Vec64 {
  return new Float64Array(v).sort()
}

// Sorted copy with NaN entries removed
export function sortedValid(v: ArrayLike<number>): Vec64 {
  const out: number[] = []
  for (let i = 0; i < v.length; i++) {
    const x = v[i]!
    if (!Number.isNaN(x)) out.push(x)
  }
  return new Float64Array(out).sort()
}

export function minmax(v: ArrayLike<number>): [number, number] {
  let lo = Infinity
  let hi = -Infinity
  for (let i = 0; i < v.length; i++) {
    const val = v[i]!
    if (val < lo) lo = val
    if (val > hi) hi = val
  }
  return [lo, hi]
}

export function countValid(v: ArrayLike<number>): number {
  let n = 0
  for (let i = 0; i < v.length; i++) {
    if (!Number.isNaN(v[i]!)) n++
  }
  return n
}

// Clamp value to range
export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value))
}

// Fill with linspace values
export function linspace(start: number, end: number, n: number): Vec64 {
  const result = vec64(n)
  if (n === 1) {
    result[0] = start
    return result
  }
  const step = (end - start) / (n - 1)
  for (let i = 0; i < n; i++) {
    result[i] = start + i * step
  }
  result[n - 1] = end
  return result
}
