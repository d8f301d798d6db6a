/**
 * Sliding-window core
 *
 * One O(1)-per-step driver shared by every rolling statistic. An
 * accumulator receives the index entering the window and the index
 * leaving it; whether NaN entries are skipped or poison the window is
 * the accumulator's validity policy.
 *
 * Running sums are kept relative to a shift value so that
 * sumSq - sum^2/n does not cancel when the data sits far from zero. When
 * the window mean drifts too far from the shift, the sums are rebuilt
 * from the window contents around its first valid value.
 */

// Largest (mean - shift)^2 / m2 tolerated before the sums are rebuilt
const REBASE_RATIO = 100

export interface WindowAccumulator {
  push(index: number): void
  pop(index: number): void
}

/**
 * Drive an accumulator across a causal window of size `window`.
 * `emit` runs for every i >= window - 1 once [i - window + 1, i] is loaded.
 */
export function slideWindow(
  length: number,
  window: number,
  acc: WindowAccumulator,
  emit: (index: number) => void
): void {
  for (let i = 0; i < length; i++) {
    acc.push(i)
    if (i >= window) acc.pop(i - window)
    if (i >= window - 1) emit(i)
  }
}

function centeredSquares(sumSq: number, sum: number, count: number): number {
  const m2 = sumSq - (sum * sum) / count
  // Negative results come from rounding
  return m2 < 0 ? 0 : m2
}

/** True when the shift is far enough from the mean to lose precision */
function driftedFromShift(sumSq: number, sum: number, count: number): boolean {
  if (count < 2) return false
  const offset = sum / count
  return offset * offset > REBASE_RATIO * (sumSq - (sum * sum) / count)
}

/**
 * Count, sum and sum of squares of one sequence over the window
 */
export class SlidingMoments implements WindowAccumulator {
  count = 0
  private shift = NaN
  private sum = 0
  private sumSq = 0
  private missing = 0
  // Window bounds [start, end)
  private start = 0
  private end = 0

  constructor(
    private readonly values: ArrayLike<number>,
    private readonly skipNaN: boolean
  ) {}

  push(index: number): void {
    this.end = index + 1
    const x = this.values[index]!
    if (Number.isNaN(x)) {
      if (!this.skipNaN) this.missing++
      return
    }
    if (this.count === 0) {
      this.shift = x
      this.sum = 0
      this.sumSq = 0
    }
    const d = x - this.shift
    this.count++
    this.sum += d
    this.sumSq += d * d
    this.settle()
  }

  pop(index: number): void {
    this.start = index + 1
    const x = this.values[index]!
    if (Number.isNaN(x)) {
      if (!this.skipNaN) this.missing--
      return
    }
    const d = x - this.shift
    this.count--
    this.sum -= d
    this.sumSq -= d * d
    this.settle()
  }

  private settle(): void {
    if (driftedFromShift(this.sumSq, this.sum, this.count)) this.rebase()
  }

  /** Rebuild the sums around the first valid value in the window */
  private rebase(): void {
    this.shift = NaN
    this.sum = 0
    this.sumSq = 0
    for (let i = this.start; i < this.end; i++) {
      const x = this.values[i]!
      if (Number.isNaN(x)) continue
      if (Number.isNaN(this.shift)) this.shift = x
      const d = x - this.shift
      this.sum += d
      this.sumSq += d * d
    }
  }

  /** True when a missing value poisons the window (NaN not skipped) */
  get poisoned(): boolean {
    return this.missing > 0
  }

  mean(minPeriods = 1): number {
    if (this.poisoned || this.count === 0 || this.count < minPeriods) return NaN
    return this.shift + this.sum / this.count
  }

  /** Sample variance; needs at least max(2, minPeriods) valid values */
  variance(minPeriods = 2): number {
    if (this.poisoned || this.count < 2 || this.count < minPeriods) return NaN
    return centeredSquares(this.sumSq, this.sum, this.count) / (this.count - 1)
  }
}

/**
 * Pairwise sums (x, y, xy, x², y²) over index-aligned pairs.
 * A pair counts only when both members are valid; the pair count is
 * tracked on its own, not derived from each side's valid count.
 */
export class SlidingCoMoments implements WindowAccumulator {
  count = 0
  private shiftX = NaN
  private shiftY = NaN
  private sumX = 0
  private sumY = 0
  private sumXY = 0
  private sumXX = 0
  private sumYY = 0
  private missing = 0
  private start = 0
  private end = 0

  constructor(
    private readonly x: ArrayLike<number>,
    private readonly y: ArrayLike<number>,
    private readonly skipNaN: boolean
  ) {}

  push(index: number): void {
    this.end = index + 1
    const xi = this.x[index]!
    const yi = this.y[index]!
    if (Number.isNaN(xi) || Number.isNaN(yi)) {
      if (!this.skipNaN) this.missing++
      return
    }
    if (this.count === 0) {
      this.shiftX = xi
      this.shiftY = yi
      this.sumX = 0
      this.sumY = 0
      this.sumXY = 0
      this.sumXX = 0
      this.sumYY = 0
    }
    const dx = xi - this.shiftX
    const dy = yi - this.shiftY
    this.count++
    this.sumX += dx
    this.sumY += dy
    this.sumXY += dx * dy
    this.sumXX += dx * dx
    this.sumYY += dy * dy
    this.settle()
  }

  pop(index: number): void {
    this.start = index + 1
    const xi = this.x[index]!
    const yi = this.y[index]!
    if (Number.isNaN(xi) || Number.isNaN(yi)) {
      if (!this.skipNaN) this.missing--
      return
    }
    const dx = xi - this.shiftX
    const dy = yi - this.shiftY
    this.count--
    this.sumX -= dx
    this.sumY -= dy
    this.sumXY -= dx * dy
    this.sumXX -= dx * dx
    this.sumYY -= dy * dy
    this.settle()
  }

  private settle(): void {
    if (
      driftedFromShift(this.sumXX, this.sumX, this.count) ||
      driftedFromShift(this.sumYY, this.sumY, this.count)
    ) {
      this.rebase()
    }
  }

  /** Rebuild the sums around the first valid pair in the window */
  private rebase(): void {
    this.shiftX = NaN
    this.shiftY = NaN
    this.sumX = 0
    this.sumY = 0
    this.sumXY = 0
    this.sumXX = 0
    this.sumYY = 0
    for (let i = this.start; i < this.end; i++) {
      const xi = this.x[i]!
      const yi = this.y[i]!
      if (Number.isNaN(xi) || Number.isNaN(yi)) continue
      if (Number.isNaN(this.shiftX)) {
        this.shiftX = xi
        this.shiftY = yi
      }
      const dx = xi - this.shiftX
      const dy = yi - this.shiftY
      this.sumX += dx
      this.sumY += dy
      this.sumXY += dx * dy
      this.sumXX += dx * dx
      this.sumYY += dy * dy
    }
  }

  private ready(minPeriods: number): boolean {
    return this.missing === 0 && this.count >= 2 && this.count >= minPeriods
  }

  covariance(minPeriods = 2): number {
    if (!this.ready(minPeriods)) return NaN
    const cross = this.sumXY - (this.sumX * this.sumY) / this.count
    return cross / (this.count - 1)
  }

  /** Pearson correlation, clamped to [-1, 1]; NaN when either side is constant */
  correlation(minPeriods = 2): number {
    if (!this.ready(minPeriods)) return NaN
    const ssx = centeredSquares(this.sumXX, this.sumX, this.count)
    const ssy = centeredSquares(this.sumYY, this.sumY, this.count)
    if (ssx === 0 || ssy === 0) return NaN
    const cross = this.sumXY - (this.sumX * this.sumY) / this.count
    const r = cross / Math.sqrt(ssx * ssy)
    return Math.max(-1, Math.min(1, r))
  }
}
