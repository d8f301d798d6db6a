/**
 * Streaming accumulator
 * Running count, mean and sum of squared deviations (Welford), with
 * Chan's pairwise combination for partitioned input
 */

export interface WelfordState {
  n: number
  mean: number
  m2: number // Sum of squared deviations from the running mean
  min: number
  max: number
}

/**
 * Summary returned by the one-pass helper
 */
export interface WelfordSummary {
  mean: number
  variance: number // Sample variance, NaN when n < 2
  n: number
}

/**
 * Empty accumulator
 */
export function createWelford(): WelfordState {
  return {
    n: 0,
    mean: 0,
    m2: 0,
    min: Infinity,
    max: -Infinity,
  }
}

/**
 * Fold one observation into the state
 */
export function welfordUpdate(state: WelfordState, x: number): void {
  state.n++
  const delta = x - state.mean
  state.mean += delta / state.n
  // Second factor uses the updated mean
  state.m2 += delta * (x - state.mean)

  if (x < state.min) state.min = x
  if (x > state.max) state.max = x
}

export function welfordUpdateBatch(state: WelfordState, values: ArrayLike<number>): void {
  for (let i = 0; i < values.length; i++) {
    welfordUpdate(state, values[i]!)
  }
}

/**
 * Combine the states of two disjoint partitions
 */
export function welfordMerge(a: WelfordState, b: WelfordState): WelfordState {
  if (a.n === 0) return { ...b }
  if (b.n === 0) return { ...a }

  const n = a.n + b.n
  const delta = b.mean - a.mean

  return {
    n,
    mean: a.mean + delta * (b.n / n),
    m2: a.m2 + b.m2 + delta * delta * ((a.n * b.n) / n),
    min: Math.min(a.min, b.min),
    max: Math.max(a.max, b.max),
  }
}

/**
 * Sample variance (n - 1 denominator)
 */
export function welfordVariance(state: WelfordState): number {
  if (state.n < 2) return NaN
  return state.m2 / (state.n - 1)
}

export function welfordPopulationVariance(state: WelfordState): number {
  if (state.n < 1) return NaN
  return state.m2 / state.n
}

export function welfordStdDev(state: WelfordState): number {
  return Math.sqrt(welfordVariance(state))
}

export function welfordFromArray(values: ArrayLike<number>): WelfordState {
  const state = createWelford()
  welfordUpdateBatch(state, values)
  return state
}

/**
 * One pass over a sequence: mean, sample variance, count
 */
export function welford(values: ArrayLike<number>): WelfordSummary {
  const state = welfordFromArray(values)
  return {
    mean: state.n === 0 ? NaN : state.mean,
    variance: welfordVariance(state),
    n: state.n,
  }
}
