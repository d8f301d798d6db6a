/**
 * Reference distributions for hypothesis tests
 * Thin wrappers over jStat with NaN handling and tail symmetry
 */

import jStat from 'jstat'

export type Alternative = 'two-sided' | 'greater' | 'less'

export function studentTCdf(t: number, df: number): number {
  if (Number.isNaN(t) || !(df > 0)) return NaN
  return jStat.studentt.cdf(t, df)
}

/**
 * P(X > x) for a chi-square variable
 */
export function chiSquareSf(x: number, df: number): number {
  if (Number.isNaN(x) || !(df > 0)) return NaN
  if (x <= 0) return 1
  return Math.max(0, 1 - jStat.chisquare.cdf(x, df))
}

export function normalCdf(z: number): number {
  if (Number.isNaN(z)) return NaN
  return jStat.normal.cdf(z, 0, 1)
}

export function normalSf(z: number): number {
  return normalCdf(-z)
}

/**
 * p-value for a statistic whose null distribution is symmetric about 0
 */
export function symmetricPValue(
  statistic: number,
  alternative: Alternative,
  cdf: (x: number) => number
): number {
  switch (alternative) {
    case 'greater':
      return cdf(-statistic)
    case 'less':
      return cdf(statistic)
    case 'two-sided':
      return Math.min(1, 2 * cdf(-Math.abs(statistic)))
  }
}
