/**
 * Configuration Types
 * Engine defaults for options the statistics functions accept
 */

import type { BandwidthRule } from '../stats/density.ts'

/**
 * Minimum valid counts for NaN-aware rolling windows
 */
export interface RollingConfig {
  meanMinPeriods: number // rollingMeanNan
  varianceMinPeriods: number // rollingVarNan, rollingStdNan, rollingZscoreNan
  pairMinPeriods: number // rollingCovNan, rollingCorrNan
}

export interface RobustConfig {
  scaleFactor: number // MAD multiplier in robustScale
  epsilon: number // Denominator when MAD is exactly 0
}

export interface KdeConfig {
  bandwidth: BandwidthRule | number
  points: number // Grid size
  padding: number // Grid padding in bandwidths
}

export interface OutlierConfig {
  iqrK: number
  zThreshold: number
}

/**
 * Full engine configuration
 */
export interface EngineConfig {
  parallelism: number // Column blocks for matrix operations
  rolling: RollingConfig
  robust: RobustConfig
  kde: KdeConfig
  outliers: OutlierConfig
}

/**
 * Configuration as written in a file: every field optional
 */
export interface EngineConfigInput {
  parallelism?: number
  rolling?: Partial<RollingConfig>
  robust?: Partial<RobustConfig>
  kde?: Partial<KdeConfig>
  outliers?: Partial<OutlierConfig>
}

/**
 * Default configuration
 */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  parallelism: 1,
  rolling: {
    meanMinPeriods: 1,
    varianceMinPeriods: 2,
    pairMinPeriods: 2,
  },
  robust: {
    scaleFactor: 1.4826,
    epsilon: 1e-12,
  },
  kde: {
    bandwidth: 'silverman',
    points: 256,
    padding: 3,
  },
  outliers: {
    iqrK: 1.5,
    zThreshold: 3,
  },
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

type NumberRule = [check: (n: number) => boolean, description: string]

const POSITIVE_INT: NumberRule = [(n) => Number.isInteger(n) && n >= 1, 'a positive integer']
const PAIR_PERIODS: NumberRule = [(n) => Number.isInteger(n) && n >= 2, 'an integer >= 2']
const POSITIVE: NumberRule = [(n) => n > 0 && Number.isFinite(n), 'a positive number']
const NON_NEGATIVE: NumberRule = [(n) => n >= 0 && Number.isFinite(n), 'a number >= 0']
const GRID_POINTS: NumberRule = [(n) => Number.isInteger(n) && n >= 2, 'an integer >= 2']

class SectionReader {
  constructor(
    private readonly section: Record<string, unknown>,
    private readonly path: string,
    private readonly errors: string[]
  ) {}

  number(key: string, fallback: number, [check, description]: NumberRule): number {
    const value = this.section[key]
    if (value === undefined) return fallback
    if (typeof value !== 'number' || !check(value)) {
      this.errors.push(`${this.path}${key} must be ${description}`)
      return fallback
    }
    return value
  }

  bandwidth(key: string, fallback: BandwidthRule | number): BandwidthRule | number {
    const value = this.section[key]
    if (value === undefined) return fallback
    if (value === 'silverman' || value === 'scott') return value
    if (typeof value === 'number' && POSITIVE[0](value)) return value
    this.errors.push(`${this.path}${key} must be 'silverman', 'scott' or a positive number`)
    return fallback
  }
}

function section(
  root: Record<string, unknown>,
  key: string,
  errors: string[]
): SectionReader {
  const value = root[key]
  if (value === undefined) return new SectionReader({}, `${key}.`, errors)
  if (!isRecord(value)) {
    errors.push(`${key} must be an object`)
    return new SectionReader({}, `${key}.`, errors)
  }
  return new SectionReader(value, `${key}.`, errors)
}

/**
 * Read an untrusted value into a full configuration.
 * Missing fields take `base` values; invalid fields are reported and
 * also fall back to `base`.
 */
export function readEngineConfig(
  value: unknown,
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): { config: EngineConfig; errors: string[] } {
  const errors: string[] = []

  if (!isRecord(value)) {
    return { config: base, errors: ['Config must be an object'] }
  }

  const known = new Set(['parallelism', 'rolling', 'robust', 'kde', 'outliers'])
  for (const key of Object.keys(value)) {
    if (!known.has(key)) errors.push(`Unknown config key: ${key}`)
  }

  const top = new SectionReader(value, '', errors)
  const rolling = section(value, 'rolling', errors)
  const robust = section(value, 'robust', errors)
  const kde = section(value, 'kde', errors)
  const outliers = section(value, 'outliers', errors)

  const config: EngineConfig = {
    parallelism: top.number('parallelism', base.parallelism, POSITIVE_INT),
    rolling: {
      meanMinPeriods: rolling.number('meanMinPeriods', base.rolling.meanMinPeriods, POSITIVE_INT),
      varianceMinPeriods: rolling.number(
        'varianceMinPeriods',
        base.rolling.varianceMinPeriods,
        POSITIVE_INT
      ),
      pairMinPeriods: rolling.number('pairMinPeriods', base.rolling.pairMinPeriods, PAIR_PERIODS),
    },
    robust: {
      scaleFactor: robust.number('scaleFactor', base.robust.scaleFactor, POSITIVE),
      epsilon: robust.number('epsilon', base.robust.epsilon, POSITIVE),
    },
    kde: {
      bandwidth: kde.bandwidth('bandwidth', base.kde.bandwidth),
      points: kde.number('points', base.kde.points, GRID_POINTS),
      padding: kde.number('padding', base.kde.padding, NON_NEGATIVE),
    },
    outliers: {
      iqrK: outliers.number('iqrK', base.outliers.iqrK, NON_NEGATIVE),
      zThreshold: outliers.number('zThreshold', base.outliers.zThreshold, POSITIVE),
    },
  }

  return { config, errors }
}

/**
 * Validate engine configuration
 */
export function validateEngineConfig(value: unknown): {
  valid: boolean
  errors: string[]
} {
  const { errors } = readEngineConfig(value)
  return { valid: errors.length === 0, errors }
}
