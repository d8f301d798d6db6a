#!/usr/bin/env tsx
/**
 * statfold CLI
 * Column statistics over delimited numeric text files
 */

import { parseArgs } from 'node:util'
import { readFileSync, existsSync, realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { type Matrix, matrixFromRows, getColumn, toRows } from './data/matrix.ts'
import { type Vec64, nanVec } from './data/vec.ts'
import {
  computeDispersion,
  dispersionSummary,
  iqrOutliers,
  zscoreOutliers,
  corrMatrix,
  rollingMeanNan,
  rollingStdNan,
  rollingVarNan,
  rollingZscoreNan,
  rollingCovNan,
  rollingCorrNan,
  mapColumns,
  minmaxScale,
  robustScale,
  kdeGaussian,
} from './stats/index.ts'
import { loadEngineConfig, generateExampleConfig } from './config/loader.ts'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config/types.ts'
import { CATALOGUE_VERSION, listCatalogue } from './catalogue.ts'

const VERSION = '0.1.0'

const HELP = `
statfold - column statistics for numeric tables

Usage:
  statfold describe <file>
  statfold rolling <mean|std|var|zscore> -w <n> <file>
  statfold pair <cov|corr> -w <n> <file>
  statfold corr <file>
  statfold scale <minmax|robust> <file>
  statfold kde [-k <column>] <file>
  statfold catalogue

Options:
  -c, --config <file>     Load engine config from YAML/JSON file
  -w, --window <n>        Rolling window length
  -k, --column <index>    Column for kde (default: 0)
  -g, --generate          Generate example config to stdout
  -v, --version           Show version
  -h, --help              Show this help

Input:
  One row per line; fields separated by commas, tabs or spaces.
  Empty fields and NaN are missing values. Lines starting with # are
  skipped. A first row with no numbers is read as column names.
  pair uses the first two columns.

Examples:
  statfold describe prices.csv
  statfold rolling zscore -w 20 returns.tsv
  statfold -g > statfold.yaml

Environment:
  STATFOLD_DEBUG=1     Enable debug logging
`

export const ROLLING_STATS = ['mean', 'std', 'var', 'zscore'] as const
export type RollingStat = (typeof ROLLING_STATS)[number]

export const PAIR_STATS = ['cov', 'corr'] as const
export type PairStat = (typeof PAIR_STATS)[number]

export const SCALE_METHODS = ['minmax', 'robust'] as const
export type ScaleMethod = (typeof SCALE_METHODS)[number]

export type Command =
  | { kind: 'describe'; file: string }
  | { kind: 'rolling'; stat: RollingStat; window: number; file: string }
  | { kind: 'pair'; stat: PairStat; window: number; file: string }
  | { kind: 'corr'; file: string }
  | { kind: 'scale'; method: ScaleMethod; file: string }
  | { kind: 'kde'; column: number; file: string }
  | { kind: 'catalogue' }

interface CLIOptions {
  config?: string
  window?: string
  column?: string
  generate: boolean
  version: boolean
  help: boolean
  positionals: string[]
}

export interface Table {
  names: string[]
  matrix: Matrix
}

function debug(message: string): void {
  if (process.env.STATFOLD_DEBUG === '1') {
    console.error(`[statfold] ${message}`)
  }
}

function parseCliArgs(argv: string[]): CLIOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      window: { type: 'string', short: 'w' },
      column: { type: 'string', short: 'k' },
      generate: { type: 'boolean', short: 'g', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  })

  return {
    config: values.config,
    window: values.window,
    column: values.column,
    generate: values.generate ?? false,
    version: values.version ?? false,
    help: values.help ?? false,
    positionals,
  }
}

function isOneOf<T extends string>(choices: readonly T[], value: string | undefined): value is T {
  return choices.some((c) => c === value)
}

function parseIntegerOption(name: string, raw: string | undefined, fallback?: number): number {
  if (raw === undefined) {
    if (fallback === undefined) throw new Error(`Missing --${name}`)
    return fallback
  }
  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw new Error(`--${name} must be an integer, got '${raw}'`)
  }
  return value
}

function requireFile(file: string | undefined, usage: string): string {
  if (file === undefined) throw new Error(`Missing input file. Usage: ${usage}`)
  return file
}

/**
 * Resolve positionals and options into a command
 */
export function parseCommand(
  positionals: string[],
  options: { window?: string; column?: string } = {}
): Command {
  const [name, ...rest] = positionals

  switch (name) {
    case 'describe':
      return { kind: 'describe', file: requireFile(rest[0], 'statfold describe <file>') }
    case 'corr':
      return { kind: 'corr', file: requireFile(rest[0], 'statfold corr <file>') }
    case 'catalogue':
      return { kind: 'catalogue' }
    case 'rolling': {
      const stat = rest[0]
      if (!isOneOf(ROLLING_STATS, stat)) {
        throw new Error(`Unknown rolling statistic '${stat ?? ''}' (expected ${ROLLING_STATS.join(', ')})`)
      }
      return {
        kind: 'rolling',
        stat,
        window: parseIntegerOption('window', options.window),
        file: requireFile(rest[1], 'statfold rolling <stat> -w <n> <file>'),
      }
    }
    case 'pair': {
      const stat = rest[0]
      if (!isOneOf(PAIR_STATS, stat)) {
        throw new Error(`Unknown pair statistic '${stat ?? ''}' (expected ${PAIR_STATS.join(', ')})`)
      }
      return {
        kind: 'pair',
        stat,
        window: parseIntegerOption('window', options.window),
        file: requireFile(rest[1], 'statfold pair <stat> -w <n> <file>'),
      }
    }
    case 'scale': {
      const method = rest[0]
      if (!isOneOf(SCALE_METHODS, method)) {
        throw new Error(`Unknown scale method '${method ?? ''}' (expected ${SCALE_METHODS.join(', ')})`)
      }
      return { kind: 'scale', method, file: requireFile(rest[1], 'statfold scale <method> <file>') }
    }
    case 'kde':
      return {
        kind: 'kde',
        column: parseIntegerOption('column', options.column, 0),
        file: requireFile(rest[0], 'statfold kde [-k <column>] <file>'),
      }
    default:
      throw new Error(name === undefined ? 'No command given' : `Unknown command '${name}'`)
  }
}

function parseField(field: string, line: number): number {
  const trimmed = field.trim()
  if (trimmed === '' || trimmed.toLowerCase() === 'nan') return NaN
  const value = Number(trimmed)
  if (Number.isNaN(value)) {
    throw new Error(`line ${line}: invalid number '${trimmed}'`)
  }
  return value
}

function splitFields(line: string): string[] {
  if (line.includes(',')) return line.split(',')
  if (line.includes('\t')) return line.split('\t')
  return line.trim().split(/\s+/)
}

function isHeader(fields: string[]): boolean {
  return fields.every((f) => {
    const t = f.trim()
    return t !== '' && t.toLowerCase() !== 'nan' && Number.isNaN(Number(t))
  })
}

/**
 * Parse one delimited line into numbers
 */
export function parseNumbers(line: string, lineNumber = 1): number[] {
  return splitFields(line).map((f) => parseField(f, lineNumber))
}

/**
 * Parse delimited text into a table (rows are observations)
 */
export function parseTable(text: string): Table {
  const rows: number[][] = []
  let names: string[] | undefined

  const lines = text.split(/\r?\n/)
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]!
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue

    const fields = splitFields(line)
    if (names === undefined && rows.length === 0 && isHeader(fields)) {
      names = fields.map((f) => f.trim())
      continue
    }
    rows.push(fields.map((f) => parseField(f, i + 1)))
  }

  const width = names?.length ?? rows[0]?.length ?? 0
  for (let r = 0; r < rows.length; r++) {
    if (rows[r]!.length !== width) {
      throw new Error(`row ${r + 1} has ${rows[r]!.length} fields, expected ${width}`)
    }
  }

  return {
    names: names ?? Array.from({ length: width }, (_, c) => `c${c}`),
    matrix: rows.length === 0 ? matrixFromRows([]) : matrixFromRows(rows),
  }
}

export function formatValue(value: number): string {
  return Number.isNaN(value) ? 'NaN' : value.toFixed(6)
}

function formatRows(m: Matrix): string[] {
  return toRows(m).map((row) => row.map(formatValue).join('\t'))
}

function validValues(column: ArrayLike<number>): number[] {
  const out: number[] = []
  for (let i = 0; i < column.length; i++) {
    const x = column[i]!
    if (!Number.isNaN(x)) out.push(x)
  }
  return out
}

// Apply a kernel to the valid entries and put the results back in place
function onValid(column: Vec64, kernel: (valid: number[]) => Vec64): Vec64 {
  const out = nanVec(column.length)
  const valid = validValues(column)
  if (valid.length === 0) return out

  const result = kernel(valid)
  let j = 0
  for (let i = 0; i < column.length; i++) {
    if (!Number.isNaN(column[i]!)) out[i] = result[j++]!
  }
  return out
}

function countTrue(flags: boolean[]): number {
  return flags.filter(Boolean).length
}

function rollingKernel(
  stat: RollingStat,
  window: number,
  config: EngineConfig
): (column: Vec64) => Vec64 {
  const varianceMin = { minPeriods: Math.min(config.rolling.varianceMinPeriods, window) }
  switch (stat) {
    case 'mean': {
      const meanMin = { minPeriods: Math.min(config.rolling.meanMinPeriods, window) }
      return (column) => rollingMeanNan(column, window, meanMin)
    }
    case 'std':
      return (column) => rollingStdNan(column, window, varianceMin)
    case 'var':
      return (column) => rollingVarNan(column, window, varianceMin)
    case 'zscore':
      return (column) => rollingZscoreNan(column, window, varianceMin)
  }
}

/**
 * Run a table command; returns output lines
 */
export function executeCommand(
  command: Exclude<Command, { kind: 'catalogue' }>,
  table: Table,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): string[] {
  const { names, matrix } = table
  const parallelism = config.parallelism

  switch (command.kind) {
    case 'describe':
      return names.map((name, c) => {
        const column = getColumn(matrix, c)
        const valid = validValues(column)
        const summary = dispersionSummary(computeDispersion(column))
        if (valid.length === 0) return `${name}: ${summary}`
        const iqrCount = countTrue(iqrOutliers(valid, config.outliers.iqrK))
        const zCount = countTrue(zscoreOutliers(valid, config.outliers.zThreshold))
        return `${name}: ${summary}, outliers(iqr)=${iqrCount}, outliers(z)=${zCount}`
      })

    case 'rolling': {
      const kernel = rollingKernel(command.stat, command.window, config)
      return [names.join('\t'), ...formatRows(mapColumns(matrix, kernel, { parallelism }))]
    }

    case 'pair': {
      if (matrix.cols < 2) {
        throw new Error(`pair needs two columns, got ${matrix.cols}`)
      }
      const x = getColumn(matrix, 0)
      const y = getColumn(matrix, 1)
      const pairMin = { minPeriods: Math.min(config.rolling.pairMinPeriods, command.window) }
      const rolled =
        command.stat === 'cov'
          ? rollingCovNan(x, y, command.window, pairMin)
          : rollingCorrNan(x, y, command.window, pairMin)
      return [`${command.stat}(${names[0]}, ${names[1]})`, ...Array.from(rolled, formatValue)]
    }

    case 'corr': {
      const rows = formatRows(corrMatrix(matrix, { parallelism }))
      return [['', ...names].join('\t'), ...rows.map((row, i) => `${names[i]}\t${row}`)]
    }

    case 'scale': {
      const kernel =
        command.method === 'minmax'
          ? (valid: number[]) => minmaxScale(valid).scaled
          : (valid: number[]) =>
              robustScale(valid, config.robust.scaleFactor, { epsilon: config.robust.epsilon }).scaled
      const scaled = mapColumns(matrix, (column) => onValid(column, kernel), { parallelism })
      return [names.join('\t'), ...formatRows(scaled)]
    }

    case 'kde': {
      if (!Number.isInteger(command.column) || command.column < 0 || command.column >= matrix.cols) {
        throw new Error(`column ${command.column} out of range [0, ${matrix.cols - 1}]`)
      }
      const valid = validValues(getColumn(matrix, command.column))
      const { grid, density, bandwidth } = kdeGaussian(valid, config.kde.points, {
        bandwidth: config.kde.bandwidth,
        padding: config.kde.padding,
      })
      const lines = [`# ${names[command.column]} bandwidth=${formatValue(bandwidth)}`]
      for (let i = 0; i < grid.length; i++) {
        lines.push(`${formatValue(grid[i]!)}\t${formatValue(density[i]!)}`)
      }
      return lines
    }
  }
}

export function catalogueLines(): string[] {
  return [
    `statfold catalogue v${CATALOGUE_VERSION}`,
    ...listCatalogue().map(({ name, group }) => `${group}\t${name}`),
  ]
}

function readTable(file: string): Table {
  if (!existsSync(file)) {
    throw new Error(`Input file not found: ${file}`)
  }
  return parseTable(readFileSync(file, 'utf-8'))
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let options: CLIOptions
  try {
    options = parseCliArgs(argv)
  } catch (e) {
    console.error(`[statfold] ${e instanceof Error ? e.message : String(e)}`)
    console.error(HELP)
    return 1
  }

  // Handle simple flags first
  if (options.help) {
    console.log(HELP)
    return 0
  }

  if (options.version) {
    console.log(`statfold v${VERSION}`)
    return 0
  }

  if (options.generate) {
    console.log(generateExampleConfig())
    return 0
  }

  try {
    let config = DEFAULT_ENGINE_CONFIG
    if (options.config) {
      config = await loadEngineConfig(options.config)
      debug(`Loaded config: ${options.config}`)
    }

    const command = parseCommand(options.positionals, options)
    if (command.kind === 'catalogue') {
      console.log(catalogueLines().join('\n'))
      return 0
    }

    const table = readTable(command.file)
    debug(`Read ${table.matrix.rows}x${table.matrix.cols} table from ${command.file}`)
    console.log(executeCommand(command, table, config).join('\n'))
    return 0
  } catch (e) {
    console.error(`[statfold] error: ${e instanceof Error ? e.message : String(e)}`)
    return 1
  }
}

// Export for testing
export { parseCliArgs, main }

function invokedDirectly(): boolean {
  const entry = process.argv[1]
  if (entry === undefined || !existsSync(entry)) return false
  return realpathSync(entry) === fileURLToPath(import.meta.url)
}

// Run if called directly
if (invokedDirectly()) {
  main().then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      console.error(`[statfold] fatal: ${e instanceof Error ? e.message : String(e)}`)
      process.exitCode = 1
    }
  )
}
