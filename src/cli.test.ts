import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  parseCliArgs,
  parseCommand,
  parseNumbers,
  parseTable,
  formatValue,
  executeCommand,
  catalogueLines,
  main,
  type Table,
} from './cli.ts'
import { matrixFromColumns } from './data/matrix.ts'
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config/types.ts'

const table = (names: string[], columns: number[][]): Table => ({
  names,
  matrix: matrixFromColumns(columns),
})

describe('input parsing', () => {
  it('should read a header and missing fields', () => {
    const { names, matrix } = parseTable('a,b\n1,2\n3,\n')
    expect(names).toEqual(['a', 'b'])
    expect(matrix.rows).toBe(2)
    expect(Array.from(matrix.data)).toEqual([1, 2, 3, NaN])
  })

  it('should split on whitespace and name columns by position', () => {
    const { names, matrix } = parseTable('# prices\n1 2 3\n\n4  5 6\n')
    expect(names).toEqual(['c0', 'c1', 'c2'])
    expect(matrix.rows).toBe(2)
    expect(Array.from(matrix.data)).toEqual([1, 2, 3, 4, 5, 6])
  })

  it('should split on tabs and read NaN tokens', () => {
    expect(Array.from(parseTable('1\tNaN\nnan\t4').matrix.data)).toEqual([1, NaN, NaN, 4])
  })

  it('should reject ragged rows and bad numbers', () => {
    expect(() => parseTable('1,2\n3')).toThrow('row 2 has 1 fields, expected 2')
    expect(() => parseTable('1,2\n3,x')).toThrow("line 2: invalid number 'x'")
  })

  it('should parse a single line', () => {
    expect(parseNumbers('1, 2,nan')).toEqual([1, 2, NaN])
  })

  it('should format numbers with six decimals', () => {
    expect(formatValue(1.5)).toBe('1.500000')
    expect(formatValue(NaN)).toBe('NaN')
  })
})

describe('command parsing', () => {
  it('should split flags from positionals', () => {
    const options = parseCliArgs(['describe', 'x.csv', '-c', 'engine.yaml'])
    expect(options.positionals).toEqual(['describe', 'x.csv'])
    expect(options.config).toBe('engine.yaml')
    expect(options.help).toBe(false)
  })

  it('should build a rolling command', () => {
    expect(parseCommand(['rolling', 'mean', 'f.csv'], { window: '3' })).toEqual({
      kind: 'rolling',
      stat: 'mean',
      window: 3,
      file: 'f.csv',
    })
  })

  it('should reject incomplete commands', () => {
    expect(() => parseCommand(['rolling', 'median', 'f.csv'], { window: '3' })).toThrow(
      /Unknown rolling statistic 'median'/
    )
    expect(() => parseCommand(['rolling', 'mean', 'f.csv'])).toThrow('Missing --window')
    expect(() => parseCommand(['rolling', 'mean', 'f.csv'], { window: 'x' })).toThrow(
      "--window must be an integer, got 'x'"
    )
    expect(() => parseCommand(['describe'])).toThrow(/^Missing input file/)
    expect(() => parseCommand([])).toThrow('No command given')
    expect(() => parseCommand(['plot', 'f.csv'])).toThrow("Unknown command 'plot'")
  })

  it('should build a pair command', () => {
    expect(parseCommand(['pair', 'corr', 'f.csv'], { window: '5' })).toEqual({
      kind: 'pair',
      stat: 'corr',
      window: 5,
      file: 'f.csv',
    })
    expect(() => parseCommand(['pair', 'beta', 'f.csv'], { window: '5' })).toThrow(
      /Unknown pair statistic 'beta'/
    )
  })

  it('should default the kde column to 0', () => {
    expect(parseCommand(['kde', 'f.csv'])).toEqual({ kind: 'kde', column: 0, file: 'f.csv' })
  })
})

describe('executeCommand', () => {
  it('should describe each column', () => {
    const lines = executeCommand({ kind: 'describe', file: '-' }, table(['a'], [[1, 2, 3, 4]]))
    expect(lines).toEqual([
      'a: n=4, missing=0, μ=2.5000, σ=1.2910, med=2.5000, IQR=1.5000, MAD=1.0000, ' +
        'range=[1.0000, 4.0000], outliers(iqr)=0, outliers(z)=0',
    ])
  })

  it('should roll every column with the NaN-aware kernels', () => {
    const lines = executeCommand(
      { kind: 'rolling', stat: 'mean', window: 2, file: '-' },
      table(['a'], [[1, NaN, 3]])
    )
    expect(lines).toEqual(['a', 'NaN', '1.000000', '3.000000'])
  })

  it('should apply minimum counts from the config', () => {
    const config: EngineConfig = {
      ...DEFAULT_ENGINE_CONFIG,
      rolling: { ...DEFAULT_ENGINE_CONFIG.rolling, meanMinPeriods: 2 },
    }
    const lines = executeCommand(
      { kind: 'rolling', stat: 'mean', window: 2, file: '-' },
      table(['a'], [[1, NaN, 3]]),
      config
    )
    expect(lines).toEqual(['a', 'NaN', 'NaN', 'NaN'])
  })

  it('should roll a pair statistic over the first two columns', () => {
    const pairs = table(['a', 'b'], [
      [1, 2, NaN, 4],
      [2, 4, 6, 8],
    ])
    expect(executeCommand({ kind: 'pair', stat: 'cov', window: 3, file: '-' }, pairs)).toEqual([
      'cov(a, b)',
      'NaN',
      'NaN',
      '1.000000',
      '4.000000',
    ])
  })

  it('should apply the pair minimum count from the config', () => {
    const config: EngineConfig = {
      ...DEFAULT_ENGINE_CONFIG,
      rolling: { ...DEFAULT_ENGINE_CONFIG.rolling, pairMinPeriods: 3 },
    }
    const pairs = table(['a', 'b'], [
      [1, 2, NaN, 4],
      [2, 4, 6, 8],
    ])
    expect(
      executeCommand({ kind: 'pair', stat: 'cov', window: 3, file: '-' }, pairs, config)
    ).toEqual(['cov(a, b)', 'NaN', 'NaN', 'NaN', 'NaN'])
  })

  it('should need two columns for a pair statistic', () => {
    expect(() =>
      executeCommand({ kind: 'pair', stat: 'corr', window: 2, file: '-' }, table(['a'], [[1, 2]]))
    ).toThrow('pair needs two columns, got 1')
  })

  it('should print the correlation matrix with labels', () => {
    const lines = executeCommand(
      { kind: 'corr', file: '-' },
      table(['a', 'b'], [
        [1, 2, 3],
        [2, 4, 6],
      ])
    )
    expect(lines).toEqual([
      '\ta\tb',
      'a\t1.000000\t1.000000',
      'b\t1.000000\t1.000000',
    ])
  })

  it('should scale around missing values', () => {
    const lines = executeCommand(
      { kind: 'scale', method: 'minmax', file: '-' },
      table(['a'], [[0, NaN, 10]])
    )
    expect(lines).toEqual(['a', '0.000000', 'NaN', '1.000000'])
  })

  it('should reject a kde column out of range', () => {
    expect(() =>
      executeCommand({ kind: 'kde', column: 2, file: '-' }, table(['a'], [[1, 2]]))
    ).toThrow('column 2 out of range [0, 0]')
  })

  it('should estimate a density on the configured grid', () => {
    const config: EngineConfig = {
      ...DEFAULT_ENGINE_CONFIG,
      kde: { bandwidth: 1, points: 3, padding: 1 },
    }
    const lines = executeCommand({ kind: 'kde', column: 0, file: '-' }, table(['a'], [[0]]), config)
    expect(lines).toEqual([
      '# a bandwidth=1.000000',
      '-1.000000\t0.241971',
      '0.000000\t0.398942',
      '1.000000\t0.241971',
    ])
  })
})

describe('catalogue listing', () => {
  it('should print the version and one line per function', () => {
    const lines = catalogueLines()
    expect(lines[0]).toBe('statfold catalogue v1.0.0')
    expect(lines).toContain('rolling\trollingMean')
    expect(lines).toContain('inference\tmannWhitneyU')
  })
})

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should print the version', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    expect(await main(['--version'])).toBe(0)
    expect(log).toHaveBeenCalledWith('statfold v0.1.0')
  })

  it('should report unknown commands on stderr', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(await main(['bogus'])).toBe(1)
    expect(error).toHaveBeenCalledWith("[statfold] error: Unknown command 'bogus'")
  })

  it('should report a missing input file', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    expect(await main(['describe', '/nonexistent/statfold-input.csv'])).toBe(1)
    expect(error).toHaveBeenCalledWith(
      '[statfold] error: Input file not found: /nonexistent/statfold-input.csv'
    )
  })
})
