/**
 * Matrix - dense 2D grid of observations
 * Row-major flattened data array: m[r][c] = data[r * cols + c]
 * Rows are observations, columns are variables
 */

import { type Vec64, vec64 } from './vec.ts'
import { InvalidArgumentError } from '../stats/errors.ts'

export interface Matrix {
  rows: number
  cols: number
  data: Vec64 // length: rows * cols
}

export function createMatrix(rows: number, cols: number, data?: ArrayLike<number>): Matrix {
  if (!Number.isInteger(rows) || rows < 0 || !Number.isInteger(cols) || cols < 0) {
    throw new InvalidArgumentError('shape', `invalid matrix shape ${rows}x${cols}`)
  }
  if (data !== undefined && data.length !== rows * cols) {
    throw new InvalidArgumentError(
      'data',
      `length ${data.length} does not match rows*cols ${rows * cols}`
    )
  }

  return {
    rows,
    cols,
    data: data === undefined ? vec64(rows * cols) : new Float64Array(data),
  }
}

// Build from an array of equal-length rows
export function matrixFromRows(rowsIn: ArrayLike<number>[]): Matrix {
  const rows = rowsIn.length
  const cols = rows === 0 ? 0 : rowsIn[0]!.length
  const m = createMatrix(rows, cols)

  for (let r = 0; r < rows; r++) {
    const row = rowsIn[r]!
    if (row.length !== cols) {
      throw new InvalidArgumentError('rows', `row ${r} has length ${row.length}, expected ${cols}`)
    }
    m.data.set(row, r * cols)
  }
  return m
}

// Build from an array of equal-length columns
export function matrixFromColumns(columns: ArrayLike<number>[]): Matrix {
  const cols = columns.length
  const rows = cols === 0 ? 0 : columns[0]!.length
  const m = createMatrix(rows, cols)

  for (let c = 0; c < cols; c++) {
    const column = columns[c]!
    if (column.length !== rows) {
      throw new InvalidArgumentError(
        'columns',
        `column ${c} has length ${column.length}, expected ${rows}`
      )
    }
    setColumn(m, c, column)
  }
  return m
}

export function getValue(m: Matrix, r: number, c: number): number {
  return m.data[r * m.cols + c]!
}

export function setValue(m: Matrix, r: number, c: number, value: number): void {
  m.data[r * m.cols + c] = value
}

// Copy of one column (variable)
export function getColumn(m: Matrix, c: number): Vec64 {
  const out = vec64(m.rows)
  for (let r = 0; r < m.rows; r++) {
    out[r] = m.data[r * m.cols + c]!
  }
  return out
}

export function setColumn(m: Matrix, c: number, values: ArrayLike<number>): void {
  for (let r = 0; r < m.rows; r++) {
    m.data[r * m.cols + c] = values[r]!
  }
}

// View of one row (observation); shares storage
export function getRow(m: Matrix, r: number): Vec64 {
  return m.data.subarray(r * m.cols, (r + 1) * m.cols)
}

// Nested arrays, handy for printing and assertions
export function toRows(m: Matrix): number[][] {
  const out: number[][] = []
  for (let r = 0; r < m.rows; r++) {
    out.push(Array.from(getRow(m, r)))
  }
  return out
}
