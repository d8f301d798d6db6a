/**
 * Column-wise scheduling for matrix operations
 * Columns never depend on each other, so the work splits into
 * contiguous blocks that can be handed to separate workers
 */

import { type Matrix, createMatrix, getColumn, setColumn } from '../data/matrix.ts'
import type { Vec64 } from '../data/vec.ts'
import { assertInteger } from './errors.ts'

/**
 * `parallelism` sets how many independent column blocks the work is split
 * into. The blocks still run one after another on the calling thread, so
 * the value changes the partition only, not the speed or the result.
 */
export interface ColumnOptions {
  parallelism?: number // Number of column blocks (default 1)
}

export interface ColumnBlock {
  start: number // First column, inclusive
  end: number // Last column, exclusive
}

/**
 * Split `cols` columns into at most `parallelism` contiguous blocks
 */
export function columnBlocks(cols: number, parallelism = 1): ColumnBlock[] {
  assertInteger('parallelism', parallelism, 1)
  const blockCount = Math.min(parallelism, Math.max(cols, 1))
  const size = Math.ceil(cols / blockCount)
  const blocks: ColumnBlock[] = []

  for (let start = 0; start < cols; start += size) {
    blocks.push({ start, end: Math.min(cols, start + size) })
  }
  return blocks
}

/**
 * Apply a sequence -> sequence kernel to every column.
 * Output keeps the matrix shape.
 */
export function mapColumns(
  m: Matrix,
  kernel: (column: Vec64, index: number) => Vec64,
  options: ColumnOptions = {}
): Matrix {
  const out = createMatrix(m.rows, m.cols)

  for (const block of columnBlocks(m.cols, options.parallelism)) {
    for (let c = block.start; c < block.end; c++) {
      setColumn(out, c, kernel(getColumn(m, c), c))
    }
  }
  return out
}

/**
 * Reduce every column to a scalar
 */
export function reduceColumns(
  m: Matrix,
  reducer: (column: Vec64, index: number) => number,
  options: ColumnOptions = {}
): Vec64 {
  const out = new Float64Array(m.cols)

  for (const block of columnBlocks(m.cols, options.parallelism)) {
    for (let c = block.start; c < block.end; c++) {
      out[c] = reducer(getColumn(m, c), c)
    }
  }
  return out
}
