import { describe, it, expect } from 'vitest'
import {
  createMatrix,
  matrixFromRows,
  matrixFromColumns,
  getValue,
  setValue,
  getColumn,
  setColumn,
  getRow,
  toRows,
} from './matrix.ts'
import { InvalidArgumentError } from '../stats/errors.ts'

describe('Matrix', () => {
  it('should store rows contiguously', () => {
    const m = matrixFromRows([
      [1, 2, 3],
      [4, 5, 6],
    ])
    expect(m.rows).toBe(2)
    expect(m.cols).toBe(3)
    expect(Array.from(m.data)).toEqual([1, 2, 3, 4, 5, 6])
    expect(getValue(m, 1, 0)).toBe(4)
    expect(Array.from(getRow(m, 1))).toEqual([4, 5, 6])
  })

  it('should build from columns', () => {
    const m = matrixFromColumns([
      [1, 4],
      [2, 5],
    ])
    expect(toRows(m)).toEqual([
      [1, 2],
      [4, 5],
    ])
  })

  it('should copy columns out and write them back', () => {
    const m = createMatrix(2, 2)
    setColumn(m, 1, [7, 8])
    setValue(m, 0, 0, 1)
    const column = getColumn(m, 1)
    column[0] = 99
    expect(toRows(m)).toEqual([
      [1, 7],
      [0, 8],
    ])
  })

  it('should reject inconsistent shapes', () => {
    expect(() => createMatrix(2, 2, [1, 2, 3])).toThrow(InvalidArgumentError)
    expect(() => createMatrix(-1, 2)).toThrow(InvalidArgumentError)
    expect(() => matrixFromRows([[1, 2], [3]])).toThrow(InvalidArgumentError)
  })
})
