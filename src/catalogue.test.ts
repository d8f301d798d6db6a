import { describe, it, expect } from 'vitest'
import { CATALOGUE_VERSION, catalogue, listCatalogue, isCatalogueName } from './catalogue.ts'
import * as api from './index.ts'

describe('catalogue', () => {
  it('should carry a semantic version', () => {
    expect(CATALOGUE_VERSION).toMatch(/^\d+\.\d+\.\d+$/)
  })

  it('should list every entry once', () => {
    const names = listCatalogue().map((entry) => entry.name)
    expect(names.length).toBe(Object.keys(catalogue).length)
    expect(new Set(names).size).toBe(names.length)
    expect(listCatalogue()[0]).toEqual({ name: 'welford', group: 'accumulator' })
  })

  it('should export each catalogued function from the package entry', () => {
    const exported = new Map<string, unknown>(Object.entries(api))
    for (const [name, entry] of Object.entries(catalogue)) {
      expect(typeof entry.fn).toBe('function')
      expect(exported.get(name)).toBe(entry.fn)
    }
  })

  it('should recognize catalogue names', () => {
    expect(isCatalogueName('rollingZscoreNan')).toBe(true)
    expect(isCatalogueName('toString')).toBe(false)
    expect(isCatalogueName('nope')).toBe(false)
  })
})
