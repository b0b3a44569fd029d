import { describe, it, expect } from 'vitest'
import matrixContent from '../data/insight-matrix.json'
import { CATEGORIES } from './categories'
import { CatalogInvariantError } from './errors'
import { getBucket, initializeInsightMatrix, resolveVariant, type InsightBucket } from './insight-matrix'
import type { Profile } from './profile'
import { STATUS_LEVELS } from './status'

const text = (en: string) => ({ en, ar: `ar:${en}` })

const profile = (overrides: Partial<Profile> = {}): Profile => ({
  incomeBracket: '10,000 - 20,000',
  nationality: 'Indian',
  gender: 'Male',
  dependents: 0,
  ...overrides,
})

describe('initializeInsightMatrix: bundled content', () => {
  const matrix = initializeInsightMatrix(matrixContent)

  it('should give every category and status level a default variant', () => {
    for (const category of CATEGORIES) {
      for (const level of STATUS_LEVELS) {
        expect(getBucket(matrix, category, level).some(v => v.tag === 'default')).toBe(true)
      }
    }
  })

  it('should freeze the loaded content', () => {
    expect(Object.isFrozen(matrix)).toBe(true)
    expect(Object.isFrozen(matrix['Debt Management'])).toBe(true)
    expect(Object.isFrozen(getBucket(matrix, 'Debt Management', 'good'))).toBe(true)
  })

  it('should pick the dependents-free protection message', () => {
    const variant = resolveVariant(getBucket(matrix, 'Protecting Your Family', 'at_risk'), profile())
    expect(variant?.tag).toBe('children_zero')
  })

  it('should fall through to else before default', () => {
    const variant = resolveVariant(getBucket(matrix, 'Income Stream', 'good'), profile())
    expect(variant?.tag).toBe('else')
  })
})

describe('resolveVariant', () => {
  const bucket: InsightBucket = [
    { tag: 'default', text: text('default') },
    { tag: 'children_zero', text: text('children') },
    { tag: 'emirati_woman', text: text('emirati') },
    { tag: 'income_above_30k', text: text('high income') },
  ]

  it('should let income framing win regardless of content order', () => {
    const variant = resolveVariant(bucket, profile({ incomeBracket: 'Above 100,000', nationality: 'Emirati', gender: 'Female' }))
    expect(variant?.tag).toBe('income_above_30k')
  })

  it('should prefer emirati_woman over family framing', () => {
    expect(resolveVariant(bucket, profile({ nationality: 'Emirati', gender: 'Female' }))?.tag).toBe('emirati_woman')
  })

  it('should use default when nothing more specific holds', () => {
    expect(resolveVariant(bucket, profile({ dependents: 2 }))?.text.en).toBe('default')
  })

  it('should return undefined for an empty bucket', () => {
    expect(resolveVariant([], profile())).toBeUndefined()
  })
})

describe('initializeInsightMatrix: invariant guard', () => {
  it('should allow absent and empty buckets', () => {
    const matrix = initializeInsightMatrix({ 'Income Stream': { good: [] } })
    expect(getBucket(matrix, 'Income Stream', 'good')).toEqual([])
    expect(getBucket(matrix, 'Debt Management', 'at_risk')).toEqual([])
  })

  it('should refuse a populated bucket without a default variant', () => {
    const definition = { 'Income Stream': { at_risk: [{ tag: 'else', text: text('fallback') }] } }
    expect(() => initializeInsightMatrix(definition)).toThrow(
      'Insight matrix failed validation: Income Stream/at_risk: populated bucket has no "default" variant',
    )
  })

  it('should report unknown keys and repeated tags together', () => {
    const definition = {
      Lifestyle: { good: [] },
      'Debt Management': {
        fine: [],
        good: [
          { tag: 'default', text: text('one') },
          { tag: 'default', text: text('two') },
        ],
      },
    }
    let caught: unknown
    try { initializeInsightMatrix(definition) } catch (err) { caught = err }
    expect(caught).toBeInstanceOf(CatalogInvariantError)
    expect(caught instanceof CatalogInvariantError && caught.issues).toEqual([
      'unknown category "Lifestyle"',
      'Debt Management: unknown status level "fine"',
      'Debt Management/good: tag "default" appears more than once',
    ])
  })

  it('should refuse an unknown condition tag', () => {
    const definition = { 'Income Stream': { good: [{ tag: 'vip', text: text('vip') }] } }
    expect(() => initializeInsightMatrix(definition)).toThrow(/Insight matrix is malformed: Income Stream\.good\.0\.tag/)
  })
})
