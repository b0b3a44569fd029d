import { describe, it, expect } from 'vitest'
import catalogV1 from '../data/catalogs/fc-v1.json'
import catalogV2 from '../data/catalogs/fc-v2.json'
import { CATEGORIES } from './categories'
import { CatalogInvariantError } from './errors'
import { initializeCatalog, presentQuestions } from './question-catalog'

describe('initializeCatalog: bundled content', () => {
  const catalog = initializeCatalog(catalogV2)

  it('should load the 15-question revision with a 100-point total', () => {
    expect(catalog.revision).toBe('fc-v2')
    expect(catalog.questions).toHaveLength(15)
    expect(catalog.totalWeight()).toBe(100)
  })

  it('should derive category weights that sum to 100', () => {
    expect(catalog.categoryWeights()).toEqual({
      'Income Stream': 15,
      'Savings Habit': 20,
      'Emergency Savings': 20,
      'Debt Management': 15,
      'Retirement Planning': 20,
      'Protecting Your Family': 10,
    })
    const sum = CATEGORIES.reduce((s, c) => s + catalog.categoryWeight(c), 0)
    expect(sum).toBe(100)
  })

  it('should order questions by number', () => {
    expect(catalog.questions.map(q => q.number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15])
  })

  it('should expose the dependents question as conditional', () => {
    expect(catalog.conditionalQuestion()?.id).toBe('fc_q15')
    expect(catalog.questionsIn('Protecting Your Family').map(q => q.id)).toEqual(['fc_q14', 'fc_q15'])
  })

  it('should exclude the conditional question for respondents without dependents', () => {
    const without = catalog.questionsFor({ hasDependents: false })
    expect(without).toHaveLength(14)
    expect(without.some(q => q.id === 'fc_q15')).toBe(false)
    expect(catalog.questionsFor({ hasDependents: true })).toHaveLength(15)
  })

  it('should look questions up by id', () => {
    expect(catalog.getQuestion('fc_q7')?.weight).toBe(10)
    expect(catalog.getQuestion('fc_q99')).toBeUndefined()
  })

  it('should freeze question content', () => {
    expect(Object.isFrozen(catalog.questions)).toBe(true)
    expect(Object.isFrozen(catalog.questions[0])).toBe(true)
    expect(Object.isFrozen(catalog.questions[0].options[0].label)).toBe(true)
  })

  it('should load the legacy 16-question revision', () => {
    const legacy = initializeCatalog(catalogV1)
    expect(legacy.revision).toBe('fc-v1')
    expect(legacy.questions).toHaveLength(16)
    expect(legacy.totalWeight()).toBe(100)
    expect(legacy.categoryWeight('Retirement Planning')).toBe(15)
    expect(legacy.categoryWeight('Protecting Your Family')).toBe(15)
  })

  it('should make the education question the conditional one in the legacy revision', () => {
    const legacy = initializeCatalog(catalogV1)
    expect(legacy.conditionalQuestion()?.id).toBe('fc_q16')
    expect(legacy.getQuestion('fc_q15')?.conditional).toBeUndefined()
    const childless = legacy.questionsFor({ hasDependents: false }).map(q => q.id)
    expect(childless).toHaveLength(15)
    expect(childless).not.toContain('fc_q16')
  })
})

describe('initializeCatalog: invariant guard', () => {
  it('should refuse a catalog whose weights do not sum to 100', () => {
    const bad = structuredClone(catalogV2)
    bad.questions[0].weight = 6
    expect(() => initializeCatalog(bad)).toThrow(CatalogInvariantError)
    expect(() => initializeCatalog(bad)).toThrow('question weights in fc-v2 sum to 101, expected 100')
  })

  it('should report every problem at once', () => {
    const bad = structuredClone(catalogV2)
    bad.questions[1].id = 'fc_q1'
    bad.questions[2].number = 4
    let caught: unknown
    try { initializeCatalog(bad) } catch (err) { caught = err }
    expect(caught).toBeInstanceOf(CatalogInvariantError)
    expect(caught instanceof CatalogInvariantError && caught.issues).toEqual([
      'duplicate question id "fc_q1"',
      'duplicate question number 4',
    ])
  })

  it('should refuse a question without exactly five options', () => {
    const bad = structuredClone(catalogV2)
    bad.questions[0].options.pop()
    expect(() => initializeCatalog(bad)).toThrow(/Question catalog is malformed: questions\.0\.options/)
  })

  it('should refuse repeated option values', () => {
    const bad = structuredClone(catalogV2)
    bad.questions[0].options[1].value = 5
    expect(() => initializeCatalog(bad)).toThrow('question "fc_q1" must offer exactly one option for each value 1-5')
  })

  it('should refuse an unknown category', () => {
    const bad = structuredClone(catalogV2)
    bad.questions[0].category = 'Lifestyle'
    expect(() => initializeCatalog(bad)).toThrow(CatalogInvariantError)
  })
})

describe('presentQuestions', () => {
  const catalog = initializeCatalog(catalogV2)

  it('should render Arabic text with the best answer first', () => {
    const [first] = presentQuestions(catalog, { hasDependents: false }, 'ar')
    expect(first.id).toBe('fc_q1')
    expect(first.category).toBe('مصدر الدخل')
    expect(first.categoryKey).toBe('Income Stream')
    expect(first.text).toBe('ما مدى نجاحك في إدارة نفقاتك الشهرية المنزلية؟')
    expect(first.options.map(o => o.value)).toEqual([5, 4, 3, 2, 1])
    expect(first.options[0].label).toBe('نفقاتي الشهرية دائماً أقل من ميزانيتي')
  })

  it('should flag the conditional question when it applies', () => {
    const questions = presentQuestions(catalog, { hasDependents: true }, 'en')
    const last = questions[questions.length - 1]
    expect(last.id).toBe('fc_q15')
    expect(last.conditional).toBe(true)
    expect(last.text).toBe('Are you actively saving for education savings for your children?')
  })
})
