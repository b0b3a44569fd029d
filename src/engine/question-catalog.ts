/**
 * Financial Clinic — Question Catalog
 *
 * Immutable, versioned question set. A catalog revision is loaded once
 * through initializeCatalog(), which refuses content whose question
 * weights do not add up to 100 or whose structure is inconsistent.
 * Later revisions replace the whole set; entries are never edited.
 *
 * @module question-catalog
 */

import { CATEGORY_LABELS, mapCategories, type Category } from './categories'
import { CatalogInvariantError } from './errors'
import { localize, type Language, type LocalizedText } from './localization'
import type { ProfileFlags } from './profile'
import { catalogDefinitionSchema, toSchemaIssues } from './validation'

// ─── Types ────────────────────────────────────────────────────────────────

export const TOTAL_WEIGHT = 100
export const OPTION_VALUES = [1, 2, 3, 4, 5] as const
export const MAX_ANSWER_VALUE = 5

export interface QuestionOption {
  value: number
  label: LocalizedText
}

export interface Question {
  id: string
  number: number
  category: Category
  weight: number // percentage points of the overall score
  text: LocalizedText
  options: readonly QuestionOption[]
  conditional?: 'has_dependents' // only asked when the respondent has dependents
}

export interface QuestionCatalog {
  readonly revision: string
  /** Every question, ordered by number. */
  readonly questions: readonly Question[]
  questionsFor(flags: ProfileFlags): Question[]
  questionsIn(category: Category): Question[]
  getQuestion(id: string): Question | undefined
  conditionalQuestion(): Question | undefined
  categoryWeight(category: Category): number
  categoryWeights(): Record<Category, number>
  totalWeight(): number
}

// ─── Initialization ───────────────────────────────────────────────────────

function checkInvariants(revision: string, questions: readonly Question[]): string[] {
  const issues: string[] = []
  const ids = new Set<string>()
  const numbers = new Set<number>()

  for (const q of questions) {
    if (ids.has(q.id)) issues.push(`duplicate question id "${q.id}"`)
    ids.add(q.id)
    if (numbers.has(q.number)) issues.push(`duplicate question number ${q.number}`)
    numbers.add(q.number)

    const values = q.options.map(o => o.value).sort((a, b) => a - b)
    if (values.join(',') !== OPTION_VALUES.join(',')) {
      issues.push(`question "${q.id}" must offer exactly one option for each value 1-5`)
    }
  }

  const conditional = questions.filter(q => q.conditional)
  if (conditional.length > 1) {
    issues.push(`only one conditional question is supported, found ${conditional.map(q => q.id).join(', ')}`)
  }

  const total = questions.reduce((sum, q) => sum + q.weight, 0)
  if (total !== TOTAL_WEIGHT) {
    issues.push(`question weights in ${revision} sum to ${total}, expected ${TOTAL_WEIGHT}`)
  }

  return issues
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

/**
 * Validate a catalog definition and build the read-only catalog.
 * Throws CatalogInvariantError listing every problem found.
 */
export function initializeCatalog(definition: unknown): QuestionCatalog {
  const parsed = catalogDefinitionSchema.safeParse(definition)
  if (!parsed.success) {
    throw new CatalogInvariantError(
      'Question catalog is malformed',
      toSchemaIssues(parsed.error).map(i => `${i.path || '(root)'}: ${i.message}`),
    )
  }

  const { revision } = parsed.data
  const questions: readonly Question[] = deepFreeze(
    [...parsed.data.questions].sort((a, b) => a.number - b.number),
  )

  const issues = checkInvariants(revision, questions)
  if (issues.length > 0) {
    throw new CatalogInvariantError(`Question catalog ${revision} failed validation`, issues)
  }

  const byId = new Map(questions.map(q => [q.id, q]))
  const weights = mapCategories(c =>
    questions.filter(q => q.category === c).reduce((sum, q) => sum + q.weight, 0),
  )

  return Object.freeze({
    revision,
    questions,
    questionsFor: (flags: ProfileFlags) =>
      questions.filter(q => q.conditional !== 'has_dependents' || flags.hasDependents),
    questionsIn: (category: Category) => questions.filter(q => q.category === category),
    getQuestion: (id: string) => byId.get(id),
    conditionalQuestion: () => questions.find(q => q.conditional),
    categoryWeight: (category: Category) => weights[category],
    categoryWeights: () => ({ ...weights }),
    totalWeight: () => questions.reduce((sum, q) => sum + q.weight, 0),
  })
}

// ─── Presentation ─────────────────────────────────────────────────────────

export interface PresentedQuestion {
  id: string
  number: number
  category: string     // localized display name
  categoryKey: Category
  weight: number
  text: string
  options: { value: number; label: string }[]
  conditional: boolean
}

/**
 * Applicable questions rendered in one language, best answer first.
 */
export function presentQuestions(
  catalog: QuestionCatalog,
  flags: ProfileFlags,
  language: Language,
): PresentedQuestion[] {
  return catalog.questionsFor(flags).map(q => ({
    id: q.id,
    number: q.number,
    category: localize(CATEGORY_LABELS[q.category], language),
    categoryKey: q.category,
    weight: q.weight,
    text: localize(q.text, language),
    options: [...q.options]
      .sort((a, b) => b.value - a.value)
      .map(o => ({ value: o.value, label: localize(o.label, language) })),
    conditional: q.conditional !== undefined,
  }))
}
