/**
 * Financial Clinic — Scoring Engine
 *
 * Converts a 1–5 answer set into six category scores and a 0–100 overall
 * score.
 *
 *   Category percentage   = Σ(answer × weight) / Σ(5 × weight) × 100
 *   Category contribution = percentage / 100 × category weight
 *   Overall total         = Σ contribution (category weights sum to 100)
 *
 * Weights always come from the full catalog, including the conditional
 * question, so every respondent is measured against the same 100 points.
 * A respondent without dependents who was not asked the conditional
 * question gets the best answer (5) for it.
 *
 * @module scoring
 */

import { CATEGORIES, mapCategories, type Category } from './categories'
import { AnswerValidationError, type AnswerViolation } from './errors'
import { MAX_ANSWER_VALUE, type QuestionCatalog } from './question-catalog'
import { profileFlags } from './profile'
import { classifyCategory, classifyOverall, type StatusBand, type StatusLevel } from './status'

// ─── Types ────────────────────────────────────────────────────────────────

/** Question id → answer. Values are untrusted until validated. */
export type AnswerSet = Readonly<Record<string, unknown>>

export interface CategoryScore {
  category: Category
  actualPoints: number
  maxPoints: number
  percentage: number     // 0-100, 2dp
  contribution: number   // points added to the overall total, 2dp
  categoryWeight: number // ceiling for contribution
  statusLevel: StatusLevel
}

export interface OverallScore {
  total: number // 0-100, 2dp
  statusBand: StatusBand
}

export interface ScoreResult {
  overall: OverallScore
  categoryScores: Record<Category, CategoryScore>
  questionsAnswered: number
  totalQuestions: number
}

const round2 = (value: number) => Math.round(value * 100) / 100

export function isAnswerValue(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= MAX_ANSWER_VALUE
}

function assertDependentsCount(dependentsCount: number): void {
  if (!Number.isInteger(dependentsCount) || dependentsCount < 0) {
    throw new RangeError(`dependentsCount must be a non-negative integer, got ${dependentsCount}`)
  }
}

// ─── Conditional Question ─────────────────────────────────────────────────

/**
 * Returns a copy of `answers` with the conditional question filled in at
 * the maximum value when the respondent has no dependents and left it
 * unanswered. The caller's object is never modified.
 * Throws RangeError for a negative or non-integer dependents count.
 */
export function applyConditionalDefault(
  catalog: QuestionCatalog,
  answers: AnswerSet,
  dependentsCount: number,
): Record<string, unknown> {
  assertDependentsCount(dependentsCount)
  const completed: Record<string, unknown> = { ...answers }
  const conditional = catalog.conditionalQuestion()
  if (conditional && !profileFlags(dependentsCount).hasDependents && !(conditional.id in completed)) {
    completed[conditional.id] = MAX_ANSWER_VALUE
  }
  return completed
}

// ─── Validation ───────────────────────────────────────────────────────────

/**
 * Every problem with an answer set, not just the first: missing answers
 * for applicable questions (in question order), then out-of-range or
 * non-integer values in the order they were supplied.
 * Throws RangeError for a negative or non-integer dependents count.
 */
export function validateAnswers(
  catalog: QuestionCatalog,
  answers: AnswerSet,
  dependentsCount: number,
): AnswerViolation[] {
  assertDependentsCount(dependentsCount)
  const violations: AnswerViolation[] = []

  for (const question of catalog.questionsFor(profileFlags(dependentsCount))) {
    if (!(question.id in answers)) {
      violations.push({
        questionId: question.id,
        code: 'missing',
        message: `Missing answer for question ${question.number} (${question.id})`,
      })
    }
  }

  for (const [questionId, value] of Object.entries(answers)) {
    if (!isAnswerValue(value)) {
      violations.push({
        questionId,
        code: 'invalid_value',
        message: `Invalid answer value ${JSON.stringify(value) ?? String(value)} for ${questionId}. Must be an integer from 1 to ${MAX_ANSWER_VALUE}.`,
      })
    }
  }

  return violations
}

// ─── Scoring ──────────────────────────────────────────────────────────────

interface CategoryTally {
  score: CategoryScore
  rawContribution: number
}

function scoreCategory(
  catalog: QuestionCatalog,
  category: Category,
  answers: Readonly<Record<string, unknown>>,
): CategoryTally {
  let actualPoints = 0
  let maxPoints = 0

  for (const question of catalog.questionsIn(category)) {
    const value = answers[question.id]
    if (!isAnswerValue(value)) {
      throw new Error(`[Scoring] No usable answer for ${question.id} after validation`)
    }
    actualPoints += value * question.weight
    maxPoints += MAX_ANSWER_VALUE * question.weight
  }

  const percentage = maxPoints > 0 ? (actualPoints / maxPoints) * 100 : 0
  const categoryWeight = catalog.categoryWeight(category)
  const rawContribution = (percentage / 100) * categoryWeight

  return {
    rawContribution,
    score: {
      category,
      actualPoints,
      maxPoints,
      percentage: round2(percentage),
      contribution: round2(rawContribution),
      categoryWeight,
      statusLevel: classifyCategory(percentage),
    },
  }
}

/**
 * Score a complete answer set. Throws AnswerValidationError with every
 * violation if the answers are incomplete or out of range; nothing is
 * scored in that case.
 */
export function scoreAnswers(
  catalog: QuestionCatalog,
  answers: AnswerSet,
  dependentsCount: number,
): ScoreResult {
  const violations = validateAnswers(catalog, answers, dependentsCount)
  if (violations.length > 0) throw new AnswerValidationError(violations)

  const completed = applyConditionalDefault(catalog, answers, dependentsCount)
  const tallies = mapCategories(category => scoreCategory(catalog, category, completed))
  const total = round2(CATEGORIES.reduce((sum, c) => sum + tallies[c].rawContribution, 0))

  const applicable = catalog.questionsFor(profileFlags(dependentsCount))

  return {
    overall: { total, statusBand: classifyOverall(total) },
    categoryScores: mapCategories(category => tallies[category].score),
    questionsAnswered: applicable.filter(q => q.id in answers).length,
    totalQuestions: applicable.length,
  }
}
