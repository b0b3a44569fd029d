/**
 * Financial Clinic — Assessment
 *
 * Boundary between the engine and the request/report layer. Takes an
 * untrusted request body, returns either the full report (scores and
 * insights) or every violation found. Transport, persistence and report
 * rendering stay with the caller.
 *
 * @module assessment
 */

import { mapCategories, type Category } from './categories'
import { migrateAnswers } from './answer-migration'
import { findCatalog, getEngine, listRevisions, type Engine } from './engine-registry'
import { loadEngineSettings, type EngineSettings } from './engine-settings'
import { selectInsights } from './insights'
import { localize, type Language } from './localization'
import { profileFlags } from './profile'
import { presentQuestions, type PresentedQuestion, type QuestionCatalog } from './question-catalog'
import { scoreAnswers, validateAnswers, type OverallScore } from './scoring'
import type { StatusLevel } from './status'
import { parseAssessmentRequest, type AssessmentRequest } from './validation'

// ─── Types ────────────────────────────────────────────────────────────────

export interface AssessmentOptions {
  engine?: Engine
  settings?: EngineSettings
}

export interface CategoryReport {
  score: number        // contribution to the overall total
  maxPossible: number  // category weight
  percentage: number
  statusLevel: StatusLevel
}

export interface InsightReport {
  category: Category
  statusLevel: StatusLevel
  text: string          // English
  textLocalized: string // settings.localizedLanguage
  priority: number
}

export interface AssessmentReport {
  revision: string
  overall: OverallScore
  categoryScores: Record<Category, CategoryReport>
  insights: InsightReport[]
  questionsAnswered: number
  totalQuestions: number
}

export interface AssessmentViolation {
  field: string
  message: string
}

export type AssessmentOutcome =
  | { ok: true; result: AssessmentReport }
  | { ok: false; violations: AssessmentViolation[] }

// ─── Helpers ──────────────────────────────────────────────────────────────

function resolveContext(options: AssessmentOptions) {
  return {
    engine: options.engine ?? getEngine(),
    settings: options.settings ?? loadEngineSettings(),
  }
}

function unknownRevision(engine: Engine, revision: string): AssessmentViolation {
  return {
    field: 'revision',
    message: `Unknown catalog revision "${revision}". Available: ${listRevisions(engine).join(', ')}`,
  }
}

function assessParsed(
  request: AssessmentRequest,
  catalog: QuestionCatalog,
  engine: Engine,
  settings: EngineSettings,
): AssessmentOutcome {
  const { answers, profile } = request

  const violations = validateAnswers(catalog, answers, profile.dependents)
  if (violations.length > 0) {
    return {
      ok: false,
      violations: violations.map(v => ({ field: `answers.${v.questionId}`, message: v.message })),
    }
  }

  const score = scoreAnswers(catalog, answers, profile.dependents)
  const insights = selectInsights(engine.matrix, score.categoryScores, profile, settings.maxInsights)

  return {
    ok: true,
    result: {
      revision: catalog.revision,
      overall: score.overall,
      categoryScores: mapCategories(category => {
        const s = score.categoryScores[category]
        return {
          score: s.contribution,
          maxPossible: s.categoryWeight,
          percentage: s.percentage,
          statusLevel: s.statusLevel,
        }
      }),
      insights: insights.map(insight => ({
        category: insight.category,
        statusLevel: insight.statusLevel,
        text: localize(insight.text, 'en'),
        textLocalized: localize(insight.text, settings.localizedLanguage),
        priority: insight.priority,
      })),
      questionsAnswered: score.questionsAnswered,
      totalQuestions: score.totalQuestions,
    },
  }
}

// ─── Operations ───────────────────────────────────────────────────────────

/**
 * Score a submission and select its insights. The request names the
 * catalog revision it was answered under; without one the configured
 * default revision is used.
 */
export function assessFinancialHealth(request: unknown, options: AssessmentOptions = {}): AssessmentOutcome {
  const { engine, settings } = resolveContext(options)

  const parsed = parseAssessmentRequest(request)
  if (!parsed.valid) {
    return { ok: false, violations: parsed.errors.map(e => ({ field: e.path, message: e.message })) }
  }

  const revision = parsed.data.revision ?? settings.catalogRevision
  const catalog = findCatalog(engine, revision)
  if (!catalog) return { ok: false, violations: [unknownRevision(engine, revision)] }

  return assessParsed(parsed.data, catalog, engine, settings)
}

/**
 * Re-score a stored submission under another catalog revision, carrying
 * answers across by question id.
 */
export function rescoreUnderRevision(
  request: unknown,
  targetRevision: string,
  options: AssessmentOptions = {},
): AssessmentOutcome {
  const { engine, settings } = resolveContext(options)

  const parsed = parseAssessmentRequest(request)
  if (!parsed.valid) {
    return { ok: false, violations: parsed.errors.map(e => ({ field: e.path, message: e.message })) }
  }

  const sourceRevision = parsed.data.revision ?? settings.catalogRevision
  const source = findCatalog(engine, sourceRevision)
  if (!source) return { ok: false, violations: [unknownRevision(engine, sourceRevision)] }
  const target = findCatalog(engine, targetRevision)
  if (!target) return { ok: false, violations: [unknownRevision(engine, targetRevision)] }

  const migrated = migrateAnswers(parsed.data.answers, source, target)
  return assessParsed({ ...parsed.data, answers: migrated.answers, revision: target.revision }, target, engine, settings)
}

/**
 * Questions a respondent should be shown, in one language.
 */
export function questionsForRespondent(
  params: { dependents: number; language: Language; revision?: string },
  options: AssessmentOptions = {},
): PresentedQuestion[] {
  const { engine, settings } = resolveContext(options)
  const revision = params.revision ?? settings.catalogRevision
  const catalog = findCatalog(engine, revision)
  if (!catalog) throw new RangeError(unknownRevision(engine, revision).message)
  return presentQuestions(catalog, profileFlags(params.dependents), params.language)
}
