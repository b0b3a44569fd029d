/**
 * Financial Clinic — Insight Matrix
 *
 * Advisory text keyed by category × status level × condition tag.
 * The matrix is sparse: a bucket may be absent or empty (the category then
 * yields no insight), but a populated bucket must carry a `default`
 * variant. Which variant applies is decided by scanning CONDITION_TAGS in
 * order, never by the order variants appear in the content file.
 *
 * @module insight-matrix
 */

import { isCategory, mapCategories, type Category } from './categories'
import { CatalogInvariantError } from './errors'
import type { LocalizedText } from './localization'
import { CONDITION_TAGS, conditionHolds, type ConditionTag, type Profile } from './profile'
import { isStatusLevel, type StatusLevel } from './status'
import { insightMatrixDefinitionSchema, toSchemaIssues } from './validation'

// ─── Types ────────────────────────────────────────────────────────────────

export interface InsightVariant {
  tag: ConditionTag
  text: LocalizedText
}

export type InsightBucket = readonly InsightVariant[]

export type InsightMatrix = Readonly<Record<Category, Readonly<Partial<Record<StatusLevel, InsightBucket>>>>>

// ─── Initialization ───────────────────────────────────────────────────────

export function initializeInsightMatrix(definition: unknown): InsightMatrix {
  const parsed = insightMatrixDefinitionSchema.safeParse(definition)
  if (!parsed.success) {
    throw new CatalogInvariantError(
      'Insight matrix is malformed',
      toSchemaIssues(parsed.error).map(i => `${i.path || '(root)'}: ${i.message}`),
    )
  }

  const issues: string[] = []
  const matrix = mapCategories((): Partial<Record<StatusLevel, InsightBucket>> => ({}))

  for (const [category, levels] of Object.entries(parsed.data)) {
    if (!isCategory(category)) {
      issues.push(`unknown category "${category}"`)
      continue
    }
    for (const [level, variants] of Object.entries(levels)) {
      if (!isStatusLevel(level)) {
        issues.push(`${category}: unknown status level "${level}"`)
        continue
      }
      const seen = new Set<ConditionTag>()
      for (const variant of variants) {
        if (seen.has(variant.tag)) issues.push(`${category}/${level}: tag "${variant.tag}" appears more than once`)
        seen.add(variant.tag)
      }
      if (variants.length > 0 && !seen.has('default')) {
        issues.push(`${category}/${level}: populated bucket has no "default" variant`)
      }
      matrix[category][level] = Object.freeze(variants.map(v => Object.freeze({ tag: v.tag, text: Object.freeze({ ...v.text }) })))
    }
  }

  if (issues.length > 0) {
    throw new CatalogInvariantError('Insight matrix failed validation', issues)
  }

  for (const category of Object.keys(matrix)) {
    if (isCategory(category)) Object.freeze(matrix[category])
  }
  return Object.freeze(matrix)
}

// ─── Lookup & Resolution ──────────────────────────────────────────────────

export function getBucket(matrix: InsightMatrix, category: Category, level: StatusLevel): InsightBucket {
  return matrix[category][level] ?? []
}

/**
 * First variant, in CONDITION_TAGS order, that is present in the bucket
 * and whose condition holds for the profile.
 */
export function resolveVariant(bucket: InsightBucket, profile: Profile): InsightVariant | undefined {
  for (const tag of CONDITION_TAGS) {
    if (!conditionHolds(tag, profile)) continue
    const variant = bucket.find(v => v.tag === tag)
    if (variant) return variant
  }
  return undefined
}
