/**
 * Financial Clinic — Insight Selector
 *
 * Picks up to N advisory messages for the weakest categories:
 *   1. Rank categories by contribution, lowest first (ties → CATEGORY_PRIORITY)
 *   2. Take the first N
 *   3. Resolve one variant per category from its matrix bucket
 * Categories whose bucket is empty or unresolvable are dropped, so fewer
 * than N insights can come back. The list is never padded.
 *
 * @module insights
 */

import { CATEGORIES, CATEGORY_PRIORITY, type Category } from './categories'
import { getBucket, resolveVariant, type InsightMatrix } from './insight-matrix'
import type { LocalizedText } from './localization'
import type { ConditionTag, Profile } from './profile'
import type { CategoryScore } from './scoring'
import type { StatusLevel } from './status'

// ─── Types ────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_INSIGHTS = 5

export interface Insight {
  category: Category
  statusLevel: StatusLevel
  text: LocalizedText
  priority: number // tie-break rank of the category, lower first
  conditionTag: ConditionTag
}

export type RankableScore = Pick<CategoryScore, 'contribution' | 'statusLevel'>

export type RankableScores = Readonly<Partial<Record<Category, RankableScore>>>

export interface RankedCategory extends RankableScore {
  category: Category
  priority: number
}

// ─── Ranking ──────────────────────────────────────────────────────────────

export function rankCategories(scores: RankableScores): RankedCategory[] {
  return CATEGORIES
    .flatMap(category => {
      const score = scores[category]
      return score
        ? [{ category, contribution: score.contribution, statusLevel: score.statusLevel, priority: CATEGORY_PRIORITY[category] }]
        : []
    })
    .sort((a, b) => a.contribution - b.contribution || a.priority - b.priority)
}

// ─── Selection ────────────────────────────────────────────────────────────

export function selectInsights(
  matrix: InsightMatrix,
  scores: RankableScores,
  profile: Profile,
  maxInsights: number = DEFAULT_MAX_INSIGHTS,
): Insight[] {
  if (!Number.isInteger(maxInsights) || maxInsights < 0) {
    throw new RangeError(`maxInsights must be a non-negative integer, got ${maxInsights}`)
  }

  const insights: Insight[] = []

  for (const ranked of rankCategories(scores).slice(0, maxInsights)) {
    const bucket = getBucket(matrix, ranked.category, ranked.statusLevel)
    if (bucket.length === 0) continue

    const variant = resolveVariant(bucket, profile)
    if (!variant) {
      console.warn(`[Insights] No applicable variant for ${ranked.category}/${ranked.statusLevel}; category omitted`)
      continue
    }

    insights.push({
      category: ranked.category,
      statusLevel: ranked.statusLevel,
      text: variant.text,
      priority: ranked.priority,
      conditionTag: variant.tag,
    })
  }

  return insights
}
