/**
 * Financial Clinic — Status Classifier
 *
 * Two independent scales:
 *   • Overall band  (0–100 total)      → At Risk / Needs Improvement / Good / Excellent
 *   • Category level (0–100 percentage) → at_risk / good / excellent
 */

// ─── Category Status Levels ───────────────────────────────────────────────

export const STATUS_LEVELS = ['at_risk', 'good', 'excellent'] as const

export type StatusLevel = typeof STATUS_LEVELS[number]

export const CATEGORY_STATUS_THRESHOLDS = {
  excellent: 80,
  good: 40,
} as const

export function classifyCategory(percentage: number): StatusLevel {
  if (percentage >= CATEGORY_STATUS_THRESHOLDS.excellent) return 'excellent'
  if (percentage >= CATEGORY_STATUS_THRESHOLDS.good) return 'good'
  return 'at_risk'
}

const STATUS_LEVEL_SET = new Set<string>(STATUS_LEVELS)

export function isStatusLevel(value: string): value is StatusLevel {
  return STATUS_LEVEL_SET.has(value)
}

// ─── Overall Status Bands ─────────────────────────────────────────────────

export type StatusBand = 'At Risk' | 'Needs Improvement' | 'Good' | 'Excellent'

interface BandRange {
  band: StatusBand
  min: number // inclusive
  max: number // exclusive, except the top band
}

// Contiguous over [0, 100], highest first.
export const STATUS_BANDS: readonly BandRange[] = [
  { band: 'Excellent', min: 80, max: 100 },
  { band: 'Good', min: 60, max: 80 },
  { band: 'Needs Improvement', min: 30, max: 60 },
  { band: 'At Risk', min: 0, max: 30 },
]

export function classifyOverall(total: number): StatusBand {
  for (const range of STATUS_BANDS) {
    const withinMax = range.max === 100 ? total <= range.max : total < range.max
    if (total >= range.min && withinMax) return range.band
  }
  console.warn(`[Status] Total ${total} is outside every status band; defaulting to At Risk`)
  return 'At Risk'
}
