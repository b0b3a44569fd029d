/**
 * Financial Clinic — Categories
 *
 * The six financial-health dimensions every question is grouped under.
 * CATEGORIES is the canonical iteration order for scoring.
 */

import type { LocalizedText } from './localization'

export const CATEGORIES = [
  'Income Stream',
  'Savings Habit',
  'Emergency Savings',
  'Debt Management',
  'Retirement Planning',
  'Protecting Your Family',
] as const

export type Category = typeof CATEGORIES[number]

export const CATEGORY_LABELS: Record<Category, LocalizedText> = {
  'Income Stream':          { en: 'Income Stream',          ar: 'مصدر الدخل' },
  'Savings Habit':          { en: 'Savings Habit',          ar: 'عادة الادخار' },
  'Emergency Savings':      { en: 'Emergency Savings',      ar: 'مدخرات الطوارئ' },
  'Debt Management':        { en: 'Debt Management',        ar: 'إدارة الديون' },
  'Retirement Planning':    { en: 'Retirement Planning',    ar: 'التخطيط للتقاعد' },
  'Protecting Your Family': { en: 'Protecting Your Family', ar: 'حماية عائلتك' },
}

/** Tie-break order when two categories contribute the same score (1 wins). */
export const CATEGORY_PRIORITY: Record<Category, number> = {
  'Income Stream': 1,
  'Emergency Savings': 2,
  'Savings Habit': 3,
  'Retirement Planning': 4,
  'Debt Management': 5,
  'Protecting Your Family': 6,
}

const CATEGORY_SET = new Set<string>(CATEGORIES)

export function isCategory(value: string): value is Category {
  return CATEGORY_SET.has(value)
}

/** Build a per-category record in canonical order. */
export function mapCategories<T>(fn: (category: Category) => T): Record<Category, T> {
  return {
    'Income Stream': fn('Income Stream'),
    'Savings Habit': fn('Savings Habit'),
    'Emergency Savings': fn('Emergency Savings'),
    'Debt Management': fn('Debt Management'),
    'Retirement Planning': fn('Retirement Planning'),
    'Protecting Your Family': fn('Protecting Your Family'),
  }
}
