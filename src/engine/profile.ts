/**
 * Financial Clinic — Respondent Profile
 *
 * Demographic facts used for conditional questions and insight
 * personalization. Income brackets are monthly AED ranges as shown on
 * the profile form; the first four are "below 30K", the last four
 * "above 30K".
 *
 * @module profile
 */

// ─── Income Brackets ──────────────────────────────────────────────────────

export const LOW_INCOME_BRACKETS = [
  'Below 5,000',
  '5,000 - 10,000',
  '10,000 - 20,000',
  '20,000 - 30,000',
] as const

export const HIGH_INCOME_BRACKETS = [
  '30,000 - 40,000',
  '40,000 - 50,000',
  '50,000 - 100,000',
  'Above 100,000',
] as const

export const INCOME_BRACKETS = [...LOW_INCOME_BRACKETS, ...HIGH_INCOME_BRACKETS] as const

export type IncomeBracket = typeof INCOME_BRACKETS[number]

export const LOCAL_NATIONALITY = 'Emirati'
export const FEMALE = 'Female'

// ─── Profile ──────────────────────────────────────────────────────────────

export interface Profile {
  incomeBracket: IncomeBracket
  nationality: string
  gender: string
  dependents: number
}

/** Flags that decide which questions a respondent is asked. */
export interface ProfileFlags {
  hasDependents: boolean
}

export function profileFlags(dependents: number): ProfileFlags {
  return { hasDependents: dependents > 0 }
}

const sameLabel = (a: string, b: string) => a.trim().toLowerCase() === b.toLowerCase()

const HIGH_INCOME = new Set<string>(HIGH_INCOME_BRACKETS)
const LOW_INCOME = new Set<string>(LOW_INCOME_BRACKETS)

export function isHighIncome(profile: Profile): boolean {
  return HIGH_INCOME.has(profile.incomeBracket)
}

export function isLowIncome(profile: Profile): boolean {
  return LOW_INCOME.has(profile.incomeBracket)
}

export function isEmiratiWoman(profile: Profile): boolean {
  return sameLabel(profile.nationality, LOCAL_NATIONALITY) && sameLabel(profile.gender, FEMALE)
}

// ─── Condition Tags ───────────────────────────────────────────────────────

/**
 * Tags an insight variant can be keyed on, in resolution order.
 * Income framing overrides nationality and family framing; `else` and
 * `default` always hold.
 */
export const CONDITION_TAGS = [
  'income_above_30k',
  'income_below_30k',
  'emirati_woman',
  'children_zero',
  'children_above_zero',
  'else',
  'default',
] as const

export type ConditionTag = typeof CONDITION_TAGS[number]

export function conditionHolds(tag: ConditionTag, profile: Profile): boolean {
  switch (tag) {
    case 'income_above_30k': return isHighIncome(profile)
    case 'income_below_30k': return isLowIncome(profile)
    case 'emirati_woman': return isEmiratiWoman(profile)
    case 'children_zero': return profile.dependents === 0
    case 'children_above_zero': return profile.dependents > 0
    case 'else':
    case 'default':
      return true
  }
}

export function conditionTagsFor(profile: Profile): ConditionTag[] {
  return CONDITION_TAGS.filter(tag => conditionHolds(tag, profile))
}
