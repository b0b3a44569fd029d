/**
 * Financial Clinic — Engine Settings
 * Process-level defaults for the assessment facade, overridable from the
 * environment.
 *
 * @module engine-settings
 */

import { z } from 'zod'
import { LANGUAGES, type Language } from './localization'

// ─── Types ────────────────────────────────────────────────────────────────

export interface EngineSettings {
  catalogRevision: string     // revision used when a request names none
  maxInsights: number
  localizedLanguage: Language // language of `textLocalized` in reports
}

export const DEFAULT_SETTINGS: EngineSettings = {
  catalogRevision: 'fc-v2',
  maxInsights: 5,
  localizedLanguage: 'ar',
}

const ENV_VARS: Record<string, string> = {
  catalogRevision: 'FINANCIAL_CLINIC_REVISION',
  maxInsights: 'FINANCIAL_CLINIC_MAX_INSIGHTS',
  localizedLanguage: 'FINANCIAL_CLINIC_LANGUAGE',
}

const settingsSchema = z.object({
  catalogRevision: z.string().min(1),
  maxInsights: z.coerce.number().int().min(0),
  localizedLanguage: z.enum(LANGUAGES),
})

// ─── Loading ──────────────────────────────────────────────────────────────

type Env = Readonly<Record<string, string | undefined>>

export function loadEngineSettings(env: Env = process.env): EngineSettings {
  const overrides: Record<string, string> = {}
  for (const [key, name] of Object.entries(ENV_VARS)) {
    const value = env[name]?.trim()
    if (value) overrides[key] = value
  }

  const result = settingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...overrides })
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${ENV_VARS[String(issue.path[0])] ?? issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new Error(`[Settings] Invalid engine settings: ${details}`)
  }
  return result.data
}
