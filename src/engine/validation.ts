/**
 * Financial Clinic — Data Validation Schemas
 * Runtime validation for catalog and insight-matrix content files and for
 * assessment requests arriving from the request layer. Uses Zod for
 * type-safe validation.
 *
 * @module validation
 */

import { z } from 'zod'
import { CATEGORIES } from './categories'
import { INCOME_BRACKETS, CONDITION_TAGS } from './profile'

// ─── Primitive Validators ─────────────────────────────────────────────────

const questionId = z.string().min(1).max(50)
const answerValue = z.number().int().min(1).max(5)

export const localizedTextSchema = z.object({
  en: z.string().min(1),
  ar: z.string().min(1),
})

// ─── Question Catalog ─────────────────────────────────────────────────────

export const questionOptionSchema = z.object({
  value: answerValue,
  label: localizedTextSchema,
})

export const questionSchema = z.object({
  id: questionId,
  number: z.number().int().positive(),
  category: z.enum(CATEGORIES),
  weight: z.number().int().positive(),
  text: localizedTextSchema,
  options: z.array(questionOptionSchema).length(5),
  conditional: z.enum(['has_dependents']).optional(),
})

export const catalogDefinitionSchema = z.object({
  revision: z.string().min(1),
  questions: z.array(questionSchema).min(1),
})

export type CatalogDefinition = z.infer<typeof catalogDefinitionSchema>

// ─── Insight Matrix ───────────────────────────────────────────────────────

export const conditionTagSchema = z.enum(CONDITION_TAGS)

export const insightVariantSchema = z.object({
  tag: conditionTagSchema,
  text: localizedTextSchema,
})

// Category and status keys are checked by the matrix loader so that every
// unknown key is reported by name.
export const insightMatrixDefinitionSchema = z.record(
  z.string(),
  z.record(z.string(), z.array(insightVariantSchema)),
)

export type InsightMatrixDefinition = z.infer<typeof insightMatrixDefinitionSchema>

// ─── Assessment Request ───────────────────────────────────────────────────

export const profileSchema = z.object({
  incomeBracket: z.enum(INCOME_BRACKETS),
  nationality: z.string().min(1).max(100),
  gender: z.string().min(1).max(50),
  dependents: z.number().int().min(0).max(50),
})

// Answer values stay unknown here: the scoring engine reports every bad
// value itself rather than stopping at the schema.
export const answersSchema = z.record(questionId, z.unknown())

export const assessmentRequestSchema = z.object({
  answers: answersSchema,
  profile: profileSchema,
  revision: z.string().min(1).optional(),
})

export type AssessmentRequest = z.infer<typeof assessmentRequestSchema>

// ─── Validation Functions ─────────────────────────────────────────────────

export interface SchemaIssue {
  path: string
  message: string
}

export type ParseResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: SchemaIssue[] }

export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

/** Validate an assessment request body */
export function parseAssessmentRequest(data: unknown): ParseResult<AssessmentRequest> {
  const result = assessmentRequestSchema.safeParse(data)
  if (result.success) return { valid: true, data: result.data }
  return { valid: false, errors: toSchemaIssues(result.error) }
}
