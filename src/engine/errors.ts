/**
 * Financial Clinic — Engine Errors
 *
 * @module errors
 */

// ─── Catalog / Matrix Invariants ──────────────────────────────────────────

/**
 * Raised while loading a question catalog or the insight matrix.
 * Fatal: the engine must not serve requests from content that failed.
 */
export class CatalogInvariantError extends Error {
  constructor(
    message: string,
    public issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'CatalogInvariantError'
  }
}

// ─── Answer Validation ────────────────────────────────────────────────────

export type AnswerViolationCode = 'missing' | 'invalid_value'

export interface AnswerViolation {
  questionId: string
  code: AnswerViolationCode
  message: string
}

export class AnswerValidationError extends Error {
  constructor(public violations: AnswerViolation[]) {
    super(`Answer set has ${violations.length} violation${violations.length === 1 ? '' : 's'}`)
    this.name = 'AnswerValidationError'
  }
}
