export { CATEGORIES, CATEGORY_LABELS, CATEGORY_PRIORITY, type Category } from './engine/categories'
export { LANGUAGES, localize, type Language, type LocalizedText } from './engine/localization'
export {
  INCOME_BRACKETS,
  LOW_INCOME_BRACKETS,
  HIGH_INCOME_BRACKETS,
  CONDITION_TAGS,
  conditionTagsFor,
  profileFlags,
  type ConditionTag,
  type IncomeBracket,
  type Profile,
  type ProfileFlags,
} from './engine/profile'
export { CatalogInvariantError, AnswerValidationError, type AnswerViolation } from './engine/errors'
export {
  initializeCatalog,
  presentQuestions,
  type Question,
  type QuestionCatalog,
  type PresentedQuestion,
} from './engine/question-catalog'
export { classifyCategory, classifyOverall, type StatusBand, type StatusLevel } from './engine/status'
export {
  applyConditionalDefault,
  validateAnswers,
  scoreAnswers,
  type AnswerSet,
  type CategoryScore,
  type OverallScore,
  type ScoreResult,
} from './engine/scoring'
export { initializeInsightMatrix, resolveVariant, type InsightMatrix, type InsightVariant } from './engine/insight-matrix'
export { rankCategories, selectInsights, DEFAULT_MAX_INSIGHTS, type Insight } from './engine/insights'
export { migrateAnswers, needsMigration, type MigrationResult } from './engine/answer-migration'
export { loadEngineSettings, DEFAULT_SETTINGS, type EngineSettings } from './engine/engine-settings'
export {
  createEngine,
  initializeEngine,
  getEngine,
  getCatalog,
  getInsightMatrix,
  findCatalog,
  listRevisions,
  type Engine,
  type EngineContent,
} from './engine/engine-registry'
export {
  assessFinancialHealth,
  rescoreUnderRevision,
  questionsForRespondent,
  type AssessmentOutcome,
  type AssessmentReport,
  type AssessmentViolation,
} from './engine/assessment'
