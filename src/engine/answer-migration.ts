/**
 * Answer migration between catalog revisions.
 *
 * Stored submissions keep the revision they were answered under. To
 * re-score one under a newer revision, answers are carried across by
 * question id; ids the target revision no longer has are dropped (e.g.
 * fc_q16 when moving from fc-v1 to fc-v2).
 */

import type { QuestionCatalog } from './question-catalog'
import type { AnswerSet } from './scoring'

export interface MigrationResult {
  answers: Record<string, unknown>
  carriedCount: number
  droppedIds: string[]
}

export const migrateAnswers = (
  answers: AnswerSet,
  from: QuestionCatalog,
  to: QuestionCatalog,
): MigrationResult => {
  const migrated: Record<string, unknown> = {}
  const droppedIds: string[] = []

  for (const [questionId, value] of Object.entries(answers)) {
    if (to.getQuestion(questionId)) {
      migrated[questionId] = value
    } else {
      droppedIds.push(questionId)
    }
  }

  if (droppedIds.length > 0) {
    console.warn(`[Migration] ${from.revision} → ${to.revision}: dropped ${droppedIds.join(', ')}`)
  }

  return { answers: migrated, carriedCount: Object.keys(migrated).length, droppedIds }
}

/** True when some answer has no question in the target revision. */
export const needsMigration = (answers: AnswerSet, to: QuestionCatalog): boolean =>
  Object.keys(answers).some(id => !to.getQuestion(id))
