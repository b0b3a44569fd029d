/**
 * Financial Clinic — Engine Registry
 *
 * Loads every bundled catalog revision and the insight matrix once per
 * process. Call initializeEngine() at startup: a CatalogInvariantError
 * thrown here means the content is broken and the service must not start.
 *
 * @module engine-registry
 */

import catalogV1 from '../data/catalogs/fc-v1.json'
import catalogV2 from '../data/catalogs/fc-v2.json'
import insightMatrixContent from '../data/insight-matrix.json'
import { CatalogInvariantError } from './errors'
import { initializeInsightMatrix, type InsightMatrix } from './insight-matrix'
import { initializeCatalog, type QuestionCatalog } from './question-catalog'

// ─── Types ────────────────────────────────────────────────────────────────

export interface EngineContent {
  catalogs: readonly unknown[]
  insightMatrix: unknown
}

export interface Engine {
  catalogs: ReadonlyMap<string, QuestionCatalog>
  matrix: InsightMatrix
}

export const BUNDLED_CONTENT: EngineContent = {
  catalogs: [catalogV1, catalogV2],
  insightMatrix: insightMatrixContent,
}

// ─── Construction ─────────────────────────────────────────────────────────

/** Validate content and build an engine. Nothing is shared between engines. */
export function createEngine(content: EngineContent): Engine {
  const catalogs = new Map<string, QuestionCatalog>()
  for (const definition of content.catalogs) {
    const catalog = initializeCatalog(definition)
    if (catalogs.has(catalog.revision)) {
      throw new CatalogInvariantError(`Catalog revision ${catalog.revision} is defined more than once`)
    }
    catalogs.set(catalog.revision, catalog)
  }
  if (catalogs.size === 0) {
    throw new CatalogInvariantError('At least one catalog revision is required')
  }

  return Object.freeze({
    catalogs,
    matrix: initializeInsightMatrix(content.insightMatrix),
  })
}

// ─── Process-wide Instance ────────────────────────────────────────────────

let engine: Engine | null = null

export function initializeEngine(): Engine {
  if (!engine) engine = createEngine(BUNDLED_CONTENT)
  return engine
}

export function getEngine(): Engine {
  if (!engine) throw new Error('[Engine] initializeEngine() must run before scoring')
  return engine
}

/** Catalog revision from the process engine, or undefined if it is not bundled. */
export function getCatalog(revision: string): QuestionCatalog | undefined {
  return findCatalog(getEngine(), revision)
}

export function getInsightMatrix(): InsightMatrix {
  return getEngine().matrix
}

export function findCatalog(target: Engine, revision: string): QuestionCatalog | undefined {
  return target.catalogs.get(revision)
}

export function listRevisions(target: Engine): string[] {
  return [...target.catalogs.keys()].sort()
}
