import type { ColumnPlan, MissingPolicy, Schema, SchemaPolicy, SkippedFile, SourceFile } from './types.js'
import {
  EmptyIntersectionError,
  MissingColumnsError,
  NoUsableFilesError,
  SchemaMismatchError,
} from './errors.js'

/** A file paired with the columns it contributes to the schema */
export type PlannedFile = {
  file: SourceFile
  plan: ColumnPlan
}

type HeaderEntry = Pick<SourceFile, 'originPath' | 'header'>

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false
  for (const value of a) {
    if (!b.has(value)) return false
  }
  return true
}

/**
 * Derive the output columns from every file's header.
 *
 * - strict: all header sets equal; first file's order
 * - union: every column, first-seen order
 * - intersection: columns shared by all files, first file's order
 */
export function reconcileSchema(entries: readonly HeaderEntry[], policy: SchemaPolicy): Schema {
  const [base, ...rest] = entries
  if (base === undefined) throw new Error('[reconcileSchema] entries must be a non-empty array')

  switch (policy) {
    case 'strict': {
      const baseSet = new Set(base.header)
      const other = rest.find(entry => !sameSet(new Set(entry.header), baseSet))
      if (other) throw new SchemaMismatchError(base.originPath, base.header, other.originPath, other.header)
      return [...base.header]
    }
    case 'union': {
      const seen = new Set<string>()
      for (const entry of entries) {
        for (const column of entry.header) seen.add(column)
      }
      return [...seen]
    }
    case 'intersection': {
      const sets = rest.map(entry => new Set(entry.header))
      const shared = [...new Set(base.header)].filter(column => sets.every(set => set.has(column)))
      if (shared.length === 0) throw new EmptyIntersectionError()
      return shared
    }
    default: {
      const neverPolicy: never = policy
      throw new Error(`[reconcileSchema] Unknown schema policy: ${String(neverPolicy)}`)
    }
  }
}

/** Reconciled mode: each schema column is read from the same-named column, when the file has one */
export function planColumns(schema: Schema, header: readonly string[]): ColumnPlan {
  const present = new Set(header)
  return schema.map(column => (present.has(column) ? column : undefined))
}

/** Lookup key → column name as written in the file. Later duplicates win. */
export function makeHeaderMap(header: readonly string[], caseInsensitive: boolean): Map<string, string> {
  return new Map(header.map(column => [caseInsensitive ? column.toLowerCase() : column, column]))
}

export type ResolvedColumns = {
  plan: ColumnPlan
  missing: string[]
}

export function resolveRequestedColumns(
  requested: readonly string[],
  headerMap: ReadonlyMap<string, string>,
  caseInsensitive: boolean,
): ResolvedColumns {
  const missing: string[] = []
  const plan = requested.map((column) => {
    const found = headerMap.get(caseInsensitive ? column.toLowerCase() : column)
    if (found === undefined) missing.push(column)
    return found
  })
  return { plan, missing }
}

export type SelectColumnsOptions = {
  caseInsensitive: boolean
  missingPolicy: MissingPolicy
}

export type ColumnSelection = {
  schema: Schema
  files: PlannedFile[]
  skipped: SkippedFile[]
}

/**
 * Requested mode: validate an explicit column list against every file.
 *
 * The schema is the requested list verbatim. Files missing some of the
 * columns abort the run (`error`), are left out (`skip`) or are merged with
 * nulls in their place (`fillna`).
 */
export function selectColumns(
  files: readonly SourceFile[],
  requested: readonly string[],
  { caseInsensitive, missingPolicy }: SelectColumnsOptions,
): ColumnSelection {
  const planned: PlannedFile[] = []
  const skipped: SkippedFile[] = []

  for (const file of files) {
    const { plan, missing } = resolveRequestedColumns(
      requested,
      makeHeaderMap(file.header, caseInsensitive),
      caseInsensitive,
    )

    if (missing.length > 0) {
      if (missingPolicy === 'error') throw new MissingColumnsError(file.originPath, missing)
      if (missingPolicy === 'skip') {
        skipped.push({ path: file.originPath, missing })
        continue
      }
    }
    planned.push({ file, plan })
  }

  if (planned.length === 0) throw new NoUsableFilesError()

  return { schema: [...requested], files: planned, skipped }
}
