import type { PlannedFile } from './reconcileSchema.js'
import type { CombineLogger, CombineOptions, CombineSummary, Schema, SkippedFile, SourceFile } from './types.js'
import { HeaderReadError } from './errors.js'
import { mergeTables } from './mergeTables.js'
import { normalizationTarget, normalizeFiles } from './normalize.js'
import { readHeader } from './readHeader.js'
import { planColumns, reconcileSchema, selectColumns } from './reconcileSchema.js'
import { resolvePaths } from './resolvePaths.js'
import { sniffFileDelimiter } from './sniffDelimiter.js'
import { SUPPORTED_DELIMITERS } from './types.js'
import { resolveLogger, throwIfAborted } from './util.js'
import { withScratchWorkspace } from './workspace.js'

/**
 * Sniff the delimiter and read the header of every file, one file at a time.
 */
export async function discoverFiles(
  paths: readonly string[],
  sampleRows: number,
  { signal, logger }: { signal?: AbortSignal; logger?: CombineLogger } = {},
): Promise<SourceFile[]> {
  const log = resolveLogger(logger)
  const files: SourceFile[] = []

  for (const [id, filePath] of paths.entries()) {
    throwIfAborted(signal, 'discoverFiles')
    const delimiter = await sniffFileDelimiter(filePath, sampleRows)
    const header = await readHeader(filePath, delimiter)
    log.debug(`[SNIFF] ${filePath}: delim=${JSON.stringify(delimiter)} | header=[${header.join(', ')}]`)
    files.push({ id, path: filePath, originPath: filePath, delimiter, header })
  }

  return files
}

/** Every file without a header, reported together */
export function assertHeaders(files: readonly SourceFile[]): void {
  const empty = files.filter(file => file.header.length === 0).map(file => file.originPath)
  if (empty.length > 0) throw new HeaderReadError(empty)
}

type MergePlan = {
  schema: Schema
  files: PlannedFile[]
  skipped: SkippedFile[]
}

function planMerge(files: readonly SourceFile[], options: CombineOptions, log: CombineLogger): MergePlan {
  if (options.columns !== undefined && options.columns.length > 0) {
    const selection = selectColumns(files, options.columns, {
      caseInsensitive: options.caseInsensitive,
      missingPolicy: options.missingPolicy,
    })
    log.debug(`[COLUMNS] requested=[${options.columns.join(', ')}]`)
    if (selection.skipped.length > 0) {
      const detail = selection.skipped.map(s => `${s.path} (missing ${s.missing.join(', ')})`).join('; ')
      log.info(`[COLUMNS] skipped ${selection.skipped.length} files due to missing columns: ${detail}`)
    }
    return selection
  }

  const schema = reconcileSchema(files, options.schemaPolicy)
  log.debug(`[SCHEMA] policy=${options.schemaPolicy} -> ${schema.length} columns`)
  log.debug(`[SCHEMA] columns=[${schema.join(', ')}]`)
  return {
    schema,
    files: files.map(file => ({ file, plan: planColumns(schema, file.header) })),
    skipped: [],
  }
}

/**
 * Combine many delimited files into one.
 *
 * Resolves the inputs, sniffs each file, normalizes mixed delimiters into a
 * scratch workspace when asked to, reconciles the columns and streams every
 * file into the output. With `dryRun` everything but the final write happens.
 * The scratch workspace never outlives the call.
 */
export async function combine(options: CombineOptions): Promise<CombineSummary> {
  const { signal } = options
  const log = resolveLogger(options.logger)

  const { paths, extension } = await resolvePaths(options.input, options.extension)
  log.debug(`[INPUT] ${paths.length} files`)
  for (const p of paths) log.debug(` - ${p}`)

  const discovered = await discoverFiles(paths, options.sampleRows, options)

  return withScratchWorkspace(async (workspace) => {
    const target = normalizationTarget(discovered, options.normalize)
    const files = target === undefined
      ? discovered
      : await normalizeFiles(discovered, workspace, { ...options, target })

    assertHeaders(files)
    throwIfAborted(signal, 'combine')

    const plan = planMerge(files, options, log)
    const usingColumns = options.columns !== undefined && options.columns.length > 0
    const first = plan.files[0]
    const delimiter = first ? first.file.delimiter : SUPPORTED_DELIMITERS.comma

    const summary: CombineSummary = {
      files: plan.files.map(({ file }) => file.originPath),
      skipped: plan.skipped,
      extension,
      delimiter,
      mode: usingColumns ? 'columns' : 'schema',
      ...(usingColumns
        ? { missingPolicy: options.missingPolicy, caseInsensitive: options.caseInsensitive }
        : { schemaPolicy: options.schemaPolicy }),
      columns: [...plan.schema],
      sourceColumn: options.sourceColumn,
      outPath: options.outPath,
      outDelimiter: options.outDelimiter,
      header: options.header,
      normalized: target !== undefined,
      rowsWritten: 0,
      dryRun: options.dryRun,
    }

    if (options.dryRun) return summary

    const rowsWritten = await mergeTables({
      ...options,
      files: plan.files,
      schema: plan.schema,
      outDelimiter: SUPPORTED_DELIMITERS[options.outDelimiter],
    })

    return { ...summary, rowsWritten }
  }, options.scratchDir)
}

/**
 * Human-readable lines describing a run, as printed for a dry run.
 */
export function describeSummary(summary: CombineSummary): string[] {
  const lines = [
    `Files: ${summary.files.length}`,
    `Extension: .${summary.extension}`,
    `Unified delimiter: ${JSON.stringify(summary.delimiter)}${summary.normalized ? ' (normalized)' : ''}`,
  ]

  if (summary.mode === 'columns') {
    lines.push(`Columns mode: [${summary.columns.join(', ')}]`)
    lines.push(`Missing-policy: ${summary.missingPolicy ?? 'error'}`)
    lines.push(`Case-insensitive: ${String(summary.caseInsensitive ?? false)}`)
    if (summary.skipped.length > 0) lines.push(`Skipped: ${summary.skipped.map(s => s.path).join(', ')}`)
  } else {
    lines.push(`Schema policy: ${summary.schemaPolicy ?? 'strict'}`)
    lines.push(`Columns: [${summary.columns.join(', ')}]`)
  }

  const { sourceColumn } = summary
  lines.push(`Source column: ${sourceColumn.enabled ? 'ON' : 'OFF'} | name='${sourceColumn.name}' | mode=${sourceColumn.mode}`)
  lines.push(`Output: ${summary.outPath} (delim=${summary.outDelimiter}, header=${String(summary.header)})`)
  return lines
}
