import type { PlannedFile } from './reconcileSchema.js'
import type { Delimiter, ProgressOptions, Schema, SourceColumnMode, SourceColumnOptions } from './types.js'
import path from 'node:path'
import { readTableChunks, TableWriter } from './tableIO.js'
import { ProgressTracker, resolveLogger, throwIfAborted } from './util.js'

export type MergeTablesOptions = ProgressOptions & {
  /** Files in merge order, each with its column plan */
  files: readonly PlannedFile[]
  schema: Schema
  outPath: string
  outDelimiter: Delimiter
  /** Rows per chunk */
  chunkSize: number
  /** Write the combined header before the first chunk (default: true) */
  header?: boolean
  sourceColumn?: SourceColumnOptions
}

export function sourceValueFor(filePath: string, mode: SourceColumnMode): string {
  switch (mode) {
    case 'name':
      return path.basename(filePath)
    case 'stem':
      return path.basename(filePath, path.extname(filePath))
    case 'path':
      return filePath
    default: {
      const neverMode: never = mode
      throw new Error(`[mergeTables] Unsupported source column mode: ${String(neverMode)}`)
    }
  }
}

/**
 * Positions of the planned columns in a chunk's columns; -1 for columns written as null.
 */
export function projectionFor(plan: readonly (string | undefined)[], columns: readonly string[]): number[] {
  return plan.map(column => (column === undefined ? -1 : columns.indexOf(column)))
}

export function projectRow(row: readonly string[], projection: readonly number[]): string[] {
  return projection.map(index => (index === -1 ? '' : (row[index] ?? '')))
}

/**
 * Merge delimited files into one output file under a single header.
 *
 * Behavior:
 * - Reads each file sequentially, in the given order, `chunkSize` rows at a time
 * - Projects every chunk onto the schema; columns a file lacks are written as nulls (empty fields)
 * - Optionally prepends a column naming the file each row came from
 * - Writes the header once, right before the first chunk
 *
 * Returns the number of data rows written.
 */
export async function mergeTables(options: MergeTablesOptions): Promise<number> {
  const { files, schema, signal, chunkSize } = options
  if (files.length === 0) throw new Error('[mergeTables] files must be a non-empty array')

  const log = resolveLogger(options.logger)
  const writeHeader = options.header ?? true
  const source = options.sourceColumn?.enabled ? options.sourceColumn : undefined
  const outColumns = source ? [source.name, ...schema] : [...schema]

  const tracker = new ProgressTracker(options, 'merge', files.length)
  const writer = await TableWriter.open(options.outPath, options.outDelimiter)
  let headerWritten = !writeHeader

  try {
    for (let i = 0; i < files.length; i += 1) {
      throwIfAborted(signal, 'mergeTables')
      tracker.startFile(i)

      const { file, plan } = files[i]!
      const label = source ? sourceValueFor(file.originPath, source.mode) : undefined
      log.debug(`[COMBINE] ${file.originPath} (sep=${JSON.stringify(file.delimiter)})`)

      for await (const chunk of readTableChunks(file.path, file.delimiter, chunkSize, signal)) {
        const projection = projectionFor(plan, chunk.columns)
        const rows = chunk.rows.map((row) => {
          const projected = projectRow(row, projection)
          return label === undefined ? projected : [label, ...projected]
        })

        if (!headerWritten) {
          await writer.writeRows([outColumns])
          headerWritten = true
        }
        await writer.writeRows(rows)
        tracker.addRows(rows.length)
        throwIfAborted(signal, 'mergeTables')
      }
    }

    await writer.close()
  } catch (e) {
    writer.destroy()
    throw e
  }

  tracker.flush()
  log.info(`[COMBINE] Wrote ${tracker.rows} rows to ${options.outPath}`)
  return tracker.rows
}
