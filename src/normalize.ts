import type { Delimiter, DelimiterName, ProgressOptions, SourceFile } from './types.js'
import type { ScratchWorkspace } from './workspace.js'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { DelimiterConflictError } from './errors.js'
import { readHeader } from './readHeader.js'
import { readTableChunks, TableWriter } from './tableIO.js'
import { SUPPORTED_DELIMITERS } from './types.js'
import { ProgressTracker, resolveLogger, throwIfAborted } from './util.js'

/**
 * Run `task` over `items` with at most `limit` tasks in flight.
 *
 * Results keep the order of `items`. After the first failure no new task is
 * started; the call still waits for the running ones, then rethrows that failure.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  const state: { next: number; failure?: { error: unknown } } = { next: 0 }

  async function worker(): Promise<void> {
    while (state.failure === undefined && state.next < items.length) {
      const index = state.next
      state.next += 1
      try {
        results[index] = await task(items[index]!, index)
      } catch (e) {
        state.failure ??= { error: e }
      }
    }
  }

  const size = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: size }, () => worker()))

  if (state.failure !== undefined) throw state.failure.error
  return results
}

export function distinctDelimiters(files: readonly SourceFile[]): Delimiter[] {
  return [...new Set(files.map(file => file.delimiter))].sort()
}

/**
 * The delimiter to rewrite the files to, or undefined when they already agree.
 * Mixed delimiters without a target are fatal.
 */
export function normalizationTarget(
  files: readonly SourceFile[],
  target: DelimiterName | undefined,
): DelimiterName | undefined {
  const delimiters = distinctDelimiters(files)
  if (delimiters.length <= 1) return undefined
  if (target === undefined) throw new DelimiterConflictError(delimiters, Object.keys(SUPPORTED_DELIMITERS))
  return target
}

export type RewriteOptions = {
  chunkSize: number
  signal?: AbortSignal
}

/**
 * Copy one delimited file to `dst` with another delimiter, header first.
 */
export async function rewriteDelimited(
  src: string,
  dst: string,
  from: Delimiter,
  to: Delimiter,
  { chunkSize, signal }: RewriteOptions,
): Promise<void> {
  const writer = await TableWriter.open(dst, to)
  try {
    let first = true
    for await (const chunk of readTableChunks(src, from, chunkSize, signal)) {
      if (first) {
        await writer.writeRows([chunk.columns])
        first = false
      }
      await writer.writeRows(chunk.rows)
    }
    if (first) {
      const header = await readHeader(src, from)
      if (header.length > 0) await writer.writeRows([header])
    }
    await writer.close()
  } catch (e) {
    writer.destroy()
    throw e
  }
}

export type NormalizeOptions = ProgressOptions & {
  target: DelimiterName
  workers: number
  chunkSize: number
}

/**
 * Rewrite every file into the workspace with the target delimiter.
 *
 * Copies land in `<workspace>/<id>/<basename>` so equal basenames never collide.
 * Returns fresh records pointing at the copies, in the same order.
 */
export async function normalizeFiles(
  files: readonly SourceFile[],
  workspace: ScratchWorkspace,
  options: NormalizeOptions,
): Promise<SourceFile[]> {
  const { signal, workers, chunkSize } = options
  const log = resolveLogger(options.logger)
  const to = SUPPORTED_DELIMITERS[options.target]
  const root = await workspace.path()
  const tracker = new ProgressTracker(options, 'normalize', files.length)

  log.info(`[NORMALIZE] Mixed delimiters [${distinctDelimiters(files).map(d => JSON.stringify(d)).join(', ')}] -> normalizing to '${options.target}'`)

  const normalized = await mapWithConcurrency(files, workers, async (file, index) => {
    throwIfAborted(signal, 'normalize')
    tracker.startFile(index)

    const dir = path.join(root, String(file.id))
    await fsp.mkdir(dir, { recursive: true })
    const dst = path.join(dir, path.basename(file.path))

    await rewriteDelimited(file.path, dst, file.delimiter, to, { chunkSize, signal })
    log.debug(`[NORMALIZE] ${file.originPath} -> ${dst}`)

    const next: SourceFile = {
      id: file.id,
      path: dst,
      originPath: file.originPath,
      delimiter: to,
      header: await readHeader(dst, to),
    }
    return next
  })

  tracker.flush()
  return normalized
}
