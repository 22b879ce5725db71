import type { Readable, Writable } from 'node:stream'
import type { CombineLogger, CombinePhase, CombineProgress, ProgressOptions } from './types.js'
import { once } from 'node:events'
import { InterruptedError } from './errors.js'

export function throwIfAborted(signal: AbortSignal | undefined, label: string): void {
  if (signal?.aborted) throw new InterruptedError(label)
}

export async function writeToWritable(output: Writable, chunk: string | Buffer): Promise<void> {
  if (output.destroyed) throw new Error('[concat-tables] output is destroyed')
  const ok = output.write(chunk)
  if (!ok) await once(output, 'drain')
}

export async function endWritable(output: Writable): Promise<void> {
  if (output.writableEnded || output.writableFinished) return

  const done = Promise.race([
    once(output, 'finish'),
    once(output, 'close'),
    once(output, 'error').then(([e]) => {
      throw e
    }),
  ])
  output.end()
  await done
}

/** Undecodable bytes come out of the UTF-8 decoder as U+FFFD; drop them */
export function dropUndecodable(text: string): string {
  return text.includes('\uFFFD') ? text.replace(/\uFFFD/g, '') : text
}

export async function* readUtf8Lines(src: Readable): AsyncGenerator<string> {
  src.setEncoding('utf8')

  let carry = ''
  for await (const chunk of src) {
    carry += String(chunk)

    while (true) {
      const lf = carry.indexOf('\n')
      if (lf === -1) break

      let line = carry.slice(0, lf)
      if (line.endsWith('\r')) line = line.slice(0, -1)
      yield dropUndecodable(line)
      carry = carry.slice(lf + 1)
    }
  }

  if (carry.length > 0) {
    if (carry.endsWith('\r')) carry = carry.slice(0, -1)
    yield dropUndecodable(carry)
  }
}

const silentLogger: CombineLogger = {
  info: () => {},
  debug: () => {},
}

export function resolveLogger(logger: CombineLogger | undefined): CombineLogger {
  return logger ?? silentLogger
}

/**
 * Throttles progress callbacks for one phase of a run.
 */
export class ProgressTracker {
  private readonly onProgress: ((progress: CombineProgress) => void) | undefined
  private readonly intervalMs: number
  private lastEmit = 0
  private fileIndex = 0
  private rowsWritten = 0

  constructor(
    options: ProgressOptions,
    private readonly phase: CombinePhase,
    private readonly totalFiles: number,
  ) {
    this.onProgress = options.onProgress
    this.intervalMs = options.progressIntervalMs ?? 1000
  }

  get rows(): number {
    return this.rowsWritten
  }

  startFile(index: number): void {
    this.fileIndex = index
    this.maybeEmit()
  }

  addRows(count: number): void {
    this.rowsWritten += count
    this.maybeEmit()
  }

  flush(): void {
    this.emit()
  }

  private maybeEmit(): void {
    if (!this.onProgress) return
    const now = Date.now()
    if (this.intervalMs === 0 || now - this.lastEmit >= this.intervalMs) this.emit(now)
  }

  private emit(now = Date.now()): void {
    if (!this.onProgress) return
    this.lastEmit = now
    this.onProgress({
      phase: this.phase,
      fileIndex: this.fileIndex,
      totalFiles: this.totalFiles,
      rowsWritten: this.rowsWritten,
    })
  }
}
