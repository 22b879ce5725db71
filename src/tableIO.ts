import type { WriteStream } from 'node:fs'
import type { Delimiter } from './types.js'
import { once } from 'node:events'
import { createReadStream, createWriteStream } from 'node:fs'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { parse } from 'csv-parse'
import { stringify } from 'csv-stringify/sync'
import { dropUndecodable, endWritable, throwIfAborted, writeToWritable } from './util.js'

/** A batch of rows sharing the header of the file they came from */
export type TableChunk = {
  columns: readonly string[]
  rows: string[][]
}

function toRow(record: unknown): string[] {
  if (!Array.isArray(record)) throw new Error('[tableIO] Expected an array record from the parser')
  return record.map(cell => dropUndecodable(typeof cell === 'string' ? cell : String(cell)))
}

export function isBlankRow(row: readonly string[]): boolean {
  return row.every(cell => cell.trim() === '')
}

/**
 * Stream the records of a delimited file.
 *
 * Bytes that are not valid UTF-8 are dropped instead of failing the read;
 * breaking out of the loop closes the file.
 */
export async function* readRows(filePath: string, delimiter: Delimiter): AsyncGenerator<string[]> {
  const src = createReadStream(filePath)
  const parser = parse({
    delimiter,
    encoding: 'utf8',
    bom: true,
    relax_quotes: true,
    relax_column_count: true,
    skip_empty_lines: true,
  })
  src.on('error', e => parser.destroy(e))
  src.pipe(parser)

  try {
    for await (const record of parser) {
      yield toRow(record)
    }
  } finally {
    src.destroy()
    parser.destroy()
  }
}

/**
 * Stream a delimited file as chunks of at most `chunkSize` rows.
 *
 * - The first row with a non-blank cell is the header (cells trimmed); rows before it are skipped
 * - Whitespace-only lines are skipped
 * - Data rows are padded with empty cells or cut to the header's width
 * - A file with a header and no data yields nothing
 */
export async function* readTableChunks(
  filePath: string,
  delimiter: Delimiter,
  chunkSize: number,
  signal?: AbortSignal,
): AsyncGenerator<TableChunk> {
  let columns: string[] | undefined
  let rows: string[][] = []

  for await (const row of readRows(filePath, delimiter)) {
    if (columns === undefined) {
      if (!isBlankRow(row)) columns = row.map(cell => cell.trim())
      continue
    }
    if (row.length === 1 && isBlankRow(row)) continue

    rows.push(fitRow(row, columns.length))
    if (rows.length >= chunkSize) {
      yield { columns, rows }
      rows = []
      throwIfAborted(signal, 'readTableChunks')
    }
  }

  if (columns !== undefined && rows.length > 0) yield { columns, rows }
}

function fitRow(row: string[], width: number): string[] {
  if (row.length === width) return row
  if (row.length > width) return row.slice(0, width)
  return [...row, ...new Array<string>(width - row.length).fill('')]
}

export function formatRows(rows: readonly (readonly string[])[], delimiter: Delimiter): string {
  return stringify(rows.map(row => [...row]), { delimiter, record_delimiter: 'unix' })
}

/**
 * Single append-only handle on a delimited output file.
 */
export class TableWriter {
  private failure: Error | undefined

  private constructor(
    private readonly output: WriteStream,
    readonly delimiter: Delimiter,
  ) {
    output.on('error', (e) => {
      this.failure = e
    })
  }

  /** Create (or truncate) the file, creating parent directories first */
  static async open(filePath: string, delimiter: Delimiter): Promise<TableWriter> {
    await fsp.mkdir(path.dirname(filePath), { recursive: true })
    const output = createWriteStream(filePath, { flags: 'w' })
    await once(output, 'open')
    return new TableWriter(output, delimiter)
  }

  async writeRows(rows: readonly (readonly string[])[]): Promise<void> {
    if (this.failure) throw this.failure
    if (rows.length === 0) return
    await writeToWritable(this.output, formatRows(rows, this.delimiter))
  }

  async close(): Promise<void> {
    if (this.failure) throw this.failure
    await endWritable(this.output)
  }

  /** Release the handle after a failure without waiting for pending writes */
  destroy(): void {
    this.output.destroy()
  }
}
