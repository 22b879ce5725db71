import type { Delimiter } from './types.js'
import { isBlankRow, readRows } from './tableIO.js'

/**
 * First row with a non-blank cell, cells trimmed. Empty when the file has no such row.
 */
export async function readHeader(filePath: string, delimiter: Delimiter): Promise<string[]> {
  for await (const row of readRows(filePath, delimiter)) {
    if (!isBlankRow(row)) return row.map(cell => cell.trim())
  }
  return []
}
