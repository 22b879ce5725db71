import type { Delimiter } from './types.js'
import { createReadStream } from 'node:fs'
import { SNIFF_CANDIDATES } from './types.js'
import { readUtf8Lines } from './util.js'

/** (mode frequency, mode field count), compared in that order */
export type DelimiterScore = readonly [frequency: number, fieldCount: number]

type Scored = { delimiter: Delimiter; score: DelimiterScore }

function isHigher(a: DelimiterScore, b: DelimiterScore): boolean {
  return a[0] > b[0] || (a[0] === b[0] && a[1] > b[1])
}

/**
 * Most frequent field count when splitting `lines` by `delimiter`.
 * Ties go to the count seen first. Returns undefined when no line is countable.
 */
export function scoreDelimiter(lines: readonly string[], delimiter: Delimiter): DelimiterScore | undefined {
  const counts = new Map<number, number>()
  for (const raw of lines) {
    const line = raw.trim()
    if (!line) continue
    const fields = line.split(delimiter).length
    counts.set(fields, (counts.get(fields) ?? 0) + 1)
  }

  let best: DelimiterScore | undefined
  for (const [fieldCount, frequency] of counts) {
    if (best === undefined || frequency > best[0]) best = [frequency, fieldCount]
  }
  return best
}

/**
 * Used only when no sampled line has content: the candidate occurring most
 * often in the raw sample, else comma.
 */
function fallbackDelimiter(lines: readonly string[]): Delimiter {
  const sample = lines.join('\n')
  let winner: Delimiter = ','
  let most = 0
  for (const delimiter of SNIFF_CANDIDATES) {
    const occurrences = sample.split(delimiter).length - 1
    if (occurrences > most) {
      most = occurrences
      winner = delimiter
    }
  }
  return winner
}

/**
 * Infer the field delimiter of sampled lines.
 *
 * Best effort: each candidate is scored by its most common field count, and
 * the first candidate with a strictly higher score wins. Lines holding
 * delimiter-like characters inside fields can still mislead it.
 */
export function sniffDelimiter(lines: readonly string[]): Delimiter {
  const winner = SNIFF_CANDIDATES.reduce<Scored | undefined>((best, delimiter) => {
    const score = scoreDelimiter(lines, delimiter)
    if (score === undefined) return best
    if (best === undefined || isHigher(score, best.score)) return { delimiter, score }
    return best
  }, undefined)

  return winner?.delimiter ?? fallbackDelimiter(lines)
}

/** Up to `count` non-blank lines from the head of a file */
export async function readSampleLines(filePath: string, count: number): Promise<string[]> {
  const lines: string[] = []
  if (count <= 0) return lines

  for await (const line of readUtf8Lines(createReadStream(filePath))) {
    if (!line.trim()) continue
    lines.push(line)
    if (lines.length >= count) break
  }
  return lines
}

export async function sniffFileDelimiter(filePath: string, sampleRows: number): Promise<Delimiter> {
  return sniffDelimiter(await readSampleLines(filePath, sampleRows))
}
