import type { InputSelection } from './types.js'
import fsp from 'node:fs/promises'
import path from 'node:path'
import { glob } from 'glob'
import { DiscoveryError, ExtensionConflictError, NoInputError } from './errors.js'

export type ResolvedPaths = {
  /** Absolute, deduplicated, sorted */
  paths: string[]
  /** Lower-case, without the leading dot */
  extension: string
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch (e) {
    if (isMissing(e)) return false
    throw e
  }
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR')
}

async function listDirectory(directory: string): Promise<string[]> {
  const entries = await fsp.readdir(directory, { withFileTypes: true }).catch((e: unknown) => {
    if (isMissing(e)) throw new DiscoveryError([directory])
    throw e
  })
  return entries.filter(entry => entry.isFile()).map(entry => path.join(directory, entry.name))
}

/**
 * Literal paths win over patterns, since the shell may already have expanded them.
 */
async function expandPatterns(patterns: string[]): Promise<string[]> {
  const hits: string[] = []
  for (const pattern of patterns) {
    if (await exists(pattern)) {
      hits.push(pattern)
      continue
    }
    hits.push(...(await glob(pattern, { nodir: true })))
  }
  return hits
}

async function collectPaths(input: InputSelection): Promise<string[]> {
  if ('directory' in input) return listDirectory(input.directory)
  if ('patterns' in input) return expandPatterns(input.patterns)
  return input.files
}

export function normalizeExtension(extension: string): string {
  return extension.toLowerCase().replace(/^\.+/, '')
}

export function extensionOf(filePath: string): string {
  return normalizeExtension(path.extname(filePath))
}

/**
 * The one extension every input must carry: the user's, or the single extension the inputs share.
 */
export function ensureSingleExtension(paths: string[], extension: string | undefined): string {
  if (extension !== undefined) return normalizeExtension(extension)

  const found = [...new Set(paths.map(extensionOf))].sort()
  if (found.length !== 1) throw new ExtensionConflictError(found)
  return found[0]!
}

/**
 * Turn a directory, glob patterns or a file list into the set of files to combine.
 */
export async function resolvePaths(input: InputSelection, extension?: string): Promise<ResolvedPaths> {
  const collected = await collectPaths(input)

  const missing: string[] = []
  for (const p of collected) {
    if (!(await exists(p))) missing.push(p)
  }
  if (missing.length > 0) throw new DiscoveryError(missing)

  const paths = [...new Set(collected.map(p => path.resolve(p)))].sort()
  if (paths.length === 0) throw new NoInputError()

  const ext = ensureSingleExtension(paths, extension)
  const filtered = paths.filter(p => extensionOf(p) === ext)
  if (filtered.length === 0) throw new NoInputError(ext)

  return { paths: filtered, extension: ext }
}
