import fsp from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import type { Delimiter, SourceFile } from '../src/types.js'

/**
 * Create a fresh temp directory holding the given files (relative path -> content).
 */
export async function createTempFiles(files: Record<string, string> = {}): Promise<{
  dir: string
  file: (name: string) => string
  cleanup: () => Promise<void>
}> {
  const dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'concat-tables-test-'))

  for (const [name, content] of Object.entries(files)) {
    const target = path.join(dir, name)
    await fsp.mkdir(path.dirname(target), { recursive: true })
    await fsp.writeFile(target, content)
  }

  return {
    dir,
    file: (name: string) => path.join(dir, name),
    cleanup: () => fsp.rm(dir, { recursive: true, force: true }),
  }
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fsp.access(target)
    return true
  } catch {
    return false
  }
}

export function sourceFile(
  id: number,
  filePath: string,
  header: string[],
  delimiter: Delimiter = ',',
): SourceFile {
  return { id, path: filePath, originPath: filePath, delimiter, header }
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
