import fsp from 'node:fs/promises'
import path from 'node:path'
import { describe, it, expect, afterEach } from 'vitest'
import { DelimiterConflictError } from '../src/errors.js'
import { mapWithConcurrency, normalizationTarget, normalizeFiles, rewriteDelimited } from '../src/normalize.js'
import type { CombineProgress } from '../src/types.js'
import { ScratchWorkspace, withScratchWorkspace } from '../src/workspace.js'
import { createTempFiles, delay, pathExists, sourceFile } from './testUtil.js'

describe('mapWithConcurrency', () => {
  it('never runs more tasks than the limit and keeps result order', async () => {
    let active = 0
    let maxActive = 0

    const results = await mapWithConcurrency([5, 1, 4, 2, 3, 0], 2, async (n) => {
      active += 1
      maxActive = Math.max(maxActive, active)
      await delay(n)
      active -= 1
      return n * 10
    })

    expect(results).toEqual([50, 10, 40, 20, 30, 0])
    expect(maxActive).toBe(2)
  })

  it('stops scheduling after a failure and rethrows it', async () => {
    const started: number[] = []

    const run = mapWithConcurrency([0, 1, 2, 3, 4], 2, async (n) => {
      started.push(n)
      if (n === 0) throw new Error('boom')
      await delay(5)
      return n
    })

    await expect(run).rejects.toThrow('boom')
    expect(started).toEqual([0, 1])
  })

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([])
  })
})

describe('normalizationTarget', () => {
  const commaFile = sourceFile(0, '/data/a.csv', ['id'], ',')
  const tabFile = sourceFile(1, '/data/b.csv', ['id'], '\t')

  it('is undefined when all files agree', () => {
    expect(normalizationTarget([commaFile, commaFile], 'tab')).toBeUndefined()
  })

  it('fails on mixed delimiters without a target', () => {
    expect(() => normalizationTarget([commaFile, tabFile], undefined)).toThrow(DelimiterConflictError)
    expect(() => normalizationTarget([commaFile, tabFile], undefined)).toThrow(
      '[normalize] Inconsistent delimiters detected: ["\\t", ","]. Use --normalize {comma, tab, semicolon, pipe} to convert.',
    )
  })

  it('returns the target on mixed delimiters', () => {
    expect(normalizationTarget([commaFile, tabFile], 'pipe')).toBe('pipe')
  })
})

describe('rewriteDelimited', () => {
  let cleanup: (() => Promise<void>) | undefined

  afterEach(async () => {
    await cleanup?.()
    cleanup = undefined
  })

  it('rewrites header and rows, quoting fields that hold the new delimiter', async () => {
    const tmp = await createTempFiles({ 'in.tsv': 'id\tnote\n1\ta,b\n2\tplain\n3\tx\n' })
    cleanup = tmp.cleanup

    await rewriteDelimited(tmp.file('in.tsv'), tmp.file('out/in.tsv'), '\t', ',', { chunkSize: 2 })

    expect(await fsp.readFile(tmp.file('out/in.tsv'), 'utf8')).toBe('id,note\n1,"a,b"\n2,plain\n3,x\n')
  })

  it('keeps the header of a file without data rows', async () => {
    const tmp = await createTempFiles({ 'in.txt': 'id;name\n' })
    cleanup = tmp.cleanup

    await rewriteDelimited(tmp.file('in.txt'), tmp.file('out.txt'), ';', '|', { chunkSize: 10 })

    expect(await fsp.readFile(tmp.file('out.txt'), 'utf8')).toBe('id|name\n')
  })
})

describe('normalizeFiles', () => {
  let cleanup: (() => Promise<void>) | undefined

  afterEach(async () => {
    await cleanup?.()
    cleanup = undefined
  })

  it('rewrites every file into the workspace and returns fresh records', async () => {
    const tmp = await createTempFiles({
      'x/data.txt': 'id,name\n1,Ann\n',
      'y/data.txt': 'id\tname\n2\tBo\n',
    })
    cleanup = tmp.cleanup

    const files = [
      sourceFile(0, tmp.file('x/data.txt'), ['id', 'name'], ','),
      sourceFile(1, tmp.file('y/data.txt'), ['id', 'name'], '\t'),
    ]
    const progress: CombineProgress[] = []
    const workspace = new ScratchWorkspace(tmp.dir)

    const normalized = await normalizeFiles(files, workspace, {
      target: 'semicolon',
      workers: 2,
      chunkSize: 100,
      onProgress: p => progress.push(p),
      progressIntervalMs: 0,
    })

    const root = await workspace.path()
    expect(normalized).toEqual([
      { id: 0, path: path.join(root, '0', 'data.txt'), originPath: tmp.file('x/data.txt'), delimiter: ';', header: ['id', 'name'] },
      { id: 1, path: path.join(root, '1', 'data.txt'), originPath: tmp.file('y/data.txt'), delimiter: ';', header: ['id', 'name'] },
    ])
    expect(await fsp.readFile(path.join(root, '1', 'data.txt'), 'utf8')).toBe('id;name\n2;Bo\n')
    expect(files[1]?.delimiter).toBe('\t')
    expect(progress.at(-1)).toMatchObject({ phase: 'normalize', totalFiles: 2 })

    await workspace.remove()
    expect(await pathExists(root)).toBe(false)
  })
})

describe('withScratchWorkspace', () => {
  it('removes the workspace when the body fails', async () => {
    const tmp = await createTempFiles()
    let created = ''

    try {
      await expect(withScratchWorkspace(async (workspace) => {
        created = await workspace.path()
        await fsp.writeFile(path.join(created, 'partial.csv'), 'id\n')
        throw new Error('failed mid-way')
      }, tmp.dir)).rejects.toThrow('failed mid-way')

      expect(created).not.toBe('')
      expect(await pathExists(created)).toBe(false)
    } finally {
      await tmp.cleanup()
    }
  })

  it('creates nothing until the workspace is used', async () => {
    const tmp = await createTempFiles()
    try {
      const used = await withScratchWorkspace(async workspace => workspace.created, tmp.dir)
      expect(used).toBe(false)
      expect(await fsp.readdir(tmp.dir)).toEqual([])
    } finally {
      await tmp.cleanup()
    }
  })
})
