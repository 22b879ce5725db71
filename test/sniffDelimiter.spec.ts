import { describe, it, expect, afterEach } from 'vitest'
import { readSampleLines, scoreDelimiter, sniffDelimiter, sniffFileDelimiter } from '../src/sniffDelimiter.js'
import { SNIFF_CANDIDATES } from '../src/types.js'
import { createTempFiles } from './testUtil.js'

describe('scoreDelimiter', () => {
  it('scores by the most frequent field count', () => {
    expect(scoreDelimiter(['a|b|c', 'd|e|f', 'g|h'], '|')).toEqual([2, 3])
  })

  it('keeps the field count seen first when frequencies tie', () => {
    expect(scoreDelimiter(['a,b', 'c,d,e'], ',')).toEqual([1, 2])
  })

  it('ignores blank lines and returns undefined when nothing is countable', () => {
    expect(scoreDelimiter(['', '   ', 'x;y'], ';')).toEqual([1, 2])
    expect(scoreDelimiter(['', '  '], ';')).toBeUndefined()
  })
})

describe('sniffDelimiter', () => {
  it('detects a comma separated sample', () => {
    expect(sniffDelimiter(['id,name', '1,Ann', '2,Bo'])).toBe(',')
  })

  it('prefers the consistent delimiter over one occurring inside fields', () => {
    expect(sniffDelimiter(['id\tnote', '1\ta,b,c', '2\tx'])).toBe('\t')
  })

  it('keeps the earlier candidate on equal scores', () => {
    // comma and semicolon both split the line in two
    expect(sniffDelimiter(['a;b,c'])).toBe(',')
    expect(sniffDelimiter(['a,b;c'])).toBe(',')
  })

  it('falls back to comma when the sample has no content', () => {
    expect(sniffDelimiter([])).toBe(',')
    expect(sniffDelimiter(['', '   '])).toBe(',')
  })

  it('returns the writing delimiter whatever other candidates appear as data', () => {
    for (const d1 of SNIFF_CANDIDATES) {
      for (const d2 of SNIFF_CANDIDATES) {
        if (d1 === d2) continue
        const lines = [
          ['a', 'b', 'c'].join(d1),
          [`x${d2}y`, '2', '3'].join(d1),
          [`p${d2}q`, '4', '5'].join(d1),
        ]
        expect(sniffDelimiter(lines), `${JSON.stringify(d1)} with ${JSON.stringify(d2)} in data`).toBe(d1)
      }
    }
  })
})

describe('sniffFileDelimiter', () => {
  let cleanup: (() => Promise<void>) | undefined

  afterEach(async () => {
    await cleanup?.()
    cleanup = undefined
  })

  it('samples only the first non-blank lines of a file', async () => {
    const tmp = await createTempFiles({
      'data.txt': '\nid;name\r\n1;Ann\n\n2;Bo\n3;Cy\n',
    })
    cleanup = tmp.cleanup

    expect(await readSampleLines(tmp.file('data.txt'), 3)).toEqual(['id;name', '1;Ann', '2;Bo'])
    expect(await readSampleLines(tmp.file('data.txt'), 0)).toEqual([])
    expect(await sniffFileDelimiter(tmp.file('data.txt'), 3)).toBe(';')
  })

  it('defaults to comma for an empty file', async () => {
    const tmp = await createTempFiles({ 'empty.csv': '' })
    cleanup = tmp.cleanup

    expect(await sniffFileDelimiter(tmp.file('empty.csv'), 50)).toBe(',')
  })
})
