import { describe, it, expect } from 'vitest'
import { parseCombineConfig, toCombineSettings } from '../src/config.js'
import { ConfigError } from '../src/errors.js'

describe('parseCombineConfig', () => {
  it('fills in defaults', () => {
    const settings = toCombineSettings(parseCombineConfig({ inputFiles: ['a.csv'], out: 'out.csv' }))
    expect(settings).toEqual({
      input: { files: ['a.csv'] },
      extension: undefined,
      sampleRows: 50,
      normalize: undefined,
      schemaPolicy: 'strict',
      columns: undefined,
      caseInsensitive: false,
      missingPolicy: 'error',
      sourceColumn: { enabled: true, name: 'source_file', mode: 'name' },
      chunkSize: 200_000,
      workers: 4,
      outPath: 'out.csv',
      outDelimiter: 'comma',
      header: true,
      dryRun: false,
    })
  })

  it('maps each input kind to its selection', () => {
    expect(toCombineSettings(parseCombineConfig({ directory: 'data', out: 'o.csv' })).input).toEqual({ directory: 'data' })
    expect(toCombineSettings(parseCombineConfig({ glob: ['*.tsv'], out: 'o.csv' })).input).toEqual({ patterns: ['*.tsv'] })
  })

  it('requires exactly one input selection', () => {
    expect(() => parseCombineConfig({ out: 'o.csv' })).toThrow(ConfigError)
    expect(() => parseCombineConfig({ directory: 'data', inputFiles: ['a.csv'], out: 'o.csv' })).toThrow(
      '[config] Invalid configuration: config: exactly one of directory, glob or inputFiles is required',
    )
  })

  it('names the offending field', () => {
    const error = (() => {
      try {
        parseCombineConfig({ directory: 'data', out: 'o.csv', schema: 'loose', chunkSize: 0 })
      } catch (e) {
        return e
      }
    })()
    expect(error).toBeInstanceOf(ConfigError)
    expect(error).toMatchObject({ code: 'CONFIG' })
    expect(error).toHaveProperty('issues.length', 2)
    expect(String(error)).toContain('schema:')
    expect(String(error)).toContain('chunkSize:')
  })

  it('rejects repeated requested columns', () => {
    expect(() => parseCombineConfig({ directory: 'data', out: 'o.csv', columns: ['id', 'id'] })).toThrow(
      '[config] Invalid configuration: columns: columns must not repeat',
    )
  })

  it('rejects unknown keys', () => {
    expect(() => parseCombineConfig({ directory: 'data', out: 'o.csv', threads: 2 })).toThrow(ConfigError)
  })
})
