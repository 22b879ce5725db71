#!/usr/bin/env node
import type { CombineLogger } from './types.js'
import { existsSync, readFileSync, realpathSync } from 'node:fs'
import { pathToFileURL } from 'node:url'
import { parseArgs } from 'node:util'
import { z } from 'zod'
import { combine, describeSummary } from './combine.js'
import { parseCombineConfig, toCombineSettings } from './config.js'
import { InterruptedError } from './errors.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_INTERRUPTED = 130

const USAGE = `Usage: concat-tables combine (-d DIR | --glob PATTERN... | -i FILE...) -o OUT [options]

Combine tabular files (CSV/TSV/etc.) into a single file.

Input (exactly one):
  -d, --directory DIR          Directory containing input files
      --glob PATTERN...        Glob pattern(s) for input files, e.g. './data/*_summary.tsv'
  -i, --input-files FILE...    Files to combine

Options:
  -e, --extension EXT          Expected file extension; if omitted all inputs must share one
      --sample-rows N          Lines to sample for delimiter sniffing (default: 50)
      --normalize NAME         Convert mixed delimiters to comma|tab|semicolon|pipe first
      --schema POLICY          strict|union|intersection (default: strict); ignored with --columns
      --columns COL...         Only combine these columns, in this order (space or comma separated)
      --missing-policy POLICY  error|skip|fillna when a file lacks requested columns (default: error)
      --case-insensitive       Match --columns to headers ignoring case
      --no-source-col          Do not add the source file column
      --source-col-name NAME   Name of the source column (default: source_file)
      --source-col-mode MODE   name|stem|path (default: name)
      --chunksize N            Rows per chunk while streaming (default: 200000)
  -T, --threads N              Concurrent files during normalization (default: 4)
  -o, --out PATH               Output file path
      --out-delim NAME         comma|tab|semicolon|pipe (default: comma)
      --no-header              Write output without a header row
      --dry-run                Analyze inputs and print a summary without writing output
  -V, --verbose                More logging
  -v, --version                Show version information and exit
  -h, --help                   Show this help and exit
`

const options = {
  'directory': { type: 'string', short: 'd' },
  'glob': { type: 'string', multiple: true },
  'input-files': { type: 'string', short: 'i', multiple: true },
  'extension': { type: 'string', short: 'e' },
  'sample-rows': { type: 'string' },
  'normalize': { type: 'string' },
  'schema': { type: 'string' },
  'columns': { type: 'string', multiple: true },
  'missing-policy': { type: 'string' },
  'case-insensitive': { type: 'boolean' },
  'no-source-col': { type: 'boolean' },
  'source-col-name': { type: 'string' },
  'source-col-mode': { type: 'string' },
  'chunksize': { type: 'string' },
  'threads': { type: 'string', short: 'T' },
  'out': { type: 'string', short: 'o' },
  'out-delim': { type: 'string' },
  'no-header': { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  'verbose': { type: 'boolean', short: 'V' },
  'version': { type: 'boolean', short: 'v' },
  'help': { type: 'boolean', short: 'h' },
} as const

/** Options that take every following bare word, like `--glob a b c` */
const LIST_OPTIONS = ['glob', 'input-files', 'columns'] as const
type ListOption = (typeof LIST_OPTIONS)[number]

function isListOption(name: string): name is ListOption {
  return LIST_OPTIONS.some(option => option === name)
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type ParsedCommandLine =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'combine'; config: Record<string, unknown> }

function toInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined
  const n = Number(value)
  if (!Number.isInteger(n)) throw new UsageError(`--${flag} expects an integer, got '${value}'`)
  return n
}

/**
 * Turn argv (without the node and script entries) into a raw configuration.
 * Values are checked later by the config schema.
 */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
  const { values, tokens } = parseArgs({ args: argv, options, allowPositionals: true, strict: true, tokens: true })

  if (values.help) return { kind: 'help' }
  if (values.version) return { kind: 'version' }

  const lists: Record<ListOption, string[]> = { 'glob': [], 'input-files': [], 'columns': [] }
  const positionals: string[] = []
  let open: ListOption | undefined

  for (const token of tokens) {
    if (token.kind === 'option') {
      open = isListOption(token.name) ? token.name : undefined
      if (open !== undefined && token.value !== undefined) lists[open].push(token.value)
    } else if (token.kind === 'positional') {
      if (open !== undefined) lists[open].push(token.value)
      else positionals.push(token.value)
    } else {
      open = undefined
    }
  }

  const [command, ...extra] = positionals
  if (command !== 'combine') throw new UsageError(command === undefined ? 'missing command' : `unknown command '${command}'`)
  if (extra.length > 0) throw new UsageError(`unexpected arguments: ${extra.join(' ')}`)

  const columns = lists.columns.flatMap(value => value.split(',')).map(c => c.trim()).filter(c => c.length > 0)

  const config: Record<string, unknown> = {
    directory: values.directory,
    glob: lists.glob.length > 0 ? lists.glob : undefined,
    inputFiles: lists['input-files'].length > 0 ? lists['input-files'] : undefined,
    extension: values.extension,
    sampleRows: toInt(values['sample-rows'], 'sample-rows'),
    normalize: values.normalize,
    schema: values.schema,
    columns: lists.columns.length > 0 ? columns : undefined,
    missingPolicy: values['missing-policy'],
    caseInsensitive: values['case-insensitive'],
    sourceColumn: values['no-source-col'] === true ? false : undefined,
    sourceColumnName: values['source-col-name'],
    sourceColumnMode: values['source-col-mode'],
    chunkSize: toInt(values.chunksize, 'chunksize'),
    workers: toInt(values.threads, 'threads'),
    out: values.out,
    outDelimiter: values['out-delim'],
    header: values['no-header'] === true ? false : undefined,
    dryRun: values['dry-run'],
    verbose: values.verbose,
  }

  return { kind: 'combine', config }
}

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'))
  return z.object({ version: z.string() }).parse(raw).version
}

export type CliIo = {
  stdout: (line: string) => void
  stderr: (line: string) => void
}

const consoleIo: CliIo = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
}

export function createCliLogger(io: CliIo, verbose: boolean): CombineLogger {
  return {
    info: message => io.stderr(message),
    debug: message => {
      if (verbose) io.stderr(message)
    },
  }
}

/**
 * Run the command line. Resolves to the process exit code.
 */
export async function main(argv: string[], io: CliIo = consoleIo, signal?: AbortSignal): Promise<number> {
  let parsed: ParsedCommandLine
  try {
    parsed = parseCommandLine(argv)
  } catch (e) {
    io.stderr(`ERROR: ${e instanceof Error ? e.message : String(e)}`)
    io.stderr(USAGE)
    return EXIT_FAILURE
  }

  if (parsed.kind === 'help') {
    io.stdout(USAGE)
    return EXIT_OK
  }
  if (parsed.kind === 'version') {
    io.stdout(`concat-tables ${readVersion()}`)
    return EXIT_OK
  }

  try {
    const config = parseCombineConfig(parsed.config)
    const summary = await combine({
      ...toCombineSettings(config),
      signal,
      logger: createCliLogger(io, config.verbose),
    })

    if (summary.dryRun) {
      io.stderr('[DRY-RUN] Summary:')
      for (const line of describeSummary(summary)) io.stderr(`  ${line}`)
      return EXIT_OK
    }

    io.stderr('[DONE] Combined successfully.')
    return EXIT_OK
  } catch (e) {
    if (e instanceof InterruptedError) {
      io.stderr('Interrupted.')
      return EXIT_INTERRUPTED
    }
    io.stderr(`ERROR: ${e instanceof Error ? e.message : String(e)}`)
    return EXIT_FAILURE
  }
}

/**
 * Whether `script` (as found in `process.argv[1]`) runs the module at `moduleUrl`.
 * Installed bins are symlinks, so the script path is resolved first.
 */
export function isEntrypoint(script: string | undefined, moduleUrl: string): boolean {
  if (script === undefined || !existsSync(script)) return false
  return pathToFileURL(realpathSync(script)).href === moduleUrl
}

if (isEntrypoint(process.argv[1], import.meta.url)) {
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort())
  main(process.argv.slice(2), consoleIo, controller.signal).then(
    (code) => {
      process.exitCode = code
    },
    (e: unknown) => {
      console.error(e)
      process.exitCode = EXIT_FAILURE
    },
  )
}
