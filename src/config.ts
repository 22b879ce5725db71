import type { CombineOptions, DelimiterName, InputSelection, ProgressOptions } from './types.js'
import { z } from 'zod'
import { ConfigError } from './errors.js'

const DELIMITER_NAMES = ['comma', 'tab', 'semicolon', 'pipe'] as const satisfies readonly DelimiterName[]

const positiveInt = z.number().int().positive()
const pathList = z.array(z.string().min(1)).min(1)

/** Raw run configuration, as collected from the command line or a caller */
export const combineConfigSchema = z
  .object({
    directory: z.string().min(1).optional(),
    glob: pathList.optional(),
    inputFiles: pathList.optional(),
    extension: z.string().min(1).optional(),
    sampleRows: positiveInt.default(50),
    normalize: z.enum(DELIMITER_NAMES).optional(),
    schema: z.enum(['strict', 'union', 'intersection']).default('strict'),
    columns: z
      .array(z.string().min(1))
      .min(1)
      .refine(columns => new Set(columns).size === columns.length, { message: 'columns must not repeat' })
      .optional(),
    missingPolicy: z.enum(['error', 'skip', 'fillna']).default('error'),
    caseInsensitive: z.boolean().default(false),
    sourceColumn: z.boolean().default(true),
    sourceColumnName: z.string().min(1).default('source_file'),
    sourceColumnMode: z.enum(['name', 'stem', 'path']).default('name'),
    chunkSize: positiveInt.default(200_000),
    workers: positiveInt.default(4),
    out: z.string().min(1),
    outDelimiter: z.enum(DELIMITER_NAMES).default('comma'),
    header: z.boolean().default(true),
    dryRun: z.boolean().default(false),
    verbose: z.boolean().default(false),
  })
  .strict()
  .superRefine((config, ctx) => {
    const given = [config.directory, config.glob, config.inputFiles].filter(v => v !== undefined).length
    if (given !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'exactly one of directory, glob or inputFiles is required',
      })
    }
  })

export type CombineConfigInput = z.input<typeof combineConfigSchema>
export type CombineConfig = z.output<typeof combineConfigSchema>

/** Options ready for `combine`, minus the runtime hooks */
export type CombineSettings = Omit<CombineOptions, keyof ProgressOptions>

function inputSelectionOf(config: CombineConfig): InputSelection {
  if (config.directory !== undefined) return { directory: config.directory }
  if (config.glob !== undefined) return { patterns: config.glob }
  if (config.inputFiles !== undefined) return { files: config.inputFiles }
  throw new ConfigError(['exactly one of directory, glob or inputFiles is required'])
}

export function toCombineSettings(config: CombineConfig): CombineSettings {
  return {
    input: inputSelectionOf(config),
    extension: config.extension,
    sampleRows: config.sampleRows,
    normalize: config.normalize,
    schemaPolicy: config.schema,
    columns: config.columns,
    caseInsensitive: config.caseInsensitive,
    missingPolicy: config.missingPolicy,
    sourceColumn: {
      enabled: config.sourceColumn,
      name: config.sourceColumnName,
      mode: config.sourceColumnMode,
    },
    chunkSize: config.chunkSize,
    workers: config.workers,
    outPath: config.out,
    outDelimiter: config.outDelimiter,
    header: config.header,
    dryRun: config.dryRun,
  }
}

/**
 * Validate a raw configuration and fill in defaults.
 */
export function parseCombineConfig(raw: unknown): CombineConfig {
  const result = combineConfigSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`),
    )
  }
  return result.data
}
