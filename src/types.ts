/** Named delimiters accepted for normalization and output */
export const SUPPORTED_DELIMITERS = {
    comma: ',',
    tab: '\t',
    semicolon: ';',
    pipe: '|',
} as const

export type DelimiterName = keyof typeof SUPPORTED_DELIMITERS
export type Delimiter = (typeof SUPPORTED_DELIMITERS)[DelimiterName]

/** Sniffing order. Earlier candidates win ties. */
export const SNIFF_CANDIDATES: readonly Delimiter[] = [',', '\t', ';', '|']

/** Where input files come from (exactly one) */
export type InputSelection =
    | { directory: string }
    | { patterns: string[] }
    | { files: string[] }

export type SchemaPolicy = 'strict' | 'union' | 'intersection'
export type MissingPolicy = 'error' | 'skip' | 'fillna'
export type SourceColumnMode = 'name' | 'stem' | 'path'

/** Output column names, in output order */
export type Schema = readonly string[]

/**
 * One input file as seen by the pipeline.
 * Records are never mutated; normalization builds new ones pointing at the scratch copy.
 */
export type SourceFile = {
    /** Position in discovery order; stable across normalization */
    readonly id: number
    /** File that is actually read */
    readonly path: string
    /** Resolved input path the file was discovered as */
    readonly originPath: string
    readonly delimiter: Delimiter
    /** First non-blank row, cells trimmed */
    readonly header: readonly string[]
}

/**
 * For each schema column, the column of one file it is read from.
 * `undefined` means the column is absent and written as null.
 */
export type ColumnPlan = readonly (string | undefined)[]

export type SourceColumnOptions = {
    enabled: boolean
    name: string
    mode: SourceColumnMode
}

export type CombineLogger = {
    info(message: string): void
    debug(message: string): void
}

export type CombinePhase = 'normalize' | 'merge'

/** Progress callback parameter types */
export type CombineProgress = {
    phase: CombinePhase
    /** Index of the file being processed */
    fileIndex: number
    /** Total number of files in this phase */
    totalFiles: number
    /** Rows written to the output so far (merge phase only) */
    rowsWritten: number
}

export type ProgressOptions = {
    /** Optional abort signal */
    signal?: AbortSignal
    /** Optional progress callback */
    onProgress?: (progress: CombineProgress) => void
    /** Progress callback interval in milliseconds (default: 1000, 0 = emit on every update) */
    progressIntervalMs?: number
    /** Receives tagged diagnostic lines; silent when omitted */
    logger?: CombineLogger
}

/** Run configuration after validation and defaults */
export type CombineOptions = ProgressOptions & {
    input: InputSelection
    /** Required extension; inferred from the inputs when omitted */
    extension?: string
    /** Non-blank lines sampled per file when sniffing */
    sampleRows: number
    /** Target delimiter for files that disagree on delimiter */
    normalize?: DelimiterName
    schemaPolicy: SchemaPolicy
    /** Explicit column list; overrides schemaPolicy */
    columns?: string[]
    caseInsensitive: boolean
    missingPolicy: MissingPolicy
    sourceColumn: SourceColumnOptions
    /** Rows per chunk when streaming */
    chunkSize: number
    /** Concurrent normalization tasks */
    workers: number
    outPath: string
    outDelimiter: DelimiterName
    header: boolean
    dryRun: boolean
    /** Directory the scratch workspace is created in (default: the OS temp directory) */
    scratchDir?: string
}

export type SkippedFile = {
    path: string
    missing: string[]
}

/** What a run did (or, for a dry run, would do) */
export type CombineSummary = {
    files: string[]
    skipped: SkippedFile[]
    extension: string
    delimiter: Delimiter
    mode: 'columns' | 'schema'
    schemaPolicy?: SchemaPolicy
    missingPolicy?: MissingPolicy
    caseInsensitive?: boolean
    columns: string[]
    sourceColumn: SourceColumnOptions
    outPath: string
    outDelimiter: DelimiterName
    header: boolean
    normalized: boolean
    rowsWritten: number
    dryRun: boolean
}
