/**
 * Error classes for a combine run.
 *
 * Every fatal condition has its own class and a stable `code`, so callers
 * (the CLI in particular) can tell an interrupt apart from a bad input set.
 */

export type CombineErrorCode =
  | 'CONFIG'
  | 'DISCOVERY'
  | 'EXTENSION_CONFLICT'
  | 'NO_INPUT'
  | 'DELIMITER_CONFLICT'
  | 'HEADER_READ'
  | 'SCHEMA_MISMATCH'
  | 'EMPTY_INTERSECTION'
  | 'MISSING_COLUMNS'
  | 'NO_USABLE_FILES'
  | 'INTERRUPTED'

/**
 * Base error class for all combine errors
 */
export class CombineError extends Error {
  constructor(
    message: string,
    public readonly code: CombineErrorCode,
  ) {
    super(message)
    this.name = 'CombineError'
  }
}

export class ConfigError extends CombineError {
  constructor(public readonly issues: string[]) {
    super(`[config] Invalid configuration: ${issues.join('; ')}`, 'CONFIG')
    this.name = 'ConfigError'
  }
}

/** An explicitly named input path does not exist */
export class DiscoveryError extends CombineError {
  constructor(public readonly missing: string[]) {
    super(`[resolvePaths] Missing files: ${missing.join(', ')}`, 'DISCOVERY')
    this.name = 'DiscoveryError'
  }
}

export class ExtensionConflictError extends CombineError {
  constructor(public readonly extensions: string[]) {
    super(
      `[resolvePaths] Inconsistent extensions detected: ${formatList(extensions)}. `
      + 'Use --extension to enforce one, or clean inputs.',
      'EXTENSION_CONFLICT',
    )
    this.name = 'ExtensionConflictError'
  }
}

export class NoInputError extends CombineError {
  constructor(public readonly extension?: string) {
    super(
      extension === undefined
        ? '[resolvePaths] No input files found'
        : `[resolvePaths] No *.${extension} files after filtering. Check inputs/--extension.`,
      'NO_INPUT',
    )
    this.name = 'NoInputError'
  }
}

export class DelimiterConflictError extends CombineError {
  constructor(
    public readonly delimiters: string[],
    accepted: readonly string[],
  ) {
    super(
      `[normalize] Inconsistent delimiters detected: ${formatList(delimiters.map(d => JSON.stringify(d)))}. `
      + `Use --normalize {${accepted.join(', ')}} to convert.`,
      'DELIMITER_CONFLICT',
    )
    this.name = 'DelimiterConflictError'
  }
}

/** Files whose header row could not be read, reported together */
export class HeaderReadError extends CombineError {
  constructor(public readonly files: string[]) {
    super(
      `[readHeader] Could not read header row from: ${formatList(files)}. Are these empty or malformed?`,
      'HEADER_READ',
    )
    this.name = 'HeaderReadError'
  }
}

export class SchemaMismatchError extends CombineError {
  constructor(
    public readonly basePath: string,
    public readonly baseHeader: readonly string[],
    public readonly otherPath: string,
    public readonly otherHeader: readonly string[],
  ) {
    super(
      '[reconcileSchema] Schema mismatch under --schema strict.\n'
      + `Base (${basePath}): ${formatList(baseHeader)}\n`
      + `Other (${otherPath}): ${formatList(otherHeader)}`,
      'SCHEMA_MISMATCH',
    )
    this.name = 'SchemaMismatchError'
  }
}

export class EmptyIntersectionError extends CombineError {
  constructor() {
    super('[reconcileSchema] No shared columns under --schema intersection.', 'EMPTY_INTERSECTION')
    this.name = 'EmptyIntersectionError'
  }
}

export class MissingColumnsError extends CombineError {
  constructor(
    public readonly path: string,
    public readonly missing: string[],
  ) {
    super(
      `[selectColumns] File '${path}': missing requested columns ${formatList(missing)} under --missing-policy error`,
      'MISSING_COLUMNS',
    )
    this.name = 'MissingColumnsError'
  }
}

export class NoUsableFilesError extends CombineError {
  constructor() {
    super('[selectColumns] No files left after applying --columns and --missing-policy skip', 'NO_USABLE_FILES')
    this.name = 'NoUsableFilesError'
  }
}

export class InterruptedError extends CombineError {
  constructor(label: string) {
    super(`[${label}] Aborted`, 'INTERRUPTED')
    this.name = 'InterruptedError'
  }
}

function formatList(values: readonly string[]): string {
  return `[${values.join(', ')}]`
}
