// Types
export type {
  ColumnPlan,
  CombineLogger,
  CombineOptions,
  CombinePhase,
  CombineProgress,
  CombineSummary,
  Delimiter,
  DelimiterName,
  InputSelection,
  MissingPolicy,
  Schema,
  SchemaPolicy,
  SkippedFile,
  SourceColumnMode,
  SourceColumnOptions,
  SourceFile,
} from './types.js'
export { SNIFF_CANDIDATES, SUPPORTED_DELIMITERS } from './types.js'

// Errors
export * from './errors.js'

// Pipeline stages
export { resolvePaths, ensureSingleExtension } from './resolvePaths.js'
export { sniffDelimiter, sniffFileDelimiter, scoreDelimiter } from './sniffDelimiter.js'
export { readHeader } from './readHeader.js'
export { reconcileSchema, selectColumns, planColumns } from './reconcileSchema.js'
export type { ColumnSelection, PlannedFile } from './reconcileSchema.js'
export { normalizeFiles, normalizationTarget, mapWithConcurrency } from './normalize.js'
export { mergeTables, sourceValueFor } from './mergeTables.js'
export type { MergeTablesOptions } from './mergeTables.js'
export { withScratchWorkspace, ScratchWorkspace } from './workspace.js'

// Unified API
export { combine, describeSummary, discoverFiles } from './combine.js'
export { combineConfigSchema, parseCombineConfig, toCombineSettings } from './config.js'
export type { CombineConfig, CombineConfigInput, CombineSettings } from './config.js'
