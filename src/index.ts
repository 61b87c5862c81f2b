// Main entry points
export { cleanData, cleanRecords, RecordCleaner, createCleaner } from './pipeline'
export type { PipelineResult } from './pipeline'
export { CleanerBuilder } from './builder'

// Configuration
export { resolveConfig, validateConfig } from './core/config'
export { DEFAULT_CLEANER_CONFIG, GENERATED_ID_COLUMN, OVERLAP_POLICIES } from './types/config'

// Loader
export { loadRecords, parseRecords, flattenRecord } from './core/loader'
export type { LoadResult } from './core/loader'

// Classifier
export {
  classifyField,
  explainClassification,
  classifyRecordSet,
  CLASSIFICATION_RULES,
  PII_NAME_PATTERNS,
  DATE_NAME_PATTERNS,
  isIdentifierName,
} from './core/classifier'
export type { ClassifierOptions, ClassificationRuleDefinition } from './core/classifier'
export { DATE, NUMERIC, TEXT, sensitive, CATEGORY_KINDS } from './types/category'

// Transformer
export {
  transform,
  transformValue,
  transformRecordSet,
  DEFAULT_TRANSFORM_OPTIONS,
} from './core/transformer'
export type { TransformOptions, TransformedRecordSet } from './core/transformer'
export {
  maskValue,
  inferPiiKind,
  maskEmail,
  maskNationalId,
  maskPhone,
  scrubNotes,
  MASKED_EMAIL_TOKEN,
} from './core/masking'
export type { MaskOptions, ValueOutcome } from './core/masking'

// Normalizers
export {
  parseDateTime,
  parseDateTimeText,
  formatDateTime,
  normalizeDateTime,
} from './core/normalizers/date'
export type { DateTimeComponents, DateTimeParseOptions } from './core/normalizers/date'
export { parseNumeric, isNumeric, roundTo, normalizeAmount } from './core/normalizers/number'

// Merger
export { mergeRecordSets, detectJoinKey, normalizeKey } from './merge'
export type { MergeOptions, MergeResult } from './merge'

// Export
export {
  buildOutputTable,
  resolveIdentifierColumn,
  toCellText,
  toCsv,
  escapeCsvValue,
  exportCsv,
} from './export'
export type { OutputTableOptions, OutputTableResult } from './export'

// Types
export type {
  RawValue,
  FlatRecord,
  RecordSet,
  UnifiedRecord,
  OutputTable,
  SourceName,
  CategoryKind,
  PiiKind,
  FieldCategory,
  ClassificationRule,
  FieldClassification,
  OverlapPolicy,
  CleanerConfig,
  CleanerOptions,
  LoadMode,
  LoadStats,
  FallbackCounts,
  RunReport,
} from './types'

// Logging
export { defaultLogger, createSilentLogger, createPrefixedLogger } from './utils/logger'
export type { Logger } from './utils/logger'

// Errors
export {
  ScrubberError,
  LoadError,
  MergeError,
  IOError,
  InvalidParameterError,
  ConfigurationError,
  isScrubberError,
} from './utils/errors'
