export type {
  RawValue,
  FlatRecord,
  RecordSet,
  UnifiedRecord,
  OutputTable,
  SourceName,
} from './record'

export type {
  CategoryKind,
  PiiKind,
  FieldCategory,
  ClassificationRule,
  FieldClassification,
} from './category'

export type { OverlapPolicy, CleanerConfig, CleanerOptions } from './config'

export type { LoadMode, LoadStats, FallbackCounts, RunReport } from './report'
