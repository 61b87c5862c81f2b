import type { CategoryKind, FieldClassification } from './category'
import type { SourceName } from './record'

/**
 * How the loader ended up reading a source.
 *
 * - `document` - the whole text parsed as one JSON value
 * - `lines` - the text was read as newline-delimited JSON
 * - `empty` - the text was blank
 */
export type LoadMode = 'document' | 'lines' | 'empty'

/**
 * Counters describing one source load.
 */
export interface LoadStats {
  /** Label of the source (file path or caller-supplied name) */
  source: string
  mode: LoadMode
  /** Records recovered */
  records: number
  /** NDJSON lines that failed to parse */
  skippedLines: number
  /** Parsed entries that were not objects */
  skippedEntries: number
}

/**
 * Per-category count of values that fell back to their safe default.
 */
export type FallbackCounts = Record<CategoryKind, number>

/**
 * Run-level summary returned alongside the output table.
 */
export interface RunReport {
  sources: Record<SourceName, LoadStats>
  /** Field classifications per input, plus columns introduced by the merge */
  classifications: Record<SourceName | 'merged', FieldClassification[]>
  fallbacks: FallbackCounts
  /** Detected join key, or null when the join degraded to concatenation */
  joinKey: string | null
  degradedJoin: boolean
  /** Transactions with no matching user */
  unmatchedTransactions: number
  /** Column placed first in the output */
  identifierColumn: string | null
  /** True when the identifier column was generated rather than found */
  generatedIdentifiers: boolean
  rowCount: number
  columnCount: number
}

/**
 * Creates a fallback counter with every category at zero.
 */
export function emptyFallbackCounts(): FallbackCounts {
  return { DATE: 0, SENSITIVE_ID: 0, NUMERIC: 0, TEXT: 0 }
}
