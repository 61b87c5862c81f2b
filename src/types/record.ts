/**
 * Scalar value a record field can hold once the source JSON has been flattened.
 * `null` doubles as the explicit empty marker for fields a record does not carry.
 */
export type RawValue = string | number | boolean | null

/**
 * A flat mapping from field name to raw value.
 * Nested source objects are flattened with dot-separated names (`address.city`).
 */
export type FlatRecord = Record<string, RawValue>

/**
 * Ordered sequence of records loaded from one source.
 * Field presence is not uniform across records.
 */
export type RecordSet = readonly FlatRecord[]

/**
 * A transaction record with its matching user fields merged in.
 * Every unified record of one merge carries the same column set.
 */
export type UnifiedRecord = FlatRecord

/**
 * The final table: fixed column order, identifier column first, every cell text.
 */
export interface OutputTable {
  /** Column names in output order */
  columns: string[]
  /** One row per unified record, keyed by column name */
  rows: Record<string, string>[]
}

/**
 * Which input a record set was loaded from.
 */
export type SourceName = 'users' | 'transactions'
