/**
 * Column ordering and text coercion for the final table
 * @module export/output-table
 */

import { DEFAULT_CLEANER_CONFIG, GENERATED_ID_COLUMN } from '../types/config'
import type { OutputTable, RawValue, RecordSet } from '../types/record'
import { collectFieldNames } from '../core/fields'
import { isIdentifierName } from '../core/classifier/rules'

/**
 * Options for building the output table
 */
export interface OutputTableOptions {
  /** Column order before the identifier is moved first (default: first-seen order) */
  columns?: readonly string[]
  /** Column forced to position 0 */
  identifierColumn?: string | null
  /** Insert a generated `ID` column when there is no identifier (default: true) */
  generateIds?: boolean
  /** Prefix of generated identifiers (default: `TXN`) */
  generatedIdPrefix?: string
}

/**
 * The table together with how its identifier column was obtained
 */
export interface OutputTableResult {
  table: OutputTable
  identifierColumn: string | null
  generated: boolean
}

/**
 * Chooses the column to place first: the join key when there is one, then the
 * first identifier alias present, then the first column named like an id.
 *
 * @example
 * ```typescript
 * resolveIdentifierColumn(['amount', 'user_id'], 'user_id')     // 'user_id'
 * resolveIdentifierColumn(['amount', 'tx_id'], null)            // 'tx_id'
 * resolveIdentifierColumn(['amount', 'order_ref'], null)        // null
 * ```
 */
export function resolveIdentifierColumn(
  columns: readonly string[],
  joinKey: string | null,
  identifierAliases: readonly string[] = DEFAULT_CLEANER_CONFIG.identifierAliases
): string | null {
  if (joinKey && columns.includes(joinKey)) return joinKey

  const alias = identifierAliases.find((candidate) => columns.includes(candidate))
  if (alias) return alias

  return columns.find(isIdentifierName) ?? null
}

/**
 * Renders a raw value as a CSV cell.
 * Null becomes empty, integral numbers print without a fraction and other
 * numbers are cut to 15 significant digits to drop binary noise.
 *
 * @example
 * ```typescript
 * toCellText(null)     // ''
 * toCellText(3)        // '3'
 * toCellText(0.1 + 0.2) // '0.3'
 * toCellText(true)     // 'true'
 * ```
 */
export function toCellText(value: RawValue | undefined): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return ''
    if (Number.isInteger(value)) return String(value)
    return String(Number(value.toPrecision(15)))
  }
  return String(value)
}

/**
 * Generated identifier for the row at a zero-based index.
 *
 * @example
 * ```typescript
 * generatedId(0) // 'TXN000001'
 * ```
 */
export function generatedId(index: number, prefix = DEFAULT_CLEANER_CONFIG.generatedIdPrefix): string {
  return `${prefix}${String(index + 1).padStart(6, '0')}`
}

/**
 * Builds the output table: identifier column first, remaining columns in
 * first-seen order, every cell coerced to text. The table copies every value
 * and keeps no reference to the input records.
 */
export function buildOutputTable(
  records: RecordSet,
  options: OutputTableOptions = {}
): OutputTableResult {
  const baseColumns = options.columns ? [...options.columns] : collectFieldNames(records)
  let identifierColumn =
    options.identifierColumn && baseColumns.includes(options.identifierColumn)
      ? options.identifierColumn
      : null
  let generated = false

  if (
    identifierColumn === null &&
    (options.generateIds ?? DEFAULT_CLEANER_CONFIG.generateIds) &&
    !baseColumns.includes(GENERATED_ID_COLUMN)
  ) {
    identifierColumn = GENERATED_ID_COLUMN
    generated = true
  }

  const columns = identifierColumn
    ? [identifierColumn, ...baseColumns.filter((column) => column !== identifierColumn)]
    : baseColumns

  const prefix = options.generatedIdPrefix ?? DEFAULT_CLEANER_CONFIG.generatedIdPrefix
  const rows = records.map((record, index) => {
    const row: Record<string, string> = {}
    for (const column of columns) {
      row[column] =
        generated && column === GENERATED_ID_COLUMN
          ? generatedId(index, prefix)
          : toCellText(record[column])
    }
    return row
  })

  return { table: { columns, rows }, identifierColumn, generated }
}
