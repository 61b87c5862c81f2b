/**
 * CSV serialization
 * @module export/csv
 */

import type { OutputTable } from '../types/record'

/**
 * Quotes a CSV field when it contains a comma, a quote or a line break,
 * doubling any embedded quotes.
 *
 * @example
 * ```typescript
 * escapeCsvValue('plain')     // 'plain'
 * escapeCsvValue('a,b')       // '"a,b"'
 * escapeCsvValue('say "hi"')  // '"say ""hi"""'
 * ```
 */
export function escapeCsvValue(value: string): string {
  if (!value) return ''

  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }

  return value
}

/**
 * Serializes a table as CSV: a header row of column names, then one line per
 * row, every line terminated by `\n`.
 *
 * @example
 * ```typescript
 * toCsv({ columns: ['id', 'note'], rows: [{ id: '1', note: 'a,b' }] })
 * // 'id,note\n1,"a,b"\n'
 * ```
 */
export function toCsv(table: OutputTable): string {
  const lines = [table.columns.map(escapeCsvValue).join(',')]
  for (const row of table.rows) {
    lines.push(table.columns.map((column) => escapeCsvValue(row[column] ?? '')).join(','))
  }
  return `${lines.join('\n')}\n`
}
