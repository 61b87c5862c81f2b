import type { RawValue, RecordSet } from '../types/record'
import { isBlank } from './normalizers/text'

/**
 * Lists every field name of a record set in first-seen order.
 *
 * @example
 * ```typescript
 * collectFieldNames([{ a: 1 }, { b: 2, a: 3 }]) // ['a', 'b']
 * ```
 */
export function collectFieldNames(records: RecordSet): string[] {
  const seen = new Set<string>()
  for (const record of records) {
    for (const field of Object.keys(record)) {
      seen.add(field)
    }
  }
  return Array.from(seen)
}

/**
 * Takes up to `size` non-blank values of a field, in record order.
 */
export function sampleField(records: RecordSet, field: string, size: number): RawValue[] {
  const sample: RawValue[] = []
  for (const record of records) {
    if (sample.length >= size) break
    const value = record[field]
    if (!isBlank(value)) {
      sample.push(value)
    }
  }
  return sample
}

/**
 * Canonical snake_case form of a field name, used for name-based heuristics.
 * camelCase boundaries and any non-alphanumeric run become `_`.
 *
 * @example
 * ```typescript
 * normalizeFieldName('nationalID')     // 'national_id'
 * normalizeFieldName('Created At')     // 'created_at'
 * normalizeFieldName('address.city')   // 'address_city'
 * ```
 */
export function normalizeFieldName(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean)
    .join('_')
}
