import type { FlatRecord, RawValue } from '../../types/record'

/**
 * Checks for a JSON object that is neither null nor an array.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Flattens a parsed JSON object into a single-level record.
 * Nested objects become dot-separated field names, arrays are kept as their
 * JSON text so no information is dropped.
 *
 * @example
 * ```typescript
 * flattenRecord({ id: 1, address: { city: 'Dakar' }, tags: ['a'] })
 * // { id: 1, 'address.city': 'Dakar', tags: '["a"]' }
 * ```
 */
export function flattenRecord(
  input: Record<string, unknown>,
  separator = '.'
): FlatRecord {
  const output: FlatRecord = {}
  flattenInto(output, input, '', separator)
  return output
}

function flattenInto(
  output: FlatRecord,
  input: Record<string, unknown>,
  prefix: string,
  separator: string
): void {
  for (const [key, value] of Object.entries(input)) {
    const path = prefix ? `${prefix}${separator}${key}` : key

    if (isPlainObject(value)) {
      flattenInto(output, value, path, separator)
      continue
    }

    output[path] = toRawValue(value)
  }
}

function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null
  if (typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  return JSON.stringify(value)
}
