import type { RawValue } from '../../types/record'

/**
 * Renders a raw value as text without reformatting it.
 * Null becomes the empty string and booleans render as `true`/`false`.
 *
 * @example
 * ```typescript
 * rawText(null)    // ''
 * rawText(false)   // 'false'
 * rawText(' abc ') // ' abc '
 * ```
 */
export function rawText(value: RawValue): string {
  if (value === null) return ''
  return String(value)
}

/**
 * Trims whitespace from both ends of a value's text.
 *
 * @example
 * ```typescript
 * trim('  hello  ') // 'hello'
 * trim(42)          // '42'
 * trim(null)        // ''
 * ```
 */
export function trim(value: RawValue): string {
  return rawText(value).trim()
}

/**
 * Checks for null or text that is blank once trimmed.
 */
export function isBlank(value: RawValue | undefined): boolean {
  if (value === null || value === undefined) return true
  return typeof value === 'string' && value.trim() === ''
}
