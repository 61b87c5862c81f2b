import type { RawValue } from '../../types/record'

/**
 * Base-10 number text: optional sign, `,` or `_` thousands separators used
 * consistently, optional fraction and exponent.
 */
const NUMERIC_TEXT =
  /^[+-]?(?:(?:\d{1,3}(?<sep>[,_])\d{3}(?:\k<sep>\d{3})*|\d+)(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i

/**
 * Parses a raw value as a base-10 number.
 * Booleans and text that is not entirely numeric are rejected.
 *
 * @returns The number, or null if the value is not numeric
 *
 * @example
 * ```typescript
 * parseNumeric(19.999)      // 19.999
 * parseNumeric(' 1,234.5 ') // 1234.5
 * parseNumeric('1e3')       // 1000
 * parseNumeric('12 apples') // null
 * parseNumeric('4111111111111111111') // null, not exact as a number
 * parseNumeric(true)        // null
 * ```
 */
export function parseNumeric(value: RawValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null

  const text = value.trim()
  if (!NUMERIC_TEXT.test(text)) return null

  const parsed = Number(text.replace(/[,_]/g, ''))
  if (!Number.isFinite(parsed)) return null
  // Digit strings past 2^53 would come back with different digits
  if (!Number.isSafeInteger(parsed) && Number.isInteger(parsed) && !/e/i.test(text)) {
    return null
  }
  return parsed
}

/**
 * Checks whether a raw value parses as a base-10 number.
 */
export function isNumeric(value: RawValue): boolean {
  return parseNumeric(value) !== null
}

/**
 * Rounds half away from zero to a number of decimal places.
 *
 * @example
 * ```typescript
 * roundTo(19.999, 2) // 20
 * roundTo(-2.345, 1) // -2.3
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const rounded = Number(value.toFixed(decimals))
  // Normalise -0 so it never renders as a signed zero
  return rounded === 0 ? 0 : rounded
}

/**
 * Renders a number in its shortest decimal form, keeping at least one
 * fractional digit for integral values.
 *
 * @example
 * ```typescript
 * formatDecimal(20)    // '20.0'
 * formatDecimal(12.34) // '12.34'
 * formatDecimal(1e21)  // '1e+21'
 * ```
 */
export function formatDecimal(value: number): string {
  const text = String(value)
  if (/[.e]/i.test(text)) return text
  return `${text}.0`
}

/**
 * Rounds a raw value to two decimals and renders it.
 *
 * @returns The rendered number, or null if the value is not numeric
 *
 * @example
 * ```typescript
 * normalizeAmount(19.999)   // '20.0'
 * normalizeAmount('12.34')  // '12.34'
 * normalizeAmount('n/a')    // null
 * ```
 */
export function normalizeAmount(value: RawValue, decimals = 2): string | null {
  const parsed = parseNumeric(value)
  return parsed === null ? null : formatDecimal(roundTo(parsed, decimals))
}
