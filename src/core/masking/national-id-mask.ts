import type { ValueOutcome } from './types'

/**
 * US Social Security Number layout.
 */
export const SSN_SHAPE = /^\d{3}-?\d{2}-?\d{4}$/

/**
 * Letter prefix followed by digits, with an optional check letter
 * (`AB123456C`, `CNI-00123456`, `P 1234567`).
 */
export const LETTER_PREFIXED_ID_SHAPE = /^[A-Za-z]{1,4}[-\s]?\d[\d\s-]{3,}[A-Za-z]?$/

/**
 * Checks whether a value is shaped like a government identifier.
 *
 * @example
 * ```typescript
 * looksLikeNationalId('AB123456C')   // true
 * looksLikeNationalId('123-45-6789') // true
 * looksLikeNationalId('hello')       // false
 * ```
 */
export function looksLikeNationalId(value: string): boolean {
  const id = value.trim()
  return SSN_SHAPE.test(id) || LETTER_PREFIXED_ID_SHAPE.test(id)
}

/**
 * Keeps a short prefix of an identifier and masks every remaining character.
 * Identifiers no longer than the prefix are masked in full.
 *
 * @example
 * ```typescript
 * maskNationalId('SN1234567').text           // 'SN1XXXXXX'
 * maskNationalId('AB12', 'X', 2).text        // 'ABXX'
 * maskNationalId('AB', 'X', 3).text          // 'XX'
 * ```
 */
export function maskNationalId(
  value: string,
  maskChar = 'X',
  prefixLength = 3
): ValueOutcome {
  const id = value.trim()
  if (id.length <= prefixLength) {
    return { text: maskChar.repeat(id.length), fallback: false }
  }
  return {
    text: id.slice(0, prefixLength) + maskChar.repeat(id.length - prefixLength),
    fallback: false,
  }
}
