import type { ValueOutcome } from './types'

/**
 * Replaces every digit of a phone number; punctuation and the `+` prefix stay
 * so the output keeps the original layout without leaking any digit.
 *
 * @example
 * ```typescript
 * maskPhone('+221 77 123 45 67').text // '+XXX XX XXX XX XX'
 * ```
 */
export function maskPhone(value: string, maskChar = 'X'): ValueOutcome {
  return { text: value.trim().replace(/\d/g, maskChar), fallback: false }
}
