/**
 * PII masking dispatch
 * @module core/masking
 */

import type { PiiKind } from '../../types/category'
import type { RawValue } from '../../types/record'
import { isValidEmail } from '../normalizers/email'
import { looksLikePhone } from '../normalizers/phone'
import { rawText } from '../normalizers/text'
import { maskEmail } from './email-mask'
import { looksLikeNationalId, maskNationalId, SSN_SHAPE } from './national-id-mask'
import { maskPhone } from './phone-mask'
import { scrubNotes } from './notes-scrubber'
import type { MaskOptions, ValueOutcome } from './types'
import { DEFAULT_MASK_OPTIONS } from './types'

export { maskEmail } from './email-mask'
export { maskNationalId, looksLikeNationalId } from './national-id-mask'
export { maskPhone } from './phone-mask'
export { scrubNotes, MASKED_EMAIL_TOKEN } from './notes-scrubber'
export { DEFAULT_MASK_OPTIONS, type MaskOptions, type ValueOutcome } from './types'

/**
 * Infers the kind of PII from a value's shape alone.
 * Checked in order: email, SSN layout, phone, letter-prefixed identifier,
 * and anything else is treated as free-text notes.
 *
 * @example
 * ```typescript
 * inferPiiKind('ann@x.com')      // 'email'
 * inferPiiKind('123-45-6789')    // 'nationalId'
 * inferPiiKind('+1 202 555 0143') // 'phone'
 * inferPiiKind('met at branch')  // 'notes'
 * ```
 */
export function inferPiiKind(
  value: string,
  options?: Pick<MaskOptions, 'defaultPhoneCountry'>
): PiiKind {
  const text = value.trim()
  if (isValidEmail(text)) return 'email'
  if (SSN_SHAPE.test(text)) return 'nationalId'
  if (looksLikePhone(text, options?.defaultPhoneCountry)) return 'phone'
  if (looksLikeNationalId(text)) return 'nationalId'
  return 'notes'
}

/**
 * Masks one PII value. When no kind is given it is inferred from the value.
 * Null masks to the empty string.
 *
 * @example
 * ```typescript
 * maskValue('ann@x.com', 'email').text      // 'a****@x.com'
 * maskValue('770001122', 'phone').text      // 'XXXXXXXXX'
 * maskValue('AB123456C', undefined).text    // 'AB1XXXXXX'
 * ```
 */
export function maskValue(
  value: RawValue,
  kind: PiiKind | undefined,
  options: MaskOptions = DEFAULT_MASK_OPTIONS
): ValueOutcome {
  if (value === null) return { text: '', fallback: false }

  const text = rawText(value)
  const resolved = kind ?? inferPiiKind(text, options)

  switch (resolved) {
    case 'email':
      return maskEmail(text, options.emailMaskChar)
    case 'nationalId':
      return maskNationalId(text, options.maskChar, options.nationalIdPrefixLength)
    case 'phone':
      return maskPhone(text, options.maskChar)
    case 'notes':
      return scrubNotes(text, options.maskChar, options.notesMaxLength)
  }
}
