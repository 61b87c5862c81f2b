import { splitEmail } from '../normalizers/email'
import type { ValueOutcome } from './types'

/**
 * Number of mask characters standing in for the hidden part of the local part.
 */
const LOCAL_PART_MASK_LENGTH = 4

/**
 * Masks an email as `c****@domain`: first character of the local part, a fixed
 * run of mask characters, then the domain verbatim.
 *
 * A one-character local part is replaced entirely, and so is one the masked
 * form would still spell out (`a*`). A value without `@` is
 * masked in full and reported as a fallback. If the domain happens to repeat
 * the local part, that repetition is masked too.
 *
 * @example
 * ```typescript
 * maskEmail('ann@x.com').text     // 'a****@x.com'
 * maskEmail('a@x.com').text       // '*@x.com'
 * maskEmail('a*@x.com').text      // '*****@x.com'
 * maskEmail('not-an-email').text  // '************'
 * ```
 */
export function maskEmail(value: string, maskChar = '*'): ValueOutcome {
  const parts = splitEmail(value)
  if (!parts) {
    const text = value.trim()
    return { text: maskChar.repeat(text.length), fallback: true }
  }

  const { localPart, domain } = parts
  let maskedLocal =
    localPart.length > 1
      ? localPart[0] + maskChar.repeat(LOCAL_PART_MASK_LENGTH)
      : maskChar.repeat(localPart.length)
  if (localPart.length > 1 && maskedLocal.includes(localPart)) {
    maskedLocal = maskChar.repeat(LOCAL_PART_MASK_LENGTH + 1)
  }

  let maskedDomain = domain
  if (localPart.length > 1 && domain.includes(localPart)) {
    maskedDomain = domain.split(localPart).join(maskChar.repeat(localPart.length))
  }

  return { text: `${maskedLocal}@${maskedDomain}`, fallback: false }
}
