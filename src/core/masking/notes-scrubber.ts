import { EMBEDDED_EMAIL_PATTERN } from '../normalizers/email'
import type { ValueOutcome } from './types'

/**
 * Placeholder substituted for email addresses found inside free text.
 */
export const MASKED_EMAIL_TOKEN = '<masked_email>'

/**
 * Scrubs free-text notes: embedded emails become `<masked_email>`, every digit
 * is replaced with the mask character, and text longer than `maxLength` is cut
 * and suffixed with `...`.
 *
 * @example
 * ```typescript
 * scrubNotes('Call 555-0100 or mail bob@corp.com').text
 * // 'Call XXX-XXXX or mail <masked_email>'
 * ```
 */
export function scrubNotes(
  value: string,
  maskChar = 'X',
  maxLength = 200
): ValueOutcome {
  const scrubbed = value
    .trim()
    .replace(EMBEDDED_EMAIL_PATTERN, MASKED_EMAIL_TOKEN)
    .replace(/\d/g, maskChar)

  if (scrubbed.length <= maxLength) {
    return { text: scrubbed, fallback: false }
  }
  return { text: `${scrubbed.slice(0, maxLength)}...`, fallback: false }
}
