import { isValidPhoneNumber, type CountryCode } from 'libphonenumber-js'

/**
 * Characters allowed in a loosely formatted phone number.
 */
const PHONE_SHAPE = /^\+?[\d\s().-]+(?:\s*(?:ext\.?|x)\s*\d+)?$/i

/**
 * Minimum digit count for a value to pass as a phone number by shape alone.
 */
const MIN_PHONE_DIGITS = 7

/**
 * Validates a phone number with libphonenumber-js.
 *
 * @param phone - The phone string to validate
 * @param country - Optional country code for numbers without a `+` prefix
 *
 * @example
 * ```typescript
 * isValidPhone('+44 20 7123 4567')   // true
 * isValidPhone('202-555-0143', 'US') // depends on the number plan
 * isValidPhone('123')                // false
 * ```
 */
export function isValidPhone(phone: string, country?: CountryCode): boolean {
  if (!phone || typeof phone !== 'string') {
    return false
  }

  try {
    return isValidPhoneNumber(phone, country)
  } catch {
    return false
  }
}

/**
 * Checks whether a value is shaped like a phone number: either valid according
 * to libphonenumber-js, or made only of phone punctuation with enough digits.
 *
 * @example
 * ```typescript
 * looksLikePhone('+221 77 123 45 67') // true
 * looksLikePhone('(555) 010-9999')    // true
 * looksLikePhone('AB123456C')         // false
 * ```
 */
export function looksLikePhone(value: string, country?: CountryCode): boolean {
  const phone = value.trim()
  if (!PHONE_SHAPE.test(phone)) return false
  if (isValidPhone(phone, country)) return true
  return phone.replace(/\D/g, '').length >= MIN_PHONE_DIGITS
}
