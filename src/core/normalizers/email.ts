/**
 * Components of an email address split at its first `@`.
 */
export interface EmailComponents {
  /** Local part (before @) */
  localPart: string
  /** Domain (after @), verbatim */
  domain: string
}

/**
 * Email-like substrings embedded in free text.
 */
export const EMBEDDED_EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g

/**
 * Validates if a string looks like a valid email address.
 * Checks a basic RFC 5322 shape, not the full grammar.
 *
 * @example
 * ```typescript
 * isValidEmail('user@example.com')  // true
 * isValidEmail('not-an-email')      // false
 * isValidEmail('user@@example.com') // false
 * ```
 */
export function isValidEmail(email: string): boolean {
  if (!email || typeof email !== 'string') {
    return false
  }

  // Must contain exactly one @ symbol
  const atCount = (email.match(/@/g) || []).length
  if (atCount !== 1) {
    return false
  }

  const [localPart, domain] = email.split('@')

  if (!localPart || !domain) {
    return false
  }

  // Alphanumerics, dots, underscores, percent, plus, hyphens; no leading or trailing dot
  if (
    !/^[a-zA-Z0-9][a-zA-Z0-9._+%-]*[a-zA-Z0-9]$|^[a-zA-Z0-9]$/.test(localPart)
  ) {
    return false
  }

  if (!domain.includes('.')) {
    return false
  }

  // Each label alphanumeric with inner hyphens only
  const domainParts = domain.split('.')
  for (const part of domainParts) {
    if (!part || !/^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?$/.test(part)) {
      return false
    }
  }

  const tld = domainParts[domainParts.length - 1]
  if (tld.length < 2) {
    return false
  }

  return true
}

/**
 * Splits an email at its first `@`.
 *
 * @returns The components, or null if there is no `@` or the local part is empty
 *
 * @example
 * ```typescript
 * splitEmail(' ann@x.com ') // { localPart: 'ann', domain: 'x.com' }
 * splitEmail('ann')         // null
 * ```
 */
export function splitEmail(value: string): EmailComponents | null {
  const email = value.trim()
  const atIndex = email.indexOf('@')
  if (atIndex <= 0) return null

  return {
    localPart: email.substring(0, atIndex),
    domain: email.substring(atIndex + 1),
  }
}
