/**
 * Join key detection
 * @module merge/join-key
 */

import { DEFAULT_CLEANER_CONFIG } from '../types/config'
import type { RawValue } from '../types/record'
import { isBlank } from '../core/normalizers/text'

/**
 * Picks the first alias present in both field sets.
 *
 * @param userFields - Field names of the user records
 * @param transactionFields - Field names of the transaction records
 * @param aliases - Candidate keys in priority order
 * @returns The join key, or null if no alias is shared
 *
 * @example
 * ```typescript
 * detectJoinKey(['id', 'customer_id'], ['customer_id', 'id'], ['user_id', 'customer_id', 'id'])
 * // 'customer_id'
 * ```
 */
export function detectJoinKey(
  userFields: Iterable<string>,
  transactionFields: Iterable<string>,
  aliases: readonly string[] = DEFAULT_CLEANER_CONFIG.joinKeyAliases
): string | null {
  const users = new Set(userFields)
  const transactions = new Set(transactionFields)
  return aliases.find((alias) => users.has(alias) && transactions.has(alias)) ?? null
}

/**
 * Text form of a key value used for matching.
 * `1` and `" 1 "` both become `'1'`; null and blank keys never match.
 */
export function normalizeKey(value: RawValue | undefined): string | null {
  if (value === undefined || isBlank(value)) return null
  return String(value).trim()
}
