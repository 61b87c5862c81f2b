/**
 * Transaction-driven merge of user and transaction records
 * @module merge/merger
 */

import { DEFAULT_CLEANER_CONFIG } from '../types/config'
import type { OverlapPolicy } from '../types/config'
import type { FlatRecord, RawValue, RecordSet, UnifiedRecord } from '../types/record'
import { collectFieldNames } from '../core/fields'
import { isBlank } from '../core/normalizers/text'
import { MergeError } from '../utils/errors'
import { defaultLogger } from '../utils/logger'
import { detectJoinKey, normalizeKey } from './join-key'
import type { MergeOptions, MergeResult } from './types'

/**
 * Merges user records into transaction records.
 *
 * Transactions drive the output: every transaction yields exactly one record,
 * and users without transactions are not emitted. With a join key, the first
 * user whose key matches (compared as trimmed text) is merged in. Without one,
 * the merge degrades to concatenation: user columns are added but left empty,
 * the result is flagged `degraded` and a warning is logged.
 *
 * Every output record carries the full column union; absent values are null.
 *
 * @param users - User records
 * @param transactions - Transaction records
 * @param options - Merge options
 * @throws {MergeError} If both inputs are empty
 *
 * @example
 * ```typescript
 * const result = mergeRecordSets(
 *   [{ user_id: '1', email: 'a****@x.com' }],
 *   [{ user_id: '1', amount: '20.0' }]
 * )
 * // result.records: [{ user_id: '1', amount: '20.0', email: 'a****@x.com' }]
 * ```
 */
export function mergeRecordSets(
  users: RecordSet,
  transactions: RecordSet,
  options: MergeOptions = {}
): MergeResult {
  if (users.length === 0 && transactions.length === 0) {
    throw new MergeError('Nothing to merge: both users and transactions are empty', {
      users: 0,
      transactions: 0,
    })
  }

  const logger = options.logger ?? defaultLogger
  const overlap = options.overlap ?? DEFAULT_CLEANER_CONFIG.overlap
  const userSuffix = options.userSuffix ?? DEFAULT_CLEANER_CONFIG.userSuffix

  const userFields = collectFieldNames(users)
  const transactionFields = collectFieldNames(transactions)
  const joinKey =
    options.joinKey !== undefined
      ? options.joinKey
      : detectJoinKey(
          userFields,
          transactionFields,
          options.joinKeyAliases ?? DEFAULT_CLEANER_CONFIG.joinKeyAliases
        )

  const transactionFieldSet = new Set(transactionFields)
  const overlapping = new Set(
    userFields.filter((field) => field !== joinKey && transactionFieldSet.has(field))
  )
  const renamed =
    overlap === 'suffix'
      ? suffixOverlapping(overlapping, userSuffix, [...transactionFields, ...userFields])
      : {}

  const columns = Array.from(
    new Set([
      ...transactionFields,
      ...userFields.map((field) => renamed[field] ?? field),
    ])
  )

  const userIndex = joinKey ? indexUsers(users, joinKey) : new Map<string, FlatRecord>()
  let unmatched = 0

  const records = transactions.map((transaction) => {
    const key = joinKey ? normalizeKey(transaction[joinKey]) : null
    const user = key === null ? undefined : userIndex.get(key)
    if (!user) unmatched++

    const record: UnifiedRecord = Object.fromEntries(
      columns.map((column): [string, RawValue] => [column, null])
    )
    Object.assign(record, transaction)

    if (user) {
      mergeUserFields(record, user, { joinKey, overlapping, renamed, overlap })
    }
    return record
  })

  if (!joinKey) {
    logger.warn(
      'No common join key between users and transactions; transactions were kept without user fields',
      { transactions: transactions.length, users: users.length, userFields }
    )
  }

  return {
    records,
    columns,
    joinKey,
    degraded: joinKey === null,
    unmatched,
    renamed,
  }
}

/**
 * Indexes users by normalized key; the first user with a given key wins.
 */
function indexUsers(users: RecordSet, joinKey: string): Map<string, FlatRecord> {
  const index = new Map<string, FlatRecord>()
  for (const user of users) {
    const key = normalizeKey(user[joinKey])
    if (key !== null && !index.has(key)) {
      index.set(key, user)
    }
  }
  return index
}

/**
 * Gives each overlapping user field a free `<name><suffix>` column name.
 */
function suffixOverlapping(
  overlapping: ReadonlySet<string>,
  suffix: string,
  takenNames: readonly string[]
): Record<string, string> {
  const taken = new Set(takenNames)
  const renamed: Record<string, string> = {}
  for (const field of overlapping) {
    let target = `${field}${suffix}`
    while (taken.has(target)) {
      target = `${target}${suffix}`
    }
    taken.add(target)
    renamed[field] = target
  }
  return renamed
}

function mergeUserFields(
  record: UnifiedRecord,
  user: FlatRecord,
  context: {
    joinKey: string | null
    overlapping: ReadonlySet<string>
    renamed: Record<string, string>
    overlap: OverlapPolicy
  }
): void {
  for (const [field, value] of Object.entries(user)) {
    if (field === context.joinKey) continue

    if (!context.overlapping.has(field)) {
      record[field] = value
      continue
    }

    switch (context.overlap) {
      case 'suffix':
        record[context.renamed[field] ?? field] = value
        break
      case 'preferTransaction':
        if (isBlank(record[field])) record[field] = value
        break
      case 'preferUser':
        if (!isBlank(value)) record[field] = value
        break
    }
  }
}
