/**
 * Merge-related type definitions
 * @module merge/types
 */

import type { OverlapPolicy } from '../types/config'
import type { UnifiedRecord } from '../types/record'
import type { Logger } from '../utils/logger'

/**
 * Options for merging users into transactions
 */
export interface MergeOptions {
  /** Ordered candidate join keys */
  joinKeyAliases?: readonly string[]
  /** Resolution of fields present on both sides */
  overlap?: OverlapPolicy
  /** Suffix for user columns under the `suffix` policy */
  userSuffix?: string
  /** Join key chosen beforehand; skips detection when set */
  joinKey?: string | null
  logger?: Logger
}

/**
 * Result of a merge
 */
export interface MergeResult {
  /** One record per transaction, all with the same column set */
  records: UnifiedRecord[]
  /** Column union: transaction columns first, then user columns */
  columns: string[]
  /** Field the sets were joined on, or null when the join degraded */
  joinKey: string | null
  /** True when no join key was found and the sets were concatenated */
  degraded: boolean
  /** Transactions that found no user */
  unmatched: number
  /** User fields stored under a different output column */
  renamed: Record<string, string>
}
