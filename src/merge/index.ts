/**
 * Merge module - joins users into transactions
 * @module merge
 */

export { mergeRecordSets } from './merger'
export { detectJoinKey, normalizeKey } from './join-key'
export type { MergeOptions, MergeResult } from './types'
