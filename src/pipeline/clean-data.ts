/**
 * End-to-end cleaning pipeline
 *
 * Stages, in order:
 * - Load and flatten both sources
 * - Detect the join key from field names
 * - Classify and transform each source on its own
 * - Merge users into transactions
 * - Build the output table and write it as CSV
 *
 * @module pipeline/clean-data
 */

import type { CleanerConfig, CleanerOptions } from '../types/config'
import type { FieldClassification } from '../types/category'
import type { FlatRecord, RecordSet } from '../types/record'
import type { FallbackCounts, RunReport } from '../types/report'
import { CATEGORY_KINDS } from '../types/category'
import { emptyFallbackCounts } from '../types/report'
import { resolveConfig } from '../core/config'
import { collectFieldNames } from '../core/fields'
import { flattenRecord, isPlainObject, loadRecords, type LoadResult } from '../core/loader'
import { classifyRecordSet, isIdentifierName } from '../core/classifier'
import { transformRecordSet, type TransformedRecordSet } from '../core/transformer'
import { detectJoinKey, mergeRecordSets } from '../merge'
import { buildOutputTable, exportCsv, resolveIdentifierColumn } from '../export'
import { createPrefixedLogger, type Logger } from '../utils/logger'
import type { PipelineResult } from './types'

/**
 * Cleans two JSON exports and writes the merged result as CSV.
 *
 * @param usersPath - JSON or NDJSON file of user records
 * @param transactionsPath - JSON or NDJSON file of transaction records
 * @param outputPath - CSV file to write; its directory must exist
 * @param options - Cleaner options
 * @returns The table written and the run report
 * @throws {LoadError} If a source cannot be read or holds no recoverable JSON
 * @throws {MergeError} If both sources are empty; nothing is written
 * @throws {IOError} If the CSV cannot be written
 *
 * @example
 * ```typescript
 * const { report } = cleanData('users.json', 'transactions.json', 'out/clean.csv')
 * console.log(`${report.rowCount} rows, join key ${report.joinKey ?? 'none'}`)
 * ```
 */
export function cleanData(
  usersPath: string,
  transactionsPath: string,
  outputPath: string,
  options?: CleanerOptions
): PipelineResult {
  return runPipeline(usersPath, transactionsPath, outputPath, resolveConfig(options))
}

/**
 * Runs {@link cleanData} against an already resolved configuration.
 */
export function runPipeline(
  usersPath: string,
  transactionsPath: string,
  outputPath: string,
  config: CleanerConfig
): PipelineResult {
  const loadLogger = createPrefixedLogger('load', config.logger)
  const users = loadSource(usersPath, loadLogger)
  const transactions = loadSource(transactionsPath, loadLogger)

  const result = cleanLoaded(users, transactions, config)

  exportCsv(result.table, outputPath)
  createPrefixedLogger('export', config.logger).info(`Wrote ${outputPath}`, {
    rows: result.report.rowCount,
    columns: result.report.columnCount,
  })

  return result
}

/**
 * Cleans in-memory records without touching the filesystem.
 * Entries that are not objects are skipped; nested objects are flattened.
 *
 * @example
 * ```typescript
 * const { table } = cleanRecords(
 *   [{ user_id: '1', email: 'ann@x.com' }],
 *   [{ user_id: '1', amount: 19.999 }]
 * )
 * // table.rows: [{ user_id: '1', amount: '20.0', email: 'a****@x.com' }]
 * ```
 */
export function cleanRecords(
  users: readonly unknown[],
  transactions: readonly unknown[],
  options?: CleanerOptions
): PipelineResult {
  const config = resolveConfig(options)
  return cleanLoaded(
    fromEntries(users, '<users>'),
    fromEntries(transactions, '<transactions>'),
    config
  )
}

/**
 * Wraps already parsed entries as a load result.
 */
export function fromEntries(entries: readonly unknown[], source: string): LoadResult {
  const records: FlatRecord[] = []
  for (const entry of entries) {
    if (isPlainObject(entry)) records.push(flattenRecord(entry))
  }
  return {
    records,
    stats: {
      source,
      mode: 'document',
      records: records.length,
      skippedLines: 0,
      skippedEntries: entries.length - records.length,
    },
  }
}

/**
 * Classifies, transforms, merges and tabulates two loaded sources.
 *
 * @throws {MergeError} If both sources are empty
 */
export function cleanLoaded(
  users: LoadResult,
  transactions: LoadResult,
  config: CleanerConfig
): PipelineResult {
  const userFields = collectFieldNames(users.records)
  const transactionFields = collectFieldNames(transactions.records)
  const joinKey = detectJoinKey(userFields, transactionFields, config.joinKeyAliases)

  const identifiers = new Set([...config.joinKeyAliases, ...config.identifierAliases])
  if (joinKey) identifiers.add(joinKey)
  for (const field of [...userFields, ...transactionFields]) {
    if (isIdentifierName(field)) identifiers.add(field)
  }

  const cleanedUsers = cleanSource(users.records, identifiers, config)
  const cleanedTransactions = cleanSource(transactions.records, identifiers, config)

  const mergeLogger = createPrefixedLogger('merge', config.logger)
  const merged = mergeRecordSets(cleanedUsers.records, cleanedTransactions.records, {
    joinKey,
    overlap: config.overlap,
    userSuffix: config.userSuffix,
    logger: mergeLogger,
  })
  mergeLogger.debug('Merged users into transactions', {
    joinKey: merged.joinKey,
    records: merged.records.length,
    unmatched: merged.unmatched,
  })

  const fallbacks = addFallbacks(cleanedUsers.fallbacks, cleanedTransactions.fallbacks)
  logFallbacks(fallbacks, createPrefixedLogger('transform', config.logger))

  const { table, identifierColumn, generated } = buildOutputTable(merged.records, {
    columns: merged.columns,
    identifierColumn: resolveIdentifierColumn(
      merged.columns,
      merged.joinKey,
      config.identifierAliases
    ),
    generateIds: config.generateIds,
    generatedIdPrefix: config.generatedIdPrefix,
  })

  const report: RunReport = {
    sources: {
      users: users.stats,
      transactions: transactions.stats,
    },
    classifications: {
      users: cleanedUsers.classifications,
      transactions: cleanedTransactions.classifications,
      merged: renamedClassifications(cleanedUsers.classifications, merged.renamed),
    },
    fallbacks,
    joinKey: merged.joinKey,
    degradedJoin: merged.degraded,
    unmatchedTransactions: merged.unmatched,
    identifierColumn,
    generatedIdentifiers: generated,
    rowCount: table.rows.length,
    columnCount: table.columns.length,
  }

  return { table, report }
}

type CleanedSource = TransformedRecordSet & { classifications: FieldClassification[] }

function cleanSource(
  records: RecordSet,
  identifiers: ReadonlySet<string>,
  config: CleanerConfig
): CleanedSource {
  const classifications = classifyRecordSet(
    records,
    { dayFirst: config.dayFirst, sampleSize: config.sampleSize },
    identifiers
  )
  return { ...transformRecordSet(records, classifications, config), classifications }
}

function loadSource(path: string, logger: Logger): LoadResult {
  const result = loadRecords(path)
  const { stats } = result
  logger.debug(`Loaded ${stats.records} records from ${path}`, { mode: stats.mode })
  if (stats.skippedLines > 0 || stats.skippedEntries > 0) {
    logger.warn(`Skipped unreadable entries in ${path}`, {
      skippedLines: stats.skippedLines,
      skippedEntries: stats.skippedEntries,
    })
  }
  return result
}

/**
 * Columns renamed by the merge carry values already transformed under the
 * user field's classification.
 */
function renamedClassifications(
  userClassifications: readonly FieldClassification[],
  renamed: Record<string, string>
): FieldClassification[] {
  return userClassifications
    .filter((classification) => classification.field in renamed)
    .map((classification) => ({
      ...classification,
      field: renamed[classification.field] ?? classification.field,
    }))
}

function addFallbacks(a: FallbackCounts, b: FallbackCounts): FallbackCounts {
  const total = emptyFallbackCounts()
  for (const kind of CATEGORY_KINDS) {
    total[kind] = a[kind] + b[kind]
  }
  return total
}

function logFallbacks(fallbacks: FallbackCounts, logger: Logger): void {
  const count = CATEGORY_KINDS.reduce((sum, kind) => sum + fallbacks[kind], 0)
  if (count > 0) {
    logger.info(`${count} values fell back to their safe default`, { ...fallbacks })
  }
}
