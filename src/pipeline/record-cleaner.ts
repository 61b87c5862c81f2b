/**
 * Reusable cleaner bound to one configuration
 * @module pipeline/record-cleaner
 */

import type { CleanerConfig, CleanerOptions } from '../types/config'
import type { OutputTable } from '../types/record'
import { resolveConfig, validateConfig } from '../core/config'
import { exportCsv } from '../export'
import { cleanLoaded, fromEntries, runPipeline } from './clean-data'
import type { PipelineResult } from './types'

/**
 * Runs the cleaning pipeline with a fixed, validated configuration.
 *
 * @example
 * ```typescript
 * const cleaner = new CleanerBuilder().dayFirst(false).build()
 * const { report } = cleaner.clean('users.json', 'transactions.json', 'clean.csv')
 * ```
 */
export class RecordCleaner {
  private readonly config: CleanerConfig

  constructor(config: CleanerConfig) {
    validateConfig(config)
    this.config = { ...config }
  }

  /**
   * Loads both files, cleans them and writes the CSV.
   *
   * @throws {LoadError} If a source cannot be read or holds no recoverable JSON
   * @throws {MergeError} If both sources are empty
   * @throws {IOError} If the CSV cannot be written
   */
  clean(usersPath: string, transactionsPath: string, outputPath: string): PipelineResult {
    return runPipeline(usersPath, transactionsPath, outputPath, this.config)
  }

  /**
   * Cleans already parsed records; nothing is read or written.
   *
   * @throws {MergeError} If both inputs are empty
   */
  cleanRecords(users: readonly unknown[], transactions: readonly unknown[]): PipelineResult {
    return cleanLoaded(
      fromEntries(users, '<users>'),
      fromEntries(transactions, '<transactions>'),
      this.config
    )
  }

  /**
   * Writes a table produced by {@link cleanRecords}.
   *
   * @throws {IOError} If the file cannot be written
   */
  export(table: OutputTable, path: string): void {
    exportCsv(table, path)
  }

  /**
   * Copy of the configuration this cleaner runs with.
   */
  getConfig(): CleanerConfig {
    return { ...this.config }
  }
}

/**
 * Creates a cleaner from plain options.
 *
 * @throws {InvalidParameterError} If an option is out of range
 * @throws {ConfigurationError} If options contradict each other
 */
export function createCleaner(options?: CleanerOptions): RecordCleaner {
  return new RecordCleaner(resolveConfig(options))
}
