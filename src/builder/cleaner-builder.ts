/**
 * Fluent builder for cleaner configuration
 * @module builder/cleaner-builder
 */

import type { CountryCode } from 'libphonenumber-js'
import type { CleanerConfig, CleanerOptions, OverlapPolicy } from '../types/config'
import { resolveConfig } from '../core/config'
import { RecordCleaner } from '../pipeline/record-cleaner'
import type { Logger } from '../utils/logger'

/**
 * Fluent builder for a {@link RecordCleaner}.
 * Every setter is optional; `build()` fills the rest from the defaults and
 * validates the result.
 *
 * @example
 * ```typescript
 * const cleaner = new CleanerBuilder()
 *   .joinKeys('account_id', 'user_id')
 *   .dayFirst(false)
 *   .overlap('preferUser')
 *   .maskChar('#')
 *   .logger(createSilentLogger())
 *   .build()
 *
 * cleaner.clean('users.json', 'transactions.json', 'clean.csv')
 * ```
 */
export class CleanerBuilder {
  private options: CleanerOptions = {}

  /**
   * Replace the ordered list of candidate join keys.
   */
  joinKeys(...aliases: string[]): this {
    this.options.joinKeyAliases = aliases
    return this
  }

  /**
   * Replace the ordered list of candidate identifier columns.
   */
  identifierColumns(...aliases: string[]): this {
    this.options.identifierAliases = aliases
    return this
  }

  /**
   * Set how many non-null values per field are sampled for classification.
   */
  sampleSize(size: number): this {
    this.options.sampleSize = size
    return this
  }

  /**
   * Read ambiguous `NN/NN/YYYY` dates as day first (`true`) or month first.
   */
  dayFirst(enabled: boolean): this {
    this.options.dayFirst = enabled
    return this
  }

  /**
   * Set the character hiding national identifiers and digits.
   */
  maskChar(char: string): this {
    this.options.maskChar = char
    return this
  }

  /**
   * Set the character hiding the local part of emails.
   */
  emailMaskChar(char: string): this {
    this.options.emailMaskChar = char
    return this
  }

  /**
   * Set how many leading characters of a national identifier stay readable.
   */
  nationalIdPrefixLength(length: number): this {
    this.options.nationalIdPrefixLength = length
    return this
  }

  notesMaxLength(length: number): this {
    this.options.notesMaxLength = length
    return this
  }

  /**
   * Choose how a field present on both a transaction and its user is resolved.
   *
   * @param policy - Overlap policy
   * @param suffix - Suffix for user columns under the `suffix` policy
   */
  overlap(policy: OverlapPolicy, suffix?: string): this {
    this.options.overlap = policy
    if (suffix !== undefined) {
      this.options.userSuffix = suffix
    }
    return this
  }

  /**
   * Turn generated identifiers on or off, optionally changing their prefix.
   *
   * @example
   * ```typescript
   * builder.generateIds(true, 'ROW') // ROW000001, ROW000002, ...
   * ```
   */
  generateIds(enabled: boolean, prefix?: string): this {
    this.options.generateIds = enabled
    if (prefix !== undefined) {
      this.options.generatedIdPrefix = prefix
    }
    return this
  }

  /**
   * Set the region used when checking whether a value is a phone number.
   */
  phoneCountry(country: CountryCode): this {
    this.options.defaultPhoneCountry = country
    return this
  }

  logger(logger: Logger): this {
    this.options.logger = logger
    return this
  }

  /**
   * Resolve and validate the configuration without building a cleaner.
   *
   * @throws {InvalidParameterError} If an option is out of range
   * @throws {ConfigurationError} If options contradict each other
   */
  buildConfig(): CleanerConfig {
    return resolveConfig(this.options)
  }

  /**
   * Build a cleaner from the configured options.
   *
   * @throws {InvalidParameterError} If an option is out of range
   * @throws {ConfigurationError} If options contradict each other
   */
  build(): RecordCleaner {
    return new RecordCleaner(this.buildConfig())
  }
}
