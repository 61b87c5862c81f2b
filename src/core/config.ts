/**
 * Resolution and validation of cleaner options
 * @module core/config
 */

import type { CleanerConfig, CleanerOptions } from '../types/config'
import { DEFAULT_CLEANER_CONFIG, OVERLAP_POLICIES } from '../types/config'
import { defaultLogger } from '../utils/logger'
import {
  ConfigurationError,
  requireIntegerInRange,
  requireNonEmptyArray,
  requireNonEmptyString,
  requireOneOf,
  requirePositive,
  requireSingleCharacter,
} from '../utils/errors'

/**
 * Merges options over the defaults and validates the result.
 *
 * @param options - Caller options; omitted fields take their defaults
 * @returns A complete configuration
 * @throws {InvalidParameterError} If a single option is out of range
 * @throws {ConfigurationError} If options contradict each other
 *
 * @example
 * ```typescript
 * const config = resolveConfig({ dayFirst: false, overlap: 'preferUser' })
 * ```
 */
export function resolveConfig(options: CleanerOptions = {}): CleanerConfig {
  const config: CleanerConfig = {
    ...DEFAULT_CLEANER_CONFIG,
    logger: defaultLogger,
    ...stripUndefined(options),
  }
  validateConfig(config)
  return config
}

/**
 * Validates a complete configuration.
 *
 * @throws {InvalidParameterError} If a single option is out of range
 * @throws {ConfigurationError} If options contradict each other
 */
export function validateConfig(config: CleanerConfig): void {
  requireNonEmptyArray(config.joinKeyAliases, 'joinKeyAliases')
  for (const alias of config.joinKeyAliases) {
    requireNonEmptyString(alias, 'joinKeyAliases[]')
  }
  for (const alias of config.identifierAliases) {
    requireNonEmptyString(alias, 'identifierAliases[]')
  }

  requirePositive(config.sampleSize, 'sampleSize')
  requireSingleCharacter(config.emailMaskChar, 'emailMaskChar')
  requireSingleCharacter(config.maskChar, 'maskChar')
  requireIntegerInRange(config.nationalIdPrefixLength, 0, 10, 'nationalIdPrefixLength')
  requirePositive(config.notesMaxLength, 'notesMaxLength')
  requireOneOf(config.overlap, OVERLAP_POLICIES, 'overlap')
  requireNonEmptyString(config.userSuffix, 'userSuffix')
  requireNonEmptyString(config.generatedIdPrefix, 'generatedIdPrefix')

  if (/\d/.test(config.maskChar)) {
    throw new ConfigurationError(
      `maskChar '${config.maskChar}' must not be a digit, masked output would still look numeric`,
      'maskChar'
    )
  }
}

function stripUndefined(options: CleanerOptions): CleanerOptions {
  const result: CleanerOptions = {}
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value })
    }
  }
  return result
}
