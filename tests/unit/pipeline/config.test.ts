import { describe, it, expect } from 'vitest'
import { resolveConfig, validateConfig } from '../../../src/core/config'
import { DEFAULT_CLEANER_CONFIG } from '../../../src/types/config'
import { defaultLogger, createSilentLogger } from '../../../src/utils/logger'
import { ConfigurationError, InvalidParameterError } from '../../../src/utils/errors'

describe('resolveConfig', () => {
  it('should fill every option from the defaults', () => {
    const config = resolveConfig()

    expect(config).toEqual({ ...DEFAULT_CLEANER_CONFIG, logger: defaultLogger })
  })

  it('should override only the given options', () => {
    const logger = createSilentLogger()
    const config = resolveConfig({ dayFirst: false, overlap: 'preferUser', logger })

    expect(config.dayFirst).toBe(false)
    expect(config.overlap).toBe('preferUser')
    expect(config.logger).toBe(logger)
    expect(config.sampleSize).toBe(100)
  })

  it('should ignore options explicitly set to undefined', () => {
    expect(resolveConfig({ sampleSize: undefined }).sampleSize).toBe(100)
  })

  it('should reject out of range options', () => {
    expect(() => resolveConfig({ sampleSize: 0 })).toThrow(InvalidParameterError)
    expect(() => resolveConfig({ maskChar: 'XX' })).toThrow(InvalidParameterError)
    expect(() => resolveConfig({ joinKeyAliases: [] })).toThrow(InvalidParameterError)
    expect(() => resolveConfig({ nationalIdPrefixLength: 11 })).toThrow(InvalidParameterError)
    expect(() => resolveConfig({ userSuffix: '  ' })).toThrow(InvalidParameterError)
    expect(() => resolveConfig({ identifierAliases: [''] })).toThrow(InvalidParameterError)
  })

  it('should reject a digit as mask character', () => {
    expect(() => resolveConfig({ maskChar: '7' })).toThrow(ConfigurationError)
  })

  it('should name the offending option', () => {
    expect(() => resolveConfig({ notesMaxLength: -1 })).toThrow(
      "Invalid parameter 'notesMaxLength': must be positive (> 0)"
    )
  })
})

describe('validateConfig', () => {
  it('should accept the resolved defaults', () => {
    expect(() => validateConfig(resolveConfig())).not.toThrow()
  })
})
