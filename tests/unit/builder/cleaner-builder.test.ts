import { describe, it, expect } from 'vitest'
import { CleanerBuilder } from '../../../src/builder'
import { RecordCleaner } from '../../../src/pipeline'
import { createSilentLogger } from '../../../src/utils/logger'
import { ConfigurationError, InvalidParameterError } from '../../../src/utils/errors'

describe('CleanerBuilder', () => {
  it('should build a cleaner with default options', () => {
    const cleaner = new CleanerBuilder().build()

    expect(cleaner).toBeInstanceOf(RecordCleaner)
    expect(cleaner.getConfig().joinKeyAliases[0]).toBe('user_id')
  })

  it('should carry every setter into the configuration', () => {
    const logger = createSilentLogger()
    const config = new CleanerBuilder()
      .joinKeys('acct', 'user_id')
      .identifierColumns('ref')
      .sampleSize(10)
      .dayFirst(false)
      .maskChar('#')
      .emailMaskChar('~')
      .nationalIdPrefixLength(2)
      .notesMaxLength(50)
      .overlap('suffix', '_u')
      .generateIds(true, 'ROW')
      .phoneCountry('SN')
      .logger(logger)
      .buildConfig()

    expect(config).toEqual({
      joinKeyAliases: ['acct', 'user_id'],
      identifierAliases: ['ref'],
      sampleSize: 10,
      dayFirst: false,
      emailMaskChar: '~',
      maskChar: '#',
      nationalIdPrefixLength: 2,
      notesMaxLength: 50,
      overlap: 'suffix',
      userSuffix: '_u',
      generateIds: true,
      generatedIdPrefix: 'ROW',
      defaultPhoneCountry: 'SN',
      logger,
    })
  })

  it('should keep the default suffix and prefix when not given', () => {
    const config = new CleanerBuilder().overlap('preferUser').generateIds(false).buildConfig()

    expect(config.userSuffix).toBe('_user')
    expect(config.generatedIdPrefix).toBe('TXN')
    expect(config.generateIds).toBe(false)
  })

  it('should validate on build', () => {
    expect(() => new CleanerBuilder().joinKeys().build()).toThrow(InvalidParameterError)
    expect(() => new CleanerBuilder().maskChar('5').build()).toThrow(ConfigurationError)
  })

  it('should produce a cleaner that applies its options', () => {
    const cleaner = new CleanerBuilder()
      .logger(createSilentLogger())
      .maskChar('#')
      .generateIds(true, 'ROW')
      .build()

    const { table } = cleaner.cleanRecords([], [{ phone: '555 0100', amount: 2 }])

    expect(table).toEqual({
      columns: ['ID', 'phone', 'amount'],
      rows: [{ ID: 'ROW000001', phone: '### ####', amount: '2.0' }],
    })
  })
})
