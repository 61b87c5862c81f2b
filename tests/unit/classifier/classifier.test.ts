import { describe, it, expect } from 'vitest'
import {
  classifyField,
  classifyRecordSet,
  explainClassification,
  isIdentifierName,
} from '../../../src/core/classifier'
import { DATE, NUMERIC, TEXT, sensitive } from '../../../src/types/category'

describe('classifyField', () => {
  describe('empty samples', () => {
    it('should classify all-null samples as TEXT', () => {
      expect(explainClassification('label', [null, '  '])).toEqual({
        field: 'label',
        category: TEXT,
        rule: 'empty-sample',
      })
    })

    it('should check emptiness before name hints', () => {
      expect(classifyField('email', [])).toEqual(TEXT)
    })
  })

  describe('PII names', () => {
    it('should detect emails', () => {
      expect(classifyField('email', ['ann@x.com'])).toEqual(sensitive('email'))
      expect(classifyField('contactMail', ['x'])).toEqual(sensitive('email'))
    })

    it('should detect national identifiers', () => {
      expect(classifyField('national_id', ['SN1'])).toEqual(sensitive('nationalId'))
      expect(classifyField('nationalID', ['SN1'])).toEqual(sensitive('nationalId'))
      expect(classifyField('ssn', ['1'])).toEqual(sensitive('nationalId'))
      expect(classifyField('passport_no', ['P1'])).toEqual(sensitive('nationalId'))
      expect(classifyField('id_number', ['1'])).toEqual(sensitive('nationalId'))
    })

    it('should detect notes', () => {
      expect(classifyField('internal_notes', ['x'])).toEqual(sensitive('notes'))
      expect(classifyField('comment', ['x'])).toEqual(sensitive('notes'))
    })

    it('should detect phones', () => {
      expect(classifyField('phone_number', ['1'])).toEqual(sensitive('phone'))
      expect(classifyField('tel', ['1'])).toEqual(sensitive('phone'))
      expect(classifyField('hotel', ['Ritz'])).toEqual(TEXT)
    })

    it('should rank PII names above date names', () => {
      expect(explainClassification('email_updated', ['x']).rule).toBe('pii-name')
    })
  })

  describe('date hints', () => {
    it('should classify date-like names as DATE whatever the values', () => {
      expect(explainClassification('created_at', ['soon'])).toEqual({
        field: 'created_at',
        category: DATE,
        rule: 'date-name',
      })
      expect(classifyField('updatedAt', [1])).toEqual(DATE)
      expect(classifyField('timestamp', ['x'])).toEqual(DATE)
    })

    it('should not match date hints inside other words', () => {
      expect(classifyField('status', ['ok'])).toEqual(TEXT)
      expect(classifyField('counts', [3])).toEqual(NUMERIC)
    })

    it('should classify a strict majority of date strings as DATE', () => {
      expect(explainClassification('when', ['2024-01-30', '31/01/2024', 'later']).rule).toBe(
        'date-values'
      )
      expect(classifyField('when', ['2024-01-30', 'later'])).toEqual(TEXT)
    })

    it('should not let numbers vote for dates', () => {
      expect(classifyField('epoch', [1706609700])).toEqual(NUMERIC)
    })
  })

  describe('numeric values', () => {
    it('should classify a strict majority of numbers as NUMERIC', () => {
      expect(explainClassification('amount', [10, '12.5', 'n/a'])).toEqual({
        field: 'amount',
        category: NUMERIC,
        rule: 'numeric-values',
      })
      expect(classifyField('code', ['20240130'])).toEqual(NUMERIC)
    })

    it('should not count booleans as numbers', () => {
      expect(explainClassification('flag', [true, false, true])).toEqual({
        field: 'flag',
        category: TEXT,
        rule: 'default',
      })
    })
  })

  it('should be deterministic', () => {
    const sample = ['2024-01-30', '12', 'x', 7]
    expect(explainClassification('value', sample)).toEqual(
      explainClassification('value', sample)
    )
  })
})

describe('classifyRecordSet', () => {
  it('should classify every field in first-seen order', () => {
    const result = classifyRecordSet([
      { amount: 1, note: 'hi' },
      { when: '2024-01-30', amount: 2 },
    ])

    expect(result.map((classification) => classification.field)).toEqual([
      'amount',
      'note',
      'when',
    ])
    expect(result.map((classification) => classification.category.kind)).toEqual([
      'NUMERIC',
      'SENSITIVE_ID',
      'DATE',
    ])
  })

  it('should keep identifier fields as text without running the rules', () => {
    expect(
      classifyRecordSet([{ user_id: 7, email: 'ann@x.com' }], {}, new Set(['user_id']))
    ).toEqual([
      { field: 'user_id', category: TEXT, rule: 'identifier' },
      { field: 'email', category: sensitive('email'), rule: 'pii-name' },
    ])
  })

  it('should only sample up to sampleSize non-null values', () => {
    const records = [{ x: null }, { x: 'n/a' }, { x: '1' }, { x: '2' }]

    expect(classifyRecordSet(records)[0].category).toEqual(NUMERIC)
    expect(classifyRecordSet(records, { sampleSize: 1 })[0].category).toEqual(TEXT)
  })
})

describe('isIdentifierName', () => {
  it('should recognise id-suffixed names', () => {
    expect(isIdentifierName('merchant_id')).toBe(true)
    expect(isIdentifierName('orderId')).toBe(true)
    expect(isIdentifierName('ID')).toBe(true)
  })

  it('should leave PII names and plain fields out', () => {
    expect(isIdentifierName('national_id')).toBe(false)
    expect(isIdentifierName('passportId')).toBe(false)
    expect(isIdentifierName('amount')).toBe(false)
    expect(isIdentifierName('paid')).toBe(false)
  })
})
