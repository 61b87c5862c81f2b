import { describe, it, expect } from 'vitest'
import {
  maskEmail,
  maskNationalId,
  maskPhone,
  scrubNotes,
  inferPiiKind,
  maskValue,
  looksLikeNationalId,
  MASKED_EMAIL_TOKEN,
} from '../../../src/core/masking'

describe('maskEmail', () => {
  it('should keep the first character and the domain', () => {
    expect(maskEmail('ann@x.com')).toEqual({ text: 'a****@x.com', fallback: false })
    expect(maskEmail(' ann.lee@example.com ').text).toBe('a****@example.com')
  })

  it('should never contain the full local part', () => {
    for (const email of ['jonathan@example.org', 'ab@x.io', 'first.last+tag@mail.co']) {
      const localPart = email.slice(0, email.indexOf('@'))
      expect(maskEmail(email).text).not.toContain(localPart)
    }
  })

  it('should mask a one-character local part entirely', () => {
    expect(maskEmail('a@x.com').text).toBe('*@x.com')
  })

  it('should fully mask a local part its masked form would spell out', () => {
    expect(maskEmail('a*@x.com').text).toBe('*****@x.com')
    expect(maskEmail('b##@y.org', '#').text).toBe('#####@y.org')
  })

  it('should mask the local part where the domain repeats it', () => {
    expect(maskEmail('bob@bob.com').text).toBe('b****@***.com')
  })

  it('should fully mask values without @ and report a fallback', () => {
    expect(maskEmail('not-an-email')).toEqual({ text: '************', fallback: true })
  })

  it('should use the given mask character', () => {
    expect(maskEmail('ann@x.com', '#').text).toBe('a####@x.com')
  })
})

describe('maskNationalId', () => {
  it('should keep a three character prefix by default', () => {
    expect(maskNationalId('SN1234567').text).toBe('SN1XXXXXX')
    expect(maskNationalId('  123456789 ').text).toBe('123XXXXXX')
  })

  it('should honour a custom prefix length', () => {
    expect(maskNationalId('AB12', 'X', 2).text).toBe('ABXX')
    expect(maskNationalId('AB12', '#', 0).text).toBe('####')
  })

  it('should fully mask identifiers no longer than the prefix', () => {
    expect(maskNationalId('AB').text).toBe('XX')
  })
})

describe('looksLikeNationalId', () => {
  it('should recognise SSN and letter-prefixed layouts', () => {
    expect(looksLikeNationalId('123-45-6789')).toBe(true)
    expect(looksLikeNationalId('AB123456C')).toBe(true)
    expect(looksLikeNationalId('CNI-00123456')).toBe(true)
    expect(looksLikeNationalId('hello')).toBe(false)
  })
})

describe('maskPhone', () => {
  it('should replace every digit and keep punctuation', () => {
    expect(maskPhone('+221 77 123 45 67').text).toBe('+XXX XX XXX XX XX')
    expect(maskPhone('(555) 010-9999').text).toBe('(XXX) XXX-XXXX')
  })
})

describe('scrubNotes', () => {
  it('should replace emails and digits', () => {
    expect(scrubNotes('Call 555-0100 or mail bob@corp.com').text).toBe(
      'Call XXX-XXXX or mail <masked_email>'
    )
  })

  it('should replace emails before digits', () => {
    expect(scrubNotes('contact jo3@x.com').text).toBe(`contact ${MASKED_EMAIL_TOKEN}`)
  })

  it('should truncate long notes with an ellipsis', () => {
    expect(scrubNotes('abcdef', 'X', 4).text).toBe('abcd...')
    expect(scrubNotes('a'.repeat(200)).text).toBe('a'.repeat(200))
    expect(scrubNotes('a'.repeat(201)).text).toBe(`${'a'.repeat(200)}...`)
  })
})

describe('inferPiiKind', () => {
  it('should infer the kind from the value shape', () => {
    expect(inferPiiKind('ann@x.com')).toBe('email')
    expect(inferPiiKind('123-45-6789')).toBe('nationalId')
    expect(inferPiiKind('+1 202 555 0143')).toBe('phone')
    expect(inferPiiKind('AB123456C')).toBe('nationalId')
    expect(inferPiiKind('met at branch')).toBe('notes')
  })
})

describe('maskValue', () => {
  it('should dispatch on the given kind', () => {
    expect(maskValue('ann@x.com', 'email').text).toBe('a****@x.com')
    expect(maskValue('770001122', 'phone').text).toBe('XXXXXXXXX')
    expect(maskValue('call 12', 'notes').text).toBe('call XX')
  })

  it('should infer the kind when none is given', () => {
    expect(maskValue('AB123456C', undefined).text).toBe('AB1XXXXXX')
    expect(maskValue(123456789, undefined).text).toBe('123XXXXXX')
  })

  it('should mask null to the empty string', () => {
    expect(maskValue(null, 'email')).toEqual({ text: '', fallback: false })
  })

  it('should read mask settings from the options', () => {
    const options = {
      emailMaskChar: '#',
      maskChar: '*',
      nationalIdPrefixLength: 1,
      notesMaxLength: 5,
    }
    expect(maskValue('ann@x.com', 'email', options).text).toBe('a####@x.com')
    expect(maskValue('SN1234', 'nationalId', options).text).toBe('S*****')
    expect(maskValue('see 1234567', 'notes', options).text).toBe('see *...')
  })
})
