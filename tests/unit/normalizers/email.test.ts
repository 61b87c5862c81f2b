import { describe, it, expect } from 'vitest'
import { isValidEmail, splitEmail } from '../../../src/core/normalizers/email'

describe('isValidEmail', () => {
  it('should accept well-formed addresses', () => {
    expect(isValidEmail('user@example.com')).toBe(true)
    expect(isValidEmail('first.last+tag@mail.example.org')).toBe(true)
  })

  it('should reject malformed addresses', () => {
    expect(isValidEmail('not-an-email')).toBe(false)
    expect(isValidEmail('user@@example.com')).toBe(false)
    expect(isValidEmail('user@example')).toBe(false)
    expect(isValidEmail('.user@example.com')).toBe(false)
    expect(isValidEmail('')).toBe(false)
  })
})

describe('splitEmail', () => {
  it('should split at the first @ after trimming', () => {
    expect(splitEmail(' ann@x.com ')).toEqual({ localPart: 'ann', domain: 'x.com' })
  })

  it('should return null without a local part', () => {
    expect(splitEmail('ann')).toBeNull()
    expect(splitEmail('@x.com')).toBeNull()
  })
})
