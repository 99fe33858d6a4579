import { describe, expect, it } from 'vitest'
import {
  getEmailDomain,
  isValidDomain,
  validateEmailCandidate,
} from '../email-validation.ts'
import type { Candidate } from '../types/contact.ts'

const candidate = (raw: string): Candidate => ({
  kind: 'email',
  raw,
  source: 'page',
})

const reasonFor = (raw: string): string | undefined => {
  const outcome = validateEmailCandidate(candidate(raw))
  return outcome.isValid ? undefined : outcome.reason
}

describe('validateEmailCandidate', () => {
  it('should accept a well-formed address and lower-case it', () => {
    expect(validateEmailCandidate(candidate(' John.Doe@Example.COM '))).toEqual({
      kind: 'email',
      raw: ' John.Doe@Example.COM ',
      source: 'page',
      isValid: true,
      normalized: 'john.doe@example.com',
      key: 'john.doe@example.com',
    })
  })

  it('should accept plus tags and subdomains', () => {
    const outcome = validateEmailCandidate(
      candidate('first+news@mail.example.co.uk'),
    )
    expect(outcome.isValid).toBe(true)
  })

  it('should reject input without an at sign', () => {
    expect(reasonFor('no-at-sign.example.com')).toBe('missing_at_sign')
  })

  it('should reject addresses longer than 254 characters', () => {
    expect(reasonFor(`${'a'.repeat(250)}@x.io`)).toBe('too_long')
  })

  it('should reject malformed local parts', () => {
    expect(reasonFor('.john@example.com')).toBe('invalid_local_part')
    expect(reasonFor('john..doe@example.com')).toBe('invalid_local_part')
    expect(reasonFor(`${'a'.repeat(65)}@example.com`)).toBe(
      'invalid_local_part',
    )
  })

  it('should reject malformed domains', () => {
    expect(reasonFor('john@localhost')).toBe('invalid_domain')
    expect(reasonFor('john@example.c0m')).toBe('invalid_domain')
    expect(reasonFor('john@-example.com')).toBe('invalid_domain')
    expect(reasonFor('john@example..com')).toBe('invalid_domain')
  })

  it('should return frozen outcomes', () => {
    expect(Object.isFrozen(validateEmailCandidate(candidate('a@b.co')))).toBe(
      true,
    )
  })
})

describe('isValidDomain', () => {
  it('should require a TLD of at least two letters', () => {
    expect(isValidDomain('example.io')).toBe(true)
    expect(isValidDomain('example.i')).toBe(false)
  })

  it('should reject labels longer than 63 characters', () => {
    expect(isValidDomain(`${'a'.repeat(64)}.com`)).toBe(false)
  })
})

describe('getEmailDomain', () => {
  it('should return the part after the last at sign', () => {
    expect(getEmailDomain('jane@example.com')).toBe('example.com')
  })
})
