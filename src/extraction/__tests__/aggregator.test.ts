import { describe, expect, it } from 'vitest'
import {
  aggregateContacts,
  getKindSummary,
  getUniqueValues,
} from '../aggregator.ts'
import { acceptCandidate, rejectCandidate } from '../outcome.ts'
import type { CandidateSource, ValidationOutcome } from '../types/contact.ts'

const email = (
  value: string,
  source: CandidateSource = 'page',
): ValidationOutcome =>
  acceptCandidate(
    { kind: 'email', raw: value, source },
    value.toLowerCase(),
    value.toLowerCase(),
  )

const phone = (normalized: string, key: string): ValidationOutcome =>
  acceptCandidate({ kind: 'phone', raw: normalized, source: 'page' }, normalized, key)

describe('aggregateContacts', () => {
  it('should keep the first-seen form of each key', () => {
    const aggregate = aggregateContacts([
      [email('b@example.com'), email('a@example.com'), email('B@example.com')],
    ])

    expect(getUniqueValues(aggregate, 'email')).toEqual([
      'b@example.com',
      'a@example.com',
    ])
    expect(getKindSummary(aggregate, 'email')).toMatchObject({
      found: 3,
      validated: 2,
    })
  })

  it('should merge sources and count every valid outcome', () => {
    const aggregate = aggregateContacts([
      [email('a@b.com', 'page')],
      [email('a@b.com', 'osint'), email('a@b.com', 'osint')],
    ])

    expect(getKindSummary(aggregate, 'email')).toEqual({
      contacts: [
        { normalized: 'a@b.com', key: 'a@b.com', sources: ['page', 'osint'] },
      ],
      found: 3,
      validated: 1,
    })
  })

  it('should de-duplicate by key even when display forms differ', () => {
    const aggregate = aggregateContacts([
      [
        phone('+1 415 555 0132', '+14155550132'),
        phone('+1 4155550132', '+14155550132'),
      ],
    ])

    expect(getUniqueValues(aggregate, 'phone')).toEqual(['+1 415 555 0132'])
  })

  it('should collect rejected outcomes separately', () => {
    const rejected = rejectCandidate(
      { kind: 'phone', raw: '12345', source: 'page' },
      'too_short',
    )
    const aggregate = aggregateContacts([[rejected, email('a@b.com')]])

    expect(aggregate.rejected).toEqual([rejected])
    expect(getKindSummary(aggregate, 'phone')).toEqual({
      contacts: [],
      found: 0,
      validated: 0,
    })
  })

  it('should return an empty aggregate for no input', () => {
    const aggregate = aggregateContacts([])

    expect(aggregate.kinds.size).toBe(0)
    expect(aggregate.rejected).toEqual([])
  })
})
