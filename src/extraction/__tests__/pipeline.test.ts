import { resolveMx } from 'node:dns/promises'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { runExtraction, runExtractionWithDomainChecks } from '../pipeline.ts'

vi.mock('node:dns/promises', () => ({
  resolveMx: vi.fn(),
}))

const extractedAt = new Date('2026-03-01T12:00:00.000Z')
const metadata = { sourceUrl: 'https://example.com/team' }
const options = { defaultRegion: 'US' as const }

describe('runExtraction', () => {
  it('should extract one email and one phone from a sentence', () => {
    const { record } = runExtraction(
      {
        content: 'Contact John at john.doe@example.com or +1 (415) 555-0132',
        metadata,
        extractedAt,
      },
      options,
    )

    expect(record).toEqual({
      emails: ['john.doe@example.com'],
      phones: ['+1 415 555 0132'],
      metadata: {
        source_url: 'https://example.com/team',
        name: null,
        title: null,
        company: null,
        location: null,
        extraction_timestamp: '2026-03-01T12:00:00.000Z',
        total_emails_found: 1,
        total_phones_found: 1,
        validated_emails: 1,
        validated_phones: 1,
      },
    })
  })

  it('should return an empty record when nothing matches', () => {
    const { record, rejected } = runExtraction(
      { content: 'Hello world', metadata, extractedAt },
      options,
    )

    expect(record.emails).toEqual([])
    expect(record.phones).toEqual([])
    expect(record.metadata).toMatchObject({
      total_emails_found: 0,
      total_phones_found: 0,
      validated_emails: 0,
      validated_phones: 0,
    })
    expect(rejected).toEqual([])
  })

  it('should return an empty record for missing content', () => {
    const { record } = runExtraction({ metadata, extractedAt }, options)

    expect(record.emails).toEqual([])
    expect(record.metadata.source_url).toBe('https://example.com/team')
  })

  it('should count an address seen on the page and by OSINT once', () => {
    const { record, aggregate } = runExtraction(
      {
        content: 'Mail a@b.com',
        osintEmails: ['a@b.com', '  '],
        metadata,
        extractedAt,
      },
      options,
    )

    expect(record.emails).toEqual(['a@b.com'])
    expect(record.metadata.total_emails_found).toBe(2)
    expect(record.metadata.validated_emails).toBe(1)
    expect(aggregate.kinds.get('email')?.contacts[0]?.sources).toEqual([
      'page',
      'osint',
    ])
  })

  it('should accept OSINT addresses with no page content', () => {
    const { record } = runExtraction(
      { content: null, osintEmails: ['Info@Example.org'], metadata, extractedAt },
      options,
    )

    expect(record.emails).toEqual(['info@example.org'])
  })

  it('should reject short digit runs', () => {
    const { record, rejected } = runExtraction(
      { content: 'Order 12345 shipped', metadata, extractedAt },
      options,
    )

    expect(record.phones).toEqual([])
    expect(record.metadata.total_phones_found).toBe(0)
    expect(rejected).toEqual([
      {
        kind: 'phone',
        raw: '12345',
        source: 'page',
        isValid: false,
        reason: 'too_short',
      },
    ])
  })

  it('should treat addresses differing only in case as one', () => {
    const { record } = runExtraction(
      { content: 'A@B.com and a@b.com', metadata, extractedAt },
      options,
    )

    expect(record.emails).toEqual(['a@b.com'])
    expect(record.metadata.total_emails_found).toBe(2)
    expect(record.metadata.validated_emails).toBe(1)
  })

  it('should find contacts in HTML including mailto targets', () => {
    const { record } = runExtraction(
      {
        content:
          '<p>Reach us: <a href="mailto:sales@example.com">Email sales</a></p>',
        metadata,
        extractedAt,
      },
      options,
    )

    expect(record.emails).toEqual(['sales@example.com'])
    expect(record.metadata.total_emails_found).toBe(1)
  })

  it('should keep a number followed by a street number', () => {
    const { record, rejected } = runExtraction(
      { content: 'Tel +1 415 555 0132 100 Main St', metadata, extractedAt },
      options,
    )

    expect(record.phones).toEqual(['+1 415 555 0132'])
    expect(rejected).toEqual([])
  })

  it('should split two numbers separated by a space', () => {
    const { record } = runExtraction(
      { content: 'Phones: 415-555-0132 212-555-0199', metadata, extractedAt },
      options,
    )

    expect(record.phones).toEqual(['+1 415 555 0132', '+1 212 555 0199'])
    expect(record.metadata.total_phones_found).toBe(2)
  })

  it('should not join digits from neighbouring table cells', () => {
    const { record } = runExtraction(
      {
        content:
          '<table><tr><td>+1 415 555 0132</td><td>2024</td></tr></table>',
        metadata,
        extractedAt,
      },
      options,
    )

    expect(record.phones).toEqual(['+1 415 555 0132'])
  })

  it('should reject dates followed by a time', () => {
    const { record, rejected } = runExtraction(
      { content: 'Updated 2024-05-20 12:30', metadata, extractedAt },
      options,
    )

    expect(record.phones).toEqual([])
    expect(rejected).toEqual([
      {
        kind: 'phone',
        raw: '2024-05-20 12',
        source: 'page',
        isValid: false,
        reason: 'date_like',
      },
    ])
  })

  it('should not read digits inside an email address as a phone', () => {
    const { record, rejected } = runExtraction(
      { content: 'Write to jane.4155550132@example.com', metadata, extractedAt },
      options,
    )

    expect(record.emails).toEqual(['jane.4155550132@example.com'])
    expect(record.phones).toEqual([])
    expect(rejected).toEqual([])
  })
})

describe('runExtractionWithDomainChecks', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should look up each email domain once and leave the record alone', async () => {
    vi.mocked(resolveMx).mockResolvedValue([
      { exchange: 'mx.example.com', priority: 10 },
    ])

    const result = await runExtractionWithDomainChecks(
      {
        content: 'jane@example.com, joe@example.com',
        metadata,
        extractedAt,
      },
      { ...options, mxTimeoutMs: 1000 },
    )

    expect(result.record.emails).toEqual([
      'jane@example.com',
      'joe@example.com',
    ])
    expect(result.domainChecks).toEqual([
      { domain: 'example.com', status: 'mx_found' },
    ])
    expect(resolveMx).toHaveBeenCalledTimes(1)
  })

  it('should keep addresses whose domain has no mail exchanger', async () => {
    vi.mocked(resolveMx).mockResolvedValue([])

    const result = await runExtractionWithDomainChecks(
      { content: 'jane@example.com', metadata, extractedAt },
      { ...options, mxTimeoutMs: 1000 },
    )

    expect(result.record.emails).toEqual(['jane@example.com'])
    expect(result.domainChecks).toEqual([
      { domain: 'example.com', status: 'no_mx' },
    ])
  })
})
