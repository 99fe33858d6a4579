import type { ContactRecord } from '../../extraction/types/contact-record.ts'

export const makeRecord = (
  overrides: Partial<ContactRecord['metadata']> = {},
  contacts: { emails?: string[]; phones?: string[] } = {},
): ContactRecord => {
  const emails = contacts.emails ?? ['jane@example.com']
  const phones = contacts.phones ?? ['+1 415 555 0132']
  return {
    emails,
    phones,
    metadata: {
      source_url: 'https://example.com/team',
      name: 'Jane Roe',
      title: null,
      company: 'Example, Inc.',
      location: null,
      extraction_timestamp: '2026-03-01T12:00:00.000Z',
      total_emails_found: emails.length,
      total_phones_found: phones.length,
      validated_emails: emails.length,
      validated_phones: phones.length,
      ...overrides,
    },
  }
}
