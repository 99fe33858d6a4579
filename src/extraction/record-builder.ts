import {
  type ContactAggregate,
  aggregateContacts,
  getKindSummary,
  getUniqueValues,
} from './aggregator.ts'
import { acceptCandidate } from './outcome.ts'
import type {
  ContactRecord,
  ContactRecordMetadata,
  ContactRow,
  RecordMetadataInput,
} from './types/contact-record.ts'
import type { ContactKind, ValidatedContact } from './types/contact.ts'

const orNull = (value: string | null | undefined): string | null => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : null
}

/**
 * Assembles the final record from already validated, de-duplicated contacts.
 * The timestamp is passed in so the output is fully determined by the inputs.
 */
export const buildContactRecord = (
  aggregate: ContactAggregate,
  input: RecordMetadataInput,
  extractedAt: Date,
): ContactRecord => {
  const emails = getUniqueValues(aggregate, 'email')
  const phones = getUniqueValues(aggregate, 'phone')

  const metadata: ContactRecordMetadata = {
    source_url: input.sourceUrl,
    name: orNull(input.name),
    title: orNull(input.title),
    company: orNull(input.company),
    location: orNull(input.location),
    extraction_timestamp: extractedAt.toISOString(),
    total_emails_found: getKindSummary(aggregate, 'email').found,
    total_phones_found: getKindSummary(aggregate, 'phone').found,
    validated_emails: emails.length,
    validated_phones: phones.length,
  }

  return Object.freeze({
    emails: Object.freeze(emails),
    phones: Object.freeze(phones),
    metadata: Object.freeze(metadata),
  })
}

/**
 * One row per contact, emails first, for tabular export.
 */
export const toContactRows = (record: ContactRecord): ContactRow[] => {
  const { source_url, name, title, company, location } = record.metadata
  const shared = { sourceUrl: source_url, name, title, company, location }

  return [
    ...record.emails.map((value) => ({ type: 'Email' as const, value, ...shared })),
    ...record.phones.map((value) => ({ type: 'Phone' as const, value, ...shared })),
  ]
}

const recordOutcomes = (record: ContactRecord): ValidatedContact[] => {
  const accept = (kind: ContactKind, value: string): ValidatedContact =>
    acceptCandidate({ kind, raw: value, source: 'page' }, value, value)

  return [
    ...record.emails.map((email) => accept('email', email)),
    ...record.phones.map((phone) => accept('phone', phone)),
  ]
}

/**
 * Unique contacts across several records, first-seen order. Values in a
 * record are already normalized, so the normalized form is the key.
 */
export const mergeRecordContacts = (
  records: readonly ContactRecord[],
): { emails: string[]; phones: string[] } => {
  const aggregate = aggregateContacts(records.map(recordOutcomes))
  return {
    emails: getUniqueValues(aggregate, 'email'),
    phones: getUniqueValues(aggregate, 'phone'),
  }
}
