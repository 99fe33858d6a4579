import type { CountryCode } from 'libphonenumber-js'
import { type ContactAggregate, aggregateContacts } from './aggregator.ts'
import { getEmailDomain } from './email-validation.ts'
import { matchCandidates, validateCandidates } from './matcher.ts'
import { type MxCheckResult, checkMailExchanger } from './mx-lookup.ts'
import { buildContactRecord } from './record-builder.ts'
import { createDefaultRules } from './rules.ts'
import { toSearchableText } from './text-content.ts'
import type {
  ContactRecord,
  RecordMetadataInput,
} from './types/contact-record.ts'
import type {
  Candidate,
  ContactRule,
  RejectedCandidate,
} from './types/contact.ts'

export interface ExtractionInput {
  /** Page HTML or already extracted text */
  content?: string | null
  /** Addresses reported by an OSINT tool for the same target */
  osintEmails?: readonly string[]
  metadata: RecordMetadataInput
  extractedAt: Date
}

export interface ExtractionOptions {
  defaultRegion: CountryCode
  /** Replaces the default email and phone rules */
  rules?: readonly ContactRule[]
}

export interface ExtractionResult {
  record: ContactRecord
  aggregate: ContactAggregate
  /** Matched strings that failed validation, for diagnostics only */
  rejected: readonly RejectedCandidate[]
}

export interface DomainCheckedExtractionResult extends ExtractionResult {
  domainChecks: MxCheckResult[]
}

const osintCandidates = (emails: readonly string[]): Candidate[] =>
  emails
    .map((email) => email.trim())
    .filter((email) => email.length > 0)
    .map((raw): Candidate => ({ kind: 'email', raw, source: 'osint' }))

/**
 * One synchronous pass: match, validate, aggregate, build.
 * Holds no state between calls.
 */
export const runExtraction = (
  input: ExtractionInput,
  options: ExtractionOptions,
): ExtractionResult => {
  const rules =
    options.rules ??
    createDefaultRules({ defaultRegion: options.defaultRegion })

  const pageOutcomes = validateCandidates(
    matchCandidates(toSearchableText(input.content), 'page', rules),
    rules,
  )
  const osintOutcomes = validateCandidates(
    osintCandidates(input.osintEmails ?? []),
    rules,
  )

  const aggregate = aggregateContacts([pageOutcomes, osintOutcomes])
  const record = buildContactRecord(
    aggregate,
    input.metadata,
    input.extractedAt,
  )

  return { record, aggregate, rejected: aggregate.rejected }
}

/**
 * runExtraction plus a mail-exchanger lookup per unique email domain.
 * Lookups run in parallel, each bounded by timeoutMs, and never alter the
 * record.
 */
export const runExtractionWithDomainChecks = async (
  input: ExtractionInput,
  options: ExtractionOptions & { mxTimeoutMs: number },
): Promise<DomainCheckedExtractionResult> => {
  const result = runExtraction(input, options)

  const domains = [...new Set(result.record.emails.map(getEmailDomain))]
  const domainChecks = await Promise.all(
    domains.map((domain) =>
      checkMailExchanger(domain, { timeoutMs: options.mxTimeoutMs }),
    ),
  )

  return { ...result, domainChecks }
}
