import type {
  CandidateSource,
  ContactKind,
  RejectedCandidate,
  ValidationOutcome,
} from './types/contact.ts'

export interface AggregatedContact {
  normalized: string
  key: string
  /** Every source the contact was seen in, first-seen order */
  sources: readonly CandidateSource[]
}

export interface KindSummary {
  contacts: readonly AggregatedContact[]
  /** Valid contacts before de-duplication */
  found: number
  /** Unique valid contacts */
  validated: number
}

export interface ContactAggregate {
  kinds: ReadonlyMap<ContactKind, KindSummary>
  rejected: readonly RejectedCandidate[]
}

const EMPTY_SUMMARY: KindSummary = Object.freeze({
  contacts: Object.freeze([]),
  found: 0,
  validated: 0,
})

interface KindAccumulator {
  byKey: Map<string, { normalized: string; key: string; sources: CandidateSource[] }>
  found: number
}

/**
 * Merges validation outcomes from any number of sources into one unique,
 * first-seen-ordered set per kind. Provenance never changes the counts.
 */
export const aggregateContacts = (
  streams: readonly (readonly ValidationOutcome[])[],
): ContactAggregate => {
  const accumulators = new Map<ContactKind, KindAccumulator>()
  const rejected: RejectedCandidate[] = []

  for (const stream of streams) {
    for (const outcome of stream) {
      if (!outcome.isValid) {
        rejected.push(outcome)
        continue
      }

      let accumulator = accumulators.get(outcome.kind)
      if (!accumulator) {
        accumulator = { byKey: new Map(), found: 0 }
        accumulators.set(outcome.kind, accumulator)
      }

      accumulator.found += 1

      const existing = accumulator.byKey.get(outcome.key)
      if (!existing) {
        accumulator.byKey.set(outcome.key, {
          normalized: outcome.normalized,
          key: outcome.key,
          sources: [outcome.source],
        })
      } else if (!existing.sources.includes(outcome.source)) {
        existing.sources.push(outcome.source)
      }
    }
  }

  const kinds = new Map<ContactKind, KindSummary>()
  for (const [kind, accumulator] of accumulators) {
    const contacts = Array.from(accumulator.byKey.values(), (contact) =>
      Object.freeze({
        normalized: contact.normalized,
        key: contact.key,
        sources: Object.freeze([...contact.sources]),
      }),
    )
    kinds.set(
      kind,
      Object.freeze({
        contacts: Object.freeze(contacts),
        found: accumulator.found,
        validated: contacts.length,
      }),
    )
  }

  return {
    kinds,
    rejected: Object.freeze(rejected),
  }
}

export const getKindSummary = (
  aggregate: ContactAggregate,
  kind: ContactKind,
): KindSummary => aggregate.kinds.get(kind) ?? EMPTY_SUMMARY

export const getUniqueValues = (
  aggregate: ContactAggregate,
  kind: ContactKind,
): string[] =>
  getKindSummary(aggregate, kind).contacts.map((contact) => contact.normalized)
