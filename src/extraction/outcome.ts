import type {
  Candidate,
  RejectedCandidate,
  ValidatedContact,
} from './types/contact.ts'

export const acceptCandidate = (
  candidate: Candidate,
  normalized: string,
  key: string,
): ValidatedContact => {
  const contact: ValidatedContact = {
    kind: candidate.kind,
    raw: candidate.raw,
    source: candidate.source,
    isValid: true,
    normalized,
    key,
  }
  return Object.freeze(contact)
}

export const rejectCandidate = (
  candidate: Candidate,
  reason: string,
): RejectedCandidate => {
  const rejected: RejectedCandidate = {
    kind: candidate.kind,
    raw: candidate.raw,
    source: candidate.source,
    isValid: false,
    reason,
  }
  return Object.freeze(rejected)
}
