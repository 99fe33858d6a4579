export type BuiltInContactKind = 'email' | 'phone'

/**
 * Kinds are open-ended: every registered rule contributes its own.
 */
export type ContactKind = BuiltInContactKind | (string & {})

export type CandidateSource = 'page' | 'osint'

export interface Candidate {
  kind: ContactKind
  raw: string
  source: CandidateSource
}

export interface ValidatedContact extends Candidate {
  isValid: true
  /** Display form, e.g. lower-cased email or international phone */
  normalized: string
  /** De-duplication key, e.g. lower-cased email or E.164 phone */
  key: string
}

export interface RejectedCandidate extends Candidate {
  isValid: false
  reason: string
}

export type ValidationOutcome = ValidatedContact | RejectedCandidate

/**
 * A contact kind: how to find candidates in text and how to judge them.
 * validate() must not throw; malformed input is a RejectedCandidate.
 */
export interface ContactRule {
  kind: ContactKind
  match: (text: string) => string[]
  validate: (candidate: Candidate) => ValidationOutcome
}
