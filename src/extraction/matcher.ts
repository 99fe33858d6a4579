import { rejectCandidate } from './outcome.ts'
import { findRule } from './rules.ts'
import type {
  Candidate,
  CandidateSource,
  ContactRule,
  ValidationOutcome,
} from './types/contact.ts'

/**
 * Runs every rule over the text, in rule order then text order.
 * Duplicates and false positives are kept for the validators.
 */
export const matchCandidates = (
  text: string,
  source: CandidateSource,
  rules: readonly ContactRule[],
): Candidate[] => {
  if (text.trim() === '') {
    return []
  }

  return rules.flatMap((rule) =>
    rule.match(text).map((raw) => ({ kind: rule.kind, raw, source })),
  )
}

export const validateCandidates = (
  candidates: readonly Candidate[],
  rules: readonly ContactRule[],
): ValidationOutcome[] =>
  candidates.map((candidate) => {
    const rule = findRule(rules, candidate.kind)
    if (!rule) {
      return rejectCandidate(candidate, 'unknown_kind')
    }
    return rule.validate(candidate)
  })
