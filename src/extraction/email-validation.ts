import { acceptCandidate, rejectCandidate } from './outcome.ts'
import type { Candidate, ValidationOutcome } from './types/contact.ts'

export const MAX_EMAIL_LENGTH = 254
export const MAX_LOCAL_PART_LENGTH = 64
export const MAX_DOMAIN_LENGTH = 253
export const MAX_LABEL_LENGTH = 63

// dot-atom: no leading, trailing or consecutive dots
const LOCAL_PART_PATTERN =
  /^[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+(?:\.[A-Za-z0-9!#$%&'*+/=?^_`{|}~-]+)*$/

const LABEL_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/

const TLD_PATTERN = /^[A-Za-z]{2,}$/

export const isValidLocalPart = (localPart: string): boolean =>
  localPart.length > 0 &&
  localPart.length <= MAX_LOCAL_PART_LENGTH &&
  LOCAL_PART_PATTERN.test(localPart)

export const isValidDomain = (domain: string): boolean => {
  if (domain.length === 0 || domain.length > MAX_DOMAIN_LENGTH) {
    return false
  }

  const labels = domain.split('.')
  if (labels.length < 2) {
    return false
  }

  const tld = labels[labels.length - 1]
  if (!TLD_PATTERN.test(tld)) {
    return false
  }

  return labels.every(
    (label) => label.length <= MAX_LABEL_LENGTH && LABEL_PATTERN.test(label),
  )
}

export const normalizeEmail = (email: string): string =>
  email.trim().toLowerCase()

/**
 * Syntactic email validation. Deliverability is a separate, optional check
 * (see mx-lookup.ts) and never affects the outcome here.
 */
export const validateEmailCandidate = (
  candidate: Candidate,
): ValidationOutcome => {
  const value = candidate.raw.trim()

  const atIndex = value.lastIndexOf('@')
  if (atIndex === -1) {
    return rejectCandidate(candidate, 'missing_at_sign')
  }

  if (value.length > MAX_EMAIL_LENGTH) {
    return rejectCandidate(candidate, 'too_long')
  }

  const localPart = value.slice(0, atIndex)
  const domain = value.slice(atIndex + 1)

  if (!isValidLocalPart(localPart)) {
    return rejectCandidate(candidate, 'invalid_local_part')
  }

  if (!isValidDomain(domain)) {
    return rejectCandidate(candidate, 'invalid_domain')
  }

  const normalized = normalizeEmail(value)
  return acceptCandidate(candidate, normalized, normalized)
}

export const getEmailDomain = (email: string): string =>
  email.slice(email.lastIndexOf('@') + 1)
