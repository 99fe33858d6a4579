import type { CountryCode } from 'libphonenumber-js'
import { validateEmailCandidate } from './email-validation.ts'
import { findEmailCandidates, findPhoneCandidates } from './patterns.ts'
import { splitPhoneRun, validatePhoneCandidate } from './phone-validation.ts'
import type { ContactKind, ContactRule } from './types/contact.ts'

export const createEmailRule = (): ContactRule => ({
  kind: 'email',
  match: findEmailCandidates,
  validate: validateEmailCandidate,
})

export const createPhoneRule = (options: {
  defaultRegion: CountryCode
}): ContactRule => ({
  kind: 'phone',
  match: (text) =>
    findPhoneCandidates(text).flatMap((run) =>
      splitPhoneRun(run, options.defaultRegion),
    ),
  validate: (candidate) => validatePhoneCandidate(candidate, options),
})

/**
 * Freezes a rule set, rejecting two rules for the same kind.
 */
export const defineRules = (
  ...rules: ContactRule[]
): readonly ContactRule[] => {
  const seen = new Set<ContactKind>()
  for (const rule of rules) {
    if (seen.has(rule.kind)) {
      throw new Error(`Duplicate contact rule for kind: ${rule.kind}`)
    }
    seen.add(rule.kind)
  }
  return Object.freeze([...rules])
}

export const createDefaultRules = (options: {
  defaultRegion: CountryCode
}): readonly ContactRule[] =>
  defineRules(createEmailRule(), createPhoneRule(options))

export const findRule = (
  rules: readonly ContactRule[],
  kind: ContactKind,
): ContactRule | undefined => rules.find((rule) => rule.kind === kind)
