import {
  type CountryCode,
  type PhoneNumber,
  parsePhoneNumberFromString,
} from 'libphonenumber-js'
import { acceptCandidate, rejectCandidate } from './outcome.ts'
import type { Candidate, ValidationOutcome } from './types/contact.ts'

export const MIN_PHONE_DIGITS = 7
export const MAX_PHONE_DIGITS = 15

export interface PhoneValidationOptions {
  /** Used only when the number carries no "+<country>" prefix */
  defaultRegion: CountryCode
}

export const countSignificantDigits = (value: string): number =>
  value.replace(/\D/g, '').length

const GROUP_BREAK = /[ \t]+/

// 2024-05-20, 2024.05.20, 20/05/2024, 5-20-24
const DATE_GROUP =
  /^(?:\d{4}[-./]\d{1,2}[-./]\d{1,2}|\d{1,2}[-./]\d{1,2}[-./](?:\d{2}|\d{4}))$/

/**
 * True when any whitespace-separated group of the value is shaped like a
 * calendar date.
 */
export const containsDateGroup = (value: string): boolean =>
  value
    .trim()
    .split(GROUP_BREAK)
    .some((group) => DATE_GROUP.test(group))

/**
 * The parsed number, or the reason the value is not a dialable number.
 */
const parseDialable = (
  value: string,
  defaultRegion: CountryCode,
): PhoneNumber | string => {
  const digitCount = countSignificantDigits(value)

  if (digitCount < MIN_PHONE_DIGITS) {
    return 'too_short'
  }

  if (digitCount > MAX_PHONE_DIGITS) {
    return 'too_long'
  }

  if (containsDateGroup(value)) {
    return 'date_like'
  }

  const parsed = parsePhoneNumberFromString(value, defaultRegion)
  if (!parsed || !parsed.isValid()) {
    return 'invalid_number'
  }

  return parsed
}

/**
 * Parses against the numbering plan of the number's own country code, or
 * the default region when it has none. Normalized form is the international
 * display format ("+1 415 555 0132"); the key is E.164 ("+14155550132").
 */
export const validatePhoneCandidate = (
  candidate: Candidate,
  options: PhoneValidationOptions,
): ValidationOutcome => {
  const parsed = parseDialable(candidate.raw.trim(), options.defaultRegion)
  if (typeof parsed === 'string') {
    return rejectCandidate(candidate, parsed)
  }

  return acceptCandidate(candidate, parsed.formatInternational(), parsed.number)
}

/**
 * Splits a matched digit run at whitespace into the dialable numbers it
 * holds, taking the longest number from each starting group. Groups that
 * belong to no number are dropped. A run holding no number comes back
 * whole so that the validator reports why.
 */
export const splitPhoneRun = (
  run: string,
  defaultRegion: CountryCode,
): string[] => {
  const groups = run.trim().split(GROUP_BREAK)
  const numbers: string[] = []

  let start = 0
  while (start < groups.length) {
    let end = groups.length
    while (
      end > start &&
      typeof parseDialable(groups.slice(start, end).join(' '), defaultRegion) ===
        'string'
    ) {
      end -= 1
    }

    if (end > start) {
      numbers.push(groups.slice(start, end).join(' '))
      start = end
    } else {
      start += 1
    }
  }

  return numbers.length > 0 ? numbers : [run]
}

/**
 * Re-normalizes an already formatted number; undefined when it does not parse.
 */
export const normalizePhone = (
  value: string,
  defaultRegion: CountryCode,
): string | undefined => {
  const parsed = parsePhoneNumberFromString(value, defaultRegion)
  return parsed?.isValid() ? parsed.formatInternational() : undefined
}
