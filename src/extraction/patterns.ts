/**
 * Candidate patterns. These over-match on purpose; the validators decide.
 */

/**
 * local@domain.tld, plus the "[at]" and "(at)" obfuscations.
 */
export const EMAIL_PATTERN =
  /\b[A-Za-z0-9._%+-]+(?:@|\s?[[(]at[\])]\s?)[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/gi

const EMAIL_OBFUSCATION = /\s?[[(]at[\])]\s?/i

/**
 * Optional "+" and opening parenthesis, then 5 or more digits joined by
 * at most two of: space, tab, dot, dash, parentheses. A run may hold several
 * numbers; the phone rule splits it. Digits inside a word or an email
 * address never start or end a run.
 */
export const PHONE_PATTERN =
  /(?<![\w.@])(?:\+\s?)?\(?\d(?:[ \t.()-]{0,2}\d){4,}(?![\w@])/g

export const findEmailCandidates = (text: string): string[] =>
  Array.from(text.matchAll(EMAIL_PATTERN), (match) =>
    match[0].replace(EMAIL_OBFUSCATION, '@'),
  )

export const findPhoneCandidates = (text: string): string[] =>
  Array.from(text.matchAll(PHONE_PATTERN), (match) => match[0])
