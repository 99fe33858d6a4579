/**
 * Host of a URL without a leading "www.", or null when the input is not a URL.
 * Bare hosts such as "example.com" are accepted.
 */
export const extractDomainFromUrl = (url: string): string | null => {
  const trimmed = url.trim()
  if (trimmed === '') return null

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`

  try {
    const { hostname } = new URL(withScheme)
    if (!hostname.includes('.')) return null
    return hostname.replace(/^www\./i, '').toLowerCase()
  } catch {
    return null
  }
}
