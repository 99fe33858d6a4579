import * as cheerio from 'cheerio'
import { PageFetchError, errorMessage } from '../plumbing/errors.ts'
import { log } from '../plumbing/logger.ts'
import type { FetchedPage, PageProfile, SiteType } from './types/page.ts'

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36'

const PROFESSIONAL_SITES: ReadonlyArray<[SiteType, string]> = [
  ['linkedin', 'linkedin.com'],
  ['xing', 'xing.com'],
  ['viadeo', 'viadeo.com'],
  ['about_me', 'about.me'],
  ['angel_list', 'angel.co'],
  ['crunchbase', 'crunchbase.com'],
]

export const detectSiteType = (url: string): SiteType => {
  let host: string
  try {
    host = new URL(url).hostname.toLowerCase()
  } catch {
    return 'general'
  }

  const match = PROFESSIONAL_SITES.find(
    ([, domain]) => host === domain || host.endsWith(`.${domain}`),
  )
  return match ? match[0] : 'general'
}

const firstText = (
  $: cheerio.CheerioAPI,
  ...selectors: string[]
): string | null => {
  for (const selector of selectors) {
    const text = $(selector).first().text().replace(/\s+/g, ' ').trim()
    if (text) return text
  }
  return null
}

const metaContent = (
  $: cheerio.CheerioAPI,
  selector: string,
): string | null => {
  const content = $(selector).first().attr('content')?.trim()
  return content ? content : null
}

/**
 * Profile fields from a page. Professional-network pages are read from their
 * profile header; other sites fall back to document title and site name.
 */
export const parseProfile = (url: string, html: string): PageProfile => {
  const $ = cheerio.load(html)
  const siteType = detectSiteType(url)
  const description =
    metaContent($, 'meta[name="description"]') ??
    metaContent($, 'meta[property="og:description"]')

  if (siteType === 'general') {
    return {
      siteType,
      name: null,
      title: firstText($, 'title'),
      company: metaContent($, 'meta[property="og:site_name"]'),
      location: null,
      description,
    }
  }

  return {
    siteType,
    name: firstText($, 'h1.text-heading-xlarge', 'h1'),
    title: firstText($, 'div.text-body-medium'),
    company: firstText(
      $,
      '#experience-section .pv-entity__secondary-title',
      '[data-field="experience_company_logo"]',
    ),
    location: firstText(
      $,
      'span.text-body-small[class*="geo-region"]',
      '[class*="geo-region"]',
    ),
    description,
  }
}

const toFetchError = (
  url: string,
  error: unknown,
  timeoutMs: number,
): PageFetchError => {
  const isTimeout = error instanceof Error && error.name === 'TimeoutError'
  return new PageFetchError(
    isTimeout
      ? `Fetching ${url} timed out after ${timeoutMs}ms`
      : `Fetching ${url} failed: ${errorMessage(error)}`,
    { url },
  )
}

/**
 * Single GET with a timeout covering headers and body. No retries: a failed
 * fetch fails the run.
 */
export const fetchPage = async (
  url: string,
  options: { timeoutMs: number },
): Promise<FetchedPage> => {
  let response: Response
  try {
    response = await fetch(url, {
      headers: {
        'User-Agent': USER_AGENT,
        Accept: 'text/html,application/xhtml+xml',
      },
      redirect: 'follow',
      signal: AbortSignal.timeout(options.timeoutMs),
    })
  } catch (error) {
    throw toFetchError(url, error, options.timeoutMs)
  }

  if (!response.ok) {
    throw new PageFetchError(
      `Fetching ${url} failed: ${response.status} ${response.statusText}`,
      { url, status: response.status },
    )
  }

  let html: string
  try {
    html = await response.text()
  } catch (error) {
    throw toFetchError(url, error, options.timeoutMs)
  }

  log({
    message: 'Page fetched',
    url,
    status: response.status,
    bytes: html.length,
  })

  return { url, html, profile: parseProfile(url, html) }
}
