import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { PageFetchError } from '../../plumbing/errors.ts'
import { detectSiteType, fetchPage, parseProfile } from '../page-fetcher.ts'

vi.mock('../../plumbing/logger.ts', () => ({
  log: vi.fn(),
}))

describe('detectSiteType', () => {
  it('should recognise professional networks and their subdomains', () => {
    expect(detectSiteType('https://www.linkedin.com/in/jane-roe')).toBe(
      'linkedin',
    )
    expect(detectSiteType('https://about.me/janeroe')).toBe('about_me')
    expect(detectSiteType('https://www.crunchbase.com/person/x')).toBe(
      'crunchbase',
    )
  })

  it('should fall back to general', () => {
    expect(detectSiteType('https://notlinkedin.com/in/x')).toBe('general')
    expect(detectSiteType('not a url')).toBe('general')
  })
})

describe('parseProfile', () => {
  it('should read title and site name from general pages', () => {
    const html = [
      '<html><head>',
      '<title> Example Co | Team </title>',
      '<meta property="og:site_name" content="Example Co">',
      '<meta name="description" content="Meet our team">',
      '</head><body><h1>Jane Roe</h1></body></html>',
    ].join('')

    expect(parseProfile('https://example.com/team', html)).toEqual({
      siteType: 'general',
      name: null,
      title: 'Example Co | Team',
      company: 'Example Co',
      location: null,
      description: 'Meet our team',
    })
  })

  it('should read the profile header of professional pages', () => {
    const html = [
      '<h1 class="text-heading-xlarge">Jane   Roe</h1>',
      '<div class="text-body-medium">Head of Research</div>',
      '<span class="text-body-small inline geo-region">Berlin, Germany</span>',
    ].join('')

    expect(parseProfile('https://www.linkedin.com/in/jane-roe', html)).toEqual({
      siteType: 'linkedin',
      name: 'Jane Roe',
      title: 'Head of Research',
      company: null,
      location: 'Berlin, Germany',
      description: null,
    })
  })
})

describe('fetchPage', () => {
  const fetchMock = vi.fn()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('should return the body and parsed profile', async () => {
    fetchMock.mockResolvedValue(
      new Response('<title>Contact</title><p>hi@example.com</p>', {
        status: 200,
      }),
    )

    const page = await fetchPage('https://example.com/contact', {
      timeoutMs: 500,
    })

    expect(page.url).toBe('https://example.com/contact')
    expect(page.html).toBe('<title>Contact</title><p>hi@example.com</p>')
    expect(page.profile.title).toBe('Contact')
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com/contact',
      expect.objectContaining({ redirect: 'follow' }),
    )
  })

  it('should fail on non-2xx responses', async () => {
    fetchMock.mockResolvedValue(
      new Response('missing', { status: 404, statusText: 'Not Found' }),
    )

    const failure = fetchPage('https://example.com', { timeoutMs: 500 })

    await expect(failure).rejects.toBeInstanceOf(PageFetchError)
    await expect(failure).rejects.toThrow(
      'Fetching https://example.com failed: 404 Not Found',
    )
  })

  it('should wrap network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'))

    await expect(
      fetchPage('https://example.com', { timeoutMs: 500 }),
    ).rejects.toThrow('Fetching https://example.com failed: fetch failed')
  })

  it('should report timeouts', async () => {
    fetchMock.mockRejectedValue(
      Object.assign(new Error('The operation was aborted'), {
        name: 'TimeoutError',
      }),
    )

    await expect(
      fetchPage('https://example.com', { timeoutMs: 500 }),
    ).rejects.toThrow('Fetching https://example.com timed out after 500ms')
  })
  it('should report a body that stalls past the timeout', async () => {
    fetchMock.mockResolvedValue({
      ok: true,
      status: 200,
      statusText: 'OK',
      text: vi.fn().mockRejectedValue(
        Object.assign(new Error('The operation was aborted'), {
          name: 'TimeoutError',
        }),
      ),
    })

    const failure = fetchPage('https://example.com', { timeoutMs: 200 })

    await expect(failure).rejects.toBeInstanceOf(PageFetchError)
    await expect(failure).rejects.toThrow(
      'Fetching https://example.com timed out after 200ms',
    )
  })

  it('should wrap a connection reset while reading the body', async () => {
    fetchMock.mockResolvedValue({
      ok: true,
      status: 200,
      statusText: 'OK',
      text: vi.fn().mockRejectedValue(new TypeError('terminated')),
    })

    await expect(
      fetchPage('https://example.com', { timeoutMs: 200 }),
    ).rejects.toThrow('Fetching https://example.com failed: terminated')
  })
})
