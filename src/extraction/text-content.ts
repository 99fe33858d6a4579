import * as cheerio from 'cheerio'

const HTML_TAG = /<(?:[a-z][a-z0-9-]*|!doctype|!--)[\s>/]/i

export const looksLikeHtml = (content: string): boolean =>
  HTML_TAG.test(content)

/**
 * Collapses spaces and tabs within each line and drops blank lines. Line
 * breaks are kept: the phone pattern never joins digits across them.
 */
export const collapseLines = (text: string): string =>
  text
    .split(/\r?\n/)
    .map((line) => line.replace(/[^\S\r\n]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n')

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value)
  } catch {
    // Malformed escapes: keep the literal value
    return value
  }
}

/**
 * Address behind a mailto: or tel: link, without query parameters.
 */
export const contactLinkTarget = (
  href: string | undefined,
): string | undefined => {
  if (!href) return undefined

  const match = href.trim().match(/^(mailto|tel):([^?#]*)/i)
  if (!match) return undefined

  const target = safeDecode(match[2]).trim()
  return target.length > 0 ? target : undefined
}

/**
 * Visible text of an HTML document plus the targets of mailto:/tel: links
 * that the visible text does not already show.
 */
export const htmlToText = (html: string): string => {
  // Text of adjacent elements lands on separate lines
  const $ = cheerio.load(html.replace(/></g, '>\n<'))

  const linkTargets: string[] = []
  $('a[href]').each((_, element) => {
    const target = contactLinkTarget($(element).attr('href'))
    if (target) {
      linkTargets.push(target)
    }
  })

  $('script, style, noscript, template').remove()
  const visible = collapseLines($.root().text())
  const lowerVisible = visible.toLowerCase()

  const hidden = linkTargets.filter(
    (target, index) =>
      !lowerVisible.includes(target.toLowerCase()) &&
      linkTargets.indexOf(target) === index,
  )

  return [visible, ...hidden].filter((part) => part.length > 0).join('\n')
}

/**
 * Text to run the pattern rules over: HTML is reduced to its text,
 * anything else is used as given.
 */
export const toSearchableText = (content: string | null | undefined): string => {
  if (!content || content.trim() === '') {
    return ''
  }

  return looksLikeHtml(content) ? htmlToText(content) : content
}
