import { randomUUID } from 'node:crypto'
import { getReconConfig } from '../config/recon-config.ts'
import {
  type ExtractionInput,
  runExtraction,
  runExtractionWithDomainChecks,
} from '../extraction/pipeline.ts'
import { mergeRecordContacts } from '../extraction/record-builder.ts'
import { looksLikeHtml } from '../extraction/text-content.ts'
import type { ContactRecord } from '../extraction/types/contact-record.ts'
import { fetchPage, parseProfile } from '../fetching/page-fetcher.ts'
import type { PageProfile } from '../fetching/types/page.ts'
import { extractDomainFromUrl } from '../osint/domain.ts'
import { createHarvesterSource } from '../osint/harvester.ts'
import type { OsintSource } from '../osint/types/osint-source.ts'
import {
  InvalidReconRequestError,
  ReconError,
  RecordStorageError,
  errorMessage,
} from '../plumbing/errors.ts'
import { logReconEvent } from '../plumbing/recon-log.ts'
import {
  findContactRecordById,
  findContactRecordsBySource,
  saveContactRecord,
} from './storage.ts'
import type {
  BatchReconEntry,
  BatchReconRequest,
  BatchReconResult,
  OsintDiagnostics,
  ReconDiagnostics,
  ReconRequest,
  ReconResult,
  StoredContactRecord,
} from './types/record.ts'

const MAX_SOURCE_RESULTS = 100

const assertHttpUrl = (url: string): void => {
  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    throw new InvalidReconRequestError(`Invalid URL: ${url}`, { url })
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new InvalidReconRequestError(
      `Unsupported URL scheme: ${parsed.protocol}`,
      { url },
    )
  }
}

/**
 * Supplied content is used as-is; profile fields are read from it only when
 * it is HTML. Without content the page is fetched.
 */
const loadPage = async (
  request: ReconRequest,
  fetchTimeoutMs: number,
): Promise<{ content: string; profile: PageProfile | null }> => {
  if (request.content !== undefined) {
    return {
      content: request.content,
      profile: looksLikeHtml(request.content)
        ? parseProfile(request.url, request.content)
        : null,
    }
  }

  const page = await fetchPage(request.url, { timeoutMs: fetchTimeoutMs })
  return { content: page.html, profile: page.profile }
}

const osintFailed = (
  tool: string,
  target: string,
  reason: string,
): OsintDiagnostics => {
  logReconEvent({ event: 'osint_failed', tool, target, reason })
  return { tool, target, emails: [], hosts: [], ips: [], error: reason }
}

/**
 * OSINT results only add candidates; a failed tool never fails the run.
 */
const collectOsint = async (
  source: OsintSource,
  url: string,
): Promise<OsintDiagnostics> => {
  const domain = extractDomainFromUrl(url)
  if (!domain) {
    return osintFailed(source.name, url, 'No domain in URL')
  }

  try {
    const report = await source.collect(domain)
    return { tool: source.name, target: domain, ...report }
  } catch (error) {
    return osintFailed(source.name, domain, errorMessage(error))
  }
}

/**
 * A caller-supplied field wins unless it is blank.
 */
const pickField = (
  supplied: string | undefined,
  parsed: string | null | undefined,
): string | null | undefined => (supplied?.trim() ? supplied : parsed)

export const runRecon = async (request: ReconRequest): Promise<ReconResult> => {
  assertHttpUrl(request.url)
  const config = getReconConfig()

  const { content, profile } = await loadPage(request, config.fetchTimeoutMs)

  const osint = request.harvest
    ? await collectOsint(
        createHarvesterSource({
          binaryPath: config.harvesterPath,
          timeoutMs: config.harvesterTimeoutMs,
          sources: config.harvesterSources,
        }),
        request.url,
      )
    : undefined

  const input: ExtractionInput = {
    content,
    osintEmails: osint?.emails ?? [],
    metadata: {
      sourceUrl: request.url,
      name: pickField(request.name, profile?.name),
      title: pickField(request.title, profile?.title),
      company: pickField(request.company, profile?.company),
      location: pickField(request.location, profile?.location),
    },
    extractedAt: new Date(),
  }

  const result = config.isMxCheckEnabled
    ? await runExtractionWithDomainChecks(input, {
        defaultRegion: config.defaultRegion,
        mxTimeoutMs: config.mxTimeoutMs,
      })
    : runExtraction(input, { defaultRegion: config.defaultRegion })

  const id = randomUUID()
  try {
    await saveContactRecord(id, result.record)
  } catch (error) {
    throw new RecordStorageError(
      `Failed to store contact record: ${errorMessage(error)}`,
      { recordId: id },
    )
  }

  logReconEvent({
    event: 'recon_completed',
    source_url: request.url,
    emails: result.record.emails.length,
    phones: result.record.phones.length,
    rejected: result.rejected.length,
  })

  const diagnostics: ReconDiagnostics = {
    rejected: result.rejected,
    profile,
  }
  if ('domainChecks' in result) {
    diagnostics.domainChecks = result.domainChecks
  }
  if (osint) {
    diagnostics.osint = osint
  }

  return { id, record: result.record, diagnostics }
}

/**
 * Runs each URL in turn, pausing between pages. A URL that fails with a
 * ReconError is reported in its entry and the batch goes on; the combined
 * contacts cover the pages that succeeded.
 */
export const runBatchRecon = async (
  request: BatchReconRequest,
): Promise<BatchReconResult> => {
  const { batchDelayMs } = getReconConfig()
  const results: BatchReconEntry[] = []
  const records: ContactRecord[] = []

  for (const [index, url] of request.urls.entries()) {
    if (index > 0 && batchDelayMs > 0) {
      await new Promise((resolve) => {
        setTimeout(resolve, batchDelayMs)
      })
    }

    try {
      const { id, record } = await runRecon({ url, harvest: request.harvest })
      results.push({ url, id, record })
      records.push(record)
    } catch (error) {
      if (!(error instanceof ReconError)) {
        throw error
      }
      results.push({ url, error: error.message, code: error.code })
    }
  }

  logReconEvent({
    event: 'batch_completed',
    urls: request.urls.length,
    succeeded: records.length,
    failed: request.urls.length - records.length,
  })

  return {
    urls_scanned: request.urls.length,
    results,
    combined_contacts: mergeRecordContacts(records),
  }
}

export const getContactRecord = async (
  id: string,
): Promise<StoredContactRecord | null> => findContactRecordById(id)

export const listContactRecordsForSource = async (
  sourceUrl: string,
  limit: number,
): Promise<StoredContactRecord[]> =>
  findContactRecordsBySource(
    sourceUrl,
    Math.min(Math.max(1, Math.floor(limit)), MAX_SOURCE_RESULTS),
  )
