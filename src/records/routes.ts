import { type Context, Hono } from 'hono'
import type { ContentfulStatusCode } from 'hono/utils/http-status'
import { ReconError, errorMessage } from '../plumbing/errors.ts'
import { log } from '../plumbing/logger.ts'
import { parseNumber } from '../plumbing/env.ts'
import { recordToCsv } from './export.ts'
import {
  getContactRecord,
  listContactRecordsForSource,
  runBatchRecon,
  runRecon,
} from './service.ts'
import type { BatchReconRequest, ReconRequest } from './types/record.ts'

const DEFAULT_SOURCE_LIMIT = 10

export const MAX_BATCH_URLS = 20

const OPTIONAL_TEXT_FIELDS = [
  'content',
  'name',
  'title',
  'company',
  'location',
] as const

const toStatus = (statusCode: number): ContentfulStatusCode => {
  switch (statusCode) {
    case 400:
      return 400
    case 502:
      return 502
    case 503:
      return 503
    case 504:
      return 504
    default:
      return 500
  }
}

/**
 * Returns the request or the message describing why the body is unusable.
 */
export const parseReconRequest = (body: unknown): ReconRequest | string => {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return 'Request body must be a JSON object'
  }

  const url = 'url' in body ? body.url : undefined
  if (typeof url !== 'string' || url.trim() === '') {
    return 'url is required'
  }

  const request: ReconRequest = { url: url.trim() }

  for (const field of OPTIONAL_TEXT_FIELDS) {
    const value: unknown = field in body ? Reflect.get(body, field) : undefined
    if (value === undefined || value === null) continue
    if (typeof value !== 'string') {
      return `${field} must be a string`
    }
    request[field] = value
  }

  const harvest = 'harvest' in body ? body.harvest : undefined
  if (harvest !== undefined && typeof harvest !== 'boolean') {
    return 'harvest must be a boolean'
  }
  request.harvest = harvest === true

  return request
}

/**
 * Returns the batch request or the message describing why the body is
 * unusable.
 */
export const parseBatchReconRequest = (
  body: unknown,
): BatchReconRequest | string => {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return 'Request body must be a JSON object'
  }

  const urls = 'urls' in body ? body.urls : undefined
  if (!Array.isArray(urls) || urls.length === 0) {
    return 'urls must be a non-empty array'
  }
  if (urls.length > MAX_BATCH_URLS) {
    return `urls must hold at most ${MAX_BATCH_URLS} entries`
  }

  const trimmed: string[] = []
  for (const url of urls) {
    if (typeof url !== 'string' || url.trim() === '') {
      return 'urls must contain only non-empty strings'
    }
    trimmed.push(url.trim())
  }

  const harvest = 'harvest' in body ? body.harvest : undefined
  if (harvest !== undefined && typeof harvest !== 'boolean') {
    return 'harvest must be a boolean'
  }

  return { urls: trimmed, harvest: harvest === true }
}

const readJson = async (c: Context): Promise<{ body: unknown } | null> => {
  try {
    return { body: await c.req.json() }
  } catch {
    return null
  }
}

const recon = new Hono()

/**
 * POST /recon
 * Run one reconnaissance pass and store the record
 */
recon.post('/', async (c) => {
  const parsed = await readJson(c)
  if (!parsed) {
    return c.json({ error: 'Request body must be valid JSON' }, 400)
  }

  const request = parseReconRequest(parsed.body)
  if (typeof request === 'string') {
    return c.json({ error: request }, 400)
  }

  try {
    const result = await runRecon(request)
    return c.json(
      { id: result.id, record: result.record, diagnostics: result.diagnostics },
      201,
    )
  } catch (error) {
    if (error instanceof ReconError) {
      return c.json(
        { error: error.message, code: error.code },
        toStatus(error.statusCode),
      )
    }
    log({ message: 'Recon failed', error: errorMessage(error) })
    return c.json({ error: 'Recon failed' }, 500)
  }
})

/**
 * POST /recon/batch
 * Scan several URLs in turn; failed URLs are reported per entry
 */
recon.post('/batch', async (c) => {
  const parsed = await readJson(c)
  if (!parsed) {
    return c.json({ error: 'Request body must be valid JSON' }, 400)
  }

  const request = parseBatchReconRequest(parsed.body)
  if (typeof request === 'string') {
    return c.json({ error: request }, 400)
  }

  try {
    return c.json(await runBatchRecon(request))
  } catch (error) {
    log({ message: 'Batch recon failed', error: errorMessage(error) })
    return c.json({ error: 'Batch recon failed' }, 500)
  }
})

/**
 * GET /recon?source_url=...&limit=...
 * Latest records for a source URL
 */
recon.get('/', async (c) => {
  const sourceUrl = c.req.query('source_url')
  if (!sourceUrl) {
    return c.json({ error: 'source_url is required' }, 400)
  }

  try {
    const limit = parseNumber(c.req.query('limit'), DEFAULT_SOURCE_LIMIT)
    const records = await listContactRecordsForSource(sourceUrl, limit)
    return c.json({
      results: records.map((stored) => ({
        id: stored.id,
        record: stored.record,
      })),
    })
  } catch (error) {
    log({ message: 'Record lookup failed', error: errorMessage(error) })
    return c.json({ error: 'Failed to retrieve records' }, 500)
  }
})

/**
 * GET /recon/:id
 */
recon.get('/:id', async (c) => {
  try {
    const stored = await getContactRecord(c.req.param('id'))
    if (!stored) {
      return c.json({ error: 'Record not found' }, 404)
    }
    return c.json({ id: stored.id, record: stored.record })
  } catch (error) {
    log({ message: 'Record lookup failed', error: errorMessage(error) })
    return c.json({ error: 'Failed to retrieve record' }, 500)
  }
})

/**
 * GET /recon/:id/csv
 */
recon.get('/:id/csv', async (c) => {
  try {
    const stored = await getContactRecord(c.req.param('id'))
    if (!stored) {
      return c.json({ error: 'Record not found' }, 404)
    }
    return c.text(recordToCsv(stored.record), 200, {
      'Content-Type': 'text/csv; charset=utf-8',
      'Content-Disposition': `attachment; filename="contacts-${stored.id}.csv"`,
    })
  } catch (error) {
    log({ message: 'Record lookup failed', error: errorMessage(error) })
    return c.json({ error: 'Failed to retrieve record' }, 500)
  }
})

export default recon
