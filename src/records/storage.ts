import type { Client, types } from 'cassandra-driver'
import { getDatabaseClient, isDatabaseEnabledForEnv } from '../database/client.ts'
import { getDatabaseConfig } from '../database/config.ts'
import type { ContactRecord } from '../extraction/types/contact-record.ts'
import { logReconEvent } from '../plumbing/recon-log.ts'
import type { StoredContactRecord } from './types/record.ts'

const getDbClient = (): Client => getDatabaseClient()
const getKeyspace = (): string => getDatabaseConfig().keyspace

/**
 * Used when ScyllaDB is disabled (tests, SCYLLA_DISABLED=true). Holds at most
 * MAX_MEMORY_RECORDS; the oldest record is dropped to make room.
 */
const memoryStore = new Map<string, StoredContactRecord>()

export const MAX_MEMORY_RECORDS = 1_000

const rememberRecord = (stored: StoredContactRecord): void => {
  memoryStore.delete(stored.id)
  memoryStore.set(stored.id, stored)

  for (const id of memoryStore.keys()) {
    if (memoryStore.size <= MAX_MEMORY_RECORDS) break
    memoryStore.delete(id)
  }
}

export const asString = (value: unknown): string | null =>
  typeof value === 'string' ? value : null

/**
 * Empty CQL collections come back as null.
 */
export const asStringList = (value: unknown): string[] =>
  Array.isArray(value)
    ? value.filter((entry): entry is string => typeof entry === 'string')
    : []

const asCount = (value: unknown): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : 0

const asDate = (value: unknown): Date =>
  value instanceof Date ? value : new Date(0)

const mapRowToStoredRecord = (row: types.Row): StoredContactRecord => {
  const record: ContactRecord = {
    emails: asStringList(row.emails),
    phones: asStringList(row.phones),
    metadata: {
      source_url: asString(row.source_url) ?? '',
      name: asString(row.name),
      title: asString(row.title),
      company: asString(row.company),
      location: asString(row.location),
      extraction_timestamp: asDate(row.extraction_timestamp).toISOString(),
      total_emails_found: asCount(row.total_emails_found),
      total_phones_found: asCount(row.total_phones_found),
      validated_emails: asCount(row.validated_emails),
      validated_phones: asCount(row.validated_phones),
    },
  }

  return {
    id: String(row.record_id),
    record,
    createdAt: asDate(row.created_at),
  }
}

/**
 * Writes the record row and its by-source lookup row in one logged batch.
 */
export const insertContactRecord = async (
  stored: StoredContactRecord,
): Promise<void> => {
  const client = getDbClient()
  const keyspace = getKeyspace()
  const { record } = stored
  const extractedAt = new Date(record.metadata.extraction_timestamp)

  await client.batch(
    [
      {
        query: `INSERT INTO ${keyspace}.contact_records
     (record_id, source_url, name, title, company, location, emails, phones, extraction_timestamp,
      total_emails_found, total_phones_found, validated_emails, validated_phones, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        params: [
          stored.id,
          record.metadata.source_url,
          record.metadata.name,
          record.metadata.title,
          record.metadata.company,
          record.metadata.location,
          [...record.emails],
          [...record.phones],
          extractedAt,
          record.metadata.total_emails_found,
          record.metadata.total_phones_found,
          record.metadata.validated_emails,
          record.metadata.validated_phones,
          stored.createdAt,
        ],
      },
      {
        query: `INSERT INTO ${keyspace}.contact_records_by_source (source_url, extraction_timestamp, record_id)
     VALUES (?, ?, ?)`,
        params: [record.metadata.source_url, extractedAt, stored.id],
      },
    ],
    { prepare: true },
  )
}

export const saveContactRecord = async (
  id: string,
  record: ContactRecord,
): Promise<StoredContactRecord> => {
  const stored: StoredContactRecord = { id, record, createdAt: new Date() }

  if (isDatabaseEnabledForEnv()) {
    await insertContactRecord(stored)
  } else {
    rememberRecord(stored)
  }

  logReconEvent({
    event: 'record_persisted',
    record_id: id,
    store: isDatabaseEnabledForEnv() ? 'scylla' : 'memory',
  })

  return stored
}

export const findContactRecordById = async (
  id: string,
): Promise<StoredContactRecord | null> => {
  if (!isDatabaseEnabledForEnv()) {
    return memoryStore.get(id) ?? null
  }

  const client = getDbClient()
  const keyspace = getKeyspace()

  const result = await client.execute(
    `SELECT * FROM ${keyspace}.contact_records WHERE record_id = ?`,
    [id],
    { prepare: true },
  )

  const [row] = result.rows
  return row ? mapRowToStoredRecord(row) : null
}

/**
 * Newest first by extraction time.
 */
export const findContactRecordsBySource = async (
  sourceUrl: string,
  limit: number,
): Promise<StoredContactRecord[]> => {
  if (!isDatabaseEnabledForEnv()) {
    return [...memoryStore.values()]
      .filter((stored) => stored.record.metadata.source_url === sourceUrl)
      .sort((a, b) =>
        b.record.metadata.extraction_timestamp.localeCompare(
          a.record.metadata.extraction_timestamp,
        ),
      )
      .slice(0, limit)
  }

  const client = getDbClient()
  const keyspace = getKeyspace()

  const lookup = await client.execute(
    `SELECT record_id FROM ${keyspace}.contact_records_by_source WHERE source_url = ? LIMIT ?`,
    [sourceUrl, limit],
    { prepare: true },
  )

  const records = await Promise.all(
    lookup.rows.map((row) => findContactRecordById(String(row.record_id))),
  )

  return records.filter(
    (stored): stored is StoredContactRecord => stored !== null,
  )
}

export const clearMemoryStore = (): void => {
  memoryStore.clear()
}
