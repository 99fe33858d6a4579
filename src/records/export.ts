import { readFile, writeFile } from 'node:fs/promises'
import Papa from 'papaparse'
import { toContactRows } from '../extraction/record-builder.ts'
import type { ContactRecord } from '../extraction/types/contact-record.ts'

const CSV_FIELDS = [
  'Type',
  'Value',
  'Source_URL',
  'Name',
  'Title',
  'Company',
  'Location',
]

export interface RecordFileEnvelope {
  results: unknown[]
}

export const serializeRecord = (record: ContactRecord): string =>
  JSON.stringify(record, null, 2)

/**
 * One row per contact of every record, under a single header; null
 * metadata becomes an empty cell.
 */
export const recordsToCsv = (records: readonly ContactRecord[]): string =>
  Papa.unparse(
    {
      fields: CSV_FIELDS,
      data: records.flatMap(toContactRows).map((row) => [
        row.type,
        row.value,
        row.sourceUrl,
        row.name ?? '',
        row.title ?? '',
        row.company ?? '',
        row.location ?? '',
      ]),
    },
    { newline: '\n' },
  )

export const recordToCsv = (record: ContactRecord): string =>
  recordsToCsv([record])

export const saveRecordToFile = async (
  record: ContactRecord,
  path: string,
): Promise<void> => {
  await writeFile(path, `${serializeRecord(record)}\n`, 'utf8')
}

/**
 * Writes the records in the same envelope appendRecordToFile extends.
 */
export const saveRecordsToFile = async (
  records: readonly ContactRecord[],
  path: string,
): Promise<void> => {
  const envelope: RecordFileEnvelope = { results: [...records] }
  await writeFile(path, `${JSON.stringify(envelope, null, 2)}\n`, 'utf8')
}

const isEnvelope = (value: unknown): value is RecordFileEnvelope =>
  typeof value === 'object' &&
  value !== null &&
  'results' in value &&
  Array.isArray(value.results)

/**
 * Existing results are kept; a file holding a single record is wrapped
 * first. A missing file starts a new envelope.
 */
export const toEnvelope = (existing: unknown): RecordFileEnvelope => {
  if (existing === undefined) {
    return { results: [] }
  }
  if (isEnvelope(existing)) {
    return { results: [...existing.results] }
  }
  return { results: [existing] }
}

const readExisting = async (path: string): Promise<unknown> => {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined
    }
    throw error
  }

  if (raw.trim() === '') {
    return undefined
  }

  try {
    return JSON.parse(raw)
  } catch {
    throw new Error(`Cannot append to ${path}: file is not valid JSON`)
  }
}

export const appendRecordToFile = async (
  record: ContactRecord,
  path: string,
): Promise<number> => {
  const envelope = toEnvelope(await readExisting(path))
  envelope.results.push(record)
  await writeFile(path, `${JSON.stringify(envelope, null, 2)}\n`, 'utf8')
  return envelope.results.length
}
