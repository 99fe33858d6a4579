import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  appendRecordToFile,
  recordToCsv,
  recordsToCsv,
  saveRecordToFile,
  saveRecordsToFile,
  serializeRecord,
  toEnvelope,
} from '../export.ts'
import { makeRecord } from './fixtures.ts'

describe('serializeRecord', () => {
  it('should write two-space indented JSON in record order', () => {
    const json = serializeRecord(makeRecord())

    expect(json.split('\n').slice(0, 4)).toEqual([
      '{',
      '  "emails": [',
      '    "jane@example.com"',
      '  ],',
    ])
    expect(JSON.parse(json)).toEqual(makeRecord())
  })
})

describe('recordToCsv', () => {
  it('should write one row per contact with quoted fields where needed', () => {
    expect(recordToCsv(makeRecord())).toBe(
      [
        'Type,Value,Source_URL,Name,Title,Company,Location',
        'Email,jane@example.com,https://example.com/team,Jane Roe,,"Example, Inc.",',
        'Phone,+1 415 555 0132,https://example.com/team,Jane Roe,,"Example, Inc.",',
      ].join('\n'),
    )
  })

  it('should write only the header for an empty record', () => {
    expect(recordToCsv(makeRecord({}, { emails: [], phones: [] }))).toBe(
      'Type,Value,Source_URL,Name,Title,Company,Location',
    )
  })
})

describe('recordsToCsv', () => {
  it('should write rows of every record under one header', () => {
    expect(
      recordsToCsv([
        makeRecord({}, { phones: [] }),
        makeRecord(
          { source_url: 'https://example.com/contact', name: null, company: null },
          { emails: ['ops@example.com'], phones: [] },
        ),
      ]),
    ).toBe(
      [
        'Type,Value,Source_URL,Name,Title,Company,Location',
        'Email,jane@example.com,https://example.com/team,Jane Roe,,"Example, Inc.",',
        'Email,ops@example.com,https://example.com/contact,,,,',
      ].join('\n'),
    )
  })
})

describe('toEnvelope', () => {
  it('should start, keep or wrap results', () => {
    expect(toEnvelope(undefined)).toEqual({ results: [] })
    expect(toEnvelope({ results: [1, 2] })).toEqual({ results: [1, 2] })
    expect(toEnvelope({ emails: [] })).toEqual({ results: [{ emails: [] }] })
  })
})

describe('record files', () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'recon-export-'))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it('should save a record as JSON', async () => {
    const path = join(directory, 'record.json')

    await saveRecordToFile(makeRecord(), path)

    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual(makeRecord())
  })

  it('should append records into a results envelope', async () => {
    const path = join(directory, 'results.json')

    expect(await appendRecordToFile(makeRecord({ name: 'First' }), path)).toBe(1)
    expect(await appendRecordToFile(makeRecord({ name: 'Second' }), path)).toBe(2)

    const saved = JSON.parse(await readFile(path, 'utf8'))
    expect(saved).toEqual({
      results: [makeRecord({ name: 'First' }), makeRecord({ name: 'Second' })],
    })
  })

  it('should wrap a file holding a single record before appending', async () => {
    const path = join(directory, 'single.json')
    await saveRecordToFile(makeRecord({ name: 'Existing' }), path)

    await appendRecordToFile(makeRecord({ name: 'New' }), path)

    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({
      results: [makeRecord({ name: 'Existing' }), makeRecord({ name: 'New' })],
    })
  })

  it('should save several records in an envelope that appends extend', async () => {
    const path = join(directory, 'batch.json')

    await saveRecordsToFile(
      [makeRecord({ name: 'First' }), makeRecord({ name: 'Second' })],
      path,
    )

    expect(await appendRecordToFile(makeRecord({ name: 'Third' }), path)).toBe(3)
  })

  it('should refuse to append to a file that is not JSON', async () => {
    const path = join(directory, 'broken.json')
    await writeFile(path, 'not json', 'utf8')

    await expect(appendRecordToFile(makeRecord(), path)).rejects.toThrow(
      `Cannot append to ${path}: file is not valid JSON`,
    )
  })
})
