#!/usr/bin/env node
import 'dotenv/config'
import { readFile, writeFile } from 'node:fs/promises'
import { parseArgs } from 'node:util'
import { initializeDatabase, shutdownDatabase } from './database/client.ts'
import { errorMessage } from './plumbing/errors.ts'
import type { ContactRecord } from './extraction/types/contact-record.ts'
import {
  appendRecordToFile,
  recordsToCsv,
  saveRecordToFile,
  saveRecordsToFile,
} from './records/export.ts'
import { runBatchRecon, runRecon } from './records/service.ts'

const USAGE = [
  'Usage: recon <url> [<url>...] [options]',
  '  Several URLs run as a batch and print the combined contacts.',
  '  --content-file <path>  Read page content from a file instead of fetching',
  '                         (single URL only)',
  '  --harvest              Add emails reported by theHarvester for the domain',
  '  --out <path>           Write the record (or batch records) as JSON',
  '  --append               Append to the --out file instead of overwriting',
  '  --csv <path>           Write one CSV row per contact',
].join('\n')

const writeOutputs = async (
  records: ContactRecord[],
  options: { out?: string; append?: boolean; csv?: string },
): Promise<void> => {
  if (options.out) {
    if (options.append) {
      let count = 0
      for (const record of records) {
        count = await appendRecordToFile(record, options.out)
      }
      console.error(
        `Appended ${records.length} record(s) to ${options.out} (${count} total)`,
      )
    } else if (records.length === 1 && records[0]) {
      await saveRecordToFile(records[0], options.out)
      console.error(`Wrote record to ${options.out}`)
    } else {
      await saveRecordsToFile(records, options.out)
      console.error(`Wrote ${records.length} record(s) to ${options.out}`)
    }
  }

  if (options.csv) {
    await writeFile(options.csv, `${recordsToCsv(records)}\n`, 'utf8')
    console.error(`Wrote CSV to ${options.csv}`)
  }
}

const main = async (): Promise<void> => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      'content-file': { type: 'string' },
      harvest: { type: 'boolean', default: false },
      out: { type: 'string' },
      append: { type: 'boolean', default: false },
      csv: { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  })

  const [url] = positionals
  if (values.help || !url) {
    console.log(USAGE)
    process.exitCode = values.help ? 0 : 1
    return
  }

  const contentFile = values['content-file']
  if (contentFile !== undefined && positionals.length > 1) {
    console.error('--content-file takes a single URL')
    process.exitCode = 1
    return
  }

  const content =
    contentFile === undefined ? undefined : await readFile(contentFile, 'utf8')

  await initializeDatabase()
  try {
    let records: ContactRecord[]
    if (positionals.length > 1) {
      const batch = await runBatchRecon({
        urls: positionals,
        harvest: values.harvest,
      })
      console.log(JSON.stringify(batch, null, 2))
      records = batch.results.flatMap((entry) =>
        'record' in entry ? [entry.record] : [],
      )
    } else {
      const result = await runRecon({ url, content, harvest: values.harvest })
      console.log(JSON.stringify(result, null, 2))
      records = [result.record]
    }

    await writeOutputs(records, values)
  } finally {
    await shutdownDatabase()
  }
}

main().catch((error: unknown) => {
  console.error('Recon failed:', errorMessage(error))
  process.exitCode = 1
})
