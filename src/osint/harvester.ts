import { type ExecFileException, execFile } from 'node:child_process'
import { readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { nanoid } from 'nanoid'
import {
  ToolTimeoutError,
  ToolUnavailableError,
  errorMessage,
} from '../plumbing/errors.ts'
import { log } from '../plumbing/logger.ts'
import type {
  HarvesterConfig,
  OsintReport,
  OsintSource,
} from './types/osint-source.ts'

export const HARVESTER_TOOL_NAME = 'theHarvester'

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024

export const buildHarvesterArgs = (
  domain: string,
  outputBase: string,
  sources: string[],
): string[] => [
  '-d',
  domain,
  '-f',
  outputBase,
  ...sources.flatMap((source) => ['-b', source]),
]

const toFailure = (
  error: ExecFileException,
  stderr: string,
  config: HarvesterConfig,
): ToolUnavailableError | ToolTimeoutError => {
  if (error.killed || error.signal === 'SIGTERM') {
    return new ToolTimeoutError(
      `${HARVESTER_TOOL_NAME} timed out after ${config.timeoutMs}ms`,
      { timeoutMs: config.timeoutMs },
    )
  }

  if (error.code === 'ENOENT') {
    return new ToolUnavailableError(
      `${HARVESTER_TOOL_NAME} not found at ${config.binaryPath}`,
      { binaryPath: config.binaryPath },
    )
  }

  const detail = stderr.trim() || error.message
  return new ToolUnavailableError(
    `${HARVESTER_TOOL_NAME} failed: ${detail}`,
    { exitCode: error.code },
  )
}

const runHarvester = (
  args: string[],
  config: HarvesterConfig,
): Promise<void> =>
  new Promise((resolve, reject) => {
    execFile(
      config.binaryPath,
      args,
      { timeout: config.timeoutMs, maxBuffer: MAX_OUTPUT_BYTES },
      (error, _stdout, stderr) => {
        if (error) {
          reject(toFailure(error, String(stderr), config))
          return
        }
        resolve()
      },
    )
  })

const stringList = (value: unknown): string[] => {
  if (!Array.isArray(value)) return []
  const strings = value.filter(
    (entry): entry is string => typeof entry === 'string',
  )
  return [...new Set(strings.map((entry) => entry.trim()))].filter(
    (entry) => entry.length > 0,
  )
}

/**
 * Reads theHarvester's JSON report. Missing sections become empty lists.
 */
export const parseHarvesterReport = (raw: string): OsintReport => {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new ToolUnavailableError(
      `${HARVESTER_TOOL_NAME} produced unreadable output`,
      { error: errorMessage(error) },
    )
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new ToolUnavailableError(
      `${HARVESTER_TOOL_NAME} produced unexpected output`,
    )
  }

  return {
    emails: stringList('emails' in data ? data.emails : undefined),
    hosts: stringList('hosts' in data ? data.hosts : undefined),
    ips: stringList('ips' in data ? data.ips : undefined),
  }
}

export const harvestDomain = async (
  domain: string,
  config: HarvesterConfig,
): Promise<OsintReport> => {
  const outputBase = join(tmpdir(), `recon-harvester-${nanoid()}`)
  const args = buildHarvesterArgs(domain, outputBase, config.sources)

  log({
    message: 'Running OSINT tool',
    tool: HARVESTER_TOOL_NAME,
    domain,
  })

  try {
    await runHarvester(args, config)

    let raw: string
    try {
      raw = await readFile(`${outputBase}.json`, 'utf8')
    } catch (error) {
      throw new ToolUnavailableError(
        `${HARVESTER_TOOL_NAME} wrote no report`,
        { error: errorMessage(error) },
      )
    }

    return parseHarvesterReport(raw)
  } finally {
    await Promise.all([
      rm(`${outputBase}.json`, { force: true }),
      rm(`${outputBase}.xml`, { force: true }),
    ])
  }
}

export const createHarvesterSource = (config: HarvesterConfig): OsintSource => ({
  name: HARVESTER_TOOL_NAME,
  collect: (target) => harvestDomain(target, config),
})
