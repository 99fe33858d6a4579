import { type CountryCode, isSupportedCountry } from 'libphonenumber-js'
import { log } from '../plumbing/logger.ts'
import { parseBoolean, parseList, parseNumber } from '../plumbing/env.ts'
import type { ReconConfig } from './types/recon-config.ts'

let cachedConfig: ReconConfig | null = null

const DEFAULT_REGION = 'US'

const validateConfig = (config: ReconConfig): void => {
  const errors: string[] = []

  if (config.mxTimeoutMs <= 0) {
    errors.push('RECON_MX_TIMEOUT_MS must be a positive number')
  }

  if (config.fetchTimeoutMs <= 0) {
    errors.push('RECON_FETCH_TIMEOUT_MS must be a positive number')
  }

  if (config.harvesterTimeoutMs <= 0) {
    errors.push('RECON_HARVESTER_TIMEOUT_MS must be a positive number')
  }

  if (config.batchDelayMs < 0) {
    errors.push('RECON_BATCH_DELAY_MS must not be negative')
  }

  if (config.harvesterPath.trim() === '') {
    errors.push('RECON_HARVESTER_PATH must not be empty')
  }

  if (errors.length > 0) {
    throw new Error(
      `Recon configuration validation failed:\n${errors.join('\n')}`,
    )
  }
}

const resolveRegion = (raw: string | undefined): CountryCode => {
  const region = (raw ?? DEFAULT_REGION).trim().toUpperCase()
  if (!isSupportedCountry(region)) {
    throw new Error(
      `Recon configuration validation failed:\nRECON_DEFAULT_REGION "${region}" is not a supported region`,
    )
  }
  return region
}

export const getReconConfig = (): ReconConfig => {
  if (cachedConfig) {
    return cachedConfig
  }

  const config: ReconConfig = {
    defaultRegion: resolveRegion(process.env.RECON_DEFAULT_REGION),
    isMxCheckEnabled: parseBoolean(process.env.RECON_MX_CHECK_ENABLED, false),
    mxTimeoutMs: parseNumber(process.env.RECON_MX_TIMEOUT_MS, 3_000),
    fetchTimeoutMs: parseNumber(process.env.RECON_FETCH_TIMEOUT_MS, 30_000),
    harvesterPath: process.env.RECON_HARVESTER_PATH ?? 'theHarvester',
    harvesterTimeoutMs: parseNumber(
      process.env.RECON_HARVESTER_TIMEOUT_MS,
      300_000,
    ),
    harvesterSources: parseList(process.env.RECON_HARVESTER_SOURCES),
    batchDelayMs: parseNumber(process.env.RECON_BATCH_DELAY_MS, 1_000),
  }

  validateConfig(config)
  cachedConfig = config

  log({
    message: 'Recon configuration validated and loaded',
    defaultRegion: config.defaultRegion,
    isMxCheckEnabled: config.isMxCheckEnabled,
  })

  return config
}

export const clearConfigCache = (): void => {
  cachedConfig = null
}
