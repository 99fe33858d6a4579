import { parseBoolean, parseList, parseNumber } from '../plumbing/env.ts'
import type { DatabaseConfig } from './types/database-config.ts'

const KEYSPACE_NAME = /^[A-Za-z][A-Za-z0-9_]{0,47}$/

export const getDatabaseConfig = (): DatabaseConfig => {
  const hosts = parseList(process.env.SCYLLA_HOSTS)
  const keyspace = process.env.SCYLLA_KEYSPACE || 'contact_recon'

  // The keyspace is interpolated into CQL, so only plain identifiers pass
  if (!KEYSPACE_NAME.test(keyspace)) {
    throw new Error(`Invalid SCYLLA_KEYSPACE: ${keyspace}`)
  }

  return {
    hosts: hosts.length > 0 ? hosts : ['localhost'],
    port: parseNumber(process.env.SCYLLA_PORT, 9042),
    keyspace,
    localDataCenter: process.env.SCYLLA_LOCAL_DATACENTER || 'datacenter1',
    username: process.env.SCYLLA_USERNAME,
    password: process.env.SCYLLA_PASSWORD,
    isSslEnabled: parseBoolean(process.env.SCYLLA_SSL, false),
    connectTimeoutMs: parseNumber(process.env.SCYLLA_CONNECT_TIMEOUT_MS, 10_000),
    connectRetries: parseNumber(process.env.SCYLLA_CONNECT_RETRIES, 3),
    connectRetryDelayMs: parseNumber(
      process.env.SCYLLA_CONNECT_RETRY_DELAY_MS,
      1_000,
    ),
  }
}
