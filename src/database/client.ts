import { Client, type ClientOptions } from 'cassandra-driver'
import { errorMessage } from '../plumbing/errors.ts'
import { log } from '../plumbing/logger.ts'
import { getDatabaseConfig } from './config.ts'

let databaseClient: Client | null = null

/**
 * Tests and SCYLLA_DISABLED=true run without a database; records then live
 * in the in-memory store. SCYLLA_ENABLE_IN_TESTS opts tests back in.
 */
export const isDatabaseEnabledForEnv = (): boolean => {
  if (process.env.SCYLLA_DISABLED === 'true') {
    return false
  }

  if (
    process.env.NODE_ENV === 'test' &&
    process.env.SCYLLA_ENABLE_IN_TESTS !== 'true'
  ) {
    return false
  }

  return true
}

const createClient = (options?: { skipKeyspace?: boolean }): Client => {
  const config = getDatabaseConfig()

  const clientOptions: ClientOptions = {
    contactPoints: config.hosts.map((host) => `${host}:${config.port}`),
    localDataCenter: config.localDataCenter,
    // Migrations connect before the keyspace exists
    keyspace: options?.skipKeyspace ? undefined : config.keyspace,
    credentials:
      config.username && config.password
        ? { username: config.username, password: config.password }
        : undefined,
    sslOptions: config.isSslEnabled ? { rejectUnauthorized: true } : undefined,
    socketOptions: {
      connectTimeout: config.connectTimeoutMs,
    },
  }

  return new Client(clientOptions)
}

export const getDatabaseClient = (): Client => {
  if (!databaseClient) {
    throw new Error(
      'Database client not initialized. Call initializeDatabase() first.',
    )
  }

  return databaseClient
}

export const initializeDatabase = async (options?: {
  skipKeyspace?: boolean
}): Promise<void> => {
  if (!isDatabaseEnabledForEnv()) {
    log('Database initialization skipped for current environment')
    return
  }

  if (databaseClient) {
    log('Database client already initialized')
    return
  }

  const config = getDatabaseConfig()
  let attempt = 0

  while (true) {
    attempt += 1
    const client = createClient(options)

    try {
      await client.connect()
      databaseClient = client

      log({
        message: 'Database connection established',
        hosts: config.hosts,
        keyspace: options?.skipKeyspace ? '(none)' : config.keyspace,
        attempt,
      })
      return
    } catch (error) {
      log({
        message: 'Failed to connect to database',
        error: errorMessage(error),
        attempt,
      })

      try {
        await client.shutdown()
      } catch (shutdownError) {
        log({
          message: 'Error shutting down failed client',
          error: errorMessage(shutdownError),
        })
      }

      if (attempt >= config.connectRetries) {
        throw error instanceof Error ? error : new Error(errorMessage(error))
      }

      await new Promise((resolve) => {
        setTimeout(resolve, config.connectRetryDelayMs)
      })
    }
  }
}

export const shutdownDatabase = async (): Promise<void> => {
  const client = databaseClient
  databaseClient = null

  if (!client) {
    return
  }

  try {
    await client.shutdown()
    log('Database connection closed')
  } catch (error) {
    log({
      message: 'Error while closing database connection',
      error: errorMessage(error),
    })
  }
}
