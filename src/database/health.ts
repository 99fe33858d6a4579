import { errorMessage } from '../plumbing/errors.ts'
import { getDatabaseClient, isDatabaseEnabledForEnv } from './client.ts'
import { getDatabaseConfig } from './config.ts'

export interface DatabaseHealthStatus {
  isHealthy: boolean
  message: string
  details?: {
    keyspaceExists: boolean
    hostCount: number
  }
}

export const checkDatabaseHealth = async (): Promise<DatabaseHealthStatus> => {
  if (!isDatabaseEnabledForEnv()) {
    return {
      isHealthy: true,
      message: 'Database disabled for this environment; using in-memory store',
    }
  }

  try {
    const client = getDatabaseClient()
    await client.execute('SELECT now() FROM system.local')

    const { keyspace } = getDatabaseConfig()
    const result = await client.execute(
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?',
      [keyspace],
      { prepare: true },
    )

    return {
      isHealthy: true,
      message: 'Database connection is healthy',
      details: {
        keyspaceExists: result.rows.length > 0,
        hostCount: client.hosts.length,
      },
    }
  } catch (error) {
    return {
      isHealthy: false,
      message: errorMessage(error),
    }
  }
}
