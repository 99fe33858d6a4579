#!/usr/bin/env node
import 'dotenv/config'
import { errorMessage } from '../plumbing/errors.ts'
import {
  getDatabaseClient,
  initializeDatabase,
  shutdownDatabase,
} from './client.ts'
import { getDatabaseConfig } from './config.ts'

const main = async (): Promise<void> => {
  try {
    await initializeDatabase({ skipKeyspace: true })
    const client = getDatabaseClient()
    const { keyspace } = getDatabaseConfig()

    const versionResult = await client.execute(
      'SELECT release_version FROM system.local',
    )
    const version: unknown = versionResult.first()?.get('release_version')
    console.log('Database version:', version ?? 'unknown')

    const keyspaceResult = await client.execute(
      'SELECT keyspace_name FROM system_schema.keyspaces WHERE keyspace_name = ?',
      [keyspace],
      { prepare: true },
    )
    console.log(`Keyspace ${keyspace} exists:`, keyspaceResult.rows.length > 0)
  } catch (error) {
    console.error('Error:', errorMessage(error))
    process.exitCode = 1
  } finally {
    await shutdownDatabase()
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error))
  process.exitCode = 1
})
