#!/usr/bin/env node
import 'dotenv/config'
import { errorMessage } from '../../plumbing/errors.ts'
import { initializeDatabase, shutdownDatabase } from '../client.ts'
import { loadMigrations } from './loader.ts'
import { runMigrations } from './runner.ts'
import { getMigrationStatus } from './status.ts'

const USAGE = [
  'Usage: migrate [up|down|status]',
  '  up     - Apply pending migrations',
  '  down   - Rollback last migration',
  '  status - Show migration status',
].join('\n')

const command = process.argv[2]

const main = async (): Promise<void> => {
  if (command !== 'up' && command !== 'down' && command !== 'status') {
    console.log(USAGE)
    process.exitCode = 1
    return
  }

  try {
    // Connect without keyspace so migration 001 can create it
    await initializeDatabase({ skipKeyspace: true })
    const migrations = loadMigrations()

    if (command === 'status') {
      const status = await getMigrationStatus(migrations)
      console.table(
        status.map((s) => ({
          version: s.version,
          name: s.name,
          applied: s.applied ? '✓' : '✗',
          appliedAt: s.appliedAt?.toISOString() ?? '-',
          rolledBackAt: s.rolledBackAt?.toISOString() ?? '-',
        })),
      )
      return
    }

    await runMigrations(migrations, command)
    console.log(
      command === 'up'
        ? 'Migrations applied successfully'
        : 'Migration rolled back successfully',
    )
  } catch (error) {
    console.error('Migration error:', errorMessage(error))
    process.exitCode = 1
  } finally {
    await shutdownDatabase()
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error))
  process.exitCode = 1
})
