import type { Client, types } from 'cassandra-driver'
import { errorMessage } from '../../plumbing/errors.ts'
import { log } from '../../plumbing/logger.ts'
import { getDatabaseClient } from '../client.ts'
import { getDatabaseConfig } from '../config.ts'
import type { Migration, MigrationHistoryRow } from './types.ts'

const asDate = (value: unknown): Date | null =>
  value instanceof Date ? value : null

/**
 * The history table lives in the keyspace it tracks, so the keyspace is
 * created here as well as by migration 001.
 */
export const ensureMigrationHistory = async (client: Client): Promise<void> => {
  const { keyspace } = getDatabaseConfig()

  await client.execute(`
    CREATE KEYSPACE IF NOT EXISTS ${keyspace}
    WITH REPLICATION = {
      'class': 'SimpleStrategy',
      'replication_factor': 1
    }
  `)

  await client.execute(`
    CREATE TABLE IF NOT EXISTS ${keyspace}.migration_history (
      version TEXT PRIMARY KEY,
      name TEXT,
      description TEXT,
      applied_at TIMESTAMP,
      rolled_back_at TIMESTAMP
    )
  `)
}

const toHistoryRow = (row: types.Row): MigrationHistoryRow => ({
  version: String(row.version),
  appliedAt: asDate(row.applied_at),
  rolledBackAt: asDate(row.rolled_back_at),
})

export const getMigrationHistory = async (
  client: Client,
): Promise<MigrationHistoryRow[]> => {
  const { keyspace } = getDatabaseConfig()
  const result = await client.execute(
    `SELECT version, applied_at, rolled_back_at FROM ${keyspace}.migration_history`,
  )
  return result.rows.map(toHistoryRow)
}

/**
 * CQL has no IS NULL filter, so rolled-back rows are dropped here.
 */
export const getAppliedMigrations = async (
  client: Client,
): Promise<string[]> => {
  const history = await getMigrationHistory(client)
  return history
    .filter((row) => row.rolledBackAt === null)
    .map((row) => row.version)
}

export const recordMigration = async (
  client: Client,
  migration: Migration,
  action: 'up' | 'down',
): Promise<void> => {
  const { keyspace } = getDatabaseConfig()
  const now = new Date()

  if (action === 'up') {
    await client.execute(
      `INSERT INTO ${keyspace}.migration_history (version, name, description, applied_at, rolled_back_at)
       VALUES (?, ?, ?, ?, ?)`,
      [migration.version, migration.name, migration.description, now, null],
      { prepare: true },
    )
    return
  }

  await client.execute(
    `UPDATE ${keyspace}.migration_history SET rolled_back_at = ? WHERE version = ?`,
    [now, migration.version],
    { prepare: true },
  )
}

const applyMigration = async (
  client: Client,
  migration: Migration,
  action: 'up' | 'down',
): Promise<void> => {
  log({
    message: action === 'up' ? 'Running migration' : 'Rolling back migration',
    version: migration.version,
    name: migration.name,
  })

  try {
    await migration[action](client)
    await recordMigration(client, migration, action)
  } catch (error) {
    log({
      message: action === 'up' ? 'Migration failed' : 'Migration rollback failed',
      version: migration.version,
      error: errorMessage(error),
    })
    throw error
  }

  log({
    message: action === 'up' ? 'Migration completed' : 'Migration rolled back',
    version: migration.version,
  })
}

/**
 * "up" applies every pending migration in version order; "down" rolls back
 * only the most recent applied one.
 */
export const runMigrations = async (
  migrations: Migration[],
  direction: 'up' | 'down' = 'up',
): Promise<void> => {
  const client = getDatabaseClient()

  await ensureMigrationHistory(client)
  const applied = new Set(await getAppliedMigrations(client))

  if (direction === 'up') {
    const pending = migrations
      .filter((m) => !applied.has(m.version))
      .sort((a, b) => a.version.localeCompare(b.version))

    for (const migration of pending) {
      await applyMigration(client, migration, 'up')
    }
    return
  }

  const [latest] = migrations
    .filter((m) => applied.has(m.version))
    .sort((a, b) => b.version.localeCompare(a.version))

  if (!latest) {
    log('No migrations to rollback')
    return
  }

  await applyMigration(client, latest, 'down')
}
