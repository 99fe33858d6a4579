import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '003',
  name: 'create_contact_records_by_source_table',
  description:
    'Create contact_records_by_source lookup table, newest run first per source URL',
  up: async (client: Client): Promise<void> => {
    const { keyspace } = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.contact_records_by_source (
        source_url TEXT,
        extraction_timestamp TIMESTAMP,
        record_id UUID,
        PRIMARY KEY (source_url, extraction_timestamp, record_id)
      ) WITH CLUSTERING ORDER BY (extraction_timestamp DESC, record_id ASC)
    `)
  },
  down: async (client: Client): Promise<void> => {
    const { keyspace } = getDatabaseConfig()
    await client.execute(
      `DROP TABLE IF EXISTS ${keyspace}.contact_records_by_source`,
    )
  },
}
