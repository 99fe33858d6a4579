import type { Client } from 'cassandra-driver'
import { getDatabaseConfig } from '../../config.ts'
import type { Migration } from '../types.ts'

export const migration: Migration = {
  version: '002',
  name: 'create_contact_records_table',
  description: 'Create contact_records table holding one row per reconnaissance run',
  up: async (client: Client): Promise<void> => {
    const { keyspace } = getDatabaseConfig()
    await client.execute(`
      CREATE TABLE IF NOT EXISTS ${keyspace}.contact_records (
        record_id UUID PRIMARY KEY,
        source_url TEXT,
        name TEXT,
        title TEXT,
        company TEXT,
        location TEXT,
        emails LIST<TEXT>,
        phones LIST<TEXT>,
        extraction_timestamp TIMESTAMP,
        total_emails_found INT,
        total_phones_found INT,
        validated_emails INT,
        validated_phones INT,
        created_at TIMESTAMP
      )
    `)
  },
  down: async (client: Client): Promise<void> => {
    const { keyspace } = getDatabaseConfig()
    await client.execute(`DROP TABLE IF EXISTS ${keyspace}.contact_records`)
  },
}
