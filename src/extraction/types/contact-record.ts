export interface ContactRecordMetadata {
  source_url: string
  name: string | null
  title: string | null
  company: string | null
  location: string | null
  extraction_timestamp: string
  total_emails_found: number
  total_phones_found: number
  validated_emails: number
  validated_phones: number
}

export interface ContactRecord {
  emails: readonly string[]
  phones: readonly string[]
  metadata: Readonly<ContactRecordMetadata>
}

/**
 * Caller-supplied profile fields for one reconnaissance target.
 */
export interface RecordMetadataInput {
  sourceUrl: string
  name?: string | null
  title?: string | null
  company?: string | null
  location?: string | null
}

export type ContactRowType = 'Email' | 'Phone'

export interface ContactRow {
  type: ContactRowType
  value: string
  sourceUrl: string
  name: string | null
  title: string | null
  company: string | null
  location: string | null
}
