import type { ContactRecord } from '../../extraction/types/contact-record.ts'
import type { MxCheckResult } from '../../extraction/mx-lookup.ts'
import type { RejectedCandidate } from '../../extraction/types/contact.ts'
import type { PageProfile } from '../../fetching/types/page.ts'

export interface StoredContactRecord {
  id: string
  record: ContactRecord
  createdAt: Date
}

export interface ReconRequest {
  url: string
  /** Page HTML or text; the page is fetched when absent */
  content?: string
  harvest?: boolean
  name?: string
  title?: string
  company?: string
  location?: string
}

/**
 * What an OSINT run reported beyond the emails merged into the record.
 */
export interface OsintDiagnostics {
  tool: string
  target: string
  emails: string[]
  hosts: string[]
  ips: string[]
  /** Set when the tool failed; the run went on with page contacts only */
  error?: string
}

/**
 * Side results of a run. Never stored with the record.
 */
export interface ReconDiagnostics {
  /** Matched strings that failed validation */
  rejected: readonly RejectedCandidate[]
  /** Profile read from the page HTML, null for plain text content */
  profile: PageProfile | null
  /** Present when mail-exchanger checks are enabled */
  domainChecks?: MxCheckResult[]
  /** Present when harvesting was requested */
  osint?: OsintDiagnostics
}

export interface ReconResult {
  id: string
  record: ContactRecord
  diagnostics: ReconDiagnostics
}

export interface BatchReconRequest {
  urls: string[]
  harvest?: boolean
}

export type BatchReconEntry =
  | { url: string; id: string; record: ContactRecord }
  | { url: string; error: string; code: string }

export interface BatchReconResult {
  urls_scanned: number
  results: BatchReconEntry[]
  /** Unique contacts across every page that succeeded */
  combined_contacts: {
    emails: string[]
    phones: string[]
  }
}
