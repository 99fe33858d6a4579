/**
 * Structured events for reconnaissance runs.
 * Never logs page bodies or raw HTML, only counts and identifiers.
 */

import { log } from './logger.ts'

export interface ReconCompletedEvent {
  event: 'recon_completed'
  source_url: string
  emails: number
  phones: number
  rejected: number
}

export interface OsintFailedEvent {
  event: 'osint_failed'
  tool: string
  target: string
  reason: string
}

export interface MxLookupDegradedEvent {
  event: 'mx_lookup_degraded'
  domain: string
  reason: string
}

export interface RecordPersistedEvent {
  event: 'record_persisted'
  record_id: string
  store: 'scylla' | 'memory'
}

export interface BatchCompletedEvent {
  event: 'batch_completed'
  urls: number
  succeeded: number
  failed: number
}

export type ReconEvent =
  | ReconCompletedEvent
  | BatchCompletedEvent
  | OsintFailedEvent
  | MxLookupDegradedEvent
  | RecordPersistedEvent

export const logReconEvent = (event: ReconEvent): void => {
  log({
    message: 'Recon event',
    recon_event: event,
  })
}
