import type { CountryCode } from 'libphonenumber-js'

export interface ReconConfig {
  /** Region used to parse phone numbers written without a country code */
  defaultRegion: CountryCode
  isMxCheckEnabled: boolean
  mxTimeoutMs: number
  fetchTimeoutMs: number
  harvesterPath: string
  harvesterTimeoutMs: number
  /** Empty means theHarvester's own default source set */
  harvesterSources: string[]
  /** Pause between pages of a batch run */
  batchDelayMs: number
}
