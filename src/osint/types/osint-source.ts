/**
 * What an OSINT tool reported for a target domain.
 */
export interface OsintReport {
  emails: string[]
  hosts: string[]
  ips: string[]
}

/**
 * An external tool that reports on a target domain.
 * Implementations reject with ToolUnavailableError or ToolTimeoutError.
 */
export interface OsintSource {
  name: string
  collect: (target: string) => Promise<OsintReport>
}

export interface HarvesterConfig {
  binaryPath: string
  timeoutMs: number
  /** theHarvester -b values; empty runs its default source set */
  sources: string[]
}
