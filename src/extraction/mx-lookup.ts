import { resolveMx } from 'node:dns/promises'
import { errorMessage } from '../plumbing/errors.ts'
import { logReconEvent } from '../plumbing/recon-log.ts'

export type MxStatus = 'mx_found' | 'no_mx' | 'unavailable'

export interface MxCheckResult {
  domain: string
  status: MxStatus
  reason?: string
}

// Resolver answers that mean "this domain has no mail exchanger"
const NO_MX_CODES = new Set(['ENOTFOUND', 'ENODATA', 'NXDOMAIN'])

const errorCode = (error: unknown): string | undefined => {
  if (error instanceof Error && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined
  }
  return undefined
}

/**
 * Mail-exchanger lookup for a domain. Additive only: it never changes whether
 * an address is syntactically valid. Timeouts and resolver failures degrade
 * to "unavailable" instead of throwing.
 */
export const checkMailExchanger = async (
  domain: string,
  options: { timeoutMs: number },
): Promise<MxCheckResult> => {
  let timer: NodeJS.Timeout | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`MX lookup timed out after ${options.timeoutMs}ms`))
    }, options.timeoutMs)
  })

  try {
    const records = await Promise.race([resolveMx(domain), timeout])
    return {
      domain,
      status: records.length > 0 ? 'mx_found' : 'no_mx',
    }
  } catch (error) {
    const code = errorCode(error)
    if (code && NO_MX_CODES.has(code)) {
      return { domain, status: 'no_mx', reason: code }
    }

    const reason = errorMessage(error)
    logReconEvent({ event: 'mx_lookup_degraded', domain, reason })
    return { domain, status: 'unavailable', reason }
  } finally {
    clearTimeout(timer)
  }
}
