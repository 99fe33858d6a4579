/**
 * Failures of the collaborators around the extraction core. The core itself
 * never throws for bad input or empty results.
 */

export abstract class ReconError extends Error {
  abstract readonly code: string
  abstract readonly statusCode: number
  readonly context?: Record<string, unknown>

  constructor(message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.context = context
  }
}

export class InvalidReconRequestError extends ReconError {
  readonly code = 'INVALID_REQUEST'
  readonly statusCode = 400
}

export class PageFetchError extends ReconError {
  readonly code = 'PAGE_FETCH_FAILED'
  readonly statusCode = 502
}

export class ToolUnavailableError extends ReconError {
  readonly code = 'TOOL_UNAVAILABLE'
  readonly statusCode = 503
}

export class ToolTimeoutError extends ReconError {
  readonly code = 'TOOL_TIMEOUT'
  readonly statusCode = 504
}

export class RecordStorageError extends ReconError {
  readonly code = 'RECORD_STORAGE_FAILED'
  readonly statusCode = 500
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
