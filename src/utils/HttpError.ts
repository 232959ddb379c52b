/**
 * Error raised by the API client for non-2xx responses
 * Carries the status code and the decoded response body
 */
export class HttpError extends Error {
  status: number
  /** Decoded response body: parsed JSON, or the raw text */
  body: unknown

  constructor(message: string, status: number, body?: unknown) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.body = body

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError)
    }
  }
}

/**
 * Raised when a request body cannot be decoded as JSON
 */
export class JsonBodyError extends Error {
  readonly parseError: unknown

  constructor(parseError: unknown) {
    super(`Invalid JSON body: ${getErrorMessage(parseError)}`)
    this.name = 'JsonBodyError'
    this.parseError = parseError
  }
}

export function isErrorWithStatus(error: unknown): error is { message: string; status?: number } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  )
}

/**
 * Get error message safely from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  if (typeof error === 'string') {
    return error
  }
  return 'Unknown error'
}

export function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof HttpError) {
    return error.status
  }
  if (isErrorWithStatus(error) && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}
