import type { HttpClient, HttpRequestOptions } from '../types'
import { logger } from '../../utils/logger'
import { getErrorMessage, getErrorStatus, HttpError } from '../../utils/HttpError'

/**
 * HTTP client decorator that records failed calls to the mock server
 *
 * 4xx answers (`unauthorized`, `new_password required`, `invalid json`) are
 * part of the protocol and go to debug with the decoded body; transport
 * failures and 5xx go to error.
 */
export class LoggingHttpClient implements HttpClient {
  constructor(private readonly innerClient: HttpClient) {}

  async request<T>(path: string, options?: HttpRequestOptions): Promise<T> {
    try {
      return await this.innerClient.request<T>(path, options)
    } catch (error: unknown) {
      const method = options?.method || 'GET'
      const status = getErrorStatus(error)

      if (status && status < 500) {
        logger.debug('Mock server rejected request', {
          url: path,
          method,
          status,
          response: error instanceof HttpError ? error.body : undefined,
        })
      } else {
        logger.error('HTTP Request Failed', {
          url: path,
          method,
          status,
          error: getErrorMessage(error),
        })
      }

      throw error
    }
  }
}
