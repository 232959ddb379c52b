import type { HttpClient } from './types'
import { AxiosHttpClient } from './AxiosHttpClient'
import { LoggingHttpClient } from './decorators/LoggingHttpClient'

export interface HttpClientConfig {
  baseURL: string
  timeoutMs?: number
}

/**
 * Factory for creating HTTP clients with decorator chain
 */
export class HttpClientFactory {
  /**
   * LoggingHttpClient → AxiosHttpClient
   */
  static createClient(config: HttpClientConfig): HttpClient {
    const coreClient = new AxiosHttpClient(
      config.baseURL.replace(/\/+$/, ''),
      { 'Content-Type': 'application/json' },
      config.timeoutMs ?? 10000
    )

    return new LoggingHttpClient(coreClient)
  }
}
