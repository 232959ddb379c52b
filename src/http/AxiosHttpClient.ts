import axios, { type AxiosInstance } from 'axios'
import type { HttpClient, HttpRequestOptions } from './types'
import { HttpError } from '../utils/HttpError'
import { logger } from '../utils/logger'

function decodeBody(raw: string, contentType: string): unknown {
  if (!contentType.includes('application/json')) {
    return raw
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    return parsed
  } catch {
    return raw
  }
}

/**
 * Core HTTP client implementation using axios
 * Bodies travel as text so the caller controls the exact bytes on the wire
 */
export class AxiosHttpClient implements HttpClient {
  private readonly instance: AxiosInstance

  constructor(baseURL: string, defaultHeaders: Record<string, string>, timeoutMs: number = 10000) {
    this.instance = axios.create({
      baseURL,
      headers: defaultHeaders,
      timeout: timeoutMs,
      responseType: 'text',
      // no JSON re-encoding or parsing by axios in either direction
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      // status handling happens below
      validateStatus: () => true,
    })
  }

  async request<T>(path: string, options: HttpRequestOptions = {}): Promise<T> {
    const method = options.method || 'GET'

    logger.debug('HTTP Request', { method, url: path })

    const response = await this.instance.request<string>({
      url: path,
      method,
      headers: options.headers,
      data: options.body,
    })

    logger.debug('HTTP Response', { status: response.status, url: path })

    const contentType = String(response.headers['content-type'] ?? '')
    const body = decodeBody(response.data, contentType)

    if (response.status < 200 || response.status >= 300) {
      throw new HttpError(`HTTP ${response.status}: ${response.data}`, response.status, body)
    }

    // response shape is the endpoint's contract; callers name it through T
    return body as T
  }
}
