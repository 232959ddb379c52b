/**
 * Core HTTP client interface
 * All HTTP implementations and decorators must implement this interface
 */
export interface HttpClient {
  request<T>(path: string, options?: HttpRequestOptions): Promise<T>
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST'
  headers?: Record<string, string>
  /** Sent verbatim; callers encode JSON themselves */
  body?: string
}
