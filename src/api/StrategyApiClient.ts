import type { HttpClient } from '../http/types'
import type { StrategySnapshot } from '../state/StrategyStore'
import { logger } from '../utils/logger'

export interface HeartbeatRequest {
  id?: string
  modified_at?: number
  [key: string]: unknown
}

/** `{}` when the device is up to date or unknown */
export type HeartbeatResponse = StrategySnapshot | Record<string, never>

export interface SetPasswordResponse {
  ok: true
  device_id: string
  modified_at: number
}

export interface HeartbeatOptions {
  /**
   * Post the payload as a JSON string holding the JSON object, the way
   * some device builds do
   */
  doubleEncode?: boolean
}

export function isStrategySnapshot(response: HeartbeatResponse): response is StrategySnapshot {
  return 'modified_at' in response && 'strategy' in response
}

/**
 * Client for the mock server's device and admin endpoints
 * Non-2xx answers surface as HttpError with the decoded body attached
 */
export class StrategyApiClient {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly adminToken?: string
  ) {}

  async health(): Promise<string> {
    return this.httpClient.request<string>('/health')
  }

  async heartbeat(request: HeartbeatRequest, options: HeartbeatOptions = {}): Promise<HeartbeatResponse> {
    const encoded = JSON.stringify(request)
    const response = await this.httpClient.request<HeartbeatResponse>('/api/heartbeat', {
      method: 'POST',
      body: options.doubleEncode ? JSON.stringify(encoded) : encoded,
    })

    if (isStrategySnapshot(response)) {
      logger.debug('Heartbeat returned new strategy', {
        deviceId: request.id,
        modifiedAt: response.modified_at,
      })
    }
    return response
  }

  async setPermanentPassword(deviceId: string, newPassword: string): Promise<SetPasswordResponse> {
    return this.httpClient.request<SetPasswordResponse>(
      `/api/admin/devices/${encodeURIComponent(deviceId)}/permanent-password`,
      {
        method: 'POST',
        headers: this.adminToken ? { 'X-Admin-Token': this.adminToken } : {},
        body: JSON.stringify({ new_password: newPassword }),
      }
    )
  }

  /**
   * POST an arbitrary body, for exercising malformed payloads
   */
  async postRaw<T>(path: string, body: string, headers: Record<string, string> = {}): Promise<T> {
    return this.httpClient.request<T>(path, { method: 'POST', headers, body })
  }
}
