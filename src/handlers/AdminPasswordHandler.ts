import type { StrategyStore } from '../state/StrategyStore'
import { decodeJsonBody, isJsonObject, type JsonValue } from '../utils/json'
import { getErrorMessage, JsonBodyError } from '../utils/HttpError'
import { logger } from '../utils/logger'
import { json, type BodyReader, type HandlerResponse } from './types'

export interface AdminPasswordRequest {
  deviceId: string
  /** Value of the X-Admin-Token header, if any */
  adminToken: string | undefined
  readBody: BodyReader
}

/**
 * POST /api/admin/devices/{id}/permanent-password
 * Strict: every malformed request is rejected.
 */
export class AdminPasswordHandler {
  constructor(
    private readonly store: StrategyStore,
    private readonly adminToken: string
  ) {}

  async handle(request: AdminPasswordRequest): Promise<HandlerResponse> {
    // token is checked before the body is read
    if (!request.adminToken || request.adminToken !== this.adminToken) {
      logger.warn('Rejected admin request', { deviceId: request.deviceId })
      return json(401, { ok: false, error: 'unauthorized' })
    }

    let body: JsonValue
    try {
      body = decodeJsonBody(await request.readBody())
    } catch (error: unknown) {
      if (error instanceof JsonBodyError) {
        logger.warn('Admin body rejected', { deviceId: request.deviceId, error: getErrorMessage(error.parseError) })
        return json(400, { ok: false, error: 'invalid json' })
      }
      throw error
    }

    if (!isJsonObject(body)) {
      return json(400, { ok: false, error: 'json object required' })
    }

    const newPassword = body.new_password
    if (typeof newPassword !== 'string' || newPassword.length === 0) {
      return json(400, { ok: false, error: 'new_password required' })
    }

    const modifiedAt = this.store.setPassword(request.deviceId, newPassword)
    logger.info('Permanent password updated', { deviceId: request.deviceId, modifiedAt })

    return json(200, { ok: true, device_id: request.deviceId, modified_at: modifiedAt })
  }
}
