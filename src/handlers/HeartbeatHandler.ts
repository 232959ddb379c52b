import type { StrategyStore } from '../state/StrategyStore'
import { coerceInteger, coerceString, decodeJsonBody, isJsonObject, type JsonValue } from '../utils/json'
import { getErrorMessage, JsonBodyError } from '../utils/HttpError'
import { logger } from '../utils/logger'
import { json, type BodyReader, type HandlerResponse } from './types'

/**
 * POST /api/heartbeat
 *
 * Devices poll with their last-seen `modified_at` and receive either `{}`
 * (nothing new) or the full current strategy. Anything short of unparseable
 * JSON degrades to `{}` so a misbehaving client keeps polling.
 */
export class HeartbeatHandler {
  constructor(private readonly store: StrategyStore) {}

  async handle(readBody: BodyReader): Promise<HandlerResponse> {
    let body: JsonValue
    try {
      body = decodeJsonBody(await readBody(), { unwrapString: true })
    } catch (error: unknown) {
      if (error instanceof JsonBodyError) {
        logger.debug('Heartbeat body rejected', { error: getErrorMessage(error.parseError) })
        return json(400, { error: 'invalid json' })
      }
      throw error
    }

    if (!isJsonObject(body)) {
      return json(200, {})
    }

    const deviceId = coerceString(body.id)
    const clientVersion = coerceInteger(body.modified_at)
    if (!deviceId) {
      return json(200, {})
    }

    const snapshot = this.store.getStrategyIfModified(deviceId, clientVersion)
    if (snapshot) {
      logger.info('Pushing strategy to device', {
        deviceId,
        clientVersion,
        modifiedAt: snapshot.modified_at,
      })
    }
    return json(200, snapshot ?? {})
  }
}
