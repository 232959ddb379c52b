import http from 'http'
import type { AddressInfo } from 'net'
import type { MockServerConfig } from '../config'
import type { StrategyStore } from '../state/StrategyStore'
import { HeartbeatHandler } from '../handlers/HeartbeatHandler'
import { AdminPasswordHandler } from '../handlers/AdminPasswordHandler'
import { json, text, type HandlerResponse } from '../handlers/types'
import { logger } from '../utils/logger'
import { getErrorMessage } from '../utils/HttpError'

const ADMIN_PASSWORD_PATH = /^\/api\/admin\/devices\/([^/]+)\/permanent-password$/

const SERVER_HEADER = `strategy-mock-server/${process.env.npm_package_version || '0.1.0'}`

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')))
    req.on('error', reject)
  })
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    return segment
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

/**
 * HTTP server emulating the device heartbeat and admin password endpoints
 */
export class MockApiServer {
  private server: http.Server | null = null
  private readonly heartbeatHandler: HeartbeatHandler
  private readonly adminPasswordHandler: AdminPasswordHandler

  constructor(
    private readonly config: MockServerConfig,
    store: StrategyStore
  ) {
    this.heartbeatHandler = new HeartbeatHandler(store)
    this.adminPasswordHandler = new AdminPasswordHandler(store, config.adminToken)
  }

  /**
   * Start listening on the configured host and port
   */
  async start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = http.createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          logger.error('Unhandled request error', { error: getErrorMessage(error) })
        })
      })

      server.on('error', (error) => {
        logger.error('Mock server error', { error: error.message })
        reject(error)
      })

      server.listen(this.config.port, this.config.host, () => {
        this.server = server
        const address = this.address()
        logger.info('Mock server listening', {
          url: `http://${address.address}:${address.port}`,
          routes: [
            'GET /health',
            'POST /api/heartbeat',
            'POST /api/admin/devices/{id}/permanent-password (X-Admin-Token)',
          ],
        })
        resolve(address)
      })
    })
  }

  /**
   * Stop accepting connections and wait for open ones to finish
   */
  async stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }
    this.server = null

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error)
          return
        }
        logger.info('Mock server stopped')
        resolve()
      })
      server.closeIdleConnections()
    })
  }

  address(): AddressInfo {
    const address = this.server?.address()
    if (!address || typeof address === 'string') {
      throw new Error('Mock server is not listening on a TCP port')
    }
    return address
  }

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method || 'GET'
    const path = (req.url || '/').split('?')[0]

    let response: HandlerResponse
    try {
      response = await this.route(method, path, req)
    } catch (error: unknown) {
      logger.error('Request failed', { method, path, error: getErrorMessage(error) })
      response = json(500, { ok: false, error: 'internal error' })
    }

    logger.info(`${method} ${path}`, {
      client: req.socket.remoteAddress,
      status: response.status,
    })
    this.send(res, response)
  }

  private route(method: string, path: string, req: http.IncomingMessage): Promise<HandlerResponse> | HandlerResponse {
    if (method === 'GET' && path === '/health') {
      return text(200, 'ok')
    }

    if (method === 'POST') {
      if (path === '/api/heartbeat') {
        return this.heartbeatHandler.handle(() => readBody(req))
      }

      const match = ADMIN_PASSWORD_PATH.exec(path)
      if (match) {
        return this.adminPasswordHandler.handle({
          deviceId: decodePathSegment(match[1]),
          adminToken: headerValue(req.headers['x-admin-token']),
          readBody: () => readBody(req),
        })
      }
    }

    return text(404, 'not found')
  }

  private send(res: http.ServerResponse, response: HandlerResponse): void {
    if (res.headersSent) {
      return
    }

    const payload = Buffer.from(
      response.type === 'json' ? JSON.stringify(response.body) : response.body,
      'utf8'
    )
    res.writeHead(response.status, {
      'Content-Type': response.type === 'json'
        ? 'application/json; charset=utf-8'
        : 'text/plain; charset=utf-8',
      'Content-Length': payload.length,
      'Server': SERVER_HEADER,
    })
    res.end(payload)
  }
}
