#!/usr/bin/env node

process.removeAllListeners('warning')

import { Command } from 'commander'
import { loadConfig, validateConfig, DEFAULT_ADMIN_TOKEN, DEFAULT_PORT, type ConfigOverrides } from './config'
import { InMemoryStrategyStore } from './state/StrategyStore'
import { MockApiServer } from './runtime/MockApiServer'
import { HttpClientFactory } from './http/HttpClientFactory'
import { StrategyApiClient } from './api/StrategyApiClient'
import { logger, flushLogs, getLogLevel } from './utils/logger'
import { getErrorMessage, getErrorStatus, HttpError } from './utils/HttpError'

async function serve(overrides: ConfigOverrides): Promise<void> {
  const config = loadConfig(overrides)

  const validation = validateConfig(config)
  if (!validation.valid) {
    logger.error('Configuration validation failed')
    validation.errors.forEach(error => logger.error(`  - ${error}`))
    flushLogs()
    process.exit(1)
  }

  logger.info('Starting strategy mock server...', {
    host: config.host,
    port: config.port,
    logLevel: getLogLevel(),
  })

  const store = new InMemoryStrategyStore()
  const server = new MockApiServer(config, store)

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`)
    try {
      await server.stop()
    } catch (error: unknown) {
      logger.error('Failed to stop server cleanly', { error: getErrorMessage(error) })
    }
    flushLogs()
    process.exit(0)
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))

  await server.start()
}

interface SetPasswordOptions {
  url: string
  adminToken: string
}

async function setPassword(deviceId: string, password: string, options: SetPasswordOptions): Promise<void> {
  const client = new StrategyApiClient(
    HttpClientFactory.createClient({ baseURL: options.url }),
    options.adminToken
  )

  try {
    const result = await client.setPermanentPassword(deviceId, password)
    logger.info('Permanent password set', {
      deviceId: result.device_id,
      modifiedAt: result.modified_at,
    })
  } catch (error: unknown) {
    logger.error('Failed to set permanent password', {
      deviceId,
      status: getErrorStatus(error),
      response: error instanceof HttpError ? error.body : undefined,
      error: getErrorMessage(error),
    })
    flushLogs()
    process.exitCode = 1
  }
}

const program = new Command()

program
  .name('strategy-mock-server')
  .description('In-memory mock of the device heartbeat and admin password endpoints')

program
  .command('serve', { isDefault: true })
  .description('run the mock server')
  .option('--host <host>', 'bind host (env MOCK_HOST, default 0.0.0.0)')
  .option('--port <port>', `bind port (env MOCK_PORT, default ${DEFAULT_PORT})`)
  .option('--admin-token <token>', `admin token (env MOCK_ADMIN_TOKEN, default ${DEFAULT_ADMIN_TOKEN})`)
  .action((options: ConfigOverrides) => serve(options))

program
  .command('set-password')
  .description('push a permanent password to a device on a running server')
  .argument('<deviceId>', 'device id')
  .argument('<password>', 'new permanent password')
  .option('--url <url>', 'server base url', `http://127.0.0.1:${DEFAULT_PORT}`)
  .option('--admin-token <token>', 'admin token', process.env.MOCK_ADMIN_TOKEN ?? DEFAULT_ADMIN_TOKEN)
  .action((deviceId: string, password: string, options: SetPasswordOptions) => setPassword(deviceId, password, options))

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error('Failed to start mock server', { error: getErrorMessage(error) })
  flushLogs()
  setTimeout(() => process.exit(1), 500)
})
