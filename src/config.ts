import dotenv from 'dotenv'

// Load environment variables from .env file (override existing env vars)
dotenv.config({ override: true })

export const DEFAULT_HOST = '0.0.0.0'
export const DEFAULT_PORT = 21115
export const DEFAULT_ADMIN_TOKEN = 'devtoken'

export interface MockServerConfig {
  host: string
  port: number
  /** Shared secret expected in the X-Admin-Token header */
  adminToken: string
}

/**
 * Values given on the command line; they win over the environment
 */
export interface ConfigOverrides {
  host?: string
  port?: string | number
  adminToken?: string
}

function parsePort(value: string | number | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_PORT
  }
  return typeof value === 'number' ? value : Number(value)
}

/**
 * Load server configuration: defaults, then environment, then overrides
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): MockServerConfig {
  return {
    host: overrides.host ?? env.MOCK_HOST ?? DEFAULT_HOST,
    port: parsePort(overrides.port ?? env.MOCK_PORT),
    adminToken: overrides.adminToken ?? env.MOCK_ADMIN_TOKEN ?? DEFAULT_ADMIN_TOKEN,
  }
}

export function validateConfig(config: MockServerConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = []

  if (!config.host) {
    errors.push('Host must not be empty (--host or MOCK_HOST)')
  }

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
    errors.push('Port must be an integer between 0 and 65535 (--port or MOCK_PORT)')
  }

  if (!config.adminToken) {
    errors.push('Admin token must not be empty (--admin-token or MOCK_ADMIN_TOKEN)')
  }

  return {
    valid: errors.length === 0,
    errors,
  }
}
