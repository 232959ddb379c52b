/**
 * Structured logger using Pino
 * Exposes the (message, data) call style used across the server
 */
import pino from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'
import * as path from 'path'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
type LogLevel = (typeof LOG_LEVELS)[number]

const isTest = process.env.NODE_ENV === 'test'
const isProduction = process.env.NODE_ENV === 'production'

const logFilePath = process.env.LOG_FILE

function resolveLogLevel(value: string | undefined): LogLevel {
  const match = LOG_LEVELS.find(level => level === value)
  if (match) {
    return match
  }
  return isTest ? 'silent' : 'info'
}

const logLevel = resolveLogLevel(process.env.LOG_LEVEL)

// pino-pretty runs in a worker thread; keep it out of tests and production
const usePrettyPrint = !isTest && !isProduction && process.env.LOG_FORMAT !== 'json' && !logFilePath

function createRotatingFileStream(): RotatingFileStream | undefined {
  if (!logFilePath) {
    return undefined
  }

  try {
    const stream = createStream(path.basename(logFilePath), {
      path: path.dirname(logFilePath),
      size: '10M',
      interval: '1d',
      maxFiles: 10,
      compress: 'gzip',
    })

    console.log(`[Logger] File logging enabled: ${logFilePath}`)
    return stream
  } catch (error: unknown) {
    console.warn(`[Logger] Failed to create rotating file stream: ${error instanceof Error ? error.message : String(error)}`)
    return undefined
  }
}

function createLogger(): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: logLevel,
    base: {
      pid: process.pid,
      hostname: process.env.HOSTNAME || 'unknown',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  }

  const fileStream = createRotatingFileStream()
  if (fileStream) {
    return pino(baseConfig, fileStream)
  }

  if (usePrettyPrint) {
    return pino({
      ...baseConfig,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  // info and below → stdout, error and fatal → stderr
  return pino(baseConfig, pino.multistream([
    { level: 'trace', stream: process.stdout },
    { level: 'error', stream: process.stderr },
  ]))
}

const pinoLogger = createLogger()

/**
 * Flush buffered log lines before the process exits
 */
export function flushLogs(): void {
  pinoLogger.flush()
}

export function getLogLevel(): string {
  return pinoLogger.level
}

type LogMethod = (message: string, data?: object) => void

function bind(level: 'debug' | 'info' | 'warn' | 'error'): LogMethod {
  return (message, data) => pinoLogger[level](data ?? {}, message)
}

export const logger: Record<'debug' | 'info' | 'warn' | 'error', LogMethod> = {
  debug: bind('debug'),
  info: bind('info'),
  warn: bind('warn'),
  error: bind('error'),
}

export default logger
