/**
 * Structured logger using Pino
 * Exposes the (message, data) call style used throughout the client runtime
 */
import pino from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'
import * as path from 'path'

const LOG_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function resolveLogLevel(value: string | undefined): pino.LevelWithSilent {
  switch (value) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return value
    default:
      return 'info'
  }
}

const logLevel = resolveLogLevel(process.env.LOG_LEVEL)

const isProduction = process.env.NODE_ENV === 'production'

// Check if file logging is requested
const logFilePath = process.env.LOG_FILE

// pino-pretty runs in a worker thread, only worth it for interactive development
const usePrettyPrint = !isProduction && process.env.LOG_FORMAT !== 'json' && !logFilePath && logLevel !== 'silent'

function timestamp(): string {
  const now = new Date()
  const hours = now.getHours().toString().padStart(2, '0')
  const minutes = now.getMinutes().toString().padStart(2, '0')
  const seconds = now.getSeconds().toString().padStart(2, '0')
  const ms = now.getMilliseconds().toString().padStart(3, '0')
  return `,"time":"${hours}:${minutes}:${seconds}.${ms}"`
}

/**
 * Create rotating file stream when LOG_FILE is set
 */
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

    return stream
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    process.stderr.write(`[logger] Failed to create rotating file stream: ${message}\n`)
    return undefined
  }
}

/**
 * Create pino logger with graceful fallback
 * If transport initialization fails, falls back to plain JSON logging
 */
function createLogger(): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    level: logLevel,
    base: {
      pid: process.pid,
      name: 'httpward',
    },
    timestamp,
  }

  const fileStream = createRotatingFileStream()

  try {
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
            ignore: 'pid,name',
            singleLine: false,
          },
        },
      })
    }

    // Info/debug/warn → stdout, error/fatal → stderr
    return pino(baseConfig, pino.multistream([
      { level: 'trace', stream: process.stdout },
      { level: 'error', stream: process.stderr },
    ]))
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    process.stderr.write(`[logger] Failed to initialize transport, falling back to JSON output: ${message}\n`)
    return pino(baseConfig)
  }
}

const pinoLogger = createLogger()

/**
 * Flush buffered logs, used before process exit
 */
export function flushLogs(): void {
  try {
    pinoLogger.flush()
  } catch {
    // flushing a closed stream during shutdown is harmless
  }
}

/**
 * Change the active log level at runtime
 */
export function setLogLevel(level: string): void {
  if (!LOG_LEVELS.includes(level)) {
    throw new Error(`Unknown log level: ${level}`)
  }
  pinoLogger.level = level
}

export function getLogLevel(): string {
  return pinoLogger.level
}

type LogData = Record<string, unknown>

/**
 * Logger API: logger.info('message', { data })
 */
export const logger = {
  debug(message: string, data: LogData = {}) {
    pinoLogger.debug(data, message)
  },

  info(message: string, data: LogData = {}) {
    pinoLogger.info(data, message)
  },

  warn(message: string, data: LogData = {}) {
    pinoLogger.warn(data, message)
  },

  error(message: string, data: LogData = {}) {
    pinoLogger.error(data, message)
  },

  isLevelEnabled(level: 'debug' | 'info' | 'warn' | 'error'): boolean {
    return pinoLogger.isLevelEnabled(level)
  },
}

export default logger
