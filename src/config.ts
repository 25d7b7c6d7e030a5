import dotenv from 'dotenv'
import { FailurePolicy } from './utils/circuit-breaker'

// Load environment variables from .env file (override existing env vars)
dotenv.config({ override: true })

export interface CircuitBreakerSettings {
  enabled: boolean
  failureThreshold: number
  resetTimeoutMs: number
  failureDecayMs: number
  failurePolicy: FailurePolicy
}

export interface RetrySettings {
  enabled: boolean
  maxRetries: number
  initialDelayMs: number
  backoffMultiplier: number
  maxDelayMs: number
}

export interface AuthRetrySettings {
  enabled: boolean
  maxRetries: number
  delayMs: number
}

export interface LoggingSettings {
  enabled: boolean
  timingEnabled: boolean
  logRequestBody: boolean
  logResponseBody: boolean
  maxLoggedBodyLength: number
}

export interface ClientConfig {
  // Transport
  baseUrl: string
  timeoutMs: number

  // Resilience
  circuitBreaker: CircuitBreakerSettings
  retry: RetrySettings
  authRetry: AuthRetrySettings

  // Async adapter
  asyncPoolSize: number

  // Logging
  logging: LoggingSettings
  /** Applied to the shared logger by RestClient; unset leaves the level from the environment */
  logLevel?: 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent'
}

type Env = Record<string, string | undefined>

function readInt(env: Env, name: string, fallback: number): number {
  const value = parseInt(env[name] || '', 10)
  return Number.isNaN(value) ? fallback : value
}

function readFloat(env: Env, name: string, fallback: number): number {
  const value = parseFloat(env[name] || '')
  return Number.isNaN(value) ? fallback : value
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const value = env[name]?.trim().toLowerCase()
  if (value === 'true' || value === '1') return true
  if (value === 'false' || value === '0') return false
  return fallback
}

function readPolicy(value: string | undefined): FailurePolicy {
  return Object.values(FailurePolicy).find(policy => policy === value) ?? FailurePolicy.ALL_EXCEPTIONS
}

function readLogLevel(value: string | undefined): ClientConfig['logLevel'] {
  switch (value) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return value
    default:
      return undefined
  }
}

/**
 * Built-in defaults, identical to loading an empty environment
 */
export function defaultConfig(): ClientConfig {
  return loadConfig({})
}

/**
 * Load client configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ClientConfig {
  return {
    baseUrl: env.HTTP_BASE_URL || '',
    timeoutMs: readInt(env, 'HTTP_TIMEOUT_MS', 30000),

    circuitBreaker: {
      enabled: readBool(env, 'CIRCUIT_BREAKER_ENABLED', true),
      failureThreshold: readInt(env, 'CIRCUIT_BREAKER_FAILURE_THRESHOLD', 5),
      resetTimeoutMs: readInt(env, 'CIRCUIT_BREAKER_RESET_TIMEOUT_MS', 30000),
      failureDecayMs: readInt(env, 'CIRCUIT_BREAKER_DECAY_MS', 60000),
      failurePolicy: readPolicy(env.CIRCUIT_BREAKER_FAILURE_POLICY),
    },

    retry: {
      enabled: readBool(env, 'RETRY_ENABLED', true),
      maxRetries: readInt(env, 'RETRY_MAX', 3),
      initialDelayMs: readInt(env, 'RETRY_INITIAL_DELAY_MS', 1000),
      backoffMultiplier: readFloat(env, 'RETRY_BACKOFF_MULTIPLIER', 2.0),
      maxDelayMs: readInt(env, 'RETRY_MAX_DELAY_MS', 30000),
    },

    authRetry: {
      enabled: readBool(env, 'AUTH_RETRY_ENABLED', true),
      maxRetries: readInt(env, 'AUTH_RETRY_MAX', 1),
      delayMs: readInt(env, 'AUTH_RETRY_DELAY_MS', 0),
    },

    asyncPoolSize: readInt(env, 'ASYNC_POOL_SIZE', 4),

    logging: {
      enabled: readBool(env, 'LOGGING_ENABLED', true),
      timingEnabled: readBool(env, 'TIMING_ENABLED', true),
      logRequestBody: readBool(env, 'LOG_REQUEST_BODY', false),
      logResponseBody: readBool(env, 'LOG_RESPONSE_BODY', false),
      maxLoggedBodyLength: readInt(env, 'MAX_LOGGED_BODY_LENGTH', 4000),
    },
    logLevel: readLogLevel(env.LOG_LEVEL),
  }
}

/**
 * Validate client configuration
 */
export function validateConfig(config: ClientConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = []

  if (config.baseUrl && !/^https?:\/\//.test(config.baseUrl) && config.baseUrl !== '/') {
    errors.push('Invalid HTTP_BASE_URL (must be empty or start with http:// or https://)')
  }

  if (config.timeoutMs <= 0) {
    errors.push('HTTP_TIMEOUT_MS must be greater than 0')
  }

  if (config.circuitBreaker.failureThreshold < 1) {
    errors.push('CIRCUIT_BREAKER_FAILURE_THRESHOLD must be at least 1')
  }

  if (config.circuitBreaker.resetTimeoutMs < 0 || config.circuitBreaker.failureDecayMs < 0) {
    errors.push('CIRCUIT_BREAKER_RESET_TIMEOUT_MS and CIRCUIT_BREAKER_DECAY_MS must not be negative')
  }

  if (config.circuitBreaker.failurePolicy === FailurePolicy.CUSTOM) {
    errors.push('CIRCUIT_BREAKER_FAILURE_POLICY=CUSTOM needs a predicate and cannot be set from the environment')
  }

  if (config.retry.maxRetries < 0 || config.retry.maxRetries > 10) {
    errors.push('RETRY_MAX must be between 0 and 10')
  }

  if (config.retry.backoffMultiplier < 1) {
    errors.push('RETRY_BACKOFF_MULTIPLIER must be at least 1')
  }

  if (config.retry.initialDelayMs < 0 || config.retry.maxDelayMs < config.retry.initialDelayMs) {
    errors.push('RETRY_MAX_DELAY_MS must be at least RETRY_INITIAL_DELAY_MS, both non-negative')
  }

  if (config.authRetry.maxRetries < 0) {
    errors.push('AUTH_RETRY_MAX must not be negative')
  }

  if (config.asyncPoolSize < 1 || config.asyncPoolSize > 64) {
    errors.push('ASYNC_POOL_SIZE must be between 1 and 64')
  }

  return {
    valid: errors.length === 0,
    errors,
  }
}
