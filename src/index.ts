/**
 * httpward: composable HTTP execution runtime
 */

// Request model and contract
export type { Executor, ExecutorDecorator, HttpMethod, RequestBody, RequestSpec, ResponseType } from './http/types'
export { RequestBuilder, remainingTime, withHeaders } from './http/RequestBuilder'
export { ContentTypes, HeaderNames, basicAuth, bearerAuth, defaultJsonHeaders, mergeHeaders, type HeaderMap } from './http/headers'
export { buildUrl, checkEndpoint, isAbsoluteUrl } from './http/url'

// Failures and results
export {
  AuthRefreshError,
  CircuitOpenError,
  ConfigError,
  HttpError,
  NetworkError,
  TransportError,
  UnauthorizedError,
  getErrorInfo,
  getErrorMessage,
  getErrorStatus,
  isTransportError,
  type FailureKind,
  type ProblemDetails,
} from './utils/TransportError'
export { Result } from './result/Result'
export { ApiError, ApiErrorType } from './result/ApiError'

// Executors and decorators
export { FetchHttpClient, type FetchHttpClientOptions } from './http/FetchHttpClient'
export { CircuitBreakerHttpClient } from './http/decorators/CircuitBreakerHttpClient'
export { InterceptingHttpClient } from './http/decorators/InterceptingHttpClient'
export { LoggingHttpClient } from './http/decorators/LoggingHttpClient'
export {
  CircuitBreaker,
  CircuitState,
  FailurePolicy,
  type CircuitBreakerOptions,
  type CircuitBreakerStats,
  type FailurePredicate,
} from './utils/circuit-breaker'
export type { InterceptorChain, RequestInterceptor } from './http/interceptors/types'
export { RetryInterceptor, RetryInterceptorBuilder, isTransientFailure, type RetryOptions } from './http/interceptors/RetryInterceptor'
export { HeaderInterceptor } from './http/interceptors/HeaderInterceptor'

// Adapters
export { AsyncHttpClient } from './http/AsyncHttpClient'
export { FluentHttpClient, toApiError, toTransportError } from './http/FluentHttpClient'
export { WorkerPool } from './utils/worker-pool'
export { MockHttpClient, type MockResponder } from './http/MockHttpClient'

// Composition
export { HttpClientFactory, HttpClientBuilder, type ComposedClient } from './http/HttpClientFactory'
export { RequestOrchestrator, type OrchestratorOptions } from './api/RequestOrchestrator'
export { RestClient, type RestClientOptions } from './api/RestClient'

// Authentication
export { AuthType, type AuthStrategy } from './auth/AuthStrategy'
export { NoAuthStrategy } from './auth/NoAuthStrategy'
export { BasicAuthStrategy } from './auth/BasicAuthStrategy'
export { BearerTokenStrategy, type BearerToken, type BearerTokenOptions, type TokenRefresher } from './auth/BearerTokenStrategy'
export { createAuthStrategy, type AuthConfig } from './auth/createAuthStrategy'

// Configuration and logging
export { defaultConfig, loadConfig, validateConfig, type ClientConfig } from './config'
export { flushLogs, getLogLevel, logger, setLogLevel } from './utils/logger'
