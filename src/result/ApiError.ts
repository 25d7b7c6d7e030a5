export enum ApiErrorType {
  HTTP_ERROR = 'HTTP_ERROR',
  AUTH_ERROR = 'AUTH_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

/**
 * Failure value returned by the Result-based API
 */
export class ApiError {
  constructor(
    readonly message: string,
    readonly statusCode: number,
    readonly responseBody: string | undefined,
    readonly errorType: ApiErrorType
  ) {}

  static httpError(message: string, statusCode: number, responseBody?: string): ApiError {
    return new ApiError(message, statusCode, responseBody, ApiErrorType.HTTP_ERROR)
  }

  static authError(message: string, statusCode: number, responseBody?: string): ApiError {
    return new ApiError(message, statusCode, responseBody, ApiErrorType.AUTH_ERROR)
  }

  static networkError(message: string): ApiError {
    return new ApiError(message, 0, undefined, ApiErrorType.NETWORK_ERROR)
  }

  static circuitOpenError(message: string): ApiError {
    return new ApiError(message, 0, undefined, ApiErrorType.CIRCUIT_OPEN)
  }

  static configError(message: string, statusCode: number = 0, responseBody?: string): ApiError {
    return new ApiError(message, statusCode, responseBody, ApiErrorType.CONFIG_ERROR)
  }

  isType(type: ApiErrorType): boolean {
    return this.errorType === type
  }

  hasStatusCode(statusCode: number): boolean {
    return this.statusCode === statusCode
  }

  toString(): string {
    const status = this.statusCode > 0 ? ` (Status: ${this.statusCode})` : ''
    return `${this.errorType}: ${this.message}${status}`
  }
}
