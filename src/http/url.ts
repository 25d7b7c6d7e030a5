import { ConfigError } from '../utils/TransportError'

export function isAbsoluteUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://')
}

/**
 * An absolute endpoint only makes sense when no base URL is configured
 */
export function checkEndpoint(baseUrl: string, endpoint: string): ConfigError | undefined {
  if (isAbsoluteUrl(endpoint) && baseUrl !== '' && baseUrl !== '/') {
    return new ConfigError(
      `Cannot use absolute URL '${endpoint}' with base URL '${baseUrl}'. ` +
      'Either use a relative path or set base URL to empty string.'
    )
  }
  return undefined
}

/**
 * Join base URL, endpoint and query string. Throws ConfigError for an absolute
 * endpoint combined with a base URL.
 */
export function buildUrl(baseUrl: string, endpoint: string, queryParams: Readonly<Record<string, string>> = {}): string {
  const conflict = checkEndpoint(baseUrl, endpoint)
  if (conflict) {
    throw conflict
  }

  let url: string
  if (isAbsoluteUrl(endpoint) || baseUrl === '') {
    url = endpoint
  } else {
    url = `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`
  }

  const query = new URLSearchParams(queryParams).toString()
  if (!query) {
    return url
  }
  return `${url}${url.includes('?') ? '&' : '?'}${query}`
}
