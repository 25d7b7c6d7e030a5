export const HeaderNames = {
  CONTENT_TYPE: 'Content-Type',
  ACCEPT: 'Accept',
  AUTHORIZATION: 'Authorization',
  USER_AGENT: 'User-Agent',
} as const

export const ContentTypes = {
  APPLICATION_JSON: 'application/json',
  APPLICATION_FORM: 'application/x-www-form-urlencoded',
  PROBLEM_JSON: 'application/problem+json',
  TEXT_PLAIN: 'text/plain',
} as const

export type HeaderMap = Record<string, string>

/**
 * Content-Type and Accept for JSON APIs
 */
export function defaultJsonHeaders(): HeaderMap {
  return {
    [HeaderNames.CONTENT_TYPE]: ContentTypes.APPLICATION_JSON,
    [HeaderNames.ACCEPT]: ContentTypes.APPLICATION_JSON,
  }
}

/**
 * Merge header sets left to right. Names compare case-insensitively;
 * a later value replaces an earlier one and takes its spelling.
 */
export function mergeHeaders(...sources: Array<Readonly<HeaderMap> | undefined>): HeaderMap {
  const merged: HeaderMap = {}
  const namesByLowerCase = new Map<string, string>()

  for (const source of sources) {
    if (!source) continue
    for (const [name, value] of Object.entries(source)) {
      const existing = namesByLowerCase.get(name.toLowerCase())
      if (existing !== undefined) {
        delete merged[existing]
      }
      merged[name] = value
      namesByLowerCase.set(name.toLowerCase(), name)
    }
  }

  return merged
}

export function bearerAuth(token: string): HeaderMap {
  return { [HeaderNames.AUTHORIZATION]: `Bearer ${token}` }
}

export function basicAuth(username: string, password: string): HeaderMap {
  const encoded = Buffer.from(`${username}:${password}`, 'utf8').toString('base64')
  return { [HeaderNames.AUTHORIZATION]: `Basic ${encoded}` }
}
