import type { EndpointSettings, Sample } from '@fairness-check/types'

/** Query parameter and body key carrying the sample. */
export const FEATURES_KEY = 'features'

export interface PreparedRequest {
  url: string
  init: RequestInit
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const lower = name.toLowerCase()
  return Object.keys(headers).some((key) => key.toLowerCase() === lower)
}

/**
 * Session headers: configured headers plus `Authorization: Bearer <token>`
 * when a token is set. The bearer header replaces any configured
 * Authorization header regardless of its casing.
 */
export function buildHeaders(settings: EndpointSettings): Record<string, string> {
  const headers: Record<string, string> = {}
  for (const [key, value] of Object.entries(settings.headers)) {
    if (settings.authToken && key.toLowerCase() === 'authorization') continue
    headers[key] = value
  }
  if (settings.authToken) {
    headers['Authorization'] = `Bearer ${settings.authToken}`
  }
  return headers
}

function isPrimitive(value: Sample): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

/**
 * Append a sample to a query string under `features`.
 *
 * - primitives are sent as their string form
 * - arrays of primitives become a repeated parameter
 * - null and empty arrays add nothing
 * - anything else is sent as JSON text
 */
export function appendFeaturesQuery(params: URLSearchParams, sample: Sample): void {
  if (sample === null) return
  if (isPrimitive(sample)) {
    params.append(FEATURES_KEY, String(sample))
    return
  }
  if (Array.isArray(sample) && sample.every(isPrimitive)) {
    for (const item of sample) params.append(FEATURES_KEY, String(item))
    return
  }
  params.append(FEATURES_KEY, JSON.stringify(sample))
}

/** Build the URL and fetch init for one sample. */
export function buildRequest(
  settings: EndpointSettings,
  headers: Record<string, string>,
  sample: Sample,
): PreparedRequest {
  if (settings.method === 'GET') {
    const url = new URL(settings.url)
    appendFeaturesQuery(url.searchParams, sample)
    return { url: url.toString(), init: { method: 'GET', headers: { ...headers } } }
  }

  const postHeaders = { ...headers }
  if (!hasHeader(postHeaders, 'content-type')) {
    postHeaders['Content-Type'] = 'application/json'
  }
  return {
    url: settings.url,
    init: {
      method: 'POST',
      headers: postHeaders,
      body: JSON.stringify({ [FEATURES_KEY]: sample }),
    },
  }
}
