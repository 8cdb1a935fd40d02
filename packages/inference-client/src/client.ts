/**
 * HTTP inference client.
 *
 * One request per sample, one attempt per request. The client holds its
 * session (headers, timeout, in-flight requests) until `close()`.
 */

import { EndpointError, silentLogger, type Logger } from '@fairness-check/shared'
import type { EndpointSettings, Label, Sample } from '@fairness-check/types'
import { buildHeaders, buildRequest } from './request'
import { parseInferenceResponse } from './response'

// ─── Client Interface ────────────────────────────────────────────────────────

export interface InferenceClient {
  /** Obtain the label the endpoint assigns to one sample. */
  infer(sample: Sample): Promise<Label>
  /** Release the session. Safe to call more than once. */
  close(): void
}

/** Transport used by the client. Defaults to the global fetch. */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface HttpInferenceClientOptions {
  fetch?: FetchLike
  logger?: Logger
}

// ─── Error classification ────────────────────────────────────────────────────

/** First string `code` found on the error or its causes (ECONNREFUSED, ENOTFOUND, ...). */
export function systemErrorCode(error: unknown): string | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code
    current = current.cause
  }
  return undefined
}

function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) return String(error)
  return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message
}

// ─── HTTP Client ─────────────────────────────────────────────────────────────

export class HttpInferenceClient implements InferenceClient {
  private readonly headers: Record<string, string>
  private readonly fetchImpl: FetchLike
  private readonly logger: Logger
  private readonly inFlight = new Set<AbortController>()
  private closed = false

  constructor(
    private readonly settings: EndpointSettings,
    options: HttpInferenceClientOptions = {},
  ) {
    this.headers = buildHeaders(settings)
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init))
    this.logger = options.logger ?? silentLogger
  }

  get isClosed(): boolean {
    return this.closed
  }

  async infer(sample: Sample): Promise<Label> {
    if (this.closed) {
      throw new EndpointError('Inference client is closed', { reason: 'closed', url: this.settings.url })
    }

    const { url, init } = buildRequest(this.settings, this.headers, sample)
    const start = performance.now()
    const { response, body } = await this.send(url, init)
    this.logger.debug('inference_response', {
      status: response.status,
      ms: Number((performance.now() - start).toFixed(1)),
    })

    if (!response.ok) {
      throw new EndpointError(
        `Failed to get inference from endpoint: HTTP ${response.status} ${response.statusText}`.trimEnd(),
        { reason: 'status', url: this.settings.url, status: response.status },
      )
    }

    return parseInferenceResponse(body)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const controller of this.inFlight) controller.abort()
    this.inFlight.clear()
  }

  private async send(url: string, init: RequestInit): Promise<{ response: Response; body: string }> {
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, this.settings.timeoutMs)
    this.inFlight.add(controller)

    try {
      const response = await this.fetchImpl(url, { ...init, redirect: 'follow', signal: controller.signal })
      const body = await response.text()
      return { response, body }
    } catch (err) {
      throw this.classify(err, timedOut)
    } finally {
      clearTimeout(timer)
      this.inFlight.delete(controller)
    }
  }

  private classify(error: unknown, timedOut: boolean): EndpointError {
    const url = this.settings.url
    if (timedOut) {
      return new EndpointError(
        `Failed to get inference from endpoint: request timed out after ${this.settings.timeoutMs}ms`,
        { reason: 'timeout', url, code: 'ETIMEDOUT', cause: error },
      )
    }
    if (this.closed) {
      return new EndpointError('Inference client was closed during the request', {
        reason: 'closed',
        url,
        cause: error,
      })
    }
    return new EndpointError(`Failed to get inference from endpoint: ${describeFailure(error)}`, {
      reason: 'network',
      url,
      code: systemErrorCode(error),
      cause: error,
    })
  }
}

/** Create the client used for one evaluation run. */
export function createInferenceClient(
  settings: EndpointSettings,
  options: HttpInferenceClientOptions = {},
): InferenceClient {
  return new HttpInferenceClient(settings, options)
}
