/**
 * Error taxonomy for fairness runs.
 *
 * Every failure that aborts a run is one of these. The orchestrator never
 * wraps or recovers them; the CLI decides how much of each to print.
 */

/** Base class for all errors raised by fairness-check. */
export class FairnessCheckError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FairnessCheckError'
  }
}

/** A configured dataset column is missing or holds values the engine cannot use. */
export class SchemaError extends FairnessCheckError {
  constructor(
    public readonly column: string,
    message: string = `Column '${column}' not found in dataset`,
    public readonly row?: number,
  ) {
    super(message)
    this.name = 'SchemaError'
  }
}

/**
 * Why an inference request failed.
 * - status: the endpoint answered with a non-2xx status
 * - timeout: no answer within the configured timeout
 * - network: connection refused, DNS failure, redirect loop, ...
 * - closed: the client was closed before or during the request
 */
export type EndpointFailureReason = 'status' | 'timeout' | 'network' | 'closed'

/** The inference endpoint could not be reached or answered with an error status. */
export class EndpointError extends FairnessCheckError {
  public readonly reason: EndpointFailureReason
  public readonly url: string
  public readonly status?: number
  /** System error code of the underlying failure, e.g. ECONNREFUSED. */
  public readonly code?: string

  constructor(
    message: string,
    details: {
      reason: EndpointFailureReason
      url: string
      status?: number
      code?: string
      cause?: unknown
    },
  ) {
    super(message, { cause: details.cause })
    this.name = 'EndpointError'
    this.reason = details.reason
    this.url = details.url
    this.status = details.status
    this.code = details.code
  }
}

/** The endpoint answered, but not with something that holds a usable label. */
export class ResponseFormatError extends FairnessCheckError {
  /** Raw response text, when the body was not JSON. */
  public readonly body?: string
  /** The offending parsed value, when the body was JSON. */
  public readonly value?: unknown

  constructor(message: string, details: { body?: string; value?: unknown; cause?: unknown } = {}) {
    super(message, { cause: details.cause })
    this.name = 'ResponseFormatError'
    this.body = details.body
    this.value = details.value
  }
}

/** The configuration file is missing, unreadable or invalid. */
export class ConfigurationError extends FairnessCheckError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ConfigurationError'
  }
}

/** The dataset file is missing, unreadable or malformed. */
export class DatasetError extends FairnessCheckError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'DatasetError'
  }
}
