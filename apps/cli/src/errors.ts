import {
  ConfigurationError,
  DatasetError,
  EndpointError,
  ResponseFormatError,
  SchemaError,
} from '@fairness-check/shared'
import { assertNever } from '@fairness-check/types'

const NETWORK_HINTS: Record<string, string> = {
  ECONNREFUSED: 'Cannot connect to the endpoint. Is the classifier running?',
  ECONNRESET: 'The endpoint closed the connection. Check its logs.',
  ENOTFOUND: 'The endpoint host could not be resolved. Check endpoint.url.',
  EAI_AGAIN: 'The endpoint host could not be resolved. Check your network connection.',
}

export interface ErrorDescription {
  message: string
  hint?: string
}

function endpointHint(err: EndpointError): string | undefined {
  switch (err.reason) {
    case 'status':
      if (err.status === 401 || err.status === 403) {
        return 'Check endpoint.auth_token or FAIRNESS_CHECK_AUTH_TOKEN.'
      }
      if (err.status === 404 || err.status === 405) {
        return 'Check endpoint.url and endpoint.method.'
      }
      return 'The endpoint rejected the request. Check its logs.'
    case 'timeout':
      return 'Increase endpoint.timeout or check that the endpoint is responsive.'
    case 'network':
      return (err.code ? NETWORK_HINTS[err.code] : undefined) ?? 'Check endpoint.url and your network connection.'
    case 'closed':
      return undefined
    default:
      return assertNever(err.reason)
  }
}

/** Message and, where one exists, a next step for the user. */
export function describeError(err: unknown): ErrorDescription {
  if (!(err instanceof Error)) {
    return { message: String(err) }
  }

  if (err instanceof ConfigurationError) {
    return {
      message: err.message,
      hint: err.issues.length > 0 ? 'Fix the fields listed above in the configuration file.' : undefined,
    }
  }
  if (err instanceof DatasetError) {
    return {
      message: err.message,
      hint: 'Check dataset.path. A relative path is resolved against the configuration file.',
    }
  }
  if (err instanceof SchemaError) {
    return {
      message: err.message,
      hint: 'Check features_column, labels_column and sensitive_column in the dataset section.',
    }
  }
  if (err instanceof EndpointError) {
    return { message: err.message, hint: endpointHint(err) }
  }
  if (err instanceof ResponseFormatError) {
    return {
      message: err.message,
      hint: "The endpoint must answer with a JSON object holding an integer 'inference', 'prediction' or 'class'.",
    }
  }
  return { message: err.message }
}

/** Stack of `err` followed by each cause, for --verbose. */
export function causeChain(err: unknown): string[] {
  const lines: string[] = []
  let current: unknown = err
  for (let depth = 0; depth < 5 && current !== undefined; depth++) {
    const text = current instanceof Error ? (current.stack ?? `${current.name}: ${current.message}`) : String(current)
    lines.push(depth === 0 ? text : `Caused by: ${text}`)
    current = current instanceof Error ? current.cause : undefined
  }
  return lines
}
