import { ResponseFormatError } from '@fairness-check/shared'
import type { Label } from '@fairness-check/types'

/** Keys that may carry the label, in priority order. First present key wins. */
export const LABEL_KEYS = ['inference', 'prediction', 'class'] as const

export type LabelKey = (typeof LABEL_KEYS)[number]

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/

/** Longest slice of a raw body quoted in error messages. */
const MAX_QUOTED_BODY = 200

function quote(value: unknown): string {
  if (value === undefined) return 'undefined'
  return JSON.stringify(value) ?? String(value)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function withoutNegativeZero(n: number): number {
  return n === 0 ? 0 : n
}

/**
 * Convert a response value to an integer label.
 *
 * Precedence:
 * 1. integer number: returned as is
 * 2. boolean: true → 1, false → 0
 * 3. other finite number: truncated toward zero
 * 4. string of digits (optional sign, surrounding whitespace): parsed
 *
 * Everything else is rejected with a ResponseFormatError naming the value.
 */
export function coerceLabel(value: unknown): Label {
  if (typeof value === 'number') {
    if (Number.isInteger(value)) return withoutNegativeZero(value)
    if (Number.isFinite(value)) return withoutNegativeZero(Math.trunc(value))
  } else if (typeof value === 'boolean') {
    return value ? 1 : 0
  } else if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    return withoutNegativeZero(Number.parseInt(value.trim(), 10))
  }
  throw new ResponseFormatError(
    `Invalid response format: cannot convert ${quote(value)} to an integer label`,
    { value },
  )
}

/** Find the label value in a parsed response body. */
export function extractLabel(data: unknown): { key: LabelKey; value: unknown } {
  if (isRecord(data)) {
    for (const key of LABEL_KEYS) {
      if (Object.hasOwn(data, key)) return { key, value: data[key] }
    }
  }
  throw new ResponseFormatError(
    `Invalid response format: expected one of ${LABEL_KEYS.join(', ')} in ${quote(data)}`,
    { value: data },
  )
}

/** Parse a raw response body into a label. */
export function parseInferenceResponse(body: string): Label {
  let data: unknown
  try {
    data = JSON.parse(body)
  } catch (err) {
    const shown = body.length > MAX_QUOTED_BODY ? `${body.slice(0, MAX_QUOTED_BODY)}...` : body
    throw new ResponseFormatError(`Invalid response format: body is not JSON: ${shown}`, { body, cause: err })
  }
  return coerceLabel(extractLabel(data).value)
}
