/**
 * Environment overrides — validated on read, fail-fast.
 *
 * FAIRNESS_CHECK_AUTH_TOKEN   bearer token used when the config file has none
 * FAIRNESS_CHECK_LOG_LEVEL    debug | info | warn | error
 */

import { ConfigurationError, isLogLevel, type LogLevel } from '@fairness-check/shared'

export interface FairnessCheckEnv {
  authToken?: string
  logLevel?: LogLevel
}

function optional(source: NodeJS.ProcessEnv, key: string): string | undefined {
  const val = source[key]
  return val ? val : undefined
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): FairnessCheckEnv {
  const logLevel = optional(source, 'FAIRNESS_CHECK_LOG_LEVEL')
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid environment variable FAIRNESS_CHECK_LOG_LEVEL: '${logLevel}'. Use debug, info, warn or error.`,
      'FAIRNESS_CHECK_LOG_LEVEL',
    )
  }

  return {
    authToken: optional(source, 'FAIRNESS_CHECK_AUTH_TOKEN'),
    logLevel,
  }
}
