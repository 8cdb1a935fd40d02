/**
 * Environment variables for the demonstration classifier. Read once at
 * startup; an invalid value stops the process before it binds a port.
 */

import { isLogLevel, type LogLevel } from '@fairness-check/shared'

function optional(source: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const val = source[key]
  return val === undefined || val === '' ? fallback : val
}

export interface ServerEnv {
  PORT: number
  LOG_LEVEL: LogLevel
}

export function readServerEnv(source: NodeJS.ProcessEnv = process.env): ServerEnv {
  const port = Number(optional(source, 'PORT', '8000'))
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`Invalid PORT: ${source['PORT']}. Expected an integer between 0 and 65535.`)
  }

  const level = optional(source, 'LOG_LEVEL', 'info')
  if (!isLogLevel(level)) {
    throw new Error(`Invalid LOG_LEVEL: ${level}. Expected one of debug, info, warn, error.`)
  }

  return { PORT: port, LOG_LEVEL: level }
}
