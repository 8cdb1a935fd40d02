/**
 * Request logging middleware: one `request` entry per request with method,
 * path, response status and duration in ms.
 */

import type { Context, Next } from 'hono'
import type { Logger } from '@fairness-check/shared'

export function requestLogger(logger: Logger) {
  return async (c: Context, next: Next): Promise<void> => {
    const start = performance.now()
    await next()
    const ms = Number((performance.now() - start).toFixed(1))

    logger.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      ms,
    })
  }
}
