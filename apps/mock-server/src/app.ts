/**
 * Demonstration classifier.
 *
 * Answers every inference request with `{ inference, features }`: random
 * labels on `/classify` and `/classify/random`, always 1 on
 * `/classify/biased`. Useful for trying a configuration end to end.
 */

import { Hono, type Context } from 'hono'
import { HTTPException } from 'hono/http-exception'
import { inferenceRequestSchema, silentLogger, type InferenceResponse, type Logger } from '@fairness-check/shared'
import { requestLogger } from './lib/request-logger'
import { parseBody, isResponse } from './lib/validate'

export const SERVICE_INFO = {
  service: 'Mock Classifier API',
  version: '1.0',
  endpoints: {
    '/classify': 'POST - Classify features and return prediction',
    '/classify/random': 'POST - Random predictions for testing',
    '/classify/biased': 'POST - Biased predictions for testing',
    '/health': 'GET - Health check',
  },
} as const

export const BIASED_NOTE = 'This is an intentionally biased endpoint for testing'

export interface AppOptions {
  /** Uniform source in [0, 1). Defaults to Math.random. */
  random?: () => number
  logger?: Logger
}

export function createApp(options: AppOptions = {}) {
  const random = options.random ?? Math.random
  const logger = options.logger ?? silentLogger

  const app = new Hono()

  // ─── Error handling ─────────────────────────────────────────────────────

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse()
    }
    logger.error('unhandled_error', { method: c.req.method, path: c.req.path, error: err })
    return c.json({ error: 'Internal server error.' }, 500)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  app.use('*', requestLogger(logger))

  // ─── Info ───────────────────────────────────────────────────────────────

  app.get('/', (c) => c.json(SERVICE_INFO))

  app.get('/health', (c) => c.json({ status: 'healthy' }))

  // ─── Classification ─────────────────────────────────────────────────────

  const randomLabel = (): number => (random() < 0.5 ? 0 : 1)

  const classifyRandom = async (c: Context) => {
    const body = await parseBody(c, inferenceRequestSchema)
    if (isResponse(body)) return body

    const reply: InferenceResponse = { inference: randomLabel(), features: body.features }
    return c.json(reply)
  }

  app.post('/classify', classifyRandom)
  app.post('/classify/random', classifyRandom)

  app.post('/classify/biased', async (c) => {
    const body = await parseBody(c, inferenceRequestSchema)
    if (isResponse(body)) return body

    const reply: InferenceResponse = { inference: 1, features: body.features, note: BIASED_NOTE }
    return c.json(reply)
  })

  return app
}
