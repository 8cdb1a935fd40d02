import { z } from 'zod'
import type { JsonValue } from '@fairness-check/types'

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
)

/** Body of every inference request: `{ "features": <any JSON value> }`. */
export const inferenceRequestSchema = z.object({
  features: jsonValueSchema,
})

/** Response shape of the demonstration classifier. */
export const inferenceResponseSchema = z.object({
  inference: z.number().int(),
  features: jsonValueSchema,
  note: z.string().optional(),
})

export type InferenceRequest = z.infer<typeof inferenceRequestSchema>
export type InferenceResponse = z.infer<typeof inferenceResponseSchema>
