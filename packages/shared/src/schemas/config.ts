import { z } from 'zod'

export const endpointConfigSchema = z.object({
  url: z.string().url('Endpoint URL must be a valid URL'),
  method: z
    .string()
    .default('POST')
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(['GET', 'POST'], { errorMap: () => ({ message: 'Method must be GET or POST' }) })),
  headers: z.record(z.string()).default({}),
  /** Seconds. */
  timeout: z.number().positive('Timeout must be positive').default(30),
  auth_token: z.string().min(1).nullish(),
})

export const datasetConfigSchema = z.object({
  path: z.string().min(1, 'Dataset path is required'),
  features_column: z.string().min(1).default('features'),
  labels_column: z.string().min(1).default('label'),
  sensitive_column: z.string().min(1).default('sensitive_attribute'),
})

export const fairnessConfigSchema = z.object({
  demographic_parity_threshold: z.number().min(0, 'Threshold must be non-negative').default(0.1),
  equal_opportunity_threshold: z.number().min(0, 'Threshold must be non-negative').default(0.1),
})

export const configSchema = z.object({
  endpoint: endpointConfigSchema,
  dataset: datasetConfigSchema,
  fairness: fairnessConfigSchema.default({}),
})

export type EndpointConfig = z.infer<typeof endpointConfigSchema>
export type DatasetConfig = z.infer<typeof datasetConfigSchema>
export type FairnessConfig = z.infer<typeof fairnessConfigSchema>
export type Config = z.infer<typeof configSchema>
export type ConfigInput = z.input<typeof configSchema>
