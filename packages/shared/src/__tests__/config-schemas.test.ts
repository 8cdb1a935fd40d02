import { describe, it, expect } from 'vitest'
import {
  configSchema,
  endpointConfigSchema,
  datasetConfigSchema,
  fairnessConfigSchema,
  inferenceRequestSchema,
} from '../schemas/index'

// ─── Endpoint ───────────────────────────────────────────────────────────────

describe('endpointConfigSchema', () => {
  it('applies defaults', () => {
    const result = endpointConfigSchema.parse({ url: 'http://localhost:8000/classify' })
    expect(result).toEqual({
      url: 'http://localhost:8000/classify',
      method: 'POST',
      headers: {},
      timeout: 30,
    })
  })

  it('normalises the method to upper case', () => {
    const result = endpointConfigSchema.parse({ url: 'http://localhost/x', method: 'get' })
    expect(result.method).toBe('GET')
  })

  it('rejects methods other than GET and POST', () => {
    const result = endpointConfigSchema.safeParse({ url: 'http://localhost/x', method: 'PUT' })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Method must be GET or POST')
      expect(result.error.issues[0]?.path).toEqual(['method'])
    }
  })

  it('requires a valid URL', () => {
    expect(endpointConfigSchema.safeParse({ url: 'not a url' }).success).toBe(false)
    expect(endpointConfigSchema.safeParse({}).success).toBe(false)
  })

  it('rejects non-positive timeouts', () => {
    expect(endpointConfigSchema.safeParse({ url: 'http://localhost/x', timeout: 0 }).success).toBe(false)
  })

  it('accepts a null auth token from an empty YAML key', () => {
    const result = endpointConfigSchema.parse({ url: 'http://localhost/x', auth_token: null })
    expect(result.auth_token).toBeNull()
  })

  it('rejects non-string header values', () => {
    const result = endpointConfigSchema.safeParse({ url: 'http://localhost/x', headers: { 'X-Retry': 3 } })
    expect(result.success).toBe(false)
  })
})

// ─── Dataset ────────────────────────────────────────────────────────────────

describe('datasetConfigSchema', () => {
  it('defaults the column names', () => {
    expect(datasetConfigSchema.parse({ path: 'data/test.csv' })).toEqual({
      path: 'data/test.csv',
      features_column: 'features',
      labels_column: 'label',
      sensitive_column: 'sensitive_attribute',
    })
  })

  it('keeps custom column names', () => {
    const result = datasetConfigSchema.parse({
      path: 'data.csv',
      features_column: 'X',
      labels_column: 'y',
      sensitive_column: 'group',
    })
    expect(result.features_column).toBe('X')
    expect(result.labels_column).toBe('y')
    expect(result.sensitive_column).toBe('group')
  })

  it('requires a path', () => {
    expect(datasetConfigSchema.safeParse({}).success).toBe(false)
    expect(datasetConfigSchema.safeParse({ path: '' }).success).toBe(false)
  })
})

// ─── Fairness ───────────────────────────────────────────────────────────────

describe('fairnessConfigSchema', () => {
  it('defaults both thresholds to 0.1', () => {
    expect(fairnessConfigSchema.parse({})).toEqual({
      demographic_parity_threshold: 0.1,
      equal_opportunity_threshold: 0.1,
    })
  })

  it('accepts zero', () => {
    const result = fairnessConfigSchema.parse({ demographic_parity_threshold: 0 })
    expect(result.demographic_parity_threshold).toBe(0)
  })

  it('rejects negative thresholds', () => {
    const result = fairnessConfigSchema.safeParse({ equal_opportunity_threshold: -0.2 })
    expect(result.success).toBe(false)
  })
})

describe('configSchema', () => {
  it('fills in the fairness section when it is missing', () => {
    const config = configSchema.parse({
      endpoint: { url: 'http://localhost:8000/classify' },
      dataset: { path: 'test.csv' },
    })
    expect(config.fairness.demographic_parity_threshold).toBe(0.1)
    expect(config.fairness.equal_opportunity_threshold).toBe(0.1)
  })

  it('requires the endpoint and dataset sections', () => {
    const result = configSchema.safeParse({ fairness: {} })
    expect(result.success).toBe(false)
    if (!result.success) {
      const paths = result.error.issues.map((i) => i.path.join('.'))
      expect(paths).toContain('endpoint')
      expect(paths).toContain('dataset')
    }
  })
})

// ─── Wire ───────────────────────────────────────────────────────────────────

describe('inferenceRequestSchema', () => {
  it('accepts nested feature payloads', () => {
    const body = { features: { age: 25, tags: ['a', 'b'], extra: { ok: true, none: null } } }
    expect(inferenceRequestSchema.parse(body)).toEqual(body)
  })

  it('accepts a null feature payload', () => {
    expect(inferenceRequestSchema.safeParse({ features: null }).success).toBe(true)
  })

  it('requires the features key', () => {
    expect(inferenceRequestSchema.safeParse({ sample: 'x' }).success).toBe(false)
  })
})
