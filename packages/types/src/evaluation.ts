import type { JsonValue } from './json'

/** One row's features. Opaque to the engine; sent to the endpoint verbatim. */
export type Sample = JsonValue

/** Tabular rows as handed over by a dataset loader. */
export interface Table {
  /** Column names in file order. */
  columns: readonly string[]
  rows: ReadonlyArray<Readonly<Record<string, JsonValue>>>
}

/** Binary class label, conventionally 0 or 1. */
export type Label = number

/** Value of the protected attribute. Groups are formed by exact equality. */
export type SensitiveValue = string | number | boolean

/** Predictions in dataset row order, one per sample. */
export type PredictionSequence = readonly Label[]

/** Maximum tolerated fairness differences. */
export interface FairnessThresholds {
  demographicParity: number
  equalOpportunity: number
}

/** Column names selected from the dataset. */
export interface ColumnNames {
  features: string
  label: string
  sensitive: string
}

/** Per-group breakdown of the values the fairness differences come from. */
export interface GroupReport {
  value: SensitiveValue
  size: number
  selection_rate: number
  /** Null when the group has no positive labels. */
  true_positive_rate: number | null
}

/** Outcome of one evaluation run. Field names match the JSON report. */
export interface EvaluationReport {
  total_predictions: number
  accuracy: number
  fairness_metrics: {
    demographic_parity_difference: number
    equal_opportunity_difference: number
  }
  thresholds_met: {
    demographic_parity: boolean
    equal_opportunity: boolean
  }
  thresholds: {
    demographic_parity: number
    equal_opportunity: number
  }
  groups: GroupReport[]
}

/** Lifecycle of an evaluation run. */
export type RunState = 'idle' | 'loading' | 'inferring' | 'aggregating' | 'done' | 'failed'

export type HttpMethod = 'GET' | 'POST'

/** Resolved endpoint settings, read-only for the run. */
export interface EndpointSettings {
  url: string
  method: HttpMethod
  headers: Readonly<Record<string, string>>
  /** Per-request timeout in milliseconds. */
  timeoutMs: number
  authToken?: string
}
