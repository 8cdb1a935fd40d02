import type { Config, DatasetConfig, EndpointConfig, FairnessConfig } from '@fairness-check/shared'
import type { ColumnNames, EndpointSettings, FairnessThresholds } from '@fairness-check/types'

/** Endpoint section as the inference client takes it (timeout in ms). */
export function toEndpointSettings(endpoint: EndpointConfig): EndpointSettings {
  return {
    url: endpoint.url,
    method: endpoint.method,
    headers: endpoint.headers,
    timeoutMs: Math.round(endpoint.timeout * 1000),
    ...(endpoint.auth_token ? { authToken: endpoint.auth_token } : {}),
  }
}

export function toThresholds(fairness: FairnessConfig): FairnessThresholds {
  return {
    demographicParity: fairness.demographic_parity_threshold,
    equalOpportunity: fairness.equal_opportunity_threshold,
  }
}

export function toColumnNames(dataset: DatasetConfig): ColumnNames {
  return {
    features: dataset.features_column,
    label: dataset.labels_column,
    sensitive: dataset.sensitive_column,
  }
}

/** Everything one evaluation run needs from a validated config. */
export function resolveRunSettings(config: Config): {
  endpoint: EndpointSettings
  thresholds: FairnessThresholds
  columns: ColumnNames
  datasetPath: string
} {
  return {
    endpoint: toEndpointSettings(config.endpoint),
    thresholds: toThresholds(config.fairness),
    columns: toColumnNames(config.dataset),
    datasetPath: config.dataset.path,
  }
}
