/**
 * Evaluation orchestrator.
 *
 * Loads the three columns, asks the inference client for one label per row
 * (strictly in row order, one request at a time), then computes accuracy and
 * the fairness differences and compares each with its own threshold.
 *
 * All-or-nothing: the first error aborts the run and is rethrown as is.
 * No partial predictions or report ever leave this module.
 */

import type { InferenceClient } from '@fairness-check/inference-client'
import {
  accuracy,
  demographicParityDifference,
  equalOpportunityDifference,
  selectionRates,
  truePositiveRates,
} from '@fairness-check/metrics'
import { silentLogger, type Logger } from '@fairness-check/shared'
import type {
  ColumnNames,
  EvaluationReport,
  FairnessThresholds,
  GroupReport,
  Label,
  RunState,
  Sample,
  SensitiveValue,
} from '@fairness-check/types'
import { EvaluationRun, type StateListener } from './state'
import { DEFAULT_COLUMNS, selectColumns, type Table } from './table'

/** Rows between two progress log entries. */
export const DEFAULT_PROGRESS_INTERVAL = 10

export type ProgressListener = (completed: number, total: number) => void

export interface EvaluationOptions {
  table: Table
  thresholds: FairnessThresholds
  /** Called once per run, after the columns are validated. */
  createClient: () => InferenceClient
  columns?: Partial<ColumnNames>
  logger?: Logger
  progressInterval?: number
  onProgress?: ProgressListener
  onStateChange?: StateListener
}

// ─── Scoped client ───────────────────────────────────────────────────────────

/** Run `fn` with a fresh client and close it on every exit path. */
export async function withClient<T>(
  createClient: () => InferenceClient,
  fn: (client: InferenceClient) => Promise<T>,
): Promise<T> {
  const client = createClient()
  try {
    return await fn(client)
  } finally {
    client.close()
  }
}

// ─── Inference loop ──────────────────────────────────────────────────────────

export interface CollectOptions {
  logger?: Logger
  progressInterval?: number
  onProgress?: ProgressListener
}

/**
 * Ask the client for every sample in order. `predictions[i]` is the label
 * for `features[i]`. The first failure propagates unchanged.
 */
export async function collectPredictions(
  client: InferenceClient,
  features: readonly Sample[],
  options: CollectOptions = {},
): Promise<Label[]> {
  const logger = options.logger ?? silentLogger
  const interval = Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL)
  const total = features.length
  const predictions: Label[] = new Array<Label>(total)

  for (let i = 0; i < total; i++) {
    predictions[i] = await client.infer(features[i] ?? null)

    const completed = i + 1
    options.onProgress?.(completed, total)
    if (completed % interval === 0) {
      logger.info('inference_progress', { completed, total })
    }
  }

  return predictions
}

// ─── Aggregation ─────────────────────────────────────────────────────────────

function groupReports(
  labels: readonly Label[],
  predictions: readonly Label[],
  sensitive: readonly SensitiveValue[],
): GroupReport[] {
  const tpr = new Map(truePositiveRates(labels, predictions, sensitive).map((g) => [g.value, g.rate]))
  return selectionRates(predictions, sensitive).map((g) => ({
    value: g.value,
    size: g.size,
    selection_rate: g.rate,
    true_positive_rate: tpr.get(g.value) ?? null,
  }))
}

/** Compute the report from complete, index-aligned sequences. */
export function buildReport(
  labels: readonly Label[],
  predictions: readonly Label[],
  sensitive: readonly SensitiveValue[],
  thresholds: FairnessThresholds,
): EvaluationReport {
  const dp = demographicParityDifference(predictions, sensitive)
  const eo = equalOpportunityDifference(labels, predictions, sensitive)

  return {
    total_predictions: predictions.length,
    accuracy: accuracy(labels, predictions),
    fairness_metrics: {
      demographic_parity_difference: dp,
      equal_opportunity_difference: eo,
    },
    thresholds_met: {
      demographic_parity: dp <= thresholds.demographicParity,
      equal_opportunity: eo <= thresholds.equalOpportunity,
    },
    thresholds: {
      demographic_parity: thresholds.demographicParity,
      equal_opportunity: thresholds.equalOpportunity,
    },
    groups: groupReports(labels, predictions, sensitive),
  }
}

// ─── Run ─────────────────────────────────────────────────────────────────────

export async function runEvaluation(options: EvaluationOptions): Promise<EvaluationReport> {
  const logger = options.logger ?? silentLogger
  const names: ColumnNames = { ...DEFAULT_COLUMNS, ...options.columns }
  const run = new EvaluationRun((state: RunState, previous: RunState) => {
    logger.debug('run_state', { from: previous, to: state })
    options.onStateChange?.(state, previous)
  })

  try {
    run.transition('loading')
    const { features, labels, sensitive } = selectColumns(options.table, names)
    logger.info('dataset_selected', { rows: features.length, columns: names })

    run.transition('inferring')
    const predictions = await withClient(options.createClient, (client) =>
      collectPredictions(client, features, {
        logger,
        progressInterval: options.progressInterval,
        onProgress: options.onProgress,
      }),
    )

    run.transition('aggregating')
    const report = buildReport(labels, predictions, sensitive, options.thresholds)

    run.transition('done')
    logger.info('evaluation_complete', {
      total: report.total_predictions,
      accuracy: report.accuracy,
      ...report.fairness_metrics,
    })
    return report
  } catch (err) {
    const failedIn = run.state
    run.fail()
    logger.info('evaluation_failed', { state: failedIn, error: err })
    throw err
  }
}
