export {
  runEvaluation,
  collectPredictions,
  buildReport,
  withClient,
  DEFAULT_PROGRESS_INTERVAL,
  type EvaluationOptions,
  type CollectOptions,
  type ProgressListener,
} from './evaluate'
export { EvaluationRun, RUN_TRANSITIONS, type StateListener } from './state'
export { selectColumns, DEFAULT_COLUMNS, type Table, type EvaluationColumns } from './table'
