// Domain types shared by the engine, the CLI and the demo classifier.

export type { JsonPrimitive, JsonValue, JsonObject } from './json'

export type {
  Sample,
  Table,
  Label,
  SensitiveValue,
  PredictionSequence,
  FairnessThresholds,
  ColumnNames,
  GroupReport,
  EvaluationReport,
  RunState,
  HttpMethod,
  EndpointSettings,
} from './evaluation'

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`)
}
