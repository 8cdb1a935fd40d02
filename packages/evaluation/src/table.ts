import { SchemaError } from '@fairness-check/shared'
import type { ColumnNames, JsonValue, Label, Sample, SensitiveValue, Table } from '@fairness-check/types'

export type { Table }

/** The three parallel sequences an evaluation runs on. */
export interface EvaluationColumns {
  features: Sample[]
  labels: Label[]
  sensitive: SensitiveValue[]
}

export const DEFAULT_COLUMNS: ColumnNames = {
  features: 'features',
  label: 'label',
  sensitive: 'sensitive_attribute',
}

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/

function toLabel(value: JsonValue | undefined): Label | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value
  if (typeof value === 'boolean') return value ? 1 : 0
  if (typeof value === 'string' && INTEGER_STRING.test(value)) return Number.parseInt(value.trim(), 10)
  return undefined
}

function toSensitive(value: JsonValue | undefined): SensitiveValue | undefined {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value
  return undefined
}

/**
 * Pick the features, label and sensitive-attribute columns out of a table.
 *
 * Every configured column must be present. Labels must be integers (or
 * integer strings) and sensitive values must be strings, numbers or
 * booleans; otherwise a SchemaError names the column and row.
 */
export function selectColumns(table: Table, names: ColumnNames): EvaluationColumns {
  for (const column of [names.features, names.label, names.sensitive]) {
    if (!table.columns.includes(column)) throw new SchemaError(column)
  }

  const features: Sample[] = []
  const labels: Label[] = []
  const sensitive: SensitiveValue[] = []

  table.rows.forEach((row, index) => {
    const rawLabel = row[names.label]
    const label = toLabel(rawLabel)
    if (label === undefined) {
      throw new SchemaError(
        names.label,
        `Column '${names.label}' row ${index}: label ${JSON.stringify(rawLabel ?? null)} is not an integer`,
        index,
      )
    }

    const rawGroup = row[names.sensitive]
    const group = toSensitive(rawGroup)
    if (group === undefined) {
      throw new SchemaError(
        names.sensitive,
        `Column '${names.sensitive}' row ${index}: sensitive value ${JSON.stringify(rawGroup ?? null)} must be a string, number or boolean`,
        index,
      )
    }

    features.push(row[names.features] ?? null)
    labels.push(label)
    sensitive.push(group)
  })

  return { features, labels, sensitive }
}
