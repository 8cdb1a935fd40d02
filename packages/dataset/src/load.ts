/**
 * Dataset loading.
 *
 * Turns a CSV, JSON or JSON-lines file into a Table. Cells are not
 * interpreted beyond number casting for CSV; choosing and validating the
 * evaluation columns is the orchestrator's job.
 */

import { readFile } from 'node:fs/promises'
import path from 'node:path'
import { parse as parseCsv } from 'csv-parse/sync'
import { DatasetError } from '@fairness-check/shared'
import type { JsonValue, Table } from '@fairness-check/types'

export type DatasetFormat = 'csv' | 'json' | 'jsonl'

const FORMATS: Record<string, DatasetFormat> = {
  '.csv': 'csv',
  '.json': 'json',
  '.jsonl': 'jsonl',
  '.ndjson': 'jsonl',
}

const NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/

type Row = Record<string, JsonValue>

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Union of row keys in first-seen order. */
function columnsOf(rows: readonly Row[]): string[] {
  const seen = new Set<string>()
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key)
  }
  return [...seen]
}

export function detectFormat(filePath: string): DatasetFormat {
  const ext = path.extname(filePath).toLowerCase()
  const format = FORMATS[ext]
  if (!format) {
    throw new DatasetError(
      `Unsupported dataset format '${ext || filePath}': use .csv, .json, .jsonl or .ndjson`,
      filePath,
    )
  }
  return format
}

/** CSV cell: numbers become numbers, everything else stays text. */
export function castCell(value: string): JsonValue {
  return NUMBER.test(value) ? Number(value) : value
}

export function parseCsvTable(text: string, source = '<csv>'): Table {
  let header: string[] = []
  let records: unknown
  try {
    records = parseCsv(text, {
      bom: true,
      skip_empty_lines: true,
      columns: (names: string[]) => {
        header = names.map((n) => n.trim())
        return header
      },
      cast: (value, context) => (context.header ? value : castCell(value)),
    })
  } catch (err) {
    throw new DatasetError(`Invalid CSV in ${source}: ${messageOf(err)}`, source, { cause: err })
  }

  const rows = Array.isArray(records) ? records.filter(isRow) : []
  return { columns: header, rows }
}

export function parseJsonTable(text: string, source = '<json>'): Table {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (err) {
    throw new DatasetError(`Invalid JSON dataset ${source}: ${messageOf(err)}`, source, { cause: err })
  }
  if (!Array.isArray(data)) {
    throw new DatasetError(`Invalid JSON dataset ${source}: expected an array of row objects`, source)
  }

  const rows: Row[] = []
  data.forEach((item: unknown, index) => {
    if (!isRow(item)) {
      throw new DatasetError(`Invalid JSON dataset ${source}: row ${index} is not an object`, source)
    }
    rows.push(item)
  })
  return { columns: columnsOf(rows), rows }
}

export function parseJsonLinesTable(text: string, source = '<jsonl>'): Table {
  const rows: Row[] = []
  text.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === '') return
    let item: unknown
    try {
      item = JSON.parse(line)
    } catch (err) {
      throw new DatasetError(`Invalid JSON on line ${index + 1} of ${source}: ${messageOf(err)}`, source, {
        cause: err,
      })
    }
    if (!isRow(item)) {
      throw new DatasetError(`Line ${index + 1} of ${source} is not a JSON object`, source)
    }
    rows.push(item)
  })
  return { columns: columnsOf(rows), rows }
}

/**
 * Load a dataset file. The format follows the extension.
 *
 * @throws DatasetError if the file is missing, unreadable or malformed
 */
export async function loadDataset(filePath: string): Promise<Table> {
  const format = detectFormat(filePath)

  let text: string
  try {
    text = await readFile(filePath, 'utf8')
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT'
    throw new DatasetError(
      missing ? `Dataset file not found: ${filePath}` : `Cannot read dataset ${filePath}: ${messageOf(err)}`,
      filePath,
      { cause: err },
    )
  }

  switch (format) {
    case 'csv':
      return parseCsvTable(text, filePath)
    case 'json':
      return parseJsonTable(text, filePath)
    case 'jsonl':
      return parseJsonLinesTable(text, filePath)
  }
}
