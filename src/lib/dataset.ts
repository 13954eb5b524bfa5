import path from "node:path"
import { readJsonlLines } from "./readJsonl"
import { SchemaError } from "./errors"
import { parseRecord, serializeRecord, type DatasetRecord } from "./record"
import { writeLines } from "./report"

export type RejectedRow = {
  line: number
  recordId?: string
  reason: string
}

export type LoadedDataset = {
  records: DatasetRecord[]
  rejected: RejectedRow[]
}

/**
 * Loads and validates records from a JSONL dataset file. Rows that violate
 * the record schema are skipped and returned in `rejected`, as are rows
 * repeating an id already seen.
 * @param filePath - Path to the JSONL dataset file.
 * @param options.limit - Maximum number of rows to read.
 * @throws Error if the file is unreadable, contains invalid JSON, or yields no valid record.
 */
export async function loadDataset(
  filePath: string,
  options: { limit?: number } = {},
): Promise<LoadedDataset> {
  const records: DatasetRecord[] = []
  const rejected: RejectedRow[] = []
  const seen = new Set<string>()

  for await (const { line, value } of readJsonlLines(filePath, options.limit)) {
    let record: DatasetRecord
    try {
      record = parseRecord(value, line)
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err
      rejected.push({ line, recordId: err.recordId, reason: err.message })
      continue
    }
    if (seen.has(record.id)) {
      rejected.push({ line, recordId: record.id, reason: `Duplicate id ${record.id} (line ${line})` })
      continue
    }
    seen.add(record.id)
    records.push(record)
  }

  if (records.length === 0) {
    throw new Error(`No valid records found in ${filePath}`)
  }
  return { records, rejected }
}

/**
 * Dataset name used to key run files: the basename without `.jsonl`.
 */
export function datasetName(filePath: string): string {
  return path.basename(filePath).replace(/\.jsonl$/i, "")
}

/**
 * Writes records as a JSONL dataset with stable key order.
 */
export async function writeDataset(filePath: string, records: DatasetRecord[]): Promise<void> {
  await writeLines(filePath, records.map(serializeRecord))
}
