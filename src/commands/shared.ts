import type { RejectedRow } from "../lib/dataset"

/**
 * Prints one warning per dataset row that failed validation.
 */
export function logRejected(datasetPath: string, rejected: RejectedRow[]): void {
  if (rejected.length === 0) return
  console.warn(`Skipped ${rejected.length} invalid row(s) in ${datasetPath}:`)
  for (const row of rejected) {
    console.warn(`  line ${row.line}${row.recordId ? ` (${row.recordId})` : ""}: ${row.reason}`)
  }
}
