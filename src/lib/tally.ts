import { originId, type DatasetRecord } from "./record"

export const BUCKET_FAMILIES = [
  "by_task_type",
  "by_source",
  "by_task_source",
  "by_year",
  "by_origin",
] as const
export type BucketFamily = (typeof BUCKET_FAMILIES)[number]

export type Counts = {
  n: number
  n_correct: number
}

export type Bucket = Counts & {
  accuracy: number
}

/**
 * Graded-outcome counts of one model, per aggregation key. Tallies are only
 * ever combined with `mergeTallies`, never incremented in place.
 */
export type Tally = {
  overall: Counts
  parse_errors: number
} & Record<BucketFamily, Record<string, Counts>>

export function createTally(): Tally {
  return {
    overall: { n: 0, n_correct: 0 },
    parse_errors: 0,
    by_task_type: {},
    by_source: {},
    by_task_source: {},
    by_year: {},
    by_origin: {},
  }
}

/**
 * Key of a record within each bucket family.
 */
export function bucketKeys(record: DatasetRecord): Record<BucketFamily, string> {
  return {
    by_task_type: record.task_type,
    by_source: record.source,
    by_task_source: `${record.task_type}/${record.source}`,
    by_year: record.year !== undefined ? String(record.year) : "unknown",
    by_origin: originId(record),
  }
}

/**
 * Tally holding a single graded outcome.
 */
export function tallyOutcome(record: DatasetRecord, correct: boolean, parseError: boolean): Tally {
  const one = (): Counts => ({ n: 1, n_correct: correct ? 1 : 0 })
  const keys = bucketKeys(record)
  const tally = createTally()
  tally.overall = one()
  tally.parse_errors = parseError ? 1 : 0
  for (const family of BUCKET_FAMILIES) {
    tally[family] = { [keys[family]]: one() }
  }
  return tally
}

function addCounts(a: Counts | undefined, b: Counts): Counts {
  return { n: (a?.n ?? 0) + b.n, n_correct: (a?.n_correct ?? 0) + b.n_correct }
}

/**
 * Sums two tallies key by key.
 */
export function mergeTallies(a: Tally, b: Tally): Tally {
  const out = createTally()
  out.overall = addCounts(a.overall, b.overall)
  out.parse_errors = a.parse_errors + b.parse_errors
  for (const family of BUCKET_FAMILIES) {
    const merged: Record<string, Counts> = { ...a[family] }
    for (const [key, counts] of Object.entries(b[family])) {
      merged[key] = addCounts(merged[key], counts)
    }
    out[family] = merged
  }
  return out
}

export function toBucket(c: Counts): Bucket {
  return { n: c.n, n_correct: c.n_correct, accuracy: c.n === 0 ? 0 : c.n_correct / c.n }
}

/**
 * Buckets of one family with keys in sorted order, for stable report files.
 */
export function toBuckets(counts: Record<string, Counts>): Record<string, Bucket> {
  return Object.fromEntries(
    Object.keys(counts)
      .sort()
      .map((key) => [key, toBucket(counts[key])]),
  )
}
