import { grade, type GradeError } from "./grade"
import { sha256Hex } from "./hash"
import type { DatasetRecord, TaskType } from "./record"
import type { ModelRunIndex } from "./runStore"
import {
  createTally,
  mergeTallies,
  tallyOutcome,
  toBucket,
  toBuckets,
  type Bucket,
  type BucketFamily,
  type Tally,
} from "./tally"

export type UngradedReason = "no_output" | "invocation_failed" | "stale_output"

export type UngradedItem = {
  record_id: string
  reason: UngradedReason
  detail?: string
}

export type GradedItem = {
  record_id: string
  task_type: TaskType
  source: string
  correct: boolean
  parsed: unknown
  error?: GradeError
}

export type ModelReport = {
  overall: Bucket
  parse_errors: number
  ungraded: { count: number; items: UngradedItem[] }
  details?: GradedItem[]
} & Record<BucketFamily, Record<string, Bucket>>

export type Report = {
  dataset: string
  rundir: string
  generated_at: string
  models: Record<string, ModelReport>
}

/**
 * Grades one model's stored outputs and aggregates them. Records without a
 * usable stored output are listed as ungraded, never scored.
 */
export function evaluateModel(
  records: DatasetRecord[],
  run: ModelRunIndex,
  includeDetails = false,
): ModelReport {
  const partials: Tally[] = []
  const ungraded: UngradedItem[] = []
  const details: GradedItem[] = []

  for (const record of records) {
    const stored = run.successes.get(record.id)
    if (!stored) {
      const failure = run.failures.get(record.id)
      ungraded.push(
        failure
          ? { record_id: record.id, reason: "invocation_failed", detail: failure.error }
          : { record_id: record.id, reason: "no_output" },
      )
      continue
    }
    if (stored.prompt_sha256 !== sha256Hex(record.prompt)) {
      ungraded.push({
        record_id: record.id,
        reason: "stale_output",
        detail: "stored output was produced for a different prompt",
      })
      continue
    }

    const result = grade(record, stored.response)
    partials.push(tallyOutcome(record, result.correct, result.error !== undefined))
    if (includeDetails) {
      details.push({
        record_id: record.id,
        task_type: record.task_type,
        source: record.source,
        correct: result.correct,
        parsed: result.parsed,
        error: result.error,
      })
    }
  }

  const tally = partials.reduce(mergeTallies, createTally())
  const report: ModelReport = {
    overall: toBucket(tally.overall),
    by_task_type: toBuckets(tally.by_task_type),
    by_source: toBuckets(tally.by_source),
    by_task_source: toBuckets(tally.by_task_source),
    by_year: toBuckets(tally.by_year),
    by_origin: toBuckets(tally.by_origin),
    parse_errors: tally.parse_errors,
    ungraded: { count: ungraded.length, items: ungraded },
  }
  if (includeDetails) report.details = details
  return report
}

/**
 * Grades every (model, record) pair with a stored output and builds the report.
 * @param params.records - Dataset records the runs answer.
 * @param params.runs - Run indexes keyed by model id.
 * @param params.dataset - Dataset path recorded in the report.
 * @param params.rundir - Run directory recorded in the report.
 */
export function evaluateRuns(params: {
  records: DatasetRecord[]
  runs: Map<string, ModelRunIndex>
  dataset: string
  rundir: string
  includeDetails?: boolean
  now?: Date
}): Report {
  const models: Record<string, ModelReport> = {}
  for (const modelId of [...params.runs.keys()].sort()) {
    const run = params.runs.get(modelId)
    if (!run) continue
    models[modelId] = evaluateModel(params.records, run, params.includeDetails)
  }
  return {
    dataset: params.dataset,
    rundir: params.rundir,
    generated_at: (params.now ?? new Date()).toISOString(),
    models,
  }
}
