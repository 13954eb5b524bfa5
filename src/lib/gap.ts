import { z } from "zod"
import { ReportMismatchError } from "./errors"
import { readJson } from "./report"
import type { Bucket, BucketFamily } from "./tally"

/**
 * A score is null when its side graded nothing; the gap is then null too.
 */
export type GapEntry = {
  score_original: number | null
  score_isomorphic: number | null
  gap: number | null
  n_original: number
  n_isomorphic: number
}

export type ModelGap = {
  overall: GapEntry
  /** `<family>:<key>` missing from, or with nothing graded in, one of the two reports. */
  unmatched_keys: string[]
} & Record<BucketFamily, Record<string, GapEntry>>

export type GapReport = {
  original: string
  isomorphic: string
  generated_at: string
  models: Record<string, ModelGap>
}

/**
 * The part of a report the gap needs: per-model overall and family buckets.
 */
export type ScoredReport = {
  models: Record<string, { overall: Bucket } & Record<BucketFamily, Record<string, Bucket>>>
}

const bucketSchema = z.object({
  n: z.number().int().nonnegative(),
  n_correct: z.number().int().nonnegative(),
  accuracy: z.number(),
})

const bucketsSchema = z.record(z.string(), bucketSchema).default({})

const scoredReportSchema = z.object({
  models: z.record(
    z.string(),
    z.object({
      overall: bucketSchema,
      by_task_type: bucketsSchema,
      by_source: bucketsSchema,
      by_task_source: bucketsSchema,
      by_year: bucketsSchema,
      by_origin: bucketsSchema,
    }),
  ),
})

/**
 * Reads and validates a report file written by the eval command.
 */
export async function loadReport(filePath: string): Promise<ScoredReport> {
  const raw = await readJson(filePath)
  const parsed = scoredReportSchema.safeParse(raw)
  if (!parsed.success) {
    const first = parsed.error.issues[0]
    throw new Error(
      `Invalid report ${filePath}: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown shape"}`,
    )
  }
  return parsed.data
}

function score(bucket: Bucket): number | null {
  return bucket.n > 0 ? bucket.accuracy : null
}

function gapEntry(original: Bucket, isomorphic: Bucket): GapEntry {
  const o = score(original)
  const i = score(isomorphic)
  return {
    score_original: o,
    score_isomorphic: i,
    gap: o !== null && i !== null ? o - i : null,
    n_original: original.n,
    n_isomorphic: isomorphic.n,
  }
}

/**
 * Memorization gap (original accuracy minus isomorphic accuracy) per model,
 * overall and for every key both reports graded something under. The overall
 * gap is null when either side graded nothing.
 * @throws ReportMismatchError if a model appears in only one report.
 */
export function computeGap(
  original: ScoredReport,
  isomorphic: ScoredReport,
  paths: { original: string; isomorphic: string },
  now: Date = new Date(),
): GapReport {
  const origModels = Object.keys(original.models)
  const isoModels = Object.keys(isomorphic.models)
  const missingFromIsomorphic = origModels.filter((m) => !(m in isomorphic.models)).sort()
  const missingFromOriginal = isoModels.filter((m) => !(m in original.models)).sort()
  if (missingFromIsomorphic.length > 0 || missingFromOriginal.length > 0) {
    throw new ReportMismatchError(missingFromOriginal, missingFromIsomorphic)
  }

  const models: Record<string, ModelGap> = {}
  for (const model of origModels.sort()) {
    const o = original.models[model]
    const i = isomorphic.models[model]
    const unmatched: string[] = []
    const familyGap = (family: BucketFamily): Record<string, GapEntry> => {
      const entries: Record<string, GapEntry> = {}
      const keys = new Set([...Object.keys(o[family]), ...Object.keys(i[family])])
      for (const key of [...keys].sort()) {
        const ob = o[family][key]
        const ib = i[family][key]
        if (ob && ib && ob.n > 0 && ib.n > 0) entries[key] = gapEntry(ob, ib)
        else unmatched.push(`${family}:${key}`)
      }
      return entries
    }

    models[model] = {
      overall: gapEntry(o.overall, i.overall),
      by_task_type: familyGap("by_task_type"),
      by_source: familyGap("by_source"),
      by_task_source: familyGap("by_task_source"),
      by_year: familyGap("by_year"),
      by_origin: familyGap("by_origin"),
      unmatched_keys: unmatched,
    }
  }

  return {
    original: paths.original,
    isomorphic: paths.isomorphic,
    generated_at: now.toISOString(),
    models,
  }
}
