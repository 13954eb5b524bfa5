import { describe, expect, it } from "vitest"

import { evaluateModel, evaluateRuns } from "../src/lib/evaluator"
import { sha256Hex } from "../src/lib/hash"
import { parseRecord, type DatasetRecord } from "../src/lib/record"
import type { ModelRunIndex, RunFailure, RunSuccess } from "../src/lib/runStore"
import { createTally, mergeTallies, tallyOutcome } from "../src/lib/tally"
import { renderReportSummary } from "../src/lib/report"
import { matchingRecord, mcqRecord, shortTextRecord } from "./fixtures"

function success(record: DatasetRecord, response: string, prompt = record.prompt): RunSuccess {
  return {
    v: 1,
    model: "m",
    record_id: record.id,
    ok: true,
    response,
    prompt_sha256: sha256Hex(prompt),
    attempts: 1,
    latency_ms: 5,
    timestamp: "2024-05-01T00:00:00.000Z",
  }
}

function failure(record: DatasetRecord, error: string): RunFailure {
  return {
    v: 1,
    model: "m",
    record_id: record.id,
    ok: false,
    error,
    attempts: 3,
    timed_out: false,
    timestamp: "2024-05-01T00:00:00.000Z",
  }
}

function runIndex(modelId: string, successes: RunSuccess[], failures: RunFailure[] = []): ModelRunIndex {
  return {
    modelId,
    successes: new Map(successes.map((s) => [s.record_id, s])),
    failures: new Map(failures.map((f) => [f.record_id, f])),
  }
}

const q1 = mcqRecord({ id: "q1", source: "IOL", year: 2010 })
const m1 = matchingRecord({ id: "m1", source: "IOL", year: 2010 })
const s1 = shortTextRecord({ id: "s1", year: undefined, meta: {} })
const q2 = mcqRecord({ id: "q2" })
const q3 = mcqRecord({ id: "q3" })
const q4 = mcqRecord({ id: "q4" })
const records = [q1, m1, s1, q2, q3, q4]

describe("evaluateModel", () => {
  const run = runIndex(
    "m",
    [
      success(q1, "The answer is C."),
      success(m1, "no idea"),
      success(s1, "water"),
      success(q3, "C", "an older prompt"),
    ],
    [failure(q2, "boom")],
  )

  it("grades stored outputs and lists the rest as ungraded", () => {
    const report = evaluateModel(records, run)

    expect(report.overall).toEqual({ n: 3, n_correct: 1, accuracy: 1 / 3 })
    expect(report.parse_errors).toBe(1)
    expect(report.by_task_type).toEqual({
      matching: { n: 1, n_correct: 0, accuracy: 0 },
      mcq: { n: 1, n_correct: 1, accuracy: 1 },
      short_text: { n: 1, n_correct: 0, accuracy: 0 },
    })
    expect(report.by_source).toEqual({
      IOL: { n: 2, n_correct: 1, accuracy: 0.5 },
      UKLO: { n: 1, n_correct: 0, accuracy: 0 },
    })
    expect(report.by_task_source).toEqual({
      "matching/IOL": { n: 1, n_correct: 0, accuracy: 0 },
      "mcq/IOL": { n: 1, n_correct: 1, accuracy: 1 },
      "short_text/UKLO": { n: 1, n_correct: 0, accuracy: 0 },
    })
    expect(report.by_year).toEqual({
      "2010": { n: 2, n_correct: 1, accuracy: 0.5 },
      unknown: { n: 1, n_correct: 0, accuracy: 0 },
    })
    expect(report.ungraded).toEqual({
      count: 3,
      items: [
        { record_id: "q2", reason: "invocation_failed", detail: "boom" },
        {
          record_id: "q3",
          reason: "stale_output",
          detail: "stored output was produced for a different prompt",
        },
        { record_id: "q4", reason: "no_output" },
      ],
    })
    expect(report.details).toBeUndefined()
  })

  it("includes per-record details on request", () => {
    const report = evaluateModel([q1, m1], run, true)
    expect(report.details).toEqual([
      { record_id: "q1", task_type: "mcq", source: "IOL", correct: true, parsed: "C", error: undefined },
      {
        record_id: "m1",
        task_type: "matching",
        source: "IOL",
        correct: false,
        parsed: null,
        error: { kind: "ParseError", code: "no_json_object", message: "No JSON object found in output" },
      },
    ])
  })

  it("groups variants under the record they came from", () => {
    const variant = parseRecord({ ...q1, id: "q1__iso0", variant_of: "q1", variant_index: 0 })
    const report = evaluateModel([q1, variant], runIndex("m", [success(q1, "C"), success(variant, "A")]))
    expect(report.by_origin).toEqual({ q1: { n: 2, n_correct: 1, accuracy: 0.5 } })
  })
})

describe("evaluateRuns", () => {
  it("covers every model in sorted order", () => {
    const runs = new Map([
      ["zeta", runIndex("zeta", [success(q1, "C")])],
      ["alpha", runIndex("alpha", [success(q1, "B")])],
    ])
    const report = evaluateRuns({
      records: [q1],
      runs,
      dataset: "data/ds.jsonl",
      rundir: "runs",
      now: new Date("2024-05-01T12:00:00.000Z"),
    })
    expect(Object.keys(report.models)).toEqual(["alpha", "zeta"])
    expect(report.generated_at).toBe("2024-05-01T12:00:00.000Z")
    expect(report.models.alpha.overall.accuracy).toBe(0)
    expect(report.models.zeta.overall.accuracy).toBe(1)
  })
})

describe("tallies", () => {
  it("merges by summing counts per key", () => {
    const merged = [tallyOutcome(q1, true, false), tallyOutcome(q2, false, true), tallyOutcome(m1, true, false)].reduce(
      mergeTallies,
      createTally(),
    )
    expect(merged.overall).toEqual({ n: 3, n_correct: 2 })
    expect(merged.parse_errors).toBe(1)
    expect(merged.by_source).toEqual({ IOL: { n: 2, n_correct: 2 }, NACLO: { n: 1, n_correct: 0 } })
    expect(mergeTallies(createTally(), createTally())).toEqual(createTally())
  })
})

describe("renderReportSummary", () => {
  it("renders one table row per model", () => {
    const report = evaluateRuns({
      records: [q1, q2],
      runs: new Map([["m", runIndex("m", [success(q1, "C")])]]),
      dataset: "ds.jsonl",
      rundir: "runs",
    })
    expect(renderReportSummary(report).split("\n")).toEqual([
      "# Evaluation: `ds.jsonl`",
      "",
      "| model | accuracy | correct/graded | parse errors | ungraded |",
      "|---|---:|---:|---:|---:|",
      "| `m` | 100.0% | 1/1 | 0 | 1 |",
      "",
      "- **m**: mcq 100.0% (1/1)",
    ])
  })
})
