import fs from "node:fs"
import os from "node:os"
import path from "node:path"

import { describe, expect, it } from "vitest"

import { ReportMismatchError } from "../src/lib/errors"
import { computeGap, loadReport, type ScoredReport } from "../src/lib/gap"
import { renderGapSummary, writeJson } from "../src/lib/report"

function bucket(n: number, n_correct: number) {
  return { n, n_correct, accuracy: n === 0 ? 0 : n_correct / n }
}

function scored(models: Record<string, { overall: [number, number]; origins: Record<string, [number, number]> }>): ScoredReport {
  return {
    models: Object.fromEntries(
      Object.entries(models).map(([model, m]) => [
        model,
        {
          overall: bucket(...m.overall),
          by_task_type: { mcq: bucket(...m.overall) },
          by_source: { IOL: bucket(...m.overall) },
          by_task_source: { "mcq/IOL": bucket(...m.overall) },
          by_year: {},
          by_origin: Object.fromEntries(Object.entries(m.origins).map(([k, v]) => [k, bucket(...v)])),
        },
      ]),
    ),
  }
}

const paths = { original: "orig.json", isomorphic: "iso.json" }

describe("computeGap", () => {
  it("subtracts isomorphic from original accuracy", () => {
    const original = scored({ m: { overall: [10, 9], origins: { q1: [1, 1], q2: [1, 0] } } })
    const isomorphic = scored({ m: { overall: [30, 15], origins: { q1: [3, 1], q3: [3, 3] } } })
    const gap = computeGap(original, isomorphic, paths, new Date("2024-05-01T00:00:00.000Z"))

    expect(gap.original).toBe("orig.json")
    expect(gap.generated_at).toBe("2024-05-01T00:00:00.000Z")
    const m = gap.models.m
    expect(m.overall.score_original).toBe(0.9)
    expect(m.overall.score_isomorphic).toBe(0.5)
    expect(m.overall.gap).toBeCloseTo(0.4)
    expect(m.overall.n_original).toBe(10)
    expect(m.overall.n_isomorphic).toBe(30)
    expect(m.by_task_type.mcq.gap).toBeCloseTo(0.4)
    expect(m.by_origin.q1.gap).toBeCloseTo(1 - 1 / 3)
    expect(Object.keys(m.by_origin)).toEqual(["q1"])
    expect(m.unmatched_keys).toEqual(["by_origin:q2", "by_origin:q3"])
  })

  it("allows a negative gap", () => {
    const gap = computeGap(
      scored({ m: { overall: [4, 1], origins: {} } }),
      scored({ m: { overall: [4, 3], origins: {} } }),
      paths,
    )
    expect(gap.models.m.overall.gap).toBeCloseTo(-0.5)
  })

  it("gives no gap where one side graded nothing", () => {
    const gap = computeGap(
      scored({ m: { overall: [10, 9], origins: { q1: [1, 1] } } }),
      scored({ m: { overall: [0, 0], origins: { q1: [0, 0] } } }),
      paths,
    )
    const m = gap.models.m
    expect(m.overall).toEqual({
      score_original: 0.9,
      score_isomorphic: null,
      gap: null,
      n_original: 10,
      n_isomorphic: 0,
    })
    expect(m.by_task_type).toEqual({})
    expect(m.by_origin).toEqual({})
    expect(m.unmatched_keys).toEqual([
      "by_task_type:mcq",
      "by_source:IOL",
      "by_task_source:mcq/IOL",
      "by_origin:q1",
    ])
    expect(renderGapSummary(gap).split("\n")[2]).toBe("| `m` | 90.0% | n/a | n/a |")
  })

  it("refuses reports over different models", () => {
    const original = scored({ a: { overall: [1, 1], origins: {} }, b: { overall: [1, 1], origins: {} } })
    const isomorphic = scored({ a: { overall: [1, 1], origins: {} }, c: { overall: [1, 0], origins: {} } })

    let caught: unknown
    try {
      computeGap(original, isomorphic, paths)
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ReportMismatchError)
    if (!(caught instanceof ReportMismatchError)) return
    expect(caught.missingFromIsomorphic).toEqual(["b"])
    expect(caught.missingFromOriginal).toEqual(["c"])
    expect(caught.message).toBe(
      "Reports do not cover the same models (missing from isomorphic report: b; missing from original report: c)",
    )
  })

  it("renders a summary row per model", () => {
    const gap = computeGap(
      scored({ m: { overall: [10, 9], origins: {} } }),
      scored({ m: { overall: [10, 5], origins: {} } }),
      paths,
    )
    expect(renderGapSummary(gap).split("\n")).toEqual([
      "| model | original | isomorphic | gap |",
      "|---|---:|---:|---:|",
      "| `m` | 90.0% | 50.0% | +40.0pp |",
    ])
  })
})

describe("loadReport", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "olyleak-gap-"))

  it("reads a report and fills absent bucket families", async () => {
    const filePath = path.join(dir, "report.json")
    await writeJson(filePath, {
      dataset: "ds.jsonl",
      models: { m: { overall: bucket(2, 1), by_task_type: { mcq: bucket(2, 1) } } },
    })
    const report = await loadReport(filePath)
    expect(report.models.m.overall).toEqual(bucket(2, 1))
    expect(report.models.m.by_origin).toEqual({})
  })

  it("rejects files that are not reports", async () => {
    const filePath = path.join(dir, "bogus.json")
    await writeJson(filePath, { models: { m: { overall: { n: "two" } } } })
    await expect(loadReport(filePath)).rejects.toThrow(`Invalid report ${filePath}: models.m.overall.n:`)
    await expect(loadReport(path.join(dir, "missing.json"))).rejects.toThrow("File not found")
  })
})
