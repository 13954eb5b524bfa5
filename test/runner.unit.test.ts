import fs from "node:fs"
import os from "node:os"
import path from "node:path"

import { afterEach, describe, expect, it, vi } from "vitest"

import { sleep } from "../src/lib/pool"
import { DEFAULT_DECODING, type DecodingOptions, type ModelInvoker } from "../src/lib/invoke"
import { loadRunIndex, modelDirName, readRunDir, runFilePath, RunStore, withRunStore } from "../src/lib/runStore"
import { runModels, type RunConfig, type RunProgressEvent } from "../src/lib/runner"
import { sha256Hex } from "../src/lib/hash"
import { mcqRecord } from "./fixtures"

const records = [
  mcqRecord({ id: "q1" }),
  mcqRecord({ id: "q2", prompt: "Second?\nA. a\nB. b\nC. c\nD. d" }),
  mcqRecord({ id: "q3", prompt: "Third?\nA. a\nB. b\nC. c\nD. d" }),
]

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "olyleak-run-"))
}

function readLines(filePath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter(Boolean)
    .map((l) => JSON.parse(l))
}

function config(outdir: string, invoke: ModelInvoker, overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    models: ["fake-a"],
    outdir,
    datasetName: "ds",
    invoke,
    decoding: DEFAULT_DECODING,
    modelConcurrency: 1,
    timeoutMs: 1_000,
    maxRetries: 0,
    retryDelayMs: 0,
    ...overrides,
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe("runModels", () => {
  it("stores one success per record and model", async () => {
    const outdir = tmpDir()
    const invoke: ModelInvoker = async (modelId) => ({ text: `${modelId} says C` })
    const summaries = await runModels(config(outdir, invoke, { models: ["fake-a", "fake-b"], modelConcurrency: 2 }), records)

    expect(summaries.map((s) => [s.modelId, s.completed, s.skipped, s.failures.length])).toEqual([
      ["fake-a", 3, 0, 0],
      ["fake-b", 3, 0, 0],
    ])
    const entries = readLines(runFilePath(outdir, "fake-b", "ds"))
    expect(entries.map((e) => e.record_id)).toEqual(["q1", "q2", "q3"])
    expect(entries[0]).toMatchObject({
      v: 1,
      model: "fake-b",
      ok: true,
      response: "fake-b says C",
      prompt_sha256: sha256Hex(records[0].prompt),
      attempts: 1,
    })
  })

  it("skips completed pairs on rerun", async () => {
    const outdir = tmpDir()
    await runModels(config(outdir, async () => ({ text: "C" })), records)

    const prompts: string[] = []
    const summaries = await runModels(
      config(outdir, async (_m, prompt) => {
        prompts.push(prompt)
        return { text: "C" }
      }),
      records,
    )
    expect(prompts).toEqual([])
    expect(summaries[0]).toMatchObject({ total: 3, completed: 0, skipped: 3, failures: [] })
    expect(readLines(runFilePath(outdir, "fake-a", "ds"))).toHaveLength(3)
  })

  it("records failures without stopping, then retries only them", async () => {
    const outdir = tmpDir()
    const flaky: ModelInvoker = async (_m, prompt) => {
      if (prompt.startsWith("Second")) throw new Error("boom")
      return { text: "C" }
    }
    const [first] = await runModels(config(outdir, flaky), records)
    expect(first.completed).toBe(2)
    expect(first.failures).toEqual([
      { recordId: "q2", error: "fake-a: invocation failed after 1 attempt(s): boom", attempts: 1, timedOut: false },
    ])

    const retried: string[] = []
    const [second] = await runModels(
      config(outdir, async (_m, prompt) => {
        retried.push(prompt)
        return { text: "C" }
      }),
      records,
    )
    expect(retried).toEqual([records[1].prompt])
    expect(second).toMatchObject({ completed: 1, skipped: 2, failures: [] })

    const index = await loadRunIndex(runFilePath(outdir, "fake-a", "ds"), "fake-a")
    expect([...index.successes.keys()].sort()).toEqual(["q1", "q2", "q3"])
    expect(index.failures.size).toBe(0)
  })

  it("keeps each model sequential while models run side by side", async () => {
    const outdir = tmpDir()
    const active = new Map<string, number>()
    let maxPerModel = 0
    let maxOverall = 0
    const invoke: ModelInvoker = async (modelId) => {
      active.set(modelId, (active.get(modelId) ?? 0) + 1)
      maxPerModel = Math.max(maxPerModel, active.get(modelId) ?? 0)
      maxOverall = Math.max(maxOverall, [...active.values()].reduce((a, b) => a + b, 0))
      await sleep(5)
      active.set(modelId, (active.get(modelId) ?? 1) - 1)
      return { text: "C" }
    }
    await runModels(config(outdir, invoke, { models: ["fake-a", "fake-b"], modelConcurrency: 2 }), records)
    expect(maxPerModel).toBe(1)
    expect(maxOverall).toBe(2)
  })

  it("runs models that share an endpoint one after another", async () => {
    const outdir = tmpDir()
    let ollamaActive = 0
    let maxOllama = 0
    let active = 0
    let maxOverall = 0
    const invoke: ModelInvoker = async (modelId) => {
      const local = modelId.startsWith("ollama:")
      active++
      if (local) ollamaActive++
      maxOverall = Math.max(maxOverall, active)
      maxOllama = Math.max(maxOllama, ollamaActive)
      await sleep(5)
      active--
      if (local) ollamaActive--
      return { text: "C" }
    }
    const summaries = await runModels(
      config(outdir, invoke, {
        models: ["ollama:qwen2.5:7b", "ollama:llama3.1:8b", "fake-a"],
        modelConcurrency: 2,
      }),
      records,
    )
    expect(summaries.map((s) => s.modelId)).toEqual(["ollama:qwen2.5:7b", "ollama:llama3.1:8b", "fake-a"])
    expect(summaries.every((s) => s.completed === 3)).toBe(true)
    expect(maxOllama).toBe(1)
    expect(maxOverall).toBe(2)
  })

  it("stores models whose ids share a path slug separately", async () => {
    const outdir = tmpDir()
    const calls: string[] = []
    const invoke: ModelInvoker = async (modelId) => {
      calls.push(modelId)
      return { text: `${modelId} says C` }
    }
    expect(modelDirName("org/m")).not.toBe(modelDirName("org:m"))

    await runModels(config(outdir, invoke, { models: ["org/m", "org:m"] }), records.slice(0, 1))
    expect(calls).toEqual(["org/m", "org:m"])

    const runs = await readRunDir(outdir, "ds")
    expect([...runs.keys()].sort()).toEqual(["org/m", "org:m"])
    expect(runs.get("org:m")?.successes.get("q1")?.response).toBe("org:m says C")
  })

  it("passes the configured decoding options to the invoker", async () => {
    const outdir = tmpDir()
    const seen: DecodingOptions[] = []
    const decoding = { temperature: 0.2, topP: 0.95, numCtx: 8192, seed: 3 }
    await runModels(
      config(
        outdir,
        async (_m, _p, options) => {
          seen.push(options.decoding)
          return { text: "C" }
        },
        { decoding },
      ),
      records.slice(0, 2),
    )
    expect(seen).toEqual([decoding, decoding])
  })

  it("queries every pair again and truncates the run file with overwrite", async () => {
    const outdir = tmpDir()
    await runModels(config(outdir, async () => ({ text: "C" })), records)

    const prompts: string[] = []
    const [summary] = await runModels(
      config(
        outdir,
        async (_m, prompt) => {
          prompts.push(prompt)
          return { text: "B" }
        },
        { overwrite: true },
      ),
      records,
    )
    expect(prompts).toEqual(records.map((r) => r.prompt))
    expect(summary).toMatchObject({ completed: 3, skipped: 0 })
    const entries = readLines(runFilePath(outdir, "fake-a", "ds"))
    expect(entries.map((e) => e.response)).toEqual(["B", "B", "B"])
  })

  it("reports progress events in order", async () => {
    const outdir = tmpDir()
    const events: RunProgressEvent[] = []
    await runModels(config(outdir, async () => ({ text: "C" })), records.slice(0, 2), (ev) => events.push(ev))
    expect(events.map((e) => e.type)).toEqual(["modelStart", "modelItem", "modelItem", "modelDone"])
    expect(events[0]).toEqual({ type: "modelStart", modelId: "fake-a", total: 2, alreadyDone: 0 })
    expect(events[2]).toMatchObject({ type: "modelItem", recordId: "q2", index: 1, done: 2, outcome: "completed" })
  })

  it("rejects an empty model list", async () => {
    await expect(runModels(config(tmpDir(), async () => ({ text: "" }), { models: [] }), records)).rejects.toThrow(
      "At least one model must be specified",
    )
  })
})

describe("RunStore", () => {
  it("writes a success at most once per record", async () => {
    const outdir = tmpDir()
    const entry = { record_id: "q1", response: "C", prompt_sha256: "abc", attempts: 1, latency_ms: 3 }
    const results = await withRunStore({ outdir, modelId: "m", datasetName: "ds" }, async (store) => {
      expect(store.claim("q1")).toBe(true)
      expect(store.claim("q1")).toBe(false)
      store.release("q1")
      return [await store.recordSuccess(entry), await store.recordSuccess(entry)]
    })
    expect(results).toEqual([true, false])
    expect(readLines(runFilePath(outdir, "m", "ds"))).toHaveLength(1)
  })

  it("tracks the latest failure until a success arrives", async () => {
    const outdir = tmpDir()
    const store = await RunStore.open({ outdir, modelId: "m", datasetName: "ds" })
    await store.recordFailure({ record_id: "q1", error: "first", attempts: 1, timed_out: false })
    await store.recordFailure({ record_id: "q1", error: "second", attempts: 2, timed_out: true })
    expect(store.lastFailure("q1")?.error).toBe("second")
    expect(store.has("q1")).toBe(false)
    await store.recordSuccess({ record_id: "q1", response: "C", prompt_sha256: "abc", attempts: 1, latency_ms: 1 })
    expect(store.lastFailure("q1")).toBeUndefined()
    expect(store.completedCount).toBe(1)
    await store.close()
    await expect(store.recordFailure({ record_id: "q2", error: "x", attempts: 1, timed_out: false })).rejects.toThrow(
      "is closed",
    )
  })

  it("skips a torn trailing line when loading", async () => {
    const outdir = tmpDir()
    const filePath = runFilePath(outdir, "m", "ds")
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    const good = {
      v: 1,
      model: "m",
      record_id: "q1",
      ok: true,
      response: "C",
      prompt_sha256: "abc",
      attempts: 1,
      latency_ms: 2,
      timestamp: "2024-05-01T00:00:00.000Z",
    }
    fs.writeFileSync(filePath, JSON.stringify(good) + '\n{"v":1,"model"', "utf8")
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})

    const index = await loadRunIndex(filePath, "m")
    expect([...index.successes.keys()]).toEqual(["q1"])
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it("skips entries written for another model", async () => {
    const outdir = tmpDir()
    const filePath = runFilePath(outdir, "m", "ds")
    fs.mkdirSync(path.dirname(filePath), { recursive: true })
    const entry = (model: string, recordId: string) => ({
      v: 1,
      model,
      record_id: recordId,
      ok: true,
      response: "C",
      prompt_sha256: "abc",
      attempts: 1,
      latency_ms: 2,
      timestamp: "2024-05-01T00:00:00.000Z",
    })
    fs.writeFileSync(filePath, [entry("other", "q1"), entry("m", "q2")].map((e) => JSON.stringify(e)).join("\n"), "utf8")
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})

    const index = await loadRunIndex(filePath, "m")
    expect([...index.successes.keys()]).toEqual(["q2"])
    expect(warn).toHaveBeenCalledWith(`Skipping 1 run entry of other models in ${filePath}`)
  })

  it("loads every model of a run directory under its own id", async () => {
    const outdir = tmpDir()
    await runModels(
      config(outdir, async () => ({ text: "C" }), { models: ["ollama:qwen2.5:7b", "fake-a"] }),
      records.slice(0, 1),
    )
    fs.mkdirSync(path.join(outdir, "unrelated"))

    const runs = await readRunDir(outdir, "ds")
    expect([...runs.keys()]).toEqual(["fake-a", "ollama:qwen2.5:7b"])
    expect(runs.get("ollama:qwen2.5:7b")?.successes.get("q1")?.response).toBe("C")
    await expect(readRunDir(path.join(outdir, "missing"), "ds")).rejects.toThrow("Run directory not found")
  })
})
