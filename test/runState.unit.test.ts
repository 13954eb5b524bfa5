import { describe, expect, it } from "vitest"

import { applyProgress, INITIAL_RUN_STATE } from "../src/hooks/useModelRun"
import { modelLabel } from "../src/config/models"

describe("applyProgress", () => {
  it("folds runner events into per-model counters", () => {
    let state = applyProgress(INITIAL_RUN_STATE, { type: "modelStart", modelId: "m", total: 3, alreadyDone: 1 })
    state = applyProgress(state, {
      type: "modelItem",
      modelId: "m",
      recordId: "q1",
      index: 0,
      done: 1,
      total: 3,
      outcome: "skipped",
    })
    state = applyProgress(state, {
      type: "modelItem",
      modelId: "m",
      recordId: "q2",
      index: 1,
      done: 2,
      total: 3,
      outcome: "failed",
      error: "m: invocation failed after 1 attempt(s): boom",
    })
    state = applyProgress(state, {
      type: "modelItem",
      modelId: "m",
      recordId: "q3",
      index: 2,
      done: 3,
      total: 3,
      outcome: "completed",
    })
    state = applyProgress(state, {
      type: "modelDone",
      modelId: "m",
      summary: { modelId: "m", total: 3, skipped: 1, completed: 1, failures: [] },
    })

    expect(state.models.m).toEqual({
      total: 3,
      alreadyDone: 1,
      done: 3,
      completed: 1,
      skipped: 1,
      failed: 1,
      lastError: "m: invocation failed after 1 attempt(s): boom",
      finished: true,
    })
    expect(INITIAL_RUN_STATE.models).toEqual({})
  })

  it("ignores items for models that never started", () => {
    const state = applyProgress(INITIAL_RUN_STATE, {
      type: "modelItem",
      modelId: "ghost",
      recordId: "q1",
      index: 0,
      done: 1,
      total: 1,
      outcome: "completed",
    })
    expect(state).toBe(INITIAL_RUN_STATE)
  })
})

describe("modelLabel", () => {
  it("uses aliases and truncates long ids", () => {
    expect(modelLabel("ollama:qwen2.5:7b")).toBe("QWEN7B")
    expect(modelLabel("vendor/a-very-long-model-name-that-keeps-going")).toBe("vendor/a-very-long-model-na...")
    expect(modelLabel("short/id")).toBe("short/id")
  })
})
