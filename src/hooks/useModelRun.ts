import { useEffect, useState } from "react"
import type { RunArgs } from "../lib/args"
import type { Settings } from "../config/settings"
import { errorMessage } from "../lib/errors"
import type { RunProgressEvent } from "../lib/runner"
import { runCommand, type RunOutcome } from "../commands/run"

export type ModelProgress = {
  total: number
  alreadyDone: number
  done: number
  completed: number
  skipped: number
  failed: number
  lastError?: string
  finished: boolean
}

export type RunState = {
  started: boolean
  done: boolean
  error?: string
  datasetName?: string
  recordsTotal: number
  rejected: number
  models: Record<string, ModelProgress>
  outcome?: RunOutcome
}

export const INITIAL_RUN_STATE: RunState = {
  started: false,
  done: false,
  recordsTotal: 0,
  rejected: 0,
  models: {},
}

/**
 * Folds one runner event into the UI state.
 */
export function applyProgress(state: RunState, ev: RunProgressEvent): RunState {
  const prev = state.models[ev.modelId]
  switch (ev.type) {
    case "modelStart":
      return {
        ...state,
        models: {
          ...state.models,
          [ev.modelId]: {
            total: ev.total,
            alreadyDone: ev.alreadyDone,
            done: 0,
            completed: 0,
            skipped: 0,
            failed: 0,
            finished: false,
          },
        },
      }
    case "modelItem": {
      if (!prev) return state
      return {
        ...state,
        models: {
          ...state.models,
          [ev.modelId]: {
            ...prev,
            done: ev.done,
            completed: prev.completed + (ev.outcome === "completed" ? 1 : 0),
            skipped: prev.skipped + (ev.outcome === "skipped" ? 1 : 0),
            failed: prev.failed + (ev.outcome === "failed" ? 1 : 0),
            lastError: ev.error ?? prev.lastError,
          },
        },
      }
    }
    case "modelDone":
      if (!prev) return state
      return {
        ...state,
        models: { ...state.models, [ev.modelId]: { ...prev, finished: true } },
      }
  }
}

/**
 * Runs the models and exposes live progress for the terminal view.
 * @param args - Validated `run` arguments. Keep the object stable across renders.
 * @param settings - Environment settings.
 * @returns The state of the run.
 */
export function useModelRun(args: RunArgs, settings: Settings) {
  const [state, setState] = useState<RunState>(INITIAL_RUN_STATE)

  useEffect(() => {
    let cancelled = false

    runCommand(args, settings, {
      onLoaded: (info) => {
        if (cancelled) return
        setState((s: RunState) => ({
          ...s,
          started: true,
          datasetName: info.datasetName,
          recordsTotal: info.records,
          rejected: info.rejected.length,
        }))
      },
      onProgress: (ev) => {
        if (cancelled) return
        setState((s: RunState) => applyProgress(s, ev))
      },
    }).then(
      (outcome) => {
        if (cancelled) return
        setState((s: RunState) => ({ ...s, done: true, outcome }))
      },
      (e: unknown) => {
        if (cancelled) return
        setState((s: RunState) => ({ ...s, done: true, error: errorMessage(e) }))
      },
    )

    return () => {
      cancelled = true
    }
  }, [args, settings])

  return state
}
