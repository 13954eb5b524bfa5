import { errorMessage, InvocationFailure } from "./errors"
import { sha256Hex } from "./hash"
import { invokeWithRetry, modelEndpoint, type DecodingOptions, type ModelInvoker, type RetryPolicy } from "./invoke"
import { groupLanes, mapPool } from "./pool"
import type { DatasetRecord } from "./record"
import { withRunStore } from "./runStore"

export type RunConfig = RetryPolicy & {
  models: string[]
  outdir: string
  datasetName: string
  invoke: ModelInvoker
  decoding: DecodingOptions
  /**
   * Endpoints served side by side. Models on one endpoint, and a single
   * model's records, are always sequential.
   */
  modelConcurrency: number
  /** Discards stored outputs and queries every pair again. */
  overwrite?: boolean
  endpointOf?: (modelId: string) => string
}

export type RunFailureItem = {
  recordId: string
  error: string
  attempts: number
  timedOut: boolean
}

export type ModelRunSummary = {
  modelId: string
  total: number
  skipped: number
  completed: number
  failures: RunFailureItem[]
}

export type RunItemOutcome = "skipped" | "completed" | "failed"

export type RunProgressEvent =
  | {
      type: "modelStart"
      modelId: string
      total: number
      alreadyDone: number
    }
  | {
      type: "modelItem"
      modelId: string
      recordId: string
      index: number
      done: number
      total: number
      outcome: RunItemOutcome
      error?: string
    }
  | {
      type: "modelDone"
      modelId: string
      summary: ModelRunSummary
    }

/**
 * Runs one model over every record it has no stored output for, one record at a time.
 * Invocation failures are persisted and reported; they never stop the model's pass.
 */
export async function runModel(
  cfg: RunConfig,
  modelId: string,
  records: DatasetRecord[],
  onProgress?: (ev: RunProgressEvent) => void,
): Promise<ModelRunSummary> {
  const storeParams = { outdir: cfg.outdir, modelId, datasetName: cfg.datasetName, overwrite: cfg.overwrite }
  return withRunStore(storeParams, async (store) => {
    const summary: ModelRunSummary = {
      modelId,
      total: records.length,
      skipped: 0,
      completed: 0,
      failures: [],
    }
    const alreadyDone = records.filter((r) => store.has(r.id)).length
    onProgress?.({ type: "modelStart", modelId, total: records.length, alreadyDone })

    let done = 0
    for (let index = 0; index < records.length; index++) {
      const record = records[index]
      const emit = (outcome: RunItemOutcome, error?: string) => {
        done++
        onProgress?.({
          type: "modelItem",
          modelId,
          recordId: record.id,
          index,
          done,
          total: records.length,
          outcome,
          error,
        })
      }

      if (!store.claim(record.id)) {
        summary.skipped++
        emit("skipped")
        continue
      }
      try {
        const result = await invokeWithRetry(cfg.invoke, modelId, record.prompt, cfg, cfg.decoding)
        await store.recordSuccess({
          record_id: record.id,
          response: result.text,
          prompt_sha256: sha256Hex(record.prompt),
          attempts: result.attempts,
          latency_ms: Math.round(result.latencyMs),
          usage: result.usage,
        })
        summary.completed++
        emit("completed")
      } catch (err) {
        if (!(err instanceof InvocationFailure)) throw err
        const failure: RunFailureItem = {
          recordId: record.id,
          error: errorMessage(err),
          attempts: err.attempts,
          timedOut: err.timedOut,
        }
        await store.recordFailure({
          record_id: record.id,
          error: failure.error,
          attempts: failure.attempts,
          timed_out: failure.timedOut,
        })
        summary.failures.push(failure)
        emit("failed", failure.error)
      } finally {
        store.release(record.id)
      }
    }

    onProgress?.({ type: "modelDone", modelId, summary })
    return summary
  })
}

/**
 * Runs every model over the records. Resumable: pairs already stored under
 * `outdir` are skipped, so rerunning only fills the gaps.
 *
 * Models are grouped into one lane per endpoint. Up to `modelConcurrency`
 * lanes run at once and the models of a lane run one after another.
 * @returns One summary per model, in the order of `cfg.models`.
 */
export async function runModels(
  cfg: RunConfig,
  records: DatasetRecord[],
  onProgress?: (ev: RunProgressEvent) => void,
): Promise<ModelRunSummary[]> {
  if (!cfg.models || cfg.models.length === 0) {
    throw new Error("At least one model must be specified")
  }
  if (cfg.modelConcurrency < 1) {
    throw new Error("Concurrency must be at least 1")
  }
  const models = [...new Set(cfg.models)]
  const lanes = groupLanes(models, cfg.endpointOf ?? modelEndpoint)
  const done = await mapPool(lanes, cfg.modelConcurrency, async (lane) => {
    const summaries: ModelRunSummary[] = []
    for (const modelId of lane) {
      summaries.push(await runModel(cfg, modelId, records, onProgress))
    }
    return summaries
  })
  return done.flat().sort((a, b) => models.indexOf(a.modelId) - models.indexOf(b.modelId))
}
