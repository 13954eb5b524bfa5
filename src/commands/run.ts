import type { RunArgs } from "../lib/args"
import type { Settings } from "../config/settings"
import { datasetName, loadDataset, type RejectedRow } from "../lib/dataset"
import { createRoutingInvoker, OLLAMA_PREFIX, type ModelInvoker } from "../lib/invoke"
import { runModels, type ModelRunSummary, type RunProgressEvent } from "../lib/runner"

export type RunLoaded = {
  datasetName: string
  records: number
  rejected: RejectedRow[]
}

export type RunOutcome = RunLoaded & {
  summaries: ModelRunSummary[]
}

export type RunHooks = {
  onLoaded?: (info: RunLoaded) => void
  onProgress?: (ev: RunProgressEvent) => void
  /** Replaces the OpenRouter/Ollama router, e.g. with an in-process fake. */
  invoke?: ModelInvoker
}

/**
 * Fails before any work when a hosted model is requested without an API key.
 */
export function assertCredentials(models: string[], settings: Settings): void {
  const hosted = models.filter((m) => !m.startsWith(OLLAMA_PREFIX))
  if (hosted.length > 0 && !settings.openrouterApiKey) {
    throw new Error(
      `Missing OPENROUTER_API_KEY env var, required for: ${hosted.join(", ")}. Set it (e.g. in .env.local) and rerun.`,
    )
  }
}

/**
 * Loads the dataset and runs every model over it, resuming from outputs already under `outdir`.
 */
export async function runCommand(args: RunArgs, settings: Settings, hooks: RunHooks = {}): Promise<RunOutcome> {
  let invoke = hooks.invoke
  if (!invoke) {
    assertCredentials(args.models, settings)
    invoke = createRoutingInvoker({
      openrouterApiKey: settings.openrouterApiKey,
      ollama: { baseUrl: settings.ollamaBaseUrl },
    })
  }

  const { records, rejected } = await loadDataset(args.dataset, { limit: args.limit })
  const loaded: RunLoaded = { datasetName: datasetName(args.dataset), records: records.length, rejected }
  hooks.onLoaded?.(loaded)

  const summaries = await runModels(
    {
      models: args.models,
      outdir: args.outdir,
      datasetName: loaded.datasetName,
      invoke,
      modelConcurrency: args.concurrency,
      decoding: args.decoding,
      overwrite: args.overwrite,
      timeoutMs: args.timeoutMs,
      maxRetries: args.maxRetries,
      retryDelayMs: args.retryDelayMs,
    },
    records,
    hooks.onProgress,
  )
  return { ...loaded, summaries }
}

/**
 * Prints per-model counts and every failed record with its reason.
 */
export function logRunOutcome(outcome: RunOutcome, outdir: string): void {
  console.log(`Dataset ${outcome.datasetName}: ${outcome.records} record(s), ${outcome.rejected.length} invalid row(s) skipped`)
  for (const row of outcome.rejected) {
    console.warn(`  line ${row.line}${row.recordId ? ` (${row.recordId})` : ""}: ${row.reason}`)
  }
  for (const s of outcome.summaries) {
    console.log(
      `${s.modelId}: ${s.completed} completed, ${s.skipped} already stored, ${s.failures.length} failed (of ${s.total})`,
    )
    for (const f of s.failures) {
      console.warn(`  ${f.recordId}: ${f.timedOut ? "timed out" : "failed"} after ${f.attempts} attempt(s): ${f.error}`)
    }
  }
  console.log(`Outputs under ${outdir}`)
}
