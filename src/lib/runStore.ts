import type { Dirent } from "node:fs"
import { mkdir, open, readdir, readFile, type FileHandle } from "node:fs/promises"
import path from "node:path"
import { z } from "zod"
import { sha256Hex } from "./hash"
import type { TokenUsage } from "./invoke"

export const RUN_ENTRY_VERSION = 1

export type RunSuccess = {
  v: typeof RUN_ENTRY_VERSION
  model: string
  record_id: string
  ok: true
  response: string
  prompt_sha256: string
  attempts: number
  latency_ms: number
  usage?: TokenUsage
  timestamp: string
}

export type RunFailure = {
  v: typeof RUN_ENTRY_VERSION
  model: string
  record_id: string
  ok: false
  error: string
  attempts: number
  timed_out: boolean
  timestamp: string
}

export type RunEntry = RunSuccess | RunFailure

/**
 * Key-presence index of one run file: the first success per record id, and
 * the latest failure for ids that never succeeded.
 */
export type ModelRunIndex = {
  modelId: string
  successes: Map<string, RunSuccess>
  failures: Map<string, RunFailure>
}

const usageSchema = z.object({
  promptTokens: z.number().optional(),
  completionTokens: z.number().optional(),
  totalTokens: z.number().optional(),
})

const runEntrySchema = z.discriminatedUnion("ok", [
  z.object({
    v: z.literal(RUN_ENTRY_VERSION),
    model: z.string(),
    record_id: z.string().min(1),
    ok: z.literal(true),
    response: z.string(),
    prompt_sha256: z.string(),
    attempts: z.number().int().positive(),
    latency_ms: z.number(),
    usage: usageSchema.optional(),
    timestamp: z.string(),
  }),
  z.object({
    v: z.literal(RUN_ENTRY_VERSION),
    model: z.string(),
    record_id: z.string().min(1),
    ok: z.literal(false),
    error: z.string(),
    attempts: z.number().int().nonnegative(),
    timed_out: z.boolean(),
    timestamp: z.string(),
  }),
])

export type RunStoreParams = {
  outdir: string
  modelId: string
  datasetName: string
  /** Truncates the run file instead of resuming from it. */
  overwrite?: boolean
}

function pathSlug(s: string): string {
  return s.replace(/[^a-zA-Z0-9._-]+/g, "_")
}

/**
 * Directory of a model under the run directory. The readable slug can be
 * shared by distinct ids (`org/m`, `org:m`); the id hash keeps them apart.
 */
export function modelDirName(modelId: string): string {
  return `${pathSlug(modelId)}-${sha256Hex(modelId).slice(0, 8)}`
}

/**
 * Gets the run file path for a specific model and dataset combination.
 */
export function runFilePath(outdir: string, modelId: string, datasetName: string): string {
  return path.join(outdir, modelDirName(modelId), `${pathSlug(datasetName)}.jsonl`)
}

function emptyIndex(modelId: string): ModelRunIndex {
  return { modelId, successes: new Map(), failures: new Map() }
}

function indexEntry(index: ModelRunIndex, entry: RunEntry) {
  if (entry.ok) {
    if (index.successes.has(entry.record_id)) return
    index.successes.set(entry.record_id, entry)
    index.failures.delete(entry.record_id)
  } else if (!index.successes.has(entry.record_id)) {
    index.failures.set(entry.record_id, entry)
  }
}

/**
 * Loads the key-presence index of a run file. A missing file is an empty run.
 * Entries are keyed by (model, record id): lines written for another model
 * are skipped.
 * @param filePath - Path to the run file.
 * @param modelId - Model the file belongs to; when omitted, the model of the first entry.
 */
export async function loadRunIndex(filePath: string, modelId?: string): Promise<ModelRunIndex> {
  let text: string
  try {
    text = await readFile(filePath, "utf8")
  } catch (err) {
    // No run file yet means nothing is completed
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return emptyIndex(modelId ?? "")
    throw err
  }

  const lines = text.split(/\r?\n/)
  let index: ModelRunIndex | undefined = modelId === undefined ? undefined : emptyIndex(modelId)
  let foreign = 0
  for (let i = 0; i < lines.length; i++) {
    const t = lines[i].trim()
    if (!t) continue
    let raw: unknown
    try {
      raw = JSON.parse(t)
    } catch (err) {
      // A torn last line from an interrupted run; the pair is simply redone
      console.warn(`Skipping invalid run entry on line ${i + 1} of ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
      continue
    }
    const parsed = runEntrySchema.safeParse(raw)
    if (!parsed.success) {
      console.warn(`Skipping malformed run entry on line ${i + 1} of ${filePath}`)
      continue
    }
    index ??= emptyIndex(parsed.data.model)
    if (parsed.data.model !== index.modelId) {
      foreign++
      continue
    }
    indexEntry(index, parsed.data)
  }
  if (foreign > 0) {
    console.warn(`Skipping ${foreign} run entr${foreign === 1 ? "y" : "ies"} of other models in ${filePath}`)
  }
  return index ?? emptyIndex("")
}

/**
 * Append-only store of raw outputs for one (model, dataset) pair.
 *
 * Successes are write-if-absent per record id. Writes are serialized through
 * one file handle; `claim` gives in-process mutual exclusion per key for
 * callers that work on the same store concurrently.
 */
export class RunStore {
  private readonly inFlight = new Set<string>()
  private writes: Promise<void> = Promise.resolve()
  private closed = false

  private constructor(
    readonly modelId: string,
    readonly filePath: string,
    private readonly handle: FileHandle,
    private readonly index: ModelRunIndex,
  ) {}

  static async open(params: RunStoreParams): Promise<RunStore> {
    if (!params.outdir || !params.modelId || !params.datasetName) {
      throw new Error("All run store parameters must be provided")
    }
    const filePath = runFilePath(params.outdir, params.modelId, params.datasetName)
    await mkdir(path.dirname(filePath), { recursive: true })
    if (params.overwrite) {
      const handle = await open(filePath, "w")
      return new RunStore(params.modelId, filePath, handle, emptyIndex(params.modelId))
    }
    const index = await loadRunIndex(filePath, params.modelId)
    const handle = await open(filePath, "a")
    return new RunStore(params.modelId, filePath, handle, index)
  }

  get completedCount(): number {
    return this.index.successes.size
  }

  has(recordId: string): boolean {
    return this.index.successes.has(recordId)
  }

  lastFailure(recordId: string): RunFailure | undefined {
    return this.index.failures.get(recordId)
  }

  /**
   * Reserves a record id for invocation. False when it is done or already reserved.
   */
  claim(recordId: string): boolean {
    if (this.has(recordId) || this.inFlight.has(recordId)) return false
    this.inFlight.add(recordId)
    return true
  }

  release(recordId: string): void {
    this.inFlight.delete(recordId)
  }

  /**
   * Persists a successful output unless one is already stored for the id.
   * @returns false when the id was already completed.
   */
  async recordSuccess(
    entry: Omit<RunSuccess, "v" | "ok" | "model" | "timestamp"> & { timestamp?: string },
  ): Promise<boolean> {
    if (this.has(entry.record_id)) return false
    const full: RunSuccess = {
      v: RUN_ENTRY_VERSION,
      model: this.modelId,
      record_id: entry.record_id,
      ok: true,
      response: entry.response,
      prompt_sha256: entry.prompt_sha256,
      attempts: entry.attempts,
      latency_ms: entry.latency_ms,
      usage: entry.usage,
      timestamp: entry.timestamp ?? new Date().toISOString(),
    }
    indexEntry(this.index, full)
    await this.append(full)
    return true
  }

  async recordFailure(
    entry: Omit<RunFailure, "v" | "ok" | "model" | "timestamp"> & { timestamp?: string },
  ): Promise<void> {
    const full: RunFailure = {
      v: RUN_ENTRY_VERSION,
      model: this.modelId,
      record_id: entry.record_id,
      ok: false,
      error: entry.error,
      attempts: entry.attempts,
      timed_out: entry.timed_out,
      timestamp: entry.timestamp ?? new Date().toISOString(),
    }
    indexEntry(this.index, full)
    await this.append(full)
  }

  private append(entry: RunEntry): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error(`Run store ${this.filePath} is closed`))
    }
    const line = JSON.stringify(entry) + "\n"
    this.writes = this.writes.then(() => this.handle.appendFile(line, "utf8"))
    return this.writes
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    try {
      await this.writes
    } finally {
      await this.handle.close()
    }
  }
}

/**
 * Opens a run store, hands it to `fn` and closes it on every path.
 */
export async function withRunStore<T>(
  params: RunStoreParams,
  fn: (store: RunStore) => Promise<T>,
): Promise<T> {
  const store = await RunStore.open(params)
  try {
    return await fn(store)
  } finally {
    await store.close()
  }
}

/**
 * Loads every model's run index for one dataset from a run directory
 * (`<rundir>/<model dir>/<dataset>.jsonl`). Models are named by the entries
 * themselves; directories without a run file for the dataset are ignored.
 */
export async function readRunDir(rundir: string, datasetName: string): Promise<Map<string, ModelRunIndex>> {
  let entries: Dirent[]
  try {
    entries = await readdir(rundir, { withFileTypes: true })
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`Run directory not found: ${rundir}`)
    }
    throw err
  }

  const runs = new Map<string, ModelRunIndex>()
  const dirs = entries.filter((e) => e.isDirectory()).map((e) => e.name).sort()
  for (const dir of dirs) {
    const filePath = path.join(rundir, dir, `${pathSlug(datasetName)}.jsonl`)
    const index = await loadRunIndex(filePath)
    if (index.successes.size === 0 && index.failures.size === 0) continue
    if (runs.has(index.modelId)) {
      console.warn(`Ignoring ${filePath}: outputs of ${index.modelId} were already read from another directory`)
      continue
    }
    runs.set(index.modelId, index)
  }
  return runs
}
