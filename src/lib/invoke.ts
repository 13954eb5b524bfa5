import { generateText } from "ai"
import { createOpenRouter } from "@openrouter/ai-sdk-provider"
import { z } from "zod"
import { InvocationFailure, errorMessage } from "./errors"
import { sleep } from "./pool"

export type TokenUsage = {
  promptTokens?: number
  completionTokens?: number
  totalTokens?: number
}

export type InvokeResult = {
  text: string
  usage?: TokenUsage
}

/**
 * Sampling settings sent with every request. `numCtx` only reaches Ollama;
 * OpenRouter picks the context window per model.
 */
export type DecodingOptions = {
  temperature: number
  topP: number
  numCtx: number
  seed: number
}

export const DEFAULT_DECODING: DecodingOptions = {
  temperature: 0,
  topP: 1,
  numCtx: 4096,
  seed: 0,
}

/**
 * The model collaborator: takes a prompt, returns text. Implementations must
 * honour `signal` so timed-out attempts stop consuming the endpoint.
 */
export type ModelInvoker = (
  modelId: string,
  prompt: string,
  options: { signal: AbortSignal; decoding: DecodingOptions },
) => Promise<InvokeResult>

export type RetryPolicy = {
  timeoutMs: number
  maxRetries: number
  retryDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  timeoutMs: 600_000,
  maxRetries: 2,
  retryDelayMs: 2_000,
}

export const OLLAMA_PREFIX = "ollama:"
export const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434"

/**
 * Serving endpoint of a model. Every `ollama:` model shares the one local
 * server; each hosted model counts as its own endpoint.
 */
export function modelEndpoint(modelId: string): string {
  return modelId.startsWith(OLLAMA_PREFIX) ? "ollama" : `openrouter:${modelId}`
}

/**
 * Invokes models through OpenRouter with the AI SDK.
 */
export function createOpenRouterInvoker(params: { apiKey: string; maxTokens?: number }): ModelInvoker {
  if (!params.apiKey) {
    throw new Error("OpenRouter API key must be a non-empty string")
  }
  const openrouter = createOpenRouter({ apiKey: params.apiKey })

  return async (modelId, prompt, { signal, decoding }) => {
    const result = await generateText({
      model: openrouter.chat(modelId),
      prompt,
      temperature: decoding.temperature,
      topP: decoding.topP,
      seed: decoding.seed,
      maxTokens: params.maxTokens,
      abortSignal: signal,
      // retries are owned by invokeWithRetry
      maxRetries: 0,
    })
    return {
      text: result.text,
      usage: {
        promptTokens: result.usage.promptTokens,
        completionTokens: result.usage.completionTokens,
        totalTokens: result.usage.totalTokens,
      },
    }
  }
}

export type OllamaOptions = {
  baseUrl?: string
  fetch?: typeof fetch
}

const ollamaResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
})

/**
 * Invokes a local Ollama server through `/api/generate` (non-streaming).
 */
export function createOllamaInvoker(options: OllamaOptions = {}): ModelInvoker {
  const baseUrl = (options.baseUrl ?? DEFAULT_OLLAMA_BASE_URL).replace(/\/+$/, "")
  const doFetch = options.fetch ?? fetch

  return async (modelId, prompt, { signal, decoding }) => {
    const res = await doFetch(`${baseUrl}/api/generate`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model: modelId,
        prompt,
        stream: false,
        options: {
          temperature: decoding.temperature,
          top_p: decoding.topP,
          num_ctx: decoding.numCtx,
          seed: decoding.seed,
        },
      }),
      signal,
    })
    if (!res.ok) {
      const body = await res.text()
      throw new Error(`Ollama returned HTTP ${res.status}: ${body.slice(0, 200)}`)
    }
    const data = ollamaResponseSchema.parse(await res.json())
    const promptTokens = data.prompt_eval_count
    const completionTokens = data.eval_count
    return {
      text: data.response,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens:
          promptTokens !== undefined && completionTokens !== undefined
            ? promptTokens + completionTokens
            : undefined,
      },
    }
  }
}

/**
 * Routes `ollama:<tag>` model ids to Ollama and everything else to OpenRouter.
 * Each backend is created on first use, so a run over local models needs no API key.
 */
export function createRoutingInvoker(config: {
  openrouterApiKey?: string
  ollama?: OllamaOptions
}): ModelInvoker {
  let openrouter: ModelInvoker | undefined
  let ollama: ModelInvoker | undefined

  return (modelId, prompt, options) => {
    if (modelId.startsWith(OLLAMA_PREFIX)) {
      ollama ??= createOllamaInvoker(config.ollama)
      return ollama(modelId.slice(OLLAMA_PREFIX.length), prompt, options)
    }
    if (!config.openrouterApiKey) {
      throw new Error(
        `Missing OPENROUTER_API_KEY env var, required for model ${modelId}. Set it (or use an ${OLLAMA_PREFIX}<tag> model) and rerun.`,
      )
    }
    openrouter ??= createOpenRouterInvoker({ apiKey: config.openrouterApiKey })
    return openrouter(modelId, prompt, options)
  }
}

class AttemptTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`)
  }
}

async function attemptOnce(
  invoker: ModelInvoker,
  modelId: string,
  prompt: string,
  timeoutMs: number,
  decoding: DecodingOptions,
): Promise<InvokeResult> {
  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new AttemptTimeout(timeoutMs))
    }, timeoutMs)
  })
  try {
    // an invoker that ignores the signal still loses the race
    return await Promise.race([
      Promise.resolve().then(() => invoker(modelId, prompt, { signal: controller.signal, decoding })),
      timeout,
    ])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Calls the collaborator with a per-attempt timeout, retrying up to `maxRetries` times.
 * @returns The model text plus the number of attempts it took and the latency of the successful attempt.
 * @throws InvocationFailure once every attempt has failed.
 */
export async function invokeWithRetry(
  invoker: ModelInvoker,
  modelId: string,
  prompt: string,
  policy: RetryPolicy,
  decoding: DecodingOptions = DEFAULT_DECODING,
): Promise<InvokeResult & { attempts: number; latencyMs: number }> {
  const maxAttempts = Math.max(0, policy.maxRetries) + 1
  let lastError: unknown
  let timedOut = false

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const start = performance.now()
    try {
      const result = await attemptOnce(invoker, modelId, prompt, policy.timeoutMs, decoding)
      return { ...result, attempts: attempt, latencyMs: performance.now() - start }
    } catch (err) {
      lastError = err
      timedOut = err instanceof AttemptTimeout
    }
    if (attempt < maxAttempts && policy.retryDelayMs > 0) {
      await sleep(policy.retryDelayMs * attempt)
    }
  }

  throw new InvocationFailure(
    modelId,
    `${modelId}: invocation failed after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`,
    { attempts: maxAttempts, timedOut, cause: lastError },
  )
}
