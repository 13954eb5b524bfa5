import { DEFAULT_OLLAMA_BASE_URL, DEFAULT_RETRY_POLICY, type RetryPolicy } from "../lib/invoke"

export type Settings = {
  openrouterApiKey?: string
  ollamaBaseUrl: string
  retry: RetryPolicy
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw === "") return fallback
  const n = Number.parseInt(raw, 10)
  if (isNaN(n) || n < 0) {
    throw new Error(`Invalid ${name}: ${raw}. Must be a non-negative integer.`)
  }
  return n
}

/**
 * Reads settings from the environment. CLI flags override the retry values.
 *
 * - `OPENROUTER_API_KEY`: required only for non-`ollama:` models.
 * - `OLLAMA_BASE_URL`: defaults to the local server.
 * - `OLYLEAK_TIMEOUT_MS`, `OLYLEAK_MAX_RETRIES`, `OLYLEAK_RETRY_DELAY_MS`.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    openrouterApiKey: env.OPENROUTER_API_KEY || undefined,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || DEFAULT_OLLAMA_BASE_URL,
    retry: {
      timeoutMs: positiveInt(env, "OLYLEAK_TIMEOUT_MS", DEFAULT_RETRY_POLICY.timeoutMs),
      maxRetries: positiveInt(env, "OLYLEAK_MAX_RETRIES", DEFAULT_RETRY_POLICY.maxRetries),
      retryDelayMs: positiveInt(env, "OLYLEAK_RETRY_DELAY_MS", DEFAULT_RETRY_POLICY.retryDelayMs),
    },
  }
}
